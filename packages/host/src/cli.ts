#!/usr/bin/env node
import { createReadStream } from "node:fs";
import { resolve } from "node:path";
import { createInterface } from "node:readline";
import minimist from "minimist";
import { createConsoleLogger } from "@claimmark/core";
import { DEFAULT_CONFIG_PATH, YamlSettingsFile, dumpSettingsYaml, loadSettings } from "@claimmark/patterns";
import { SCAN_TIMEOUT_MS } from "@claimmark/scanner";
import { dispatchCommand } from "./commands.js";
import { openMarkerDb, SqliteMarkerStore } from "./db.js";
import { ClaimEngine, type ClientBridge } from "./engine.js";

const DEFAULT_STORE_PATH = "data/markers.sqlite";

function printHelp(): void {
  console.log(`claimmark

Usage:
  npm run claimmark -- replay <transcript|-> [--store data/markers.sqlite] [--config config/claimmark.yaml]
  npm run claimmark -- markers [--store data/markers.sqlite]
  npm run claimmark -- config [--config config/claimmark.yaml]

Replay reads a chat transcript line by line. Lines starting with "/" are run
as commands (for example "/cp add world"), every other line is treated as
server chat.

Options:
  --store <path>           SQLite waypoint store (default: ${DEFAULT_STORE_PATH})
  --config <path>          YAML settings file (default: ${DEFAULT_CONFIG_PATH})
  --timeout <ms>           Give up on a report after this long (default: ${SCAN_TIMEOUT_MS})
`);
}

async function replay(source: string, engine: ClaimEngine, client: ClientBridge): Promise<void> {
  const input = source === "-" ? process.stdin : createReadStream(resolve(source), "utf8");
  const lines = createInterface({ input, crlfDelay: Infinity });

  for await (const line of lines) {
    const now = Date.now();
    engine.pollTimeout(now);
    if (line.startsWith("/")) {
      if (!dispatchCommand(engine, client, line, now)) {
        client.showMessage(`Unknown command '${line}'.`);
      }
    } else {
      engine.feedLine(line);
    }
  }

  // End of input: nothing else will arrive, so let a pending scan run out its clock.
  const deadline = engine.deadline();
  if (deadline !== null) {
    engine.pollTimeout(deadline);
  }
}

async function run(): Promise<void> {
  const argv = minimist(process.argv.slice(2), {
    string: ["store", "config", "timeout"],
    default: {
      store: DEFAULT_STORE_PATH,
      config: DEFAULT_CONFIG_PATH
    }
  });

  const command = argv._[0];
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  const logger = createConsoleLogger();

  if (command === "config") {
    const patterns = loadSettings(new YamlSettingsFile(String(argv.config), logger), logger);
    console.log(dumpSettingsYaml(patterns.settings));
    return;
  }

  const store = new SqliteMarkerStore(openMarkerDb(resolve(String(argv.store))));
  try {
    if (command === "markers") {
      console.log(JSON.stringify(store.listMarkers(), null, 2));
      return;
    }

    if (command !== "replay") {
      throw new Error(`Unknown command: ${String(command)}`);
    }

    const source = argv._[1];
    if (source === undefined) {
      throw new Error("Missing transcript argument.");
    }

    const timeoutMs = argv.timeout ? Number(argv.timeout) : undefined;
    if (timeoutMs !== undefined && !(Number.isFinite(timeoutMs) && timeoutMs > 0)) {
      throw new Error(`Invalid --timeout: ${String(argv.timeout)}`);
    }

    const client: ClientBridge = {
      sendCommand: (cmd) => logger.info(`> /${cmd}`),
      showMessage: (message) => console.log(message)
    };
    const engine = new ClaimEngine({
      store,
      client,
      settings: new YamlSettingsFile(String(argv.config), logger),
      logger,
      timeoutMs
    });
    await replay(String(source), engine, client);
    logger.info(`${store.count()} waypoints in ${resolve(String(argv.store))}`);
  } finally {
    store.close();
  }
}

run().catch((error) => {
  console.error(`[claimmark] ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && typeof error.stack === "string" && error.stack.trim()) {
    console.error(error.stack);
  }
  process.exit(1);
});
