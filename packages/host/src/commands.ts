import { WAYPOINT_COLORS, type ScanKind } from "@claimmark/core";
import type { ClaimEngine, ClientBridge } from "./engine.js";

export const COMMAND_PREFIX = "/cp";

const HELP: ReadonlyArray<readonly [string, string]> = [
  ["/cp worlds", "Lists the worlds in which you have active claims, and stores them for autocompletion."],
  ["/cp add <world>", "Adds a ClaimPoint at the corner of every claim in the world."],
  ["/cp clean <world>", "Removes all ClaimPoints that do not match a claim in the world."],
  ["/cp update <world>", "Combines add and clean, and also updates ClaimPoint size indicators."],
  ["/cp waypoints show", "Shows all ClaimPoints."],
  ["/cp waypoints hide", "Hides all ClaimPoints."],
  ["/cp waypoints clear", "Permanently deletes all ClaimPoints."],
  ["/cp waypoints set nameformat <format>", "Sets the name format of all ClaimPoints. The format must contain %d."],
  ["/cp waypoints set alias <alias>", "Sets the alias (symbol) of all ClaimPoints, at most 2 characters."],
  ["/cp waypoints set color <color>", "Sets the color of all ClaimPoints."]
];

export function helpText(): string {
  return HELP.map(([usage, text]) => `${usage}\n  ${text}`).join("\n");
}

/** Splits off the first word; the remainder keeps its inner spacing. */
function splitFirst(text: string): [string, string] {
  const match = /^(\S+)\s*([\s\S]*)$/.exec(text.trim());
  return match ? [match[1] ?? "", match[2] ?? ""] : ["", ""];
}

function isScanKind(word: string): word is ScanKind {
  return word === "add" || word === "clean" || word === "update";
}

/**
 * Runs one `/cp` command line against the engine. Returns false when the
 * input is not a `/cp` command at all.
 */
export function dispatchCommand(engine: ClaimEngine, client: ClientBridge, input: string, now: number): boolean {
  const [root, rest] = splitFirst(input);
  if (root !== COMMAND_PREFIX) return false;

  const [sub, args] = splitFirst(rest);
  if (sub === "" || sub === "help") {
    client.showMessage(helpText());
    return true;
  }

  if (sub === "worlds") {
    engine.startWorldScan(now);
    return true;
  }

  if (isScanKind(sub)) {
    if (!args) {
      client.showMessage(`Missing world name. Usage: ${COMMAND_PREFIX} ${sub} <world>`);
      return true;
    }
    engine.startClaimScan(args, sub, now);
    return true;
  }

  if (sub === "waypoints") {
    runWaypoints(engine, client, args);
    return true;
  }

  client.showMessage(`Unknown command '${input.trim()}'. Try ${COMMAND_PREFIX} help.`);
  return true;
}

function runWaypoints(engine: ClaimEngine, client: ClientBridge, args: string): void {
  const [action, rest] = splitFirst(args);
  switch (action) {
    case "show":
      engine.showClaimPoints();
      return;
    case "hide":
      engine.hideClaimPoints();
      return;
    case "clear":
      engine.clearClaimPoints();
      return;
    case "set": {
      const [field, value] = splitFirst(rest);
      if (!value) {
        client.showMessage(`Usage: ${COMMAND_PREFIX} waypoints set nameformat|alias|color <value>`);
        return;
      }
      if (field === "nameformat") engine.setNameFormat(value);
      else if (field === "alias") engine.setAlias(value);
      else if (field === "color") engine.setColor(value);
      else client.showMessage(`Unknown setting '${field}'.`);
      return;
    }
    default:
      client.showMessage(`Usage: ${COMMAND_PREFIX} waypoints show|hide|clear|set`);
  }
}

function startingWith(options: readonly string[], partial: string): string[] {
  const lowered = partial.toLowerCase();
  return options.filter((o) => o.toLowerCase().startsWith(lowered));
}

/** Completions for the last argument of a partially typed command. */
export function suggest(engine: ClaimEngine, input: string): string[] {
  const [root, rest] = splitFirst(input);
  if (root !== COMMAND_PREFIX) return [];
  const [sub, args] = splitFirst(rest);
  const endsWithSpace = /\s$/.test(input);

  if (!args && !endsWithSpace) {
    return startingWith(["help", "worlds", "add", "clean", "update", "waypoints"], sub);
  }
  if (isScanKind(sub)) {
    return startingWith(engine.getKnownWorlds(), args);
  }
  if (sub === "waypoints") {
    const [action, setArgs] = splitFirst(args);
    if (action === "set") {
      const [field, value] = splitFirst(setArgs);
      if (field === "color") return startingWith(WAYPOINT_COLORS, value);
      return startingWith(["nameformat", "alias", "color"], field);
    }
    return startingWith(["show", "hide", "clear", "set"], action);
  }
  return [];
}
