import { existsSync, mkdirSync, readFileSync, renameSync, statSync, writeFileSync } from "node:fs";
import { basename, dirname, resolve } from "node:path";
import YAML from "js-yaml";
import { z } from "zod";
import type { Logger } from "@claimmark/core";
import { ConfigError } from "./errors.js";
import { buildPatternSet, type PatternSet } from "./pattern-set.js";
import {
  DEFAULT_ALIAS,
  DEFAULT_CLAIM_LINE_PATTERN,
  DEFAULT_COLOR,
  DEFAULT_ENDING_LINE_PATTERNS,
  DEFAULT_FIRST_LINE_PATTERN,
  DEFAULT_IGNORED_LINE_PATTERNS,
  DEFAULT_NAME_FORMAT,
  defaultSettings,
  type ClaimSettings
} from "./settings.js";

export const DEFAULT_CONFIG_PATH = "config/claimmark.yaml";

/** On-disk shape: snake_case keys, every field optional and defaulted. */
const settingsFileSchema = z.object({
  claim_point: z
    .object({
      name_format: z.string().default(DEFAULT_NAME_FORMAT),
      alias: z.string().default(DEFAULT_ALIAS),
      color: z.string().default(DEFAULT_COLOR)
    })
    .default({}),
  report: z
    .object({
      first_line_pattern: z.string().default(DEFAULT_FIRST_LINE_PATTERN),
      claim_line_pattern: z.string().default(DEFAULT_CLAIM_LINE_PATTERN),
      ignored_line_patterns: z.array(z.string()).default([...DEFAULT_IGNORED_LINE_PATTERNS]),
      ending_line_patterns: z.array(z.string()).default([...DEFAULT_ENDING_LINE_PATTERNS])
    })
    .default({})
});

type SettingsFile = z.infer<typeof settingsFileSchema>;

function fromFile(file: SettingsFile): ClaimSettings {
  return {
    claimPoint: {
      nameFormat: file.claim_point.name_format,
      alias: file.claim_point.alias,
      color: file.claim_point.color
    },
    report: {
      firstLinePattern: file.report.first_line_pattern,
      claimLinePattern: file.report.claim_line_pattern,
      ignoredLinePatterns: file.report.ignored_line_patterns,
      endingLinePatterns: file.report.ending_line_patterns
    }
  };
}

function toFile(settings: ClaimSettings): SettingsFile {
  return {
    claim_point: {
      name_format: settings.claimPoint.nameFormat,
      alias: settings.claimPoint.alias,
      color: settings.claimPoint.color
    },
    report: {
      first_line_pattern: settings.report.firstLinePattern,
      claim_line_pattern: settings.report.claimLinePattern,
      ignored_line_patterns: [...settings.report.ignoredLinePatterns],
      ending_line_patterns: [...settings.report.endingLinePatterns]
    }
  };
}

export function parseSettingsYaml(raw: string): ClaimSettings {
  const parsed: unknown = YAML.load(raw);
  return fromFile(settingsFileSchema.parse(parsed ?? {}));
}

export function dumpSettingsYaml(settings: ClaimSettings): string {
  return YAML.dump(toFile(settings), { lineWidth: -1 });
}

export interface SettingsRepository {
  /** Null when nothing usable is stored. */
  load(): ClaimSettings | null;
  save(settings: ClaimSettings): void;
}

export class YamlSettingsFile implements SettingsRepository {
  public readonly path: string;
  private readonly logger: Logger;

  public constructor(path: string, logger: Logger) {
    this.path = resolve(path);
    this.logger = logger;
  }

  public load(): ClaimSettings | null {
    if (!existsSync(this.path)) {
      this.logger.warn(`Unable to locate config file '${basename(this.path)}'.`);
      return null;
    }
    try {
      return parseSettingsYaml(readFileSync(this.path, "utf8"));
    } catch (error) {
      this.logger.error(`Unable to load config from file '${this.path}'.`, error);
      return null;
    }
  }

  public save(settings: ClaimSettings): void {
    const dir = dirname(this.path);
    try {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      } else if (!statSync(dir).isDirectory()) {
        throw new Error(`Not a directory: ${dir}`);
      }
      // Write beside the target, then swap it in with a single rename.
      const tempPath = `${this.path}.tmp`;
      writeFileSync(tempPath, dumpSettingsYaml(settings), "utf8");
      renameSync(tempPath, this.path);
    } catch (error) {
      throw new Error("Unable to update config file.", { cause: error });
    }
  }
}

/**
 * Loads and validates stored settings. Anything missing or invalid is
 * replaced by the defaults, and the result is written back.
 */
export function loadSettings(repository: SettingsRepository, logger: Logger): PatternSet {
  const stored = repository.load();
  let patterns: PatternSet;

  if (!stored) {
    logger.info("Using default configuration.");
    patterns = buildPatternSet(defaultSettings());
  } else {
    try {
      patterns = buildPatternSet(stored);
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      logger.warn(`Invalid config (${error.code}).`, error);
      logger.info("Using default configuration.");
      patterns = buildPatternSet(defaultSettings());
    }
  }

  repository.save(patterns.settings);
  return patterns;
}
