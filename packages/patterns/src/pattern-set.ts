import { colorIndex, isWaypointColor, parseUnsignedInt32, type WaypointColor } from "@claimmark/core";
import { ConfigError } from "./errors.js";
import type { ClaimSettings } from "./settings.js";

export const SIZE_PLACEHOLDER = "%d";
export const MAX_ALIAS_LENGTH = 2;
export const CLAIM_GROUP_COUNT = 4;

/**
 * Compiled, validated view of {@link ClaimSettings}. Never mutated: an edit
 * builds a new set so a scan in progress cannot observe half an update.
 */
export interface PatternSet {
  readonly start: RegExp;
  readonly claim: RegExp;
  readonly ignored: readonly RegExp[];
  readonly end: readonly RegExp[];
  readonly nameFormat: string;
  readonly namePattern: RegExp;
  readonly alias: string;
  readonly color: WaypointColor;
  readonly colorIndex: number;
  readonly settings: Readonly<ClaimSettings>;
}

function countOccurrences(text: string, token: string): number {
  return text.split(token).length - 1;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function deriveNamePattern(nameFormat: string): string {
  const count = countOccurrences(nameFormat, SIZE_PLACEHOLDER);
  if (count !== 1) {
    throw new ConfigError(
      "MissingPlaceholder",
      `Name format '${nameFormat}' must contain ${SIZE_PLACEHOLDER} exactly once (found ${count}).`
    );
  }
  const idx = nameFormat.indexOf(SIZE_PLACEHOLDER);
  const prefix = nameFormat.slice(0, idx);
  const suffix = nameFormat.slice(idx + SIZE_PLACEHOLDER.length);
  return `^${escapeRegExp(prefix)}(\\d+)${escapeRegExp(suffix)}$`;
}

function compileAnchored(source: string, field: string): RegExp {
  try {
    return new RegExp(`^(?:${source})$`);
  } catch (error) {
    throw new ConfigError("BadPattern", `Pattern '${source}' in ${field} does not compile.`, { cause: error });
  }
}

function captureGroupCount(re: RegExp): number {
  // The empty alternative always matches, so exec() reports every group slot.
  const match = new RegExp(`${re.source}|`).exec("");
  return match ? match.length - 1 : 0;
}

export function truncateAlias(alias: string): string {
  return alias.length <= MAX_ALIAS_LENGTH ? alias : alias.slice(0, MAX_ALIAS_LENGTH);
}

export function buildPatternSet(settings: ClaimSettings): PatternSet {
  const { claimPoint, report } = settings;

  const namePattern = new RegExp(deriveNamePattern(claimPoint.nameFormat));

  if (claimPoint.alias.length > MAX_ALIAS_LENGTH) {
    throw new ConfigError("BadAlias", `Alias '${claimPoint.alias}' is longer than ${MAX_ALIAS_LENGTH} characters.`);
  }

  const color = claimPoint.color;
  if (!isWaypointColor(color)) {
    throw new ConfigError("UnknownColor", `Color '${color}' is not a valid waypoint color.`);
  }

  const start = compileAnchored(report.firstLinePattern, "firstLinePattern");
  const claim = compileAnchored(report.claimLinePattern, "claimLinePattern");
  const groups = captureGroupCount(claim);
  if (groups !== CLAIM_GROUP_COUNT) {
    throw new ConfigError(
      "BadPattern",
      `Claim line pattern '${report.claimLinePattern}' needs ${CLAIM_GROUP_COUNT} capture groups (world, x, z, size), found ${groups}.`
    );
  }
  const ignored = report.ignoredLinePatterns.map((p, i) => compileAnchored(p, `ignoredLinePatterns[${i}]`));
  const end = report.endingLinePatterns.map((p, i) => compileAnchored(p, `endingLinePatterns[${i}]`));

  return Object.freeze({
    start,
    claim,
    ignored: Object.freeze(ignored),
    end: Object.freeze(end),
    nameFormat: claimPoint.nameFormat,
    namePattern,
    alias: claimPoint.alias,
    color,
    colorIndex: colorIndex(color),
    settings: Object.freeze({
      claimPoint: Object.freeze({ ...claimPoint }),
      report: Object.freeze({
        ...report,
        ignoredLinePatterns: [...report.ignoredLinePatterns],
        endingLinePatterns: [...report.endingLinePatterns]
      })
    })
  });
}

export function formatLabel(patterns: Pick<PatternSet, "nameFormat">, size: number): string {
  return patterns.nameFormat.replace(SIZE_PLACEHOLDER, () => String(size));
}

/** Returns the size encoded in a label, or null when the label does not follow the name format. */
export function parseLabelSize(patterns: Pick<PatternSet, "namePattern">, label: string): number | null {
  const match = patterns.namePattern.exec(label);
  if (!match) return null;
  const size = parseUnsignedInt32(match[1]);
  return size.ok ? size.value : null;
}
