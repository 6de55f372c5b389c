import type { WaypointColor } from "@claimmark/core";

export interface ClaimPointSettings {
  nameFormat: string;
  alias: string;
  color: string;
}

export interface ReportSettings {
  firstLinePattern: string;
  claimLinePattern: string;
  ignoredLinePatterns: string[];
  endingLinePatterns: string[];
}

export interface ClaimSettings {
  claimPoint: ClaimPointSettings;
  report: ReportSettings;
}

export const DEFAULT_NAME_FORMAT = "Claim (%d)";
export const DEFAULT_ALIAS = "CP";
// Last entry of the color table.
export const DEFAULT_COLOR: WaypointColor = "white";

export const DEFAULT_FIRST_LINE_PATTERN = "^-?\\d+ blocks from play \\+ -?\\d+ bonus = -?\\d+ total.$";
export const DEFAULT_CLAIM_LINE_PATTERN = "^(.+): x(-?\\d+), z(-?\\d+) \\(-?(\\d+) blocks\\)$";
export const DEFAULT_IGNORED_LINE_PATTERNS: readonly string[] = ["^Claims:$"];
export const DEFAULT_ENDING_LINE_PATTERNS: readonly string[] = ["^ = -?\\d* blocks left to spend$"];

export function defaultSettings(): ClaimSettings {
  return {
    claimPoint: {
      nameFormat: DEFAULT_NAME_FORMAT,
      alias: DEFAULT_ALIAS,
      color: DEFAULT_COLOR
    },
    report: {
      firstLinePattern: DEFAULT_FIRST_LINE_PATTERN,
      claimLinePattern: DEFAULT_CLAIM_LINE_PATTERN,
      ignoredLinePatterns: [...DEFAULT_IGNORED_LINE_PATTERNS],
      endingLinePatterns: [...DEFAULT_ENDING_LINE_PATTERNS]
    }
  };
}

export function withClaimPoint(settings: ClaimSettings, patch: Partial<ClaimPointSettings>): ClaimSettings {
  return {
    claimPoint: { ...settings.claimPoint, ...patch },
    report: {
      ...settings.report,
      ignoredLinePatterns: [...settings.report.ignoredLinePatterns],
      endingLinePatterns: [...settings.report.endingLinePatterns]
    }
  };
}
