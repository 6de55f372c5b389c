import type { PatternSet } from "@claimmark/patterns";
import { ReportSession, type SessionOptions } from "./session.js";
import type { ClaimLine, MalformedClaimLine, WorldScanResult } from "./types.js";

/** Harvests the distinct world names a report mentions, first-seen order. */
export class WorldCatalogScan extends ReportSession<WorldScanResult> {
  private readonly worlds = new Set<string>();

  public constructor(patterns: PatternSet, options: SessionOptions) {
    super(patterns, options);
  }

  protected onClaim(line: ClaimLine): void {
    this.worlds.add(line.world);
  }

  protected onMalformed(line: MalformedClaimLine): void {
    if (line.world !== null) this.worlds.add(line.world);
  }

  protected result(): WorldScanResult {
    return {
      worlds: [...this.worlds],
      unrecognized: this.unrecognized,
      diagnostics: [...this.diagnostics]
    };
  }
}
