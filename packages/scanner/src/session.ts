import type { ClaimRecord, ScanKind } from "@claimmark/core";
import type { PatternSet } from "@claimmark/patterns";
import { classifyLine, describeExtractionError } from "./classify.js";
import type {
  ClaimLine,
  ClaimScanResult,
  Diagnostic,
  ExtractionErrorCode,
  MalformedClaimLine,
  SessionOutcome,
  SessionState
} from "./types.js";

const DIAGNOSTIC_CODES: Record<ExtractionErrorCode, string> = {
  NumericOverflow: "CLAIM_NUMERIC_OVERFLOW",
  NotANumber: "CLAIM_NOT_A_NUMBER",
  MissingGroup: "CLAIM_GROUP_MISSING"
};

/** How long a session waits for the end of the report, measured from its creation. */
export const SCAN_TIMEOUT_MS = 10_000;

export interface SessionOptions {
  startedAt: number;
  timeoutMs?: number;
}

/**
 * Line-driven state machine shared by claim and world scans. Everything
 * before the report's first line is discarded; the session never holds a
 * timer, the owner polls {@link ReportSession.pollTimeout}.
 */
export abstract class ReportSession<TResult> {
  public readonly startedAt: number;
  public readonly timeoutMs: number;
  protected readonly patterns: PatternSet;

  private current: SessionState = "awaiting-start";
  private linesSeen = 0;
  private unrecognizedLines = 0;
  private elapsedAtTimeout = 0;
  private readonly diagnosticList: Diagnostic[] = [];

  protected constructor(patterns: PatternSet, options: SessionOptions) {
    this.patterns = patterns;
    this.startedAt = options.startedAt;
    this.timeoutMs = options.timeoutMs ?? SCAN_TIMEOUT_MS;
  }

  public get state(): SessionState {
    return this.current;
  }

  public get unrecognized(): number {
    return this.unrecognizedLines;
  }

  public get diagnostics(): readonly Diagnostic[] {
    return this.diagnosticList;
  }

  public isTerminal(): boolean {
    return this.current === "completed" || this.current === "timed-out";
  }

  public feedLine(line: string): SessionState {
    if (this.isTerminal()) return this.current;
    this.linesSeen++;
    const classified = classifyLine(line, this.patterns);

    if (this.current === "awaiting-start") {
      if (classified.kind === "start") this.current = "collecting";
      return this.current;
    }

    switch (classified.kind) {
      case "end":
        this.current = "completed";
        break;
      case "claim":
        this.onClaim(classified);
        break;
      case "malformed":
        this.diagnosticList.push({
          code: DIAGNOSTIC_CODES[classified.error.code],
          severity: "warning",
          message: `Skipping claim line: ${describeExtractionError(classified.error)}`,
          line: this.linesSeen
        });
        this.onMalformed(classified);
        break;
      case "unrecognized":
        this.unrecognizedLines++;
        break;
      case "start":
      case "ignored":
        break;
    }
    return this.current;
  }

  public pollTimeout(now: number): SessionOutcome<TResult> {
    if (
      (this.current === "awaiting-start" || this.current === "collecting") &&
      now - this.startedAt >= this.timeoutMs
    ) {
      this.current = "timed-out";
      this.elapsedAtTimeout = now - this.startedAt;
    }
    return this.outcome();
  }

  public outcome(): SessionOutcome<TResult> {
    switch (this.current) {
      case "completed":
        return { status: "completed", result: this.result() };
      case "timed-out":
        return { status: "timed-out", elapsedMs: this.elapsedAtTimeout };
      case "awaiting-start":
      case "collecting":
        return { status: "pending", state: this.current };
    }
  }

  protected abstract onClaim(line: ClaimLine): void;

  protected onMalformed(_line: MalformedClaimLine): void {}

  protected abstract result(): TResult;
}

export interface ClaimScanOptions extends SessionOptions {
  world: string;
  kind: ScanKind;
}

/** Collects the claims of one world for an add, clean or update run. */
export class ClaimScanSession extends ReportSession<ClaimScanResult> {
  public readonly world: string;
  public readonly kind: ScanKind;
  private readonly records: ClaimRecord[] = [];
  private otherWorldLines = 0;

  public constructor(patterns: PatternSet, options: ClaimScanOptions) {
    super(patterns, options);
    this.world = options.world;
    this.kind = options.kind;
  }

  protected onClaim(line: ClaimLine): void {
    if (line.world !== this.world) {
      this.otherWorldLines++;
      return;
    }
    this.records.push({ world: this.world, x: line.x, z: line.z, size: line.size });
  }

  protected result(): ClaimScanResult {
    return {
      world: this.world,
      kind: this.kind,
      records: [...this.records],
      unrecognized: this.unrecognized,
      otherWorld: this.otherWorldLines,
      diagnostics: [...this.diagnostics]
    };
  }
}
