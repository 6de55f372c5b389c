import type { ClaimRecord, ScanKind } from "@claimmark/core";

export type ExtractionErrorCode = "NumericOverflow" | "NotANumber" | "MissingGroup";

export interface ExtractionError {
  code: ExtractionErrorCode;
  field: "world" | "x" | "z" | "size";
  text?: string;
}

export interface ClaimLine {
  kind: "claim";
  world: string;
  x: number;
  z: number;
  size: number;
}

export interface MalformedClaimLine {
  kind: "malformed";
  /** Null when the world group itself did not match. */
  world: string | null;
  error: ExtractionError;
}

export type LineClass =
  | { kind: "start" }
  | { kind: "ignored" }
  | { kind: "end" }
  | { kind: "unrecognized" }
  | ClaimLine
  | MalformedClaimLine;

export type SessionState = "awaiting-start" | "collecting" | "completed" | "timed-out";

export interface Diagnostic {
  code: string;
  severity: "warning" | "error";
  message: string;
  line?: number;
}

export interface ClaimScanResult {
  world: string;
  kind: ScanKind;
  /** Arrival order, duplicates kept. */
  records: ClaimRecord[];
  unrecognized: number;
  otherWorld: number;
  diagnostics: Diagnostic[];
}

export interface WorldScanResult {
  worlds: string[];
  unrecognized: number;
  diagnostics: Diagnostic[];
}

export type SessionOutcome<TResult> =
  | { status: "pending"; state: "awaiting-start" | "collecting" }
  | { status: "completed"; result: TResult }
  | { status: "timed-out"; elapsedMs: number };
