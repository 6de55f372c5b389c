export type ScanKind = "add" | "clean" | "update";

export const SCAN_KINDS: readonly ScanKind[] = ["add", "clean", "update"];

export interface Position {
  x: number;
  z: number;
}

export interface ClaimRecord {
  world: string;
  x: number;
  z: number;
  size: number;
}

/** Store-assigned waypoint id. */
export type MarkerRef = number;

export interface Marker {
  id: MarkerRef;
  x: number;
  z: number;
  label: string;
  alias: string;
  color: string;
  visible: boolean;
}

export interface Logger {
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
}
