import type { ClaimRecord, Marker, Position } from "./types.js";

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

export type IntParseResult =
  | { ok: true; value: number }
  | { ok: false; reason: "NotANumber" | "NumericOverflow" };

export function positionKey(x: number, z: number): string {
  return `${x},${z}`;
}

export function keyOf(item: Position | ClaimRecord | Marker): string {
  return positionKey(item.x, item.z);
}

/** Parses a block coordinate. Values outside the 32-bit range are rejected, not clamped. */
export function parseSignedInt32(text: string | undefined): IntParseResult {
  if (text === undefined || !/^[+-]?\d+$/.test(text.trim())) {
    return { ok: false, reason: "NotANumber" };
  }
  const value = Number(text.trim());
  if (!Number.isSafeInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    return { ok: false, reason: "NumericOverflow" };
  }
  return { ok: true, value };
}

export function parseUnsignedInt32(text: string | undefined): IntParseResult {
  if (text === undefined || !/^\+?\d+$/.test(text.trim())) {
    return { ok: false, reason: "NotANumber" };
  }
  const value = Number(text.trim());
  if (!Number.isSafeInteger(value) || value > INT32_MAX) {
    return { ok: false, reason: "NumericOverflow" };
  }
  return { ok: true, value };
}
