import { parseSignedInt32, parseUnsignedInt32 } from "@claimmark/core";
import type { PatternSet } from "@claimmark/patterns";
import type { ClaimLine, ExtractionError, LineClass, MalformedClaimLine } from "./types.js";

function numberError(
  world: string,
  field: ExtractionError["field"],
  text: string | undefined,
  reason: "NotANumber" | "NumericOverflow"
): MalformedClaimLine {
  const error: ExtractionError = text === undefined ? { code: "MissingGroup", field } : { code: reason, field, text };
  return { kind: "malformed", world, error };
}

function extractClaim(match: RegExpExecArray): ClaimLine | MalformedClaimLine {
  const [, world, xText, zText, sizeText] = match;
  if (world === undefined) {
    return { kind: "malformed", world: null, error: { code: "MissingGroup", field: "world" } };
  }

  const x = parseSignedInt32(xText);
  if (!x.ok) return numberError(world, "x", xText, x.reason);
  const z = parseSignedInt32(zText);
  if (!z.ok) return numberError(world, "z", zText, z.reason);
  const size = parseUnsignedInt32(sizeText);
  if (!size.ok) return numberError(world, "size", sizeText, size.reason);

  return { kind: "claim", world, x: x.value, z: z.value, size: size.value };
}

/**
 * Classifies one chat line. End is checked before ignored so a separator
 * shared by both can never swallow the terminator.
 */
export function classifyLine(line: string, patterns: PatternSet): LineClass {
  if (patterns.end.some((re) => re.test(line))) return { kind: "end" };
  if (patterns.ignored.some((re) => re.test(line))) return { kind: "ignored" };
  const claim = patterns.claim.exec(line);
  if (claim) return extractClaim(claim);
  if (patterns.start.test(line)) return { kind: "start" };
  return { kind: "unrecognized" };
}

export function describeExtractionError(error: ExtractionError): string {
  switch (error.code) {
    case "NumericOverflow":
      return `Claim ${error.field} '${error.text ?? ""}' is out of range.`;
    case "NotANumber":
      return `Claim ${error.field} '${error.text ?? ""}' is not an integer.`;
    case "MissingGroup":
      return `Claim line has no ${error.field} value.`;
  }
}
