import type { Marker } from "@claimmark/core";
import { parseLabelSize, type PatternSet } from "@claimmark/patterns";

export interface ClaimMarker {
  marker: Marker;
  /** Size decoded from the label. */
  size: number;
}

/**
 * A marker belongs to us when its label follows the name format and it
 * carries the configured alias and color. Anything else in the store is a
 * user waypoint and is never touched.
 */
export function asClaimMarker(marker: Marker, patterns: PatternSet): ClaimMarker | null {
  if (marker.alias !== patterns.alias || marker.color !== patterns.color) return null;
  const size = parseLabelSize(patterns, marker.label);
  return size === null ? null : { marker, size };
}

export function claimMarkers(markers: readonly Marker[], patterns: PatternSet): ClaimMarker[] {
  const out: ClaimMarker[] = [];
  for (const marker of markers) {
    const claim = asClaimMarker(marker, patterns);
    if (claim) out.push(claim);
  }
  return out;
}
