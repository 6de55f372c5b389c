import type { Marker } from "@claimmark/core";
import { formatLabel, type PatternSet } from "@claimmark/patterns";
import { claimMarkers } from "./claim-markers.js";
import { buildDiff, type Diff, type DiffOperation } from "./diff.js";

export function visibilityDiff(markers: readonly Marker[], patterns: PatternSet, visible: boolean): Diff {
  return buildDiff(
    claimMarkers(markers, patterns)
      .filter((c) => c.marker.visible !== visible)
      .map((c): DiffOperation => ({ op: "set-visible", ref: c.marker.id, visible }))
  );
}

export function clearDiff(markers: readonly Marker[], patterns: PatternSet): Diff {
  return buildDiff(claimMarkers(markers, patterns).map((c): DiffOperation => ({ op: "delete", ref: c.marker.id })));
}

/**
 * Moves every marker that is claim-shaped under `previous` to the name
 * format, alias and color of `next`. Must be computed before `next` is
 * adopted, since afterwards the old markers no longer look like ours.
 */
export function restyleDiff(markers: readonly Marker[], previous: PatternSet, next: PatternSet): Diff {
  const operations: DiffOperation[] = [];
  for (const claim of claimMarkers(markers, previous)) {
    const label = formatLabel(next, claim.size);
    if (label !== claim.marker.label) {
      operations.push({ op: "relabel", ref: claim.marker.id, label });
    }
    if (claim.marker.alias !== next.alias || claim.marker.color !== next.color) {
      operations.push({ op: "restyle", ref: claim.marker.id, alias: next.alias, color: next.color });
    }
  }
  return buildDiff(operations);
}
