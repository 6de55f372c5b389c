import { keyOf, type ClaimRecord, type Marker, type ScanKind } from "@claimmark/core";
import { formatLabel, type PatternSet } from "@claimmark/patterns";
import { claimMarkers } from "./claim-markers.js";
import { buildDiff, type Diff, type DiffOperation } from "./diff.js";

/** First record wins when the report lists a position more than once. */
function desiredByPosition(records: readonly ClaimRecord[]): Map<string, ClaimRecord> {
  const desired = new Map<string, ClaimRecord>();
  for (const record of records) {
    const key = keyOf(record);
    if (!desired.has(key)) desired.set(key, record);
  }
  return desired;
}

/**
 * Computes the store changes that bring claim-shaped markers in line with
 * one scan. Pure; the caller applies the result.
 *
 * - add: create a marker for each claim position without one.
 * - clean: delete claim-shaped markers at positions the scan did not report.
 *   The store is not partitioned by world, so markers created from other
 *   worlds are removed too.
 * - update: clean, add, then relabel survivors whose size changed.
 *
 * Operations are ordered deletes, creates, relabels.
 */
export function reconcile(
  records: readonly ClaimRecord[],
  kind: ScanKind,
  markers: readonly Marker[],
  patterns: PatternSet
): Diff {
  const desired = desiredByPosition(records);
  const existing = claimMarkers(markers, patterns);
  const operations: DiffOperation[] = [];

  const removeStale = kind === "clean" || kind === "update";
  const surviving = removeStale ? existing.filter((c) => desired.has(keyOf(c.marker))) : existing;
  if (removeStale) {
    for (const claim of existing) {
      if (!desired.has(keyOf(claim.marker))) {
        operations.push({ op: "delete", ref: claim.marker.id });
      }
    }
  }

  if (kind === "add" || kind === "update") {
    const occupied = new Set(surviving.map((c) => keyOf(c.marker)));
    for (const [key, record] of desired) {
      if (occupied.has(key)) continue;
      operations.push({
        op: "create",
        position: { x: record.x, z: record.z },
        label: formatLabel(patterns, record.size),
        alias: patterns.alias,
        color: patterns.color
      });
    }
  }

  if (kind === "update") {
    for (const claim of surviving) {
      const record = desired.get(keyOf(claim.marker));
      if (record && record.size !== claim.size) {
        operations.push({ op: "relabel", ref: claim.marker.id, label: formatLabel(patterns, record.size) });
      }
    }
  }

  return buildDiff(operations);
}
