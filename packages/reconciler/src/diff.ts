import type { MarkerRef, Position, WaypointColor } from "@claimmark/core";

export type DiffOperation =
  | { op: "create"; position: Position; label: string; alias: string; color: WaypointColor }
  | { op: "delete"; ref: MarkerRef }
  | { op: "relabel"; ref: MarkerRef; label: string }
  | { op: "restyle"; ref: MarkerRef; alias: string; color: WaypointColor }
  | { op: "set-visible"; ref: MarkerRef; visible: boolean };

export type DiffOperationKind = DiffOperation["op"];

/** Ordered store mutations plus per-kind counts for reporting. Every operation is safe to apply on its own. */
export interface Diff {
  operations: DiffOperation[];
  counts: Record<DiffOperationKind, number>;
}

export function buildDiff(operations: DiffOperation[]): Diff {
  const counts: Record<DiffOperationKind, number> = {
    create: 0,
    delete: 0,
    relabel: 0,
    restyle: 0,
    "set-visible": 0
  };
  for (const operation of operations) {
    counts[operation.op]++;
  }
  return { operations, counts };
}

export function isEmptyDiff(diff: Diff): boolean {
  return diff.operations.length === 0;
}
