import type { Marker, MarkerRef, Position } from "@claimmark/core";
import type { Diff } from "@claimmark/reconciler";

/** Waypoint storage the engine reads from and applies diffs to. */
export interface MarkerStore {
  listMarkers(): Marker[];
  create(position: Position, label: string, alias: string, color: string): MarkerRef;
  /** Returns false when the marker no longer exists. */
  delete(ref: MarkerRef): boolean;
  relabel(ref: MarkerRef, label: string): boolean;
  restyle(ref: MarkerRef, alias: string, color: string): boolean;
  setVisible(ref: MarkerRef, visible: boolean): boolean;
  count(): number;
  transaction<T>(fn: () => T): T;
}

/** Applies every operation in order inside one store transaction; returns how many took effect. */
export function applyDiff(store: MarkerStore, diff: Diff): number {
  return store.transaction(() => {
    let applied = 0;
    for (const operation of diff.operations) {
      switch (operation.op) {
        case "create":
          store.create(operation.position, operation.label, operation.alias, operation.color);
          applied++;
          break;
        case "delete":
          if (store.delete(operation.ref)) applied++;
          break;
        case "relabel":
          if (store.relabel(operation.ref, operation.label)) applied++;
          break;
        case "restyle":
          if (store.restyle(operation.ref, operation.alias, operation.color)) applied++;
          break;
        case "set-visible":
          if (store.setVisible(operation.ref, operation.visible)) applied++;
          break;
      }
    }
    return applied;
  });
}
