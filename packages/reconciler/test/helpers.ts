import type { ClaimRecord, Marker } from "@claimmark/core";
import type { Diff } from "../src/index.js";

export function marker(id: number, x: number, z: number, label: string, overrides: Partial<Marker> = {}): Marker {
  return { id, x, z, label, alias: "CP", color: "white", visible: true, ...overrides };
}

export function claim(x: number, z: number, size: number, world = "World1"): ClaimRecord {
  return { world, x, z, size };
}

/** Applies a diff to a marker snapshot the way a store would. */
export function applyToSnapshot(markers: readonly Marker[], diff: Diff): Marker[] {
  let next = markers.map((m) => ({ ...m }));
  let nextId = Math.max(0, ...markers.map((m) => m.id)) + 1;
  for (const op of diff.operations) {
    switch (op.op) {
      case "create":
        next.push({
          id: nextId++,
          x: op.position.x,
          z: op.position.z,
          label: op.label,
          alias: op.alias,
          color: op.color,
          visible: true
        });
        break;
      case "delete":
        next = next.filter((m) => m.id !== op.ref);
        break;
      case "relabel":
        next = next.map((m) => (m.id === op.ref ? { ...m, label: op.label } : m));
        break;
      case "restyle":
        next = next.map((m) => (m.id === op.ref ? { ...m, alias: op.alias, color: op.color } : m));
        break;
      case "set-visible":
        next = next.map((m) => (m.id === op.ref ? { ...m, visible: op.visible } : m));
        break;
    }
  }
  return next;
}
