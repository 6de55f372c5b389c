import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { buildPatternSet, defaultSettings } from "@claimmark/patterns";
import { reconcile } from "../src/index.js";
import { applyToSnapshot, claim, marker } from "./helpers.js";

const patterns = buildPatternSet(defaultSettings());

describe("reconcile: add", () => {
  it("creates one marker per claim on an empty store", () => {
    const diff = reconcile([claim(10, 20, 100)], "add", [], patterns);
    expect(diff.operations).toEqual([
      { op: "create", position: { x: 10, z: 20 }, label: "Claim (100)", alias: "CP", color: "white" }
    ]);
    expect(diff.counts.create).toBe(1);
  });

  it("leaves positions that already have a ClaimPoint alone, whatever its size", () => {
    const diff = reconcile([claim(10, 20, 150), claim(-3, 4, 9)], "add", [marker(1, 10, 20, "Claim (100)")], patterns);
    expect(diff.operations).toEqual([
      { op: "create", position: { x: -3, z: 4 }, label: "Claim (9)", alias: "CP", color: "white" }
    ]);
  });

  it("does not treat a user waypoint at the same position as a conflict", () => {
    const diff = reconcile([claim(10, 20, 100)], "add", [marker(1, 10, 20, "Home")], patterns);
    expect(diff.counts.create).toBe(1);
    expect(diff.counts.delete).toBe(0);
  });

  it("creates a single marker for a position reported twice, using the first size", () => {
    const diff = reconcile([claim(0, 0, 10), claim(0, 0, 20)], "add", [], patterns);
    expect(diff.operations).toEqual([
      { op: "create", position: { x: 0, z: 0 }, label: "Claim (10)", alias: "CP", color: "white" }
    ]);
  });

  it("is idempotent once its diff has been applied", () => {
    const records = [claim(10, 20, 100), claim(-64, 128, 400)];
    const before = [marker(1, 10, 20, "Home"), marker(2, 5, 5, "Claim (25)")];
    const after = applyToSnapshot(before, reconcile(records, "add", before, patterns));
    expect(reconcile(records, "add", after, patterns).operations).toEqual([]);
  });

  it("property: add after add is empty", () => {
    const coord = fc.integer({ min: -50, max: 50 });
    fc.assert(
      fc.property(
        fc.array(fc.record({ x: coord, z: coord, size: fc.nat({ max: 10_000 }) }), { maxLength: 30 }),
        fc.array(fc.record({ x: coord, z: coord, size: fc.nat({ max: 10_000 }), ours: fc.boolean() }), { maxLength: 30 }),
        (claims, existing) => {
          const records = claims.map((c) => claim(c.x, c.z, c.size));
          const markers = existing.map((m, i) => marker(i + 1, m.x, m.z, m.ours ? `Claim (${m.size})` : `Base ${m.size}`));
          const after = applyToSnapshot(markers, reconcile(records, "add", markers, patterns));
          return reconcile(records, "add", after, patterns).operations.length === 0;
        }
      )
    );
  });
});

describe("reconcile: clean", () => {
  it("removes only ClaimPoints without a matching claim", () => {
    const markers = [
      marker(1, 10, 20, "Claim (100)"),
      marker(2, 0, 0, "Claim (64)"),
      marker(3, 0, 0, "Home"),
      marker(4, 7, 7, "Claim (5)", { alias: "XX" }),
      marker(5, 8, 8, "Claim (7)", { color: "red" }),
      marker(6, 9, 9, "Claim (9)", { visible: false })
    ];
    const diff = reconcile([claim(10, 20, 100)], "clean", markers, patterns);
    expect(diff.operations).toEqual([
      { op: "delete", ref: 2 },
      { op: "delete", ref: 6 }
    ]);
    expect(diff.counts.delete).toBe(2);
    expect(diff.counts.create).toBe(0);
  });

  it("removes claim markers created from other worlds too, because the store is not world-scoped", () => {
    const fromNether = marker(1, 300, -40, "Claim (80)");
    const diff = reconcile([claim(10, 20, 100, "World1")], "clean", [fromNether], patterns);
    expect(diff.operations).toEqual([{ op: "delete", ref: 1 }]);
  });

  it("never creates markers", () => {
    expect(reconcile([claim(1, 1, 1)], "clean", [], patterns).operations).toEqual([]);
  });
});

describe("reconcile: update", () => {
  it("relabels a claim whose size changed instead of deleting and recreating it", () => {
    const diff = reconcile([claim(10, 20, 150)], "update", [marker(1, 10, 20, "Claim (100)")], patterns);
    expect(diff.operations).toEqual([{ op: "relabel", ref: 1, label: "Claim (150)" }]);
    expect(diff.counts).toEqual({ create: 0, delete: 0, relabel: 1, restyle: 0, "set-visible": 0 });
  });

  it("orders deletes, then creates, then relabels", () => {
    const markers = [marker(1, 10, 20, "Claim (100)"), marker(2, 0, 0, "Claim (5)"), marker(3, 1, 1, "Claim (3)")];
    const diff = reconcile([claim(1, 1, 3), claim(10, 20, 120), claim(4, 4, 16)], "update", markers, patterns);
    expect(diff.operations).toEqual([
      { op: "delete", ref: 2 },
      { op: "create", position: { x: 4, z: 4 }, label: "Claim (16)", alias: "CP", color: "white" },
      { op: "relabel", ref: 1, label: "Claim (120)" }
    ]);
  });

  it("is empty when the store already matches", () => {
    const markers = [marker(1, 10, 20, "Claim (100)")];
    expect(reconcile([claim(10, 20, 100)], "update", markers, patterns).operations).toEqual([]);
  });
});
