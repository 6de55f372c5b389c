import type { ScanKind } from "@claimmark/core";
import type { Diff } from "./diff.js";

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function summarizeScan(kind: ScanKind, world: string, claimCount: number, diff: Diff): string {
  if (claimCount === 0) {
    return `No claims found in '${world}'.`;
  }
  const { create, relabel } = diff.counts;
  const removed = diff.counts.delete;
  switch (kind) {
    case "add":
      return `Added ${plural(create, "new ClaimPoint")} from ${plural(claimCount, "claim")} in '${world}'.`;
    case "clean":
      return `Removed ${plural(removed, "ClaimPoint")} not matching a claim in '${world}'.`;
    case "update":
      return `Updated ClaimPoints from ${plural(claimCount, "claim")} in '${world}': ${create} added, ${removed} removed, ${relabel} resized.`;
  }
}

export function summarizeClear(removed: number): string {
  return `Removed all ClaimPoints (${removed}).`;
}

export function summarizeVisibility(visible: boolean, changed: number): string {
  return `${visible ? "Showing" : "Hiding"} all ClaimPoints (${changed} changed).`;
}
