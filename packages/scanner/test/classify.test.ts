import { describe, expect, it } from "vitest";
import { buildPatternSet, defaultSettings, type ClaimSettings } from "@claimmark/patterns";
import { classifyLine } from "../src/index.js";
import { END, HEADER, START, claimLine } from "./fixtures.js";

const patterns = buildPatternSet(defaultSettings());

function withReport(patch: Partial<ClaimSettings["report"]>): ClaimSettings {
  const base = defaultSettings();
  return { ...base, report: { ...base.report, ...patch } };
}

describe("classifyLine", () => {
  it("classifies each default report line", () => {
    expect(classifyLine(HEADER, patterns)).toEqual({ kind: "ignored" });
    expect(classifyLine(START, patterns)).toEqual({ kind: "start" });
    expect(classifyLine(claimLine("World1", 10, 20, 100), patterns)).toEqual({
      kind: "claim",
      world: "World1",
      x: 10,
      z: 20,
      size: 100
    });
    expect(classifyLine(END, patterns)).toEqual({ kind: "end" });
    expect(classifyLine("<Steve> anyone selling diamonds?", patterns)).toEqual({ kind: "unrecognized" });
  });

  it("parses negative coordinates and drops the size sign", () => {
    expect(classifyLine(claimLine("world_nether", -305, -12, -64), patterns)).toEqual({
      kind: "claim",
      world: "world_nether",
      x: -305,
      z: -12,
      size: 64
    });
  });

  it("gives the end pattern priority over an ignore pattern that also matches", () => {
    const custom = buildPatternSet(withReport({ ignoredLinePatterns: ["^Claims:$", " = .*"] }));
    expect(classifyLine(END, custom)).toEqual({ kind: "end" });
    expect(classifyLine(" = separator", custom)).toEqual({ kind: "ignored" });
  });

  it("prefers the claim pattern over the start pattern", () => {
    const custom = buildPatternSet(withReport({ firstLinePattern: ".*blocks\\)$" }));
    expect(classifyLine(claimLine("World1", 1, 2, 3), custom).kind).toBe("claim");
  });

  it("reports coordinates outside the 32-bit range as overflow", () => {
    expect(classifyLine(claimLine("World1", "99999999999", 0, 10), patterns)).toEqual({
      kind: "malformed",
      world: "World1",
      error: { code: "NumericOverflow", field: "x", text: "99999999999" }
    });
  });

  it("reports a group that did not participate", () => {
    const custom = buildPatternSet(withReport({ claimLinePattern: "^(.+): x(-?\\d+), z(-?\\d+)(?: \\((\\d+) blocks\\))?$" }));
    expect(classifyLine("World1: x1, z2", custom)).toEqual({
      kind: "malformed",
      world: "World1",
      error: { code: "MissingGroup", field: "size" }
    });
  });
});
