import { describe, expect, it } from "vitest";

import { classifyFlagCell, parseFlagCell } from "./flag-cell";

describe("flag cell parser", () => {
  it("accepts boolean true, the number one and truthy words", () => {
    expect(parseFlagCell(true)).toBe(true);
    expect(parseFlagCell(1)).toBe(true);
    expect(parseFlagCell("TRUE")).toBe(true);
    expect(parseFlagCell(" yes ")).toBe(true);
    expect(parseFlagCell("1")).toBe(true);
  });

  it("rejects everything else", () => {
    expect(parseFlagCell(false)).toBe(false);
    expect(parseFlagCell(0)).toBe(false);
    expect(parseFlagCell(2)).toBe(false);
    expect(parseFlagCell("no")).toBe(false);
    expect(parseFlagCell("y")).toBe(false);
    expect(parseFlagCell(null)).toBe(false);
    expect(parseFlagCell(undefined)).toBe(false);
    expect(parseFlagCell(new Date(0))).toBe(false);
  });

  it("judges formula cells by their cached result", () => {
    expect(classifyFlagCell({ formula: "A2>0", result: true })).toEqual({ kind: "boolean", value: true });
    expect(parseFlagCell({ formula: "B2", result: "Yes" })).toBe(true);
    expect(parseFlagCell({ formula: "B2" })).toBe(false);
  });
});
