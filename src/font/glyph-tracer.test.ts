import { describe, test, expect } from "vitest";
import { FontDataError } from "../core/errors";
import type { Glyph } from "./font";
import { parsePathData } from "./path-data";
import { countClosedSubpaths, traceGlyph, type GlyphTransform } from "./glyph-tracer";

const unit: GlyphTransform = { origin: { x: 0, y: 0 }, xScale: 1, scale: 1 };

function trace(d: string, transform = unit, resolution?: number) {
  return traceGlyph({ pathSteps: parsePathData(d) }, transform, resolution);
}

describe("traceGlyph", () => {
  test("absolute H and V", () => {
    expect(trace("M10 10H30V40Z")).toEqual([
      {
        index: 0,
        points: [
          { x: 10, y: 10 },
          { x: 30, y: 10 },
          { x: 30, y: 40 },
          { x: 10, y: 10 },
        ],
      },
    ]);
  });

  test("applies origin and scale", () => {
    const [sp] = trace("M1 1L2 1l0 1H3z", { origin: { x: 5, y: 7 }, xScale: 1, scale: 2 });
    expect(sp.points).toEqual([
      { x: 7, y: 9 },
      { x: 9, y: 9 },
      { x: 9, y: 11 },
      { x: 11, y: 11 },
      { x: 7, y: 9 },
    ]);
  });

  test("mirrors with a negative xScale", () => {
    const [sp] = trace("M10 0L20 0L20 5Z", { origin: { x: 100, y: 0 }, xScale: -1, scale: 1 });
    expect(sp.points).toEqual([
      { x: 90, y: 0 },
      { x: 80, y: 0 },
      { x: 80, y: 5 },
      { x: 90, y: 0 },
    ]);
  });

  test("extra moveto pairs are linetos", () => {
    const [sp] = trace("m5 5 10 0 0 10z");
    expect(sp.points).toEqual([
      { x: 5, y: 5 },
      { x: 15, y: 5 },
      { x: 15, y: 15 },
      { x: 5, y: 5 },
    ]);
  });

  test("T reflects the previous quadratic control point", () => {
    // A coarse resolution pins every curve to the minimum of 4 steps.
    const [sp] = trace("M0 0Q10 10 20 0T40 0", unit, 1000);
    expect(sp.points).toHaveLength(9);
    expect(sp.points[1]).toEqual({ x: 5, y: 3.75 });
    expect(sp.points[4]).toEqual({ x: 20, y: 0 });
    expect(sp.points[6]).toEqual({ x: 30, y: -5 });
    expect(sp.points[8]).toEqual({ x: 40, y: 0 });
  });

  test("T after a non-quadratic command uses the pen as control", () => {
    const [sp] = trace("M0 0L10 0T20 0", unit, 1000);
    expect(sp.points.map((p) => p.x)).toEqual([0, 10, 10.625, 12.5, 15.625, 20]);
    expect(sp.points.every((p) => p.y === 0)).toBe(true);
  });

  test("S reflects the previous cubic control point", () => {
    const [sp] = trace("M0 0C0 10 10 10 10 0S20 -10 20 0", unit, 1000);
    expect(sp.points).toHaveLength(9);
    // Reflected first control point is (10, -10).
    expect(sp.points[6]).toEqual({ x: 15, y: -7.5 });
    expect(sp.points[8]).toEqual({ x: 20, y: 0 });
  });

  test("relative s reflects the same way", () => {
    const [sp] = trace("M0 0c0 10 10 10 10 0s10 -10 10 0", unit, 1000);
    expect(sp.points[6]).toEqual({ x: 15, y: -7.5 });
    expect(sp.points[8]).toEqual({ x: 20, y: 0 });
  });

  test("S after a non-cubic command uses the pen as control", () => {
    const [afterLine] = trace("M0 0L10 0S20 10 20 0", unit, 1000);
    expect(afterLine.points[3]).toEqual({ x: 15, y: 3.75 });

    const [afterQuad] = trace("M0 0Q5 10 10 0S20 10 20 0", unit, 1000);
    expect(afterQuad.points[6]).toEqual({ x: 15, y: 3.75 });
  });

  test("curves flatten by length", () => {
    // 3mm straight cubic at 0.1mm per chord.
    const [sp] = trace("M0 0C1 0 2 0 3 0");
    expect(sp.points).toHaveLength(31);
    expect(sp.points[30]).toEqual({ x: 3, y: 0 });
  });

  test("closepaths number the contours", () => {
    const subpaths = trace("M0 0L10 0L10 10ZM20 20L30 20L30 30ZL5 5L0 5Z");
    expect(subpaths.map((sp) => sp.index)).toEqual([0, 1, 2]);
    // Drawing after a closepath restarts from the closed contour's start.
    expect(subpaths[2].points[0]).toEqual({ x: 20, y: 20 });
  });

  test("movetos without closepath share an index", () => {
    const subpaths = trace("M0 0L1 0M5 5L6 5");
    expect(subpaths.map((sp) => sp.index)).toEqual([0, 0]);
  });

  test("a lone moveto leaves no contour", () => {
    expect(trace("M0 0M1 1L2 2")).toEqual([
      {
        index: 0,
        points: [
          { x: 1, y: 1 },
          { x: 2, y: 2 },
        ],
      },
    ]);
  });

  test("elliptical arcs are rejected", () => {
    expect(() => trace("M0 0A1 1 0 0 1 2 2")).toThrow(FontDataError);
  });

  test("unknown commands from loose data are rejected", () => {
    const glyph: Pick<Glyph, "pathSteps"> = JSON.parse('{"pathSteps":[{"command":"K","params":[]}]}');
    expect(() => traceGlyph(glyph, unit)).toThrow('Unsupported path command "K"');
  });
});

describe("countClosedSubpaths", () => {
  test("counts both closepath cases", () => {
    expect(countClosedSubpaths({ pathSteps: parsePathData("M0 0L1 0L1 1ZM2 2L3 2L3 3z") })).toBe(2);
    expect(countClosedSubpaths({ pathSteps: parsePathData("M0 0L1 0") })).toBe(0);
  });
});
