// src/font/glyph-tracer.ts

import type { Vec2 } from "../types/pcb-model";
import { CubicBezier, QuadraticBezier, flattenCurve, type Curve } from "../geometry/bezier";
import { CURVE_RESOLUTION_MM } from "../geometry/constants";
import { FontDataError } from "../core/errors";
import type { Glyph, PathCommand } from "./font";
import { isPathCommand, validateParams } from "./path-data";

/**
 * Maps font units onto the output plane:
 *   out = origin + (xScale * scale * px, scale * py)
 */
export interface GlyphTransform {
  origin: Vec2;
  xScale: number; // 1, or -1 to mirror
  scale: number; // output units per font unit
}

/**
 * A flattened contour. `index` counts closepaths seen before it and picks
 * the polarity character for the contour.
 */
export interface Subpath {
  points: Vec2[];
  index: number;
}

/**
 * Everything the interpreter carries from one path step to the next.
 */
interface TracerState {
  pen: Vec2;
  subpathStart: Vec2;
  points: Vec2[];
  closed: number;
  lastCommand: PathCommand | null;
  /** Last cubic second control point or quadratic control point. */
  lastControl: Vec2 | null;
  subpaths: Subpath[];
}

const CUBIC_FAMILY = new Set<PathCommand>(["C", "c", "S", "s"]);
const QUADRATIC_FAMILY = new Set<PathCommand>(["Q", "q", "T", "t"]);

/**
 * Interpret a glyph's path steps into flattened contours.
 *
 * Curves are flattened at `resolution` output units per chord, clamped
 * to the usual step bounds.
 */
export function traceGlyph(
  glyph: Pick<Glyph, "pathSteps">,
  transform: GlyphTransform,
  resolution = CURVE_RESOLUTION_MM
): Subpath[] {
  const { origin, xScale, scale } = transform;
  const sx = xScale * scale;

  const abs = (px: number, py: number): Vec2 => ({ x: origin.x + sx * px, y: origin.y + scale * py });
  const rel = (from: Vec2, dx: number, dy: number): Vec2 => ({ x: from.x + sx * dx, y: from.y + scale * dy });

  const state: TracerState = {
    pen: { ...origin },
    subpathStart: { ...origin },
    points: [],
    closed: 0,
    lastCommand: null,
    lastControl: null,
    subpaths: [],
  };

  const flush = () => {
    // A lone moveto has no area to fill.
    if (state.points.length > 1) {
      state.subpaths.push({ points: state.points, index: state.closed });
    }
    state.points = [];
  };

  // Drawing straight after a closepath reopens a contour at the pen.
  const ensureOpen = () => {
    if (state.points.length === 0) {
      state.subpathStart = state.pen;
      state.points.push(state.pen);
    }
  };

  const lineTo = (p: Vec2) => {
    ensureOpen();
    state.pen = p;
    state.points.push(p);
  };

  const curveTo = (curve: Curve, control: Vec2) => {
    ensureOpen();
    for (const p of flattenCurve(curve, resolution)) {
      state.points.push(p);
    }
    state.pen = curve.end;
    state.lastControl = control;
  };

  // Reflection of the previous control point through the pen, or the pen
  // itself when the previous command was not a curve of the same family.
  const reflected = (family: Set<PathCommand>): Vec2 => {
    if (state.lastControl && state.lastCommand && family.has(state.lastCommand)) {
      return {
        x: 2 * state.pen.x - state.lastControl.x,
        y: 2 * state.pen.y - state.lastControl.y,
      };
    }
    return { ...state.pen };
  };

  for (const step of glyph.pathSteps) {
    const { command: c, params: p } = step;
    if (!isPathCommand(c)) {
      throw new FontDataError(`Unsupported path command "${String(c)}"`);
    }
    validateParams(c, p);

    switch (c) {
      case "M":
      case "m": {
        flush();
        const start = c === "M" ? abs(p[0], p[1]) : rel(state.pen, p[0], p[1]);
        state.pen = start;
        state.subpathStart = start;
        state.points = [start];
        // Further pairs are implicit linetos.
        for (let i = 2; i < p.length; i += 2) {
          lineTo(c === "M" ? abs(p[i], p[i + 1]) : rel(state.pen, p[i], p[i + 1]));
        }
        break;
      }
      case "L":
        for (let i = 0; i < p.length; i += 2) lineTo(abs(p[i], p[i + 1]));
        break;
      case "l":
        for (let i = 0; i < p.length; i += 2) lineTo(rel(state.pen, p[i], p[i + 1]));
        break;
      case "H":
        for (const v of p) lineTo({ x: origin.x + sx * v, y: state.pen.y });
        break;
      case "h":
        for (const v of p) lineTo({ x: state.pen.x + sx * v, y: state.pen.y });
        break;
      case "V":
        for (const v of p) lineTo({ x: state.pen.x, y: origin.y + scale * v });
        break;
      case "v":
        for (const v of p) lineTo({ x: state.pen.x, y: state.pen.y + scale * v });
        break;
      case "C":
      case "c":
        for (let i = 0; i < p.length; i += 6) {
          const base = state.pen;
          const pt = (j: number) => (c === "C" ? abs(p[i + j], p[i + j + 1]) : rel(base, p[i + j], p[i + j + 1]));
          const c2 = pt(2);
          curveTo(new CubicBezier(base, pt(0), c2, pt(4)), c2);
          state.lastCommand = c;
        }
        break;
      case "S":
      case "s":
        for (let i = 0; i < p.length; i += 4) {
          const base = state.pen;
          const pt = (j: number) => (c === "S" ? abs(p[i + j], p[i + j + 1]) : rel(base, p[i + j], p[i + j + 1]));
          const c1 = reflected(CUBIC_FAMILY);
          const c2 = pt(0);
          curveTo(new CubicBezier(base, c1, c2, pt(2)), c2);
          state.lastCommand = c;
        }
        break;
      case "Q":
      case "q":
        for (let i = 0; i < p.length; i += 4) {
          const base = state.pen;
          const pt = (j: number) => (c === "Q" ? abs(p[i + j], p[i + j + 1]) : rel(base, p[i + j], p[i + j + 1]));
          const control = pt(0);
          curveTo(new QuadraticBezier(base, control, pt(2)), control);
          state.lastCommand = c;
        }
        break;
      case "T":
      case "t":
        for (let i = 0; i < p.length; i += 2) {
          const base = state.pen;
          const control = reflected(QUADRATIC_FAMILY);
          const end = c === "T" ? abs(p[i], p[i + 1]) : rel(base, p[i], p[i + 1]);
          curveTo(new QuadraticBezier(base, control, end), control);
          state.lastCommand = c;
        }
        break;
      case "Z":
      case "z":
        if (state.points.length > 0) {
          state.points.push({ ...state.points[0] });
          flush();
        }
        state.pen = state.subpathStart;
        state.closed++;
        break;
      case "A":
      case "a":
        throw new FontDataError(`Unsupported path command "${c}"`);
      default: {
        const unhandled: never = c;
        throw new FontDataError(`Unsupported path command "${String(unhandled)}"`);
      }
    }
    state.lastCommand = c;
  }
  flush();

  return state.subpaths;
}

/** Number of closepaths in a glyph, i.e. the polarity characters it needs. */
export function countClosedSubpaths(glyph: Pick<Glyph, "pathSteps">): number {
  return glyph.pathSteps.filter((s) => s.command === "Z" || s.command === "z").length;
}
