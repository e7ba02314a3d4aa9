// src/geometry/bezier.ts

import type { Vec2 } from "../types/pcb-model";
import {
  CURVE_LENGTH_SUBDIVISIONS,
  CURVE_MAX_STEPS,
  CURVE_MIN_STEPS,
  CURVE_RESOLUTION_MM,
} from "./constants";

/**
 * A parametric curve over t in [0, 1].
 */
export interface Curve {
  start: Vec2;
  end: Vec2;
  pointAt(t: number): Vec2;
}

export class CubicBezier implements Curve {
  constructor(
    readonly start: Vec2,
    readonly c1: Vec2,
    readonly c2: Vec2,
    readonly end: Vec2
  ) {}

  pointAt(t: number): Vec2 {
    const u = 1 - t;
    const a = u * u * u;
    const b = 3 * u * u * t;
    const c = 3 * u * t * t;
    const d = t * t * t;
    return {
      x: a * this.start.x + b * this.c1.x + c * this.c2.x + d * this.end.x,
      y: a * this.start.y + b * this.c1.y + c * this.c2.y + d * this.end.y,
    };
  }
}

export class QuadraticBezier implements Curve {
  constructor(
    readonly start: Vec2,
    readonly control: Vec2,
    readonly end: Vec2
  ) {}

  pointAt(t: number): Vec2 {
    const u = 1 - t;
    const a = u * u;
    const b = 2 * u * t;
    const c = t * t;
    return {
      x: a * this.start.x + b * this.control.x + c * this.end.x,
      y: a * this.start.y + b * this.control.y + c * this.end.y,
    };
  }
}

/**
 * Approximate arc length by summing chords over a fixed subdivision.
 */
export function curveLength(curve: Curve): number {
  let length = 0;
  let prev = curve.start;
  for (let i = 1; i <= CURVE_LENGTH_SUBDIVISIONS; i++) {
    const p = curve.pointAt(i / CURVE_LENGTH_SUBDIVISIONS);
    length += Math.hypot(p.x - prev.x, p.y - prev.y);
    prev = p;
  }
  return length;
}

export function stepsForLength(length: number, resolution = CURVE_RESOLUTION_MM): number {
  const steps = Math.round(length / resolution);
  return Math.min(CURVE_MAX_STEPS, Math.max(CURVE_MIN_STEPS, steps));
}

/**
 * Sample the curve at equal parameter increments, excluding t = 0
 * (the pen is already there).
 */
export function flattenCurve(curve: Curve, resolution = CURVE_RESOLUTION_MM): Vec2[] {
  const steps = stepsForLength(curveLength(curve), resolution);
  const out: Vec2[] = [];
  for (let j = 1; j <= steps; j++) {
    out.push(curve.pointAt(j / steps));
  }
  return out;
}
