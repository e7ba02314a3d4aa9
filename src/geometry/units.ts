// src/geometry/units.ts
import { GERBER_SCALE } from "./constants";

/**
 * Convert millimeters to the integer Gerber coordinate.
 * Halves round away from zero.
 */
export function toGerberUnits(mm: number): number {
  const scaled = mm * GERBER_SCALE;
  const rounded = Math.round(Math.abs(scaled));
  return scaled < 0 ? -rounded : rounded;
}

export function fromGerberUnits(n: number): number {
  return n / GERBER_SCALE;
}

/**
 * Format an integer coordinate zero padded to 9 digits (3 integer + 6
 * fractional), with a leading "-" for negative values.
 */
export function formatCoord(mm: number): string {
  const n = toGerberUnits(mm);
  const digits = Math.abs(n).toString().padStart(9, "0");
  return n < 0 ? `-${digits}` : digits;
}
