// src/core/aperture.ts

import type { Shape } from "../types/pcb-model";
import { APERTURE_SIZE_SCALE } from "../geometry/constants";

export interface Aperture {
  shape: Shape;
  size: number; // mm
}

/**
 * Built-in thin aperture selected for region fills (polygons, glyphs).
 * Allocated apertures start right after it.
 */
export const REGION_APERTURE: Readonly<Aperture> = { shape: "circle", size: 0.001 };
export const REGION_APERTURE_INDEX = 10;
export const FIRST_APERTURE_INDEX = REGION_APERTURE_INDEX + 1;

/**
 * Identity used for deduplication: sizes equal to the nanometer share a key.
 */
export function apertureKey(ap: Aperture): string {
  return `${ap.shape}:${Math.round(ap.size * APERTURE_SIZE_SCALE)}`;
}

/**
 * Size at the key's resolution: five decimals, or six when the last one
 * is significant, so distinct keys never share a definition.
 */
export function formatApertureSize(size: number): string {
  const n = Math.round(Math.abs(size) * APERTURE_SIZE_SCALE);
  const digits = n.toString().padStart(7, "0");
  let text = `${digits.slice(0, -6)}.${digits.slice(-6)}`;
  if (text.endsWith("0")) text = text.slice(0, -1);
  return size < 0 ? `-${text}` : text;
}

export function formatApertureDefinition(index: number, ap: Aperture): string {
  const size = formatApertureSize(ap.size);
  switch (ap.shape) {
    case "circle":
      return `%ADD${index}C,${size}*%`;
    case "rect":
      return `%ADD${index}R,${size}X${size}*%`;
  }
}

/**
 * Per-layer table of declared apertures, in allocation order.
 */
export class ApertureTable {
  private readonly entries: Aperture[] = [];
  private readonly index = new Map<string, number>();

  /** Returns the D-code for ap, declaring it on first use. */
  allocate(ap: Aperture): number {
    const key = apertureKey(ap);
    const existing = this.index.get(key);
    if (existing !== undefined) return existing;

    const code = FIRST_APERTURE_INDEX + this.entries.length;
    this.entries.push({ shape: ap.shape, size: ap.size });
    this.index.set(key, code);
    return code;
  }

  lookup(ap: Aperture): number | undefined {
    return this.index.get(apertureKey(ap));
  }

  get size(): number {
    return this.entries.length;
  }

  /** Definitions for the built-in aperture followed by every allocated one. */
  definitions(): string[] {
    const defs = [formatApertureDefinition(REGION_APERTURE_INDEX, REGION_APERTURE)];
    this.entries.forEach((ap, i) => {
      defs.push(formatApertureDefinition(FIRST_APERTURE_INDEX + i, ap));
    });
    return defs;
  }
}
