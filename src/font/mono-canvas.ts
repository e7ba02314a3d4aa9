// src/font/mono-canvas.ts

import type { Vec2 } from "../types/pcb-model";

export const BACKGROUND = 0;
export const INK = 1;

/**
 * One byte per pixel offscreen bitmap. Pixel (x, y) covers
 * [x, x+1) x [y, y+1); its center is (x + 0.5, y + 0.5).
 */
export class MonoCanvas {
  readonly pixels: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    this.pixels = new Uint8Array(width * height);
  }

  /** Out of range reads as background. */
  get(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return BACKGROUND;
    return this.pixels[y * this.width + x];
  }

  /**
   * Scanline fill of a closed polygon with the nonzero winding rule,
   * sampling at pixel centers.
   */
  fillPolygon(points: Vec2[], value: number): void {
    if (points.length < 3) return;

    let minY = Infinity;
    let maxY = -Infinity;
    for (const p of points) {
      if (p.y < minY) minY = p.y;
      if (p.y > maxY) maxY = p.y;
    }
    const rowStart = Math.max(0, Math.ceil(minY - 0.5));
    const rowEnd = Math.min(this.height - 1, Math.floor(maxY - 0.5));

    const crossings: { x: number; dir: number }[] = [];
    for (let row = rowStart; row <= rowEnd; row++) {
      const sy = row + 0.5;
      crossings.length = 0;

      for (let i = 0; i < points.length; i++) {
        const a = points[i];
        const b = points[(i + 1) % points.length];
        if (a.y === b.y) continue;
        const up = a.y < b.y;
        const lo = up ? a : b;
        const hi = up ? b : a;
        // Half-open in y so shared vertices are counted once.
        if (sy < lo.y || sy >= hi.y) continue;
        const t = (sy - lo.y) / (hi.y - lo.y);
        crossings.push({ x: lo.x + t * (hi.x - lo.x), dir: up ? 1 : -1 });
      }
      if (crossings.length < 2) continue;

      crossings.sort((m, n) => m.x - n.x);
      let winding = 0;
      for (let k = 0; k < crossings.length - 1; k++) {
        winding += crossings[k].dir;
        if (winding === 0) continue;
        const x0 = Math.max(0, Math.ceil(crossings[k].x - 0.5));
        const x1 = Math.min(this.width - 1, Math.floor(crossings[k + 1].x - 0.5));
        const base = row * this.width;
        for (let x = x0; x <= x1; x++) {
          this.pixels[base + x] = value;
        }
      }
    }
  }
}
