// src/primitives/polygon.ts

import { MBB, type Vec2 } from "../types/pcb-model";
import { REGION_APERTURE_INDEX, type Aperture } from "../core/aperture";
import type { GerberWriter } from "../core/gerber-writer";
import type { Primitive } from "./primitive";

/**
 * Filled polygon written as a single region. The outline is closed back
 * to the first vertex on write; callers need not repeat it.
 */
export class Polygon implements Primitive {
  readonly kind = "polygon";
  readonly points: Vec2[];
  private cachedMBB: MBB | null = null;

  constructor(offset: Vec2, points: Vec2[]) {
    this.points = points.map((p) => ({ x: offset.x + p.x, y: offset.y + p.y }));
  }

  writeGerber(w: GerberWriter, _apertureIndex: number): void {
    if (this.points.length === 0) return;
    w.selectAperture(REGION_APERTURE_INDEX);
    w.region(this.points);
  }

  aperture(): Aperture | null {
    return null;
  }

  mbb(): MBB {
    if (!this.cachedMBB) {
      this.cachedMBB = MBB.fromPoints(this.points);
    }
    return this.cachedMBB;
  }
}

export function polygon(x: number, y: number, points: Vec2[]): Polygon {
  return new Polygon({ x, y }, points);
}
