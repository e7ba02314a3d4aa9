// src/primitives/line.ts

import { MBB, type Shape, type Vec2 } from "../types/pcb-model";
import type { Aperture } from "../core/aperture";
import type { GerberWriter } from "../core/gerber-writer";
import type { Primitive } from "./primitive";

export class Line implements Primitive {
  readonly kind = "line";
  private cachedMBB: MBB | null = null;

  constructor(
    readonly start: Vec2,
    readonly end: Vec2,
    readonly shape: Shape,
    readonly thickness: number
  ) {}

  writeGerber(w: GerberWriter, _apertureIndex: number): void {
    w.moveTo(this.start);
    w.drawTo(this.end);
  }

  aperture(): Aperture {
    return { shape: this.shape, size: this.thickness };
  }

  // Segment box grown by half the stroke width, which covers either cap.
  mbb(): MBB {
    if (!this.cachedMBB) {
      const h = 0.5 * this.thickness;
      this.cachedMBB = new MBB(
        {
          x: Math.min(this.start.x, this.end.x) - h,
          y: Math.min(this.start.y, this.end.y) - h,
        },
        {
          x: Math.max(this.start.x, this.end.x) + h,
          y: Math.max(this.start.y, this.end.y) + h,
        }
      );
    }
    return this.cachedMBB;
  }
}

export function line(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  shape: Shape,
  thickness: number
): Line {
  return new Line({ x: x1, y: y1 }, { x: x2, y: y2 }, shape, thickness);
}
