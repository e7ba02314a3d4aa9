// src/primitives/circle.ts

import { MBB, type Vec2 } from "../types/pcb-model";
import type { Aperture } from "../core/aperture";
import type { GerberWriter } from "../core/gerber-writer";
import type { Primitive } from "./primitive";

/**
 * A round pad: a zero-length stroke with a circular aperture whose
 * diameter is the thickness.
 */
export class Circle implements Primitive {
  readonly kind = "circle";
  private cachedMBB: MBB | null = null;

  constructor(
    readonly center: Vec2,
    readonly thickness: number
  ) {}

  writeGerber(w: GerberWriter, _apertureIndex: number): void {
    w.moveTo(this.center);
    w.drawTo(this.center);
  }

  aperture(): Aperture {
    return { shape: "circle", size: this.thickness };
  }

  mbb(): MBB {
    if (!this.cachedMBB) {
      const r = 0.5 * this.thickness;
      this.cachedMBB = new MBB(
        { x: this.center.x - r, y: this.center.y - r },
        { x: this.center.x + r, y: this.center.y + r }
      );
    }
    return this.cachedMBB;
  }
}

export function circle(x: number, y: number, thickness: number): Circle {
  return new Circle({ x, y }, thickness);
}
