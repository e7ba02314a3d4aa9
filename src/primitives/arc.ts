// src/primitives/arc.ts

import { MBB, type Shape, type Vec2 } from "../types/pcb-model";
import type { Aperture } from "../core/aperture";
import type { GerberWriter } from "../core/gerber-writer";
import { ARC_SEGMENTS_PER_MM_RAD } from "../geometry/constants";
import type { Primitive } from "./primitive";

export class Arc implements Primitive {
  readonly kind = "arc";
  readonly startAngle: number; // radians
  readonly endAngle: number; // radians
  private cachedMBB: MBB | null = null;

  constructor(
    readonly center: Vec2,
    readonly radius: number,
    readonly shape: Shape,
    readonly xScale: number,
    readonly yScale: number,
    startAngleDeg: number,
    endAngleDeg: number,
    readonly thickness: number
  ) {
    if (startAngleDeg > endAngleDeg) {
      [startAngleDeg, endAngleDeg] = [endAngleDeg, startAngleDeg];
    }
    this.startAngle = (startAngleDeg * Math.PI) / 180;
    this.endAngle = (endAngleDeg * Math.PI) / 180;
  }

  /**
   * Chord vertices shared by writing and bounding box, so each chord
   * covers at most 0.1mm of arc.
   */
  vertices(): Vec2[] {
    const span = this.endAngle - this.startAngle;
    const segments = Math.floor(0.5 + span * this.radius * ARC_SEGMENTS_PER_MM_RAD) + 1;
    const pts: Vec2[] = [];
    for (let i = 0; i <= segments; i++) {
      const angle = this.startAngle + (span * i) / segments;
      pts.push({
        x: this.center.x + this.radius * this.xScale * Math.cos(angle),
        y: this.center.y + this.radius * this.yScale * Math.sin(angle),
      });
    }
    return pts;
  }

  writeGerber(w: GerberWriter, _apertureIndex: number): void {
    const pts = this.vertices();
    w.moveTo(pts[0]);
    for (let i = 1; i < pts.length; i++) {
      w.drawTo(pts[i]);
    }
  }

  aperture(): Aperture {
    return { shape: this.shape, size: this.thickness };
  }

  mbb(): MBB {
    if (!this.cachedMBB) {
      this.cachedMBB = MBB.fromPoints(this.vertices());
    }
    return this.cachedMBB;
  }
}

/**
 * Arc primitive. Dimensions are in millimeters, angles in degrees.
 */
export function arc(
  x: number,
  y: number,
  radius: number,
  shape: Shape,
  xScale: number,
  yScale: number,
  startAngle: number,
  endAngle: number,
  thickness: number
): Arc {
  return new Arc({ x, y }, radius, shape, xScale, yScale, startAngle, endAngle, thickness);
}
