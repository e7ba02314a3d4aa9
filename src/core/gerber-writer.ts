// src/core/gerber-writer.ts

import type { Vec2 } from "../types/pcb-model";
import { formatCoord } from "../geometry/units";

export type Polarity = "dark" | "clear";

/**
 * Accumulates RS274X commands, one per line.
 */
export class GerberWriter {
  private readonly lines: string[] = [];

  raw(line: string): void {
    this.lines.push(line);
  }

  /** D02: move with the pen up. */
  moveTo(p: Vec2): void {
    this.lines.push(`X${formatCoord(p.x)}Y${formatCoord(p.y)}D02*`);
  }

  /** D01: draw with the pen down. */
  drawTo(p: Vec2): void {
    this.lines.push(`X${formatCoord(p.x)}Y${formatCoord(p.y)}D01*`);
  }

  selectAperture(index: number): void {
    this.lines.push(`G54D${index}*`);
  }

  polarity(p: Polarity): void {
    this.lines.push(p === "dark" ? "%LPD*%" : "%LPC*%");
  }

  /**
   * Filled region (G36/G37). The contour is closed back to its first
   * vertex unless it already ends there.
   */
  region(points: Vec2[]): void {
    if (points.length === 0) return;
    this.lines.push("G36*");
    const first = points[0];
    this.moveTo(first);
    for (let i = 1; i < points.length; i++) {
      this.drawTo(points[i]);
    }
    const last = points[points.length - 1];
    if (points.length === 1 || formatCoord(last.x) !== formatCoord(first.x) || formatCoord(last.y) !== formatCoord(first.y)) {
      this.drawTo(first);
    }
    this.lines.push("G37*");
  }

  getLines(): readonly string[] {
    return this.lines;
  }

  toString(): string {
    return this.lines.length > 0 ? this.lines.join("\n") + "\n" : "";
  }
}
