// src/types/pcb-model.ts

/** Aperture shapes a primitive may stroke with. */
export type Shape = "circle" | "rect";

export interface Vec2 {
  x: number; // mm
  y: number; // mm
}

export function point(x: number, y: number): Vec2 {
  return { x, y };
}

/**
 * Minimum bounding box.
 *
 * A freshly created MBB is empty (min at +Infinity, max at -Infinity),
 * so joining anything into it simply adopts the other box.
 */
export class MBB {
  min: Vec2;
  max: Vec2;

  constructor(min: Vec2 = point(Infinity, Infinity), max: Vec2 = point(-Infinity, -Infinity)) {
    this.min = { ...min };
    this.max = { ...max };
  }

  static empty(): MBB {
    return new MBB();
  }

  static fromPoints(points: Vec2[]): MBB {
    const mbb = new MBB();
    for (const p of points) {
      mbb.addPoint(p);
    }
    return mbb;
  }

  isEmpty(): boolean {
    return this.min.x > this.max.x || this.min.y > this.max.y;
  }

  addPoint(p: Vec2): this {
    if (p.x < this.min.x) this.min.x = p.x;
    if (p.y < this.min.y) this.min.y = p.y;
    if (p.x > this.max.x) this.max.x = p.x;
    if (p.y > this.max.y) this.max.y = p.y;
    return this;
  }

  /** Grow in place to the union with other. */
  join(other: MBB): this {
    if (other.isEmpty()) return this;
    this.addPoint(other.min);
    this.addPoint(other.max);
    return this;
  }

  /** Touching edges count as intersecting. */
  intersects(other: MBB): boolean {
    if (this.isEmpty() || other.isEmpty()) return false;
    if (this.max.x < other.min.x || other.max.x < this.min.x) return false;
    if (this.max.y < other.min.y || other.max.y < this.min.y) return false;
    return true;
  }

  contains(other: MBB): boolean {
    if (other.isEmpty()) return true;
    if (this.isEmpty()) return false;
    return (
      this.min.x <= other.min.x &&
      this.min.y <= other.min.y &&
      this.max.x >= other.max.x &&
      this.max.y >= other.max.y
    );
  }

  get width(): number {
    return this.isEmpty() ? 0 : this.max.x - this.min.x;
  }

  get height(): number {
    return this.isEmpty() ? 0 : this.max.y - this.min.y;
  }

  center(): Vec2 {
    return point(0.5 * (this.min.x + this.max.x), 0.5 * (this.min.y + this.max.y));
  }

  clone(): MBB {
    return new MBB(this.min, this.max);
  }
}
