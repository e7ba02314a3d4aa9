// src/core/layer.ts

import { MBB } from "../types/pcb-model";
import type { LayerRole } from "../io/layer-files";
import type { Primitive } from "../primitives/primitive";
import { ApertureTable } from "./aperture";
import { GerberWriter } from "./gerber-writer";

/**
 * A printed circuit board layer: an append-only list of primitives and
 * the apertures they need.
 */
export class Layer {
  readonly primitives: Primitive[] = [];
  readonly apertures = new ApertureTable();

  constructor(
    readonly filename: string,
    readonly role: LayerRole
  ) {}

  /**
   * Append primitives, declaring any aperture not yet on this layer.
   */
  add(...primitives: Primitive[]): this {
    for (const p of primitives) {
      const ap = p.aperture();
      if (ap) {
        this.apertures.allocate(ap);
      }
      this.primitives.push(p);
    }
    return this;
  }

  /** Union of every primitive's bounding box. */
  mbb(): MBB {
    const mbb = MBB.empty();
    for (const p of this.primitives) {
      mbb.join(p.mbb());
    }
    return mbb;
  }

  /**
   * Serialize the complete Gerber file for this layer.
   */
  toGerber(): string {
    const w = new GerberWriter();
    w.raw("%FSLAX36Y36*%");
    w.raw("%MOMM*%");
    w.raw("%LPD*%");
    for (const def of this.apertures.definitions()) {
      w.raw(def);
    }

    for (const p of this.primitives) {
      const ap = p.aperture();
      let index = -1;
      if (ap) {
        const found = this.apertures.lookup(ap);
        if (found === undefined) {
          // Only reachable if a primitive changed after add().
          throw new Error(`Aperture ${ap.shape} ${ap.size} was never declared on ${this.filename}`);
        }
        index = found;
        w.selectAperture(index);
      }
      p.writeGerber(w, index);
    }

    w.raw("M02*");
    return w.toString();
  }
}
