// src/font/glyph-writer.ts

import { REGION_APERTURE_INDEX } from "../core/aperture";
import type { GerberWriter } from "../core/gerber-writer";
import type { Subpath } from "./glyph-tracer";

/**
 * Emit one glyph's contours as region fills.
 *
 * With a polarity string, the character at each contour's index picks
 * dark or clear; a change is written only when it differs from the
 * previous contour. Dark is restored before returning so following
 * primitives are unaffected.
 */
export function writeGlyphRegions(w: GerberWriter, subpaths: Subpath[], polarity?: string): void {
  let current: "d" | "c" = "d";

  for (const sp of subpaths) {
    if (polarity && sp.index < polarity.length) {
      const wanted = polarity[sp.index] === "c" ? "c" : "d";
      if (wanted !== current) {
        w.polarity(wanted === "c" ? "clear" : "dark");
        current = wanted;
      }
    }
    w.selectAperture(REGION_APERTURE_INDEX);
    w.region(sp.points);
  }

  if (current !== "d") {
    w.polarity("dark");
  }
}
