// src/font/polarity.ts

import { MBB } from "../types/pcb-model";
import { POLARITY_RASTER_SIZE } from "../geometry/constants";
import type { Glyph } from "./font";
import { countClosedSubpaths, traceGlyph } from "./glyph-tracer";
import { BACKGROUND, INK, MonoCanvas } from "./mono-canvas";

const MARGIN_PX = 2;

/**
 * Decide dark/clear for each closed subpath of a glyph by painting it.
 *
 * Subpaths are painted in order. Before painting one, the pixel under its
 * starting point is sampled: background means a solid region ("d"), ink
 * means a hole cut out of something already painted ("c"), which is then
 * painted with the background. The first subpath is always dark.
 */
export function computePolarity(glyph: Pick<Glyph, "pathSteps">): string {
  const probe = traceGlyph(glyph, { origin: { x: 0, y: 0 }, xScale: 1, scale: 1 }, 1);
  const bounds = MBB.fromPoints(probe.flatMap((sp) => sp.points));
  if (bounds.isEmpty()) return "";

  const extent = Math.max(bounds.width, bounds.height);
  const pxScale = extent > 0 ? (POLARITY_RASTER_SIZE - 2 * MARGIN_PX) / extent : 1;
  const canvas = new MonoCanvas(
    Math.ceil(bounds.width * pxScale) + 2 * MARGIN_PX + 1,
    Math.ceil(bounds.height * pxScale) + 2 * MARGIN_PX + 1
  );

  const subpaths = traceGlyph(
    glyph,
    {
      origin: {
        x: MARGIN_PX - bounds.min.x * pxScale,
        y: MARGIN_PX - bounds.min.y * pxScale,
      },
      xScale: 1,
      scale: pxScale,
    },
    1
  );

  const marks: string[] = [];
  let color = INK;
  for (const sp of subpaths) {
    // Contours sharing an index (moveto without closepath) share its mark.
    if (sp.index < marks.length) {
      canvas.fillPolygon(sp.points, color);
      continue;
    }
    while (marks.length < sp.index) marks.push("d");

    if (marks.length === 0) {
      marks.push("d");
      color = INK;
    } else {
      const start = sp.points[0];
      const sampled = canvas.get(Math.floor(start.x), Math.floor(start.y));
      if (sampled === BACKGROUND) {
        marks.push("d");
        color = INK;
      } else {
        marks.push("c");
        color = BACKGROUND;
      }
    }
    canvas.fillPolygon(sp.points, color);
  }

  return marks.join("");
}

/** A polarity string shorter than the glyph's closed subpath count is unusable. */
export function hasUsablePolarity(glyph: Glyph): boolean {
  const needed = countClosedSubpaths(glyph);
  return !!glyph.polarity && glyph.polarity.length >= needed;
}

/**
 * Return the glyph with a usable polarity string, computing one if needed.
 */
export function ensurePolarity(glyph: Glyph): Glyph {
  if (glyph.pathSteps.length === 0 || hasUsablePolarity(glyph)) return glyph;
  return { ...glyph, polarity: computePolarity(glyph) };
}
