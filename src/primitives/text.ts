// src/primitives/text.ts

import { MBB, type Vec2 } from "../types/pcb-model";
import type { TextOptions } from "../types/options";
import type { Aperture } from "../core/aperture";
import type { GerberWriter } from "../core/gerber-writer";
import { MM_PER_PT } from "../geometry/constants";
import { getFont, glyphFor, type Font, type Glyph } from "../font/font";
import { traceGlyph, type Subpath } from "../font/glyph-tracer";
import { writeGlyphRegions } from "../font/glyph-writer";
import type { Primitive } from "./primitive";

interface PlacedGlyph {
  glyph: Glyph;
  subpaths: Subpath[];
}

/**
 * A run of text rendered as filled glyph outlines.
 *
 * The font's default advance renders as `pts` points, so a 72pt run
 * advances 25.4mm per default-width character.
 */
export class Text implements Primitive {
  readonly kind = "text";
  readonly font: Font;
  /** Millimeters per font unit. */
  readonly scale: number;
  private placed: PlacedGlyph[] | null = null;
  private cachedMBB: MBB | null = null;

  constructor(
    readonly origin: Vec2,
    readonly xScale: number,
    readonly message: string,
    fontName: string,
    readonly pts: number,
    readonly options: TextOptions = {}
  ) {
    this.font = getFont(fontName);
    this.scale = (pts * MM_PER_PT) / this.font.horizAdvX;
  }

  writeGerber(w: GerberWriter, _apertureIndex: number): void {
    for (const g of this.layout()) {
      writeGlyphRegions(w, g.subpaths, g.glyph.polarity);
    }
  }

  aperture(): Aperture | null {
    return null;
  }

  mbb(): MBB {
    if (!this.cachedMBB) {
      this.cachedMBB = boundsOf(this.layout());
    }
    return this.cachedMBB;
  }

  width(): number {
    return this.mbb().width;
  }

  height(): number {
    return this.mbb().height;
  }

  private layout(): PlacedGlyph[] {
    if (!this.placed) {
      const raw = this.layoutAt(this.origin);
      const shift = this.alignmentShift(boundsOf(raw));
      this.placed = shift.x === 0 && shift.y === 0 ? raw : translate(raw, shift);
    }
    return this.placed;
  }

  private layoutAt(origin: Vec2): PlacedGlyph[] {
    const { font, scale, xScale } = this;
    const advance = font.horizAdvX * scale;
    const lineHeight = (font.ascent - font.descent) * scale;
    const out: PlacedGlyph[] = [];

    let x = origin.x;
    let y = origin.y;
    for (const ch of this.message) {
      if (ch === "\n") {
        x = origin.x;
        y -= lineHeight;
        continue;
      }
      if (ch === "\t") {
        x += 2 * xScale * advance;
        continue;
      }
      const glyph = glyphFor(font, ch);
      if (!glyph) {
        console.warn(`Missing glyph ${JSON.stringify(ch)} in font "${font.id}": skipping`);
        x += xScale * advance;
        continue;
      }
      out.push({ glyph, subpaths: traceGlyph(glyph, { origin: { x, y }, xScale, scale }) });
      const dx = glyph.horizAdvX || font.horizAdvX;
      x += xScale * dx * scale;
    }
    return out;
  }

  /**
   * Without alignment the pen origin is the baseline start of the first
   * glyph. An alignment on an axis moves the matching edge or center of
   * the rendered box onto the origin.
   */
  private alignmentShift(bounds: MBB): Vec2 {
    const { xAlign, yAlign } = this.options;
    if (bounds.isEmpty() || (xAlign === undefined && yAlign === undefined)) return { x: 0, y: 0 };
    const c = bounds.center();

    let dx = 0;
    switch (xAlign) {
      case "left":
        dx = this.origin.x - bounds.min.x;
        break;
      case "center":
        dx = this.origin.x - c.x;
        break;
      case "right":
        dx = this.origin.x - bounds.max.x;
        break;
    }

    let dy = 0;
    switch (yAlign) {
      case "bottom":
        dy = this.origin.y - bounds.min.y;
        break;
      case "center":
        dy = this.origin.y - c.y;
        break;
      case "top":
        dy = this.origin.y - bounds.max.y;
        break;
    }

    return { x: dx, y: dy };
  }
}

function boundsOf(placed: PlacedGlyph[]): MBB {
  const mbb = MBB.empty();
  for (const g of placed) {
    for (const sp of g.subpaths) {
      for (const p of sp.points) mbb.addPoint(p);
    }
  }
  return mbb;
}

function translate(placed: PlacedGlyph[], d: Vec2): PlacedGlyph[] {
  return placed.map((g) => ({
    glyph: g.glyph,
    subpaths: g.subpaths.map((sp) => ({
      index: sp.index,
      points: sp.points.map((p) => ({ x: p.x + d.x, y: p.y + d.y })),
    })),
  }));
}

/**
 * Text primitive. xScale is 1 for top silkscreen and -1 for bottom
 * (mirrored) silkscreen; pts is the point size.
 */
export function text(
  x: number,
  y: number,
  xScale: number,
  message: string,
  fontName: string,
  pts: number,
  options?: TextOptions
): Text {
  return new Text({ x, y }, xScale, message, fontName, pts, options);
}
