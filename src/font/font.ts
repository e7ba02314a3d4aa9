// src/font/font.ts

import { FontDataError } from "../core/errors";

/**
 * SVG path-data commands. Upper case is absolute, lower case relative.
 *
 * MoveTo: M, m
 * LineTo: L, l, H, h, V, v
 * Cubic Bézier: C, c, S, s
 * Quadratic Bézier: Q, q, T, t
 * Elliptical arc: A, a (recognized, never rendered)
 * ClosePath: Z, z
 */
export type PathCommand =
  | "M" | "m"
  | "L" | "l" | "H" | "h" | "V" | "v"
  | "C" | "c" | "S" | "s"
  | "Q" | "q" | "T" | "t"
  | "A" | "a"
  | "Z" | "z";

export interface PathStep {
  command: PathCommand;
  params: number[];
}

export interface Glyph {
  horizAdvX: number;
  unicode: string;
  /** One character per closed subpath: "d" dark, "c" clear. */
  polarity?: string;
  pathSteps: PathStep[];
}

export interface Font {
  id: string;
  horizAdvX: number;
  unitsPerEm: number;
  ascent: number;
  descent: number;
  glyphs: Record<string, Glyph>;
}

const fonts = new Map<string, Font>();

export function registerFont(font: Font): void {
  fonts.set(font.id, font);
}

export function fontNames(): string[] {
  return [...fonts.keys()];
}

export function clearFonts(): void {
  fonts.clear();
}

/**
 * Look up a font by id. An unknown id falls back to the first registered
 * font with a warning; an empty registry is a data fault.
 */
export function getFont(name: string): Font {
  const font = fonts.get(name);
  if (font) return font;

  const first = fonts.values().next();
  if (first.done) {
    throw new FontDataError("No fonts available");
  }
  console.warn(`Could not find font "${name}": using "${first.value.id}" instead`);
  return first.value;
}

/** Own-property lookup, so keys like "constructor" never hit the prototype. */
export function glyphFor(font: Font, ch: string): Glyph | undefined {
  return Object.prototype.hasOwnProperty.call(font.glyphs, ch) ? font.glyphs[ch] : undefined;
}
