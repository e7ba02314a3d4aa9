// src/font/webfont.ts
import { parse, type ElementNode, type Node } from "svg-parser";
import { decodeXML } from "entities";

import { FontDataError } from "../core/errors";
import type { Font, Glyph } from "./font";
import { parsePathData } from "./path-data";
import { ensurePolarity } from "./polarity";

/**
 * Build a Font from an SVG webfont document:
 *
 *   <svg><defs><font id horiz-adv-x>
 *     <font-face units-per-em ascent descent/>
 *     <glyph unicode horiz-adv-x d [d-orig] [gerber-lp]/>
 *   </font></defs></svg>
 *
 * Attribute values are entity-decoded. Glyphs without a usable gerber-lp
 * polarity string get one computed.
 */
export function loadWebfont(svgText: string): Font {
  const root = parse(tagUnicodeValues(svgText));
  const fontEl = findElement(root.children, "font");
  if (!fontEl) {
    throw new FontDataError("No <font> element found in webfont");
  }

  const id = stringAttr(fontEl, "id");
  if (!id) {
    throw new FontDataError("Webfont <font> has no id");
  }
  const horizAdvX = numberAttr(fontEl, "horiz-adv-x", 0);
  const face = findElement(fontEl.children, "font-face");

  const unitsPerEm = face ? numberAttr(face, "units-per-em", 1000) : 1000;
  const font: Font = {
    id: id.toLowerCase(),
    horizAdvX: horizAdvX || unitsPerEm,
    unitsPerEm,
    ascent: face ? numberAttr(face, "ascent", 0) : 0,
    descent: face ? numberAttr(face, "descent", 0) : 0,
    glyphs: {},
  };

  for (const child of fontEl.children) {
    if (!isElement(child) || child.tagName !== "glyph") continue;
    const unicode = unicodeAttr(child);
    if (!unicode) continue;

    const dOrig = stringAttr(child, "d-orig");
    const d = dOrig || stringAttr(child, "d") || "";
    let glyph: Glyph;
    try {
      glyph = {
        horizAdvX: numberAttr(child, "horiz-adv-x", 0),
        unicode,
        polarity: stringAttr(child, "gerber-lp") || undefined,
        pathSteps: parsePathData(d),
      };
    } catch (err) {
      if (err instanceof FontDataError) {
        throw new FontDataError(`Glyph ${JSON.stringify(unicode)} in font "${font.id}": ${err.message}`);
      }
      throw err;
    }
    font.glyphs[unicode] = ensurePolarity(glyph);
  }

  return font;
}

function isElement(node: Node | string): node is ElementNode {
  return typeof node !== "string" && node.type === "element";
}

/** Depth-first search for the first element named tagName. */
function findElement(nodes: Array<Node | string>, tagName: string): ElementNode | null {
  for (const node of nodes) {
    if (!isElement(node)) continue;
    if (node.tagName === tagName) return node;
    const found = findElement(node.children, tagName);
    if (found) return found;
  }
  return null;
}

/** Entity-decoded attribute text. */
function stringAttr(el: ElementNode, name: string): string | undefined {
  const v = el.properties?.[name];
  return v === undefined ? undefined : decodeXML(String(v));
}

// svg-parser turns numeric-looking values into numbers, which would lose
// glyph names such as "07". Every unicode value is prefixed before parsing
// so it always stays text, and the prefix is dropped on read.
const UNICODE_TAG = "u:";
const UNICODE_ATTR_RE = /(\sunicode\s*=\s*)(?:"([^"]*)"|'([^']*)')/g;

function tagUnicodeValues(svgText: string): string {
  return svgText.replace(
    UNICODE_ATTR_RE,
    (_m, lead: string, dq: string | undefined, sq: string | undefined) =>
      dq !== undefined ? `${lead}"${UNICODE_TAG}${dq}"` : `${lead}'${UNICODE_TAG}${sq ?? ""}'`
  );
}

function unicodeAttr(el: ElementNode): string | undefined {
  const v = stringAttr(el, "unicode");
  if (v === undefined) return undefined;
  return v.startsWith(UNICODE_TAG) ? v.slice(UNICODE_TAG.length) : v;
}

function numberAttr(el: ElementNode, name: string, fallback: number): number {
  const v = el.properties?.[name];
  if (v === undefined || v === "") return fallback;
  const n = typeof v === "number" ? v : Number(v);
  if (!Number.isFinite(n)) {
    throw new FontDataError(`Attribute ${name}="${v}" on <${el.tagName}> is not a number`);
  }
  return n;
}
