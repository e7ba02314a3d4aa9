// src/index.ts

export { Design } from "./core/design";
export { Layer } from "./core/layer";
export { GerberWriter, type Polarity } from "./core/gerber-writer";
export {
  ApertureTable,
  apertureKey,
  REGION_APERTURE_INDEX,
  FIRST_APERTURE_INDEX,
  type Aperture,
} from "./core/aperture";
export { FontDataError } from "./core/errors";

export { Arc, arc } from "./primitives/arc";
export { Circle, circle } from "./primitives/circle";
export { Line, line } from "./primitives/line";
export { Polygon, polygon } from "./primitives/polygon";
export { Text, text } from "./primitives/text";
export type { Primitive, PrimitiveKind } from "./primitives/primitive";

export {
  registerFont,
  getFont,
  fontNames,
  clearFonts,
  type Font,
  type Glyph,
  type PathStep,
  type PathCommand,
} from "./font/font";
export { parsePathData } from "./font/path-data";
export { traceGlyph, type Subpath, type GlyphTransform } from "./font/glyph-tracer";
export { computePolarity, ensurePolarity } from "./font/polarity";
export { loadWebfont } from "./font/webfont";

export { readArchive, type ZipEntry } from "./io/archive";
export { layerFilename, type LayerRole } from "./io/layer-files";
export { toGerberUnits, fromGerberUnits } from "./geometry/units";

export { MBB, point, type Vec2, type Shape } from "./types/pcb-model";
export * from "./types/options";
