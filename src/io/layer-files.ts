// src/io/layer-files.ts

export type LayerRole =
  | "top_copper"
  | "bottom_copper"
  | "inner_copper"
  | "top_mask"
  | "bottom_mask"
  | "top_silk"
  | "bottom_silk"
  | "drill"
  | "outline";

/**
 * File extensions fabricators expect for each fixed role.
 * Inner copper layers are numbered: ".g2l", ".g3l", ...
 */
const ROLE_EXTENSIONS: Record<Exclude<LayerRole, "inner_copper">, string> = {
  top_copper: "gtl",
  bottom_copper: "gbl",
  top_mask: "gts",
  bottom_mask: "gbs",
  top_silk: "gto",
  bottom_silk: "gbo",
  drill: "xln",
  outline: "gko",
};

export function layerFilename(prefix: string, role: LayerRole, innerIndex?: number): string {
  if (role === "inner_copper") {
    if (innerIndex === undefined || !Number.isInteger(innerIndex) || innerIndex < 2) {
      throw new RangeError(`Inner layer number must be an integer >= 2, got ${innerIndex}`);
    }
    return `${prefix}.g${innerIndex}l`;
  }
  return `${prefix}.${ROLE_EXTENSIONS[role]}`;
}
