// src/types/options.ts

export interface DesignOptions {
  /**
   * Directory the layer files and the zip archive are written to.
   * Defaults to the current working directory.
   */
  outputDir?: string;
}

export type XAlign = "left" | "center" | "right";
export type YAlign = "bottom" | "center" | "top";

/**
 * Where the rendered text sits relative to its (x, y) anchor. An axis
 * left unset keeps the anchor as the pen origin: the baseline start of
 * the first glyph.
 */
export interface TextOptions {
  xAlign?: XAlign;
  yAlign?: YAlign;
}

export const BottomLeft: TextOptions = { xAlign: "left", yAlign: "bottom" };
export const BottomCenter: TextOptions = { xAlign: "center", yAlign: "bottom" };
export const BottomRight: TextOptions = { xAlign: "right", yAlign: "bottom" };
export const CenterLeft: TextOptions = { xAlign: "left", yAlign: "center" };
export const Center: TextOptions = { xAlign: "center", yAlign: "center" };
export const CenterRight: TextOptions = { xAlign: "right", yAlign: "center" };
export const TopLeft: TextOptions = { xAlign: "left", yAlign: "top" };
export const TopCenter: TextOptions = { xAlign: "center", yAlign: "top" };
export const TopRight: TextOptions = { xAlign: "right", yAlign: "top" };
