// src/primitives/primitive.ts

import type { MBB } from "../types/pcb-model";
import type { Aperture } from "../core/aperture";
import type { GerberWriter } from "../core/gerber-writer";

export type PrimitiveKind = "arc" | "circle" | "line" | "polygon" | "text";

/**
 * Something a Layer can hold and serialize.
 *
 * A primitive that returns null from aperture() fills regions and selects
 * the built-in region aperture itself.
 */
export interface Primitive {
  readonly kind: PrimitiveKind;
  writeGerber(w: GerberWriter, apertureIndex: number): void;
  aperture(): Aperture | null;
  mbb(): MBB;
}
