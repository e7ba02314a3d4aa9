// src/geometry/constants.ts

/**
 * Gerber coordinates are written as integers in millionths of a millimeter
 * (%FSLAX36Y36*%).
 */
export const GERBER_SCALE = 1e6;

/** Aperture sizes closer than this collapse into one declaration. */
export const APERTURE_SIZE_SCALE = 1e6;

/** Arc flattening: segments per radian per mm of radius (0.1mm chords). */
export const ARC_SEGMENTS_PER_MM_RAD = 10;

/** Curve flattening target chord length in output units. */
export const CURVE_RESOLUTION_MM = 0.1;
export const CURVE_MIN_STEPS = 4;
export const CURVE_MAX_STEPS = 100;

/** Chords used to estimate a curve's length before picking its step count. */
export const CURVE_LENGTH_SUBDIVISIONS = 16;

export const MM_PER_PT = 25.4 / 72;

/** Longest side of the offscreen canvas used for polarity detection. */
export const POLARITY_RASTER_SIZE = 1024;
