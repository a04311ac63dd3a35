// ============================================================================
// Cue Designer — Unit Conversion Utilities
// ============================================================================
//
// Axial positions and lengths are in inches; diameters and radii are in mm.
// This mix is how cue makers specify a butt, so both units stay native and
// only the geometry core converts between them.
//
// Conversion factor: 1 inch = 25.4 mm
// ============================================================================

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Exact conversion factor: millimeters per inch. */
export const MM_PER_INCH = 25.4;

/** Cubic centimeters per cubic inch. */
export const CM3_PER_IN3 = 16.387;

/** Grams per avoirdupois ounce. */
export const GRAMS_PER_OUNCE = 28.3495;

// ---------------------------------------------------------------------------
// Core Conversion Functions
// ---------------------------------------------------------------------------

/** Convert millimeters to inches. */
export function mmToIn(mm: number): number {
  return mm / MM_PER_INCH;
}

/** Convert inches to millimeters. */
export function inToMm(inches: number): number {
  return inches * MM_PER_INCH;
}

export function radiansToDegrees(rad: number): number {
  return (rad * 180) / Math.PI;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Format an inch value with the inch mark, e.g. `12.000"`. */
export function formatInches(valueIn: number, decimals = 3): string {
  return `${valueIn.toFixed(decimals)}"`;
}

/** Format a millimeter value, e.g. `20.20mm`. */
export function formatMm(valueMm: number, decimals = 2): string {
  return `${valueMm.toFixed(decimals)}mm`;
}

/** Format an angle, e.g. `5.12°`. */
export function formatDegrees(valueDeg: number, decimals = 2): string {
  return `${valueDeg.toFixed(decimals)}°`;
}
