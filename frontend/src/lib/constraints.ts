// ============================================================================
// Cue Designer — Manufacturing Constraint Tables
// Pure data. The validator looks rules up here instead of branching per type.
// ============================================================================

import type { CueSection, SectionSchema, SectionType } from '../types/cue';

// ---------------------------------------------------------------------------
// Section Sequences
// ---------------------------------------------------------------------------

/** Canonical order of section types from the joint end to the butt end. */
export const SECTION_SEQUENCES: Record<SectionSchema, readonly SectionType[]> = {
  standard: ['joint', 'forearm', 'handle', 'sleeve', 'butt'],
  compact: ['forearm', 'handle', 'butt_sleeve'],
} as const;

export const SECTION_LABELS: Record<SectionType, string> = {
  joint: 'Joint',
  forearm: 'Forearm',
  handle: 'Handle',
  sleeve: 'Sleeve',
  butt: 'Butt',
  butt_sleeve: 'Butt Sleeve',
};

// ---------------------------------------------------------------------------
// Per-Type Bounds
// ---------------------------------------------------------------------------

export interface SectionBounds {
  /** @unit in */
  minLengthIn: number;
  /** @unit in */
  maxLengthIn: number;
  /** @unit mm */
  minDiameterMm: number;
  /** @unit mm */
  maxDiameterMm: number;
}

/** Types without a row (butt_sleeve) are only held to the global limits. */
export const SECTION_BOUNDS: Partial<Record<SectionType, SectionBounds>> = {
  joint: { minLengthIn: 0.5, maxLengthIn: 2.0, minDiameterMm: 18, maxDiameterMm: 25 },
  forearm: { minLengthIn: 8.0, maxLengthIn: 14.0, minDiameterMm: 19, maxDiameterMm: 24 },
  handle: { minLengthIn: 8.0, maxLengthIn: 12.0, minDiameterMm: 20, maxDiameterMm: 26 },
  sleeve: { minLengthIn: 4.0, maxLengthIn: 8.0, minDiameterMm: 24, maxDiameterMm: 32 },
  butt: { minLengthIn: 2.0, maxLengthIn: 6.0, minDiameterMm: 26, maxDiameterMm: 32 },
};

// ---------------------------------------------------------------------------
// Global Manufacturing Limits
// ---------------------------------------------------------------------------

export const MANUFACTURING_LIMITS = {
  /** Steepest allowed taper half-angle. @unit deg */
  maxTaperAngleDeg: 5,
  /** @unit mm */
  minRadiusMm: 5,
  /** @unit mm */
  maxRadiusMm: 25,
  /** Longest single section the lathe takes. @unit in */
  maxSectionLengthIn: 20,
  /** Cap on the summed section lengths. @unit in */
  maxTotalLengthIn: 40,
  /** Largest step between one section's end and the next one's start. @unit mm */
  maxDiameterJumpMm: 1,
} as const;

/**
 * Slack allowed on every limit comparison, in inches for positions and
 * lengths and in mm for diameters. Exactly-touching sections stored as
 * decimals must not read as a gap.
 */
export const COMPARISON_TOLERANCE = 1e-6;

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

/** Position of a type in the schema's sequence, or -1 when it is not part of it. */
export function getSequenceRank(type: SectionType, schema: SectionSchema = 'standard'): number {
  return SECTION_SEQUENCES[schema].indexOf(type);
}

export function getSectionBounds(type: SectionType): SectionBounds | undefined {
  return SECTION_BOUNDS[type];
}

/** A design containing any butt_sleeve follows the compact schema. */
export function detectSchema(sections: readonly Pick<CueSection, 'sectionType'>[]): SectionSchema {
  return sections.some((s) => s.sectionType === 'butt_sleeve') ? 'compact' : 'standard';
}

/** Upper length bound actually enforced: the type's own, capped by the lathe limit. */
export function effectiveMaxLengthIn(type: SectionType): number {
  const bounds = SECTION_BOUNDS[type];
  return bounds
    ? Math.min(bounds.maxLengthIn, MANUFACTURING_LIMITS.maxSectionLengthIn)
    : MANUFACTURING_LIMITS.maxSectionLengthIn;
}
