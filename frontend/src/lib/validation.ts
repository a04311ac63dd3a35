// ============================================================================
// Cue Designer — Manufacturing Constraint Validation
// ============================================================================
//
// validate() is a pure function of its input: no caching, no instance state.
// Every rule breach is returned as a Violation; nothing is thrown for a bad
// design. Only geometry derivation (when the caller does not pass derived
// geometry in) can throw, and only for structurally unusable sections.
// ============================================================================

import type {
  DerivedSectionGeometry,
  DesignGeometrySummary,
  DesignInput,
  Violation,
  ViolationKind,
} from '../types/cue';
import {
  COMPARISON_TOLERANCE,
  MANUFACTURING_LIMITS,
  SECTION_LABELS,
  SECTION_SEQUENCES,
  detectSchema,
  effectiveMaxLengthIn,
  getSectionBounds,
  getSequenceRank,
} from './constraints';
import { computeDesignGeometry, summarizeDesign } from './geometry';
import { formatDegrees, formatInches, formatMm } from './units';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function describe(g: DerivedSectionGeometry): string {
  return `${SECTION_LABELS[g.sectionType]} ${g.sectionId}`;
}

function makeViolation(
  kind: ViolationKind,
  sectionIds: string[],
  message: string,
  value?: number,
  limit?: number,
): Violation {
  return { kind, severity: 'error', sectionIds, message, value, limit };
}

function exceeds(value: number, max: number): boolean {
  return value > max + COMPARISON_TOLERANCE;
}

function fallsBelow(value: number, min: number): boolean {
  return value < min - COMPARISON_TOLERANCE;
}

// ---------------------------------------------------------------------------
// Per-Section Rules
// ---------------------------------------------------------------------------

function checkLength(g: DerivedSectionGeometry, out: Violation[]): void {
  const bounds = getSectionBounds(g.sectionType);
  const maxLengthIn = effectiveMaxLengthIn(g.sectionType);

  if (bounds && fallsBelow(g.lengthIn, bounds.minLengthIn)) {
    out.push(makeViolation(
      'length_bound',
      [g.sectionId],
      `${describe(g)} length ${formatInches(g.lengthIn)} is below minimum ${formatInches(bounds.minLengthIn)}`,
      g.lengthIn,
      bounds.minLengthIn,
    ));
  }
  if (exceeds(g.lengthIn, maxLengthIn)) {
    out.push(makeViolation(
      'length_bound',
      [g.sectionId],
      `${describe(g)} length ${formatInches(g.lengthIn)} exceeds maximum ${formatInches(maxLengthIn)}`,
      g.lengthIn,
      maxLengthIn,
    ));
  }
}

function checkDiameters(g: DerivedSectionGeometry, out: Violation[]): void {
  const bounds = getSectionBounds(g.sectionType);
  if (!bounds) return;

  const ends: [label: string, diameterMm: number][] = [
    ['start', g.startDiameterMm],
    ['end', g.endDiameterMm],
  ];
  for (const [label, diameterMm] of ends) {
    if (fallsBelow(diameterMm, bounds.minDiameterMm)) {
      out.push(makeViolation(
        'diameter_bound',
        [g.sectionId],
        `${describe(g)} ${label} diameter ${formatMm(diameterMm)} is below minimum ${formatMm(bounds.minDiameterMm)}`,
        diameterMm,
        bounds.minDiameterMm,
      ));
    } else if (exceeds(diameterMm, bounds.maxDiameterMm)) {
      out.push(makeViolation(
        'diameter_bound',
        [g.sectionId],
        `${describe(g)} ${label} diameter ${formatMm(diameterMm)} exceeds maximum ${formatMm(bounds.maxDiameterMm)}`,
        diameterMm,
        bounds.maxDiameterMm,
      ));
    }
  }
}

function checkTaper(g: DerivedSectionGeometry, out: Violation[]): void {
  const { maxTaperAngleDeg } = MANUFACTURING_LIMITS;
  if (exceeds(Math.abs(g.taperAngleDeg), maxTaperAngleDeg)) {
    out.push(makeViolation(
      'taper_exceeded',
      [g.sectionId],
      `${describe(g)} taper angle ${formatDegrees(g.taperAngleDeg)} exceeds maximum ${formatDegrees(maxTaperAngleDeg)}`,
      g.taperAngleDeg,
      maxTaperAngleDeg,
    ));
  }
}

function checkRadius(g: DerivedSectionGeometry, out: Violation[]): void {
  const { minRadiusMm, maxRadiusMm } = MANUFACTURING_LIMITS;
  const smallest = Math.min(g.startRadiusMm, g.endRadiusMm);
  const largest = Math.max(g.startRadiusMm, g.endRadiusMm);

  // One violation per section; the undersized end is reported first.
  if (fallsBelow(smallest, minRadiusMm)) {
    out.push(makeViolation(
      'radius_out_of_range',
      [g.sectionId],
      `${describe(g)} radius ${formatMm(smallest)} is below minimum ${formatMm(minRadiusMm)}`,
      smallest,
      minRadiusMm,
    ));
  } else if (exceeds(largest, maxRadiusMm)) {
    out.push(makeViolation(
      'radius_out_of_range',
      [g.sectionId],
      `${describe(g)} radius ${formatMm(largest)} exceeds maximum ${formatMm(maxRadiusMm)}`,
      largest,
      maxRadiusMm,
    ));
  }
}

// ---------------------------------------------------------------------------
// Adjacency Rules
// ---------------------------------------------------------------------------

function checkAdjacency(
  prev: DerivedSectionGeometry,
  next: DerivedSectionGeometry,
  out: Violation[],
): void {
  const pair = [prev.sectionId, next.sectionId];
  const between = `between ${describe(prev)} and ${describe(next)}`;

  const delta = next.startPositionIn - prev.endPositionIn;
  if (delta > COMPARISON_TOLERANCE) {
    out.push(makeViolation('gap', pair, `Gap of ${formatInches(delta)} ${between}`, delta, 0));
  } else if (delta < -COMPARISON_TOLERANCE) {
    out.push(makeViolation('overlap', pair, `Overlap of ${formatInches(-delta)} ${between}`, -delta, 0));
  }

  // Evaluated whether or not the positions touch.
  const { maxDiameterJumpMm } = MANUFACTURING_LIMITS;
  const jump = Math.abs(next.startDiameterMm - prev.endDiameterMm);
  if (exceeds(jump, maxDiameterJumpMm)) {
    out.push(makeViolation(
      'diameter_jump',
      pair,
      `Diameter jump of ${formatMm(jump)} ${between} exceeds maximum ${formatMm(maxDiameterJumpMm)}`,
      jump,
      maxDiameterJumpMm,
    ));
  }
}

// ---------------------------------------------------------------------------
// Public API — Validator
// ---------------------------------------------------------------------------

/**
 * Check a design against the manufacturing rules.
 *
 * Sections are visited in start-position order. For each one the sequence,
 * length, diameter, taper and radius rules run, then continuity with the
 * previous section. The summed-length cap and the declared overall length
 * are checked once at the end.
 *
 * @param design - Sections plus optional declared length and schema.
 * @param derived - Geometry from computeDesignGeometry(). Computed here when omitted.
 * @returns Every breach found, in visiting order. Empty for a design with no sections.
 */
export function validate(
  design: DesignInput,
  derived?: readonly DerivedSectionGeometry[],
): Violation[] {
  const geometries = [...(derived ?? computeDesignGeometry(design.sections))].sort(
    (a, b) => a.startPositionIn - b.startPositionIn,
  );
  const violations: Violation[] = [];
  if (geometries.length === 0) return violations;

  const schema = design.schema ?? detectSchema(geometries);
  const sequence = SECTION_SEQUENCES[schema];
  const expectedOrder = sequence.join(' → ');

  let highest: { rank: number; geometry: DerivedSectionGeometry } | null = null;
  let prev: DerivedSectionGeometry | null = null;
  let totalLengthIn = 0;
  let furthestEndIn = -Infinity;

  for (const g of geometries) {
    const rank = getSequenceRank(g.sectionType, schema);
    if (rank < 0) {
      violations.push(makeViolation(
        'sequence_error',
        [g.sectionId],
        `${describe(g)} is not part of the ${schema} sequence (${expectedOrder})`,
      ));
    } else if (highest && rank < highest.rank) {
      violations.push(makeViolation(
        'sequence_error',
        [g.sectionId],
        `${describe(g)} at ${formatInches(g.startPositionIn)} follows ${describe(highest.geometry)}; ` +
          `expected order ${expectedOrder}`,
      ));
    } else {
      highest = { rank, geometry: g };
    }

    checkLength(g, violations);
    checkDiameters(g, violations);
    checkTaper(g, violations);
    checkRadius(g, violations);
    if (prev) checkAdjacency(prev, g, violations);

    totalLengthIn += g.lengthIn;
    furthestEndIn = Math.max(furthestEndIn, g.endPositionIn);
    prev = g;
  }

  const { maxTotalLengthIn } = MANUFACTURING_LIMITS;
  if (exceeds(totalLengthIn, maxTotalLengthIn)) {
    violations.push(makeViolation(
      'total_length',
      [],
      `Total section length ${formatInches(totalLengthIn)} exceeds maximum ${formatInches(maxTotalLengthIn)}`,
      totalLengthIn,
      maxTotalLengthIn,
    ));
  }

  if (design.overallLengthIn !== undefined && exceeds(furthestEndIn, design.overallLengthIn)) {
    violations.push(makeViolation(
      'overall_length',
      [],
      `Sections extend to ${formatInches(furthestEndIn)}, beyond the declared overall length ` +
        `${formatInches(design.overallLengthIn)}`,
      furthestEndIn,
      design.overallLengthIn,
    ));
  }

  return violations;
}

export interface DesignAnalysis {
  geometry: DerivedSectionGeometry[];
  summary: DesignGeometrySummary;
  violations: Violation[];
}

/**
 * Derive, summarize and validate in one call. This is what the API layer
 * and the editor store use.
 *
 * @throws DomainError when a section cannot be derived at all.
 */
export function analyzeDesign(design: DesignInput): DesignAnalysis {
  const geometry = computeDesignGeometry(design.sections);
  return {
    geometry,
    summary: summarizeDesign(geometry),
    violations: validate(design, geometry),
  };
}

// ---------------------------------------------------------------------------
// Display Helpers
// ---------------------------------------------------------------------------

export const VIOLATION_DESCRIPTIONS: Record<ViolationKind, string> = {
  sequence_error: 'Section out of canonical order (joint → forearm → handle → sleeve → butt)',
  length_bound: 'Section length outside the range for its type',
  diameter_bound: 'Section diameter outside the range for its type',
  taper_exceeded: 'Taper steeper than 5°, too steep to turn reliably',
  radius_out_of_range: 'Radius outside the 5–25 mm the lathe can hold',
  diameter_jump: 'Step of more than 1 mm between adjoining sections',
  gap: 'Sections do not touch; material is missing between them',
  overlap: 'Sections overlap along the axis',
  total_length: 'Sections add up to more than 40 inches',
  overall_length: 'Sections run past the declared overall length',
};

const SECTION_KINDS: ReadonlySet<ViolationKind> = new Set<ViolationKind>([
  'sequence_error', 'length_bound', 'diameter_bound', 'taper_exceeded', 'radius_out_of_range',
]);

const CONTINUITY_KINDS: ReadonlySet<ViolationKind> = new Set<ViolationKind>([
  'gap', 'overlap', 'diameter_jump',
]);

/**
 * Format a violation for display.
 * Returns e.g. "[gap] Gap of 0.500" between Forearm F1 and Handle H1"
 */
export function formatViolation(violation: Violation): string {
  return `[${violation.kind}] ${violation.message}`;
}

/** "3 problems", "1 problem", or "" for zero. */
export function getViolationCountBadge(violations: readonly Violation[]): string {
  const count = violations.length;
  if (count === 0) return '';
  return count === 1 ? '1 problem' : `${count} problems`;
}

/**
 * Split violations into per-section, continuity and design-level groups,
 * keeping their original order within each group.
 */
export function groupViolationsByCategory(
  violations: readonly Violation[],
): { section: Violation[]; continuity: Violation[]; design: Violation[] } {
  const section: Violation[] = [];
  const continuity: Violation[] = [];
  const design: Violation[] = [];

  for (const v of violations) {
    if (SECTION_KINDS.has(v.kind)) {
      section.push(v);
    } else if (CONTINUITY_KINDS.has(v.kind)) {
      continuity.push(v);
    } else {
      design.push(v);
    }
  }

  return { section, continuity, design };
}

/** Whether any violation references the given section. */
export function sectionHasViolation(violations: readonly Violation[], sectionId: string): boolean {
  return violations.some((v) => v.sectionIds.includes(sectionId));
}

/** All violations referencing the given section, adjacency pairs included. */
export function getSectionViolations(
  violations: readonly Violation[],
  sectionId: string,
): Violation[] {
  return violations.filter((v) => v.sectionIds.includes(sectionId));
}

// ---------------------------------------------------------------------------
// Per-Field Lookup
// ---------------------------------------------------------------------------

/** Which group of section inputs a violation is shown beside. */
export type SectionFieldGroup = 'position' | 'diameter';

const DIAMETER_KINDS: ReadonlySet<ViolationKind> = new Set<ViolationKind>([
  'diameter_bound', 'radius_out_of_range', 'diameter_jump', 'taper_exceeded',
]);

export function getViolationFieldGroup(kind: ViolationKind): SectionFieldGroup {
  return DIAMETER_KINDS.has(kind) ? 'diameter' : 'position';
}

/** Newline-joined messages for one section's position or diameter inputs; "" when clean. */
export function getFieldViolationText(
  violations: readonly Violation[],
  sectionId: string,
  group: SectionFieldGroup,
): string {
  return getSectionViolations(violations, sectionId)
    .filter((v) => getViolationFieldGroup(v.kind) === group)
    .map((v) => v.message)
    .join('\n');
}
