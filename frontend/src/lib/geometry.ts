// ============================================================================
// Cue Designer — Section Geometry
// Pure TypeScript, no React dependencies.
// Derives lengths, radii and taper from raw section records. Knows nothing
// about manufacturing rules; see validation.ts for those.
// ============================================================================

import type {
  CueSection,
  DerivedSectionGeometry,
  DesignGeometrySummary,
  MomentOfInertia,
} from '../types/cue';
import { DomainError } from './errors';
import { COMPARISON_TOLERANCE, SECTION_LABELS } from './constraints';
import { CM3_PER_IN3, GRAMS_PER_OUNCE, MM_PER_INCH, mmToIn, radiansToDegrees } from './units';

/** Hard maple, roughly. Used when no density is supplied. @unit g/cm3 */
export const DEFAULT_DENSITY_G_PER_CM3 = 1.2;

// ---------------------------------------------------------------------------
// Per-Section Derivation
// ---------------------------------------------------------------------------

/**
 * Derive the geometry of a single section.
 *
 * The taper angle is the half-angle of the frustum: half the diameter change
 * per inch, converted to inches per inch, through arctangent.
 *
 * @throws DomainError('non_positive_length') when end <= start. Checked
 *   before the taper division.
 */
export function computeSectionGeometry(section: CueSection): DerivedSectionGeometry {
  const lengthIn = section.endPositionIn - section.startPositionIn;
  if (!(lengthIn > 0)) {
    throw new DomainError(
      'non_positive_length',
      `${SECTION_LABELS[section.sectionType]} ${section.sectionId}: end position ` +
        `${section.endPositionIn}" must be greater than start position ${section.startPositionIn}"`,
      section.sectionId,
    );
  }

  const taperMmPerIn = (section.outerDiameterEndMm - section.outerDiameterStartMm) / lengthIn;

  return {
    sectionId: section.sectionId,
    sectionType: section.sectionType,
    startPositionIn: section.startPositionIn,
    endPositionIn: section.endPositionIn,
    lengthIn,
    startDiameterMm: section.outerDiameterStartMm,
    endDiameterMm: section.outerDiameterEndMm,
    startRadiusMm: section.outerDiameterStartMm / 2,
    endRadiusMm: section.outerDiameterEndMm / 2,
    taperMmPerIn,
    taperAngleDeg: radiansToDegrees(Math.atan(taperMmPerIn / 2 / MM_PER_INCH)),
  };
}

/**
 * Derive every section of a design, ordered by start position.
 * Sections starting at the same position keep their input order.
 * Cross-section rules are not checked here.
 */
export function computeDesignGeometry(sections: readonly CueSection[]): DerivedSectionGeometry[] {
  return sections
    .map((section) => computeSectionGeometry(section))
    .sort((a, b) => a.startPositionIn - b.startPositionIn);
}

// ---------------------------------------------------------------------------
// Positional Queries
// ---------------------------------------------------------------------------

/**
 * Radius at an axial position inside one section, by linear interpolation.
 *
 * @throws DomainError('position_out_of_range') outside the section.
 */
export function radiusAtPosition(geometry: DerivedSectionGeometry, xIn: number): number {
  if (
    xIn < geometry.startPositionIn - COMPARISON_TOLERANCE ||
    xIn > geometry.endPositionIn + COMPARISON_TOLERANCE
  ) {
    throw new DomainError(
      'position_out_of_range',
      `Position ${xIn}" is outside section ${geometry.sectionId} ` +
        `(${geometry.startPositionIn}"–${geometry.endPositionIn}")`,
      geometry.sectionId,
    );
  }
  const t = Math.min(1, Math.max(0, (xIn - geometry.startPositionIn) / geometry.lengthIn));
  return geometry.startRadiusMm + t * (geometry.endRadiusMm - geometry.startRadiusMm);
}

/** First section whose span contains xIn (boundaries inclusive). */
export function findSectionAt(
  geometries: readonly DerivedSectionGeometry[],
  xIn: number,
): DerivedSectionGeometry | undefined {
  return geometries.find((g) => g.startPositionIn <= xIn && xIn <= g.endPositionIn);
}

/** @throws DomainError('position_out_of_range') when no section covers xIn. */
export function designRadiusAtPosition(
  geometries: readonly DerivedSectionGeometry[],
  xIn: number,
): number {
  const section = findSectionAt(geometries, xIn);
  if (!section) {
    throw new DomainError('position_out_of_range', `Position ${xIn}" is outside the cue design`);
  }
  return radiusAtPosition(section, xIn);
}

// ---------------------------------------------------------------------------
// Area / Volume
// ---------------------------------------------------------------------------

/** Lateral surface from the mean radius. @unit in2 */
export function sectionSurfaceAreaIn2(geometry: DerivedSectionGeometry): number {
  const meanRadiusIn = mmToIn((geometry.startRadiusMm + geometry.endRadiusMm) / 2);
  return 2 * Math.PI * meanRadiusIn * geometry.lengthIn;
}

/** Frustum volume. @unit in3 */
export function sectionVolumeIn3(geometry: DerivedSectionGeometry): number {
  const r1 = mmToIn(geometry.startRadiusMm);
  const r2 = mmToIn(geometry.endRadiusMm);
  return (Math.PI * geometry.lengthIn * (r1 * r1 + r1 * r2 + r2 * r2)) / 3;
}

// ---------------------------------------------------------------------------
// Design Summary
// ---------------------------------------------------------------------------

/**
 * Treats the butt as a solid cylinder of the widest radius:
 * I_axial = m·r²/2, I_perpendicular = m·(3r² + L²)/12.
 */
export function estimateMomentOfInertia(massG: number, maxRadiusMm: number, spanIn: number): MomentOfInertia {
  const radiusIn = maxRadiusMm / MM_PER_INCH;
  return {
    axial: 0.5 * massG * radiusIn ** 2,
    perpendicular: (massG * (3 * radiusIn ** 2 + spanIn ** 2)) / 12,
  };
}

/**
 * Aggregate quantities of the assembled design. Uniform density; the weight
 * is an estimate for balancing, not a production figure.
 */
export function summarizeDesign(
  geometries: readonly DerivedSectionGeometry[],
  densityGPerCm3: number = DEFAULT_DENSITY_G_PER_CM3,
): DesignGeometrySummary {
  if (geometries.length === 0) {
    return {
      sectionCount: 0,
      spanIn: 0,
      totalSectionLengthIn: 0,
      surfaceAreaIn2: 0,
      volumeIn3: 0,
      centerOfMassIn: null,
      estimatedWeightOz: 0,
      momentOfInertia: null,
      minRadiusMm: null,
      maxRadiusMm: null,
      averageRadiusMm: null,
    };
  }

  let totalSectionLengthIn = 0;
  let surfaceAreaIn2 = 0;
  let volumeIn3 = 0;
  let weightedX = 0;
  let minRadiusMm = Infinity;
  let maxRadiusMm = -Infinity;
  let radiusSum = 0;
  let firstStart = Infinity;
  let lastEnd = -Infinity;

  for (const g of geometries) {
    const volume = sectionVolumeIn3(g);
    totalSectionLengthIn += g.lengthIn;
    surfaceAreaIn2 += sectionSurfaceAreaIn2(g);
    volumeIn3 += volume;
    weightedX += volume * ((g.startPositionIn + g.endPositionIn) / 2);
    minRadiusMm = Math.min(minRadiusMm, g.startRadiusMm, g.endRadiusMm);
    maxRadiusMm = Math.max(maxRadiusMm, g.startRadiusMm, g.endRadiusMm);
    radiusSum += (g.startRadiusMm + g.endRadiusMm) / 2;
    firstStart = Math.min(firstStart, g.startPositionIn);
    lastEnd = Math.max(lastEnd, g.endPositionIn);
  }

  const spanIn = lastEnd - firstStart;
  const massG = volumeIn3 * CM3_PER_IN3 * densityGPerCm3;

  return {
    sectionCount: geometries.length,
    spanIn,
    totalSectionLengthIn,
    surfaceAreaIn2,
    volumeIn3,
    centerOfMassIn: volumeIn3 > 0 ? weightedX / volumeIn3 : null,
    estimatedWeightOz: massG / GRAMS_PER_OUNCE,
    momentOfInertia: estimateMomentOfInertia(massG, maxRadiusMm, spanIn),
    minRadiusMm,
    maxRadiusMm,
    averageRadiusMm: radiusSum / geometries.length,
  };
}
