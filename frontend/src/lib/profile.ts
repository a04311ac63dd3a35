// ============================================================================
// Cue Designer — Side-Profile Drawing Data
// Turns derived section geometry into screen coordinates for the SVG
// profile. Pure TypeScript; CueProfile.tsx does the drawing.
// ============================================================================

import type { DerivedSectionGeometry } from '../types/cue';
import { SECTION_LABELS } from './constraints';
import { formatInches, formatMm } from './units';

export interface ProfilePoint {
  /** @unit in */
  xIn: number;
  /** Signed: positive above the centreline, negative below. @unit mm */
  radiusMm: number;
}

export interface ProfileViewport {
  width: number;
  height: number;
  padding: number;
}

export const DEFAULT_VIEWPORT: ProfileViewport = { width: 1200, height: 400, padding: 50 };

/** Vertical scale used when there is nothing to draw. @unit mm */
const EMPTY_MAX_RADIUS_MM = 10;

/** Headroom above the widest section. */
const RADIUS_HEADROOM = 1.1;

// ---------------------------------------------------------------------------
// Coordinate Transform
// ---------------------------------------------------------------------------

/**
 * Maps (axial inches, radial mm) to SVG pixels. The cue runs left to right
 * across the padded width; the centreline sits at mid-height and the widest
 * radius (plus headroom) reaches the padded top edge.
 */
export class ProfileTransform {
  readonly viewport: ProfileViewport;
  readonly startIn: number;
  readonly spanIn: number;
  readonly maxRadiusMm: number;

  constructor(geometries: readonly DerivedSectionGeometry[], viewport: ProfileViewport = DEFAULT_VIEWPORT) {
    this.viewport = viewport;
    if (geometries.length === 0) {
      this.startIn = 0;
      this.spanIn = 1;
      this.maxRadiusMm = EMPTY_MAX_RADIUS_MM;
      return;
    }
    const startIn = Math.min(...geometries.map((g) => g.startPositionIn));
    const endIn = Math.max(...geometries.map((g) => g.endPositionIn));
    this.startIn = startIn;
    this.spanIn = endIn - startIn;
    this.maxRadiusMm =
      Math.max(...geometries.map((g) => Math.max(g.startRadiusMm, g.endRadiusMm))) * RADIUS_HEADROOM;
  }

  get availableWidth(): number {
    return this.viewport.width - 2 * this.viewport.padding;
  }

  get availableHeight(): number {
    return this.viewport.height - 2 * this.viewport.padding;
  }

  get centerY(): number {
    return Math.floor(this.viewport.height / 2);
  }

  toSvgX(xIn: number): number {
    return this.viewport.padding + ((xIn - this.startIn) / this.spanIn) * this.availableWidth;
  }

  toSvgY(radiusMm: number): number {
    return this.centerY - (radiusMm / this.maxRadiusMm) * (this.availableHeight / 2);
  }

  toSvg(point: ProfilePoint): [number, number] {
    return [this.toSvgX(point.xIn), this.toSvgY(point.radiusMm)];
  }

  /** Pixels per inch along the axis, pixels per mm across it. */
  scaleFactors(): { pxPerIn: number; pxPerMm: number } {
    return {
      pxPerIn: this.availableWidth / this.spanIn,
      pxPerMm: this.availableHeight / 2 / this.maxRadiusMm,
    };
  }
}

// ---------------------------------------------------------------------------
// Outline
// ---------------------------------------------------------------------------

/**
 * Closed outline of the cue: top edge left to right, then bottom edge right
 * to left. Each section contributes stepsPerSection + 1 samples per edge, so
 * shared boundaries appear twice (once per section).
 */
export function buildProfileOutline(
  geometries: readonly DerivedSectionGeometry[],
  stepsPerSection = 20,
): ProfilePoint[] {
  const top: ProfilePoint[] = [];
  for (const g of geometries) {
    for (let i = 0; i <= stepsPerSection; i++) {
      const t = i / stepsPerSection;
      top.push({
        xIn: g.startPositionIn + t * g.lengthIn,
        radiusMm: g.startRadiusMm + t * (g.endRadiusMm - g.startRadiusMm),
      });
    }
  }
  const bottom = top
    .slice()
    .reverse()
    .map((p) => ({ xIn: p.xIn, radiusMm: -p.radiusMm }));
  return [...top, ...bottom];
}

function formatPoint([x, y]: [number, number]): string {
  return `${x.toFixed(1)},${y.toFixed(1)}`;
}

/** SVG path data for the outline, `''` when there are no sections. */
export function buildProfilePath(
  geometries: readonly DerivedSectionGeometry[],
  transform: ProfileTransform,
  stepsPerSection = 20,
): string {
  if (geometries.length === 0) return '';
  const points = buildProfileOutline(geometries, stepsPerSection).map((p) => formatPoint(transform.toSvg(p)));
  return `M ${points.join(' L ')} Z`;
}

// ---------------------------------------------------------------------------
// Per-Section Shapes
// ---------------------------------------------------------------------------

export interface SectionShape {
  sectionId: string;
  label: string;
  /** SVG `points` attribute of the closed quadrilateral. */
  points: string;
}

/** One trapezoid per section, used for highlighting and click targets. */
export function buildSectionShapes(
  geometries: readonly DerivedSectionGeometry[],
  transform: ProfileTransform,
): SectionShape[] {
  return geometries.map((g) => {
    const corners: ProfilePoint[] = [
      { xIn: g.startPositionIn, radiusMm: g.startRadiusMm },
      { xIn: g.endPositionIn, radiusMm: g.endRadiusMm },
      { xIn: g.endPositionIn, radiusMm: -g.endRadiusMm },
      { xIn: g.startPositionIn, radiusMm: -g.startRadiusMm },
    ];
    return {
      sectionId: g.sectionId,
      label: SECTION_LABELS[g.sectionType],
      points: corners.map((c) => formatPoint(transform.toSvg(c))).join(' '),
    };
  });
}

export interface SectionDivider {
  x: number;
  /** Label of the section ending at this divider. */
  label: string;
}

/** Vertical dividers at each internal section boundary. */
export function buildSectionDividers(
  geometries: readonly DerivedSectionGeometry[],
  transform: ProfileTransform,
): SectionDivider[] {
  return geometries.slice(0, -1).map((g) => ({
    x: transform.toSvgX(g.endPositionIn),
    label: SECTION_LABELS[g.sectionType],
  }));
}

// ---------------------------------------------------------------------------
// Annotations
// ---------------------------------------------------------------------------

export interface ProfileLabel {
  x: number;
  y: number;
  text: string;
  anchor: 'start' | 'middle' | 'end';
}

/**
 * Overall span centred along the bottom edge, plus the diameter at each end
 * of the butt above the padded top edge.
 */
export function buildDimensionLabels(
  geometries: readonly DerivedSectionGeometry[],
  transform: ProfileTransform,
): ProfileLabel[] {
  if (geometries.length === 0) return [];
  const { width, height, padding } = transform.viewport;
  const first = geometries.reduce((a, b) => (b.startPositionIn < a.startPositionIn ? b : a));
  const last = geometries.reduce((a, b) => (b.endPositionIn > a.endPositionIn ? b : a));
  return [
    { x: Math.floor(width / 2), y: height - 10, text: formatInches(transform.spanIn, 1), anchor: 'middle' },
    {
      x: transform.toSvgX(first.startPositionIn),
      y: padding - 20,
      text: `Ø${formatMm(first.startDiameterMm, 1)}`,
      anchor: 'start',
    },
    {
      x: transform.toSvgX(last.endPositionIn),
      y: padding - 20,
      text: `Ø${formatMm(last.endDiameterMm, 1)}`,
      anchor: 'end',
    },
  ];
}

/** Scale and section count in the bottom-right corner. */
export function buildLegend(
  geometries: readonly DerivedSectionGeometry[],
  transform: ProfileTransform,
): ProfileLabel[] {
  if (geometries.length === 0) return [];
  const { width, height, padding } = transform.viewport;
  const { pxPerIn, pxPerMm } = transform.scaleFactors();
  return [
    {
      x: width - padding,
      y: height - 20,
      text: `Scale: ${pxPerIn.toFixed(1)} px/in, ${pxPerMm.toFixed(1)} px/mm`,
      anchor: 'end',
    },
    { x: width - padding, y: height - 10, text: `Sections: ${geometries.length}`, anchor: 'end' },
  ];
}
