// ============================================================================
// Cue Designer — Side-profile drawing data unit tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import {
  ProfileTransform,
  buildDimensionLabels,
  buildLegend,
  buildProfileOutline,
  buildProfilePath,
  buildSectionDividers,
  buildSectionShapes,
} from '@/lib/profile';
import { computeDesignGeometry } from '@/lib/geometry';
import type { CueSection } from '@/types/cue';

const forearm: CueSection = {
  sectionId: 'F1',
  sectionType: 'forearm',
  startPositionIn: 0,
  endPositionIn: 10,
  outerDiameterStartMm: 20,
  outerDiameterEndMm: 20,
};

const handle: CueSection = {
  sectionId: 'H1',
  sectionType: 'handle',
  startPositionIn: 10,
  endPositionIn: 20,
  outerDiameterStartMm: 20,
  outerDiameterEndMm: 22,
};

// Default viewport 1200x400, padding 50: usable 1100 x 300, centreline at y=200

describe('ProfileTransform', () => {
  it('maps the span across the padded width', () => {
    const t = new ProfileTransform(computeDesignGeometry([forearm]));
    expect(t.toSvgX(0)).toBe(50);
    expect(t.toSvgX(5)).toBe(600);
    expect(t.toSvgX(10)).toBe(1150);
  });

  it('puts the widest radius plus 10% at the padded top edge', () => {
    const t = new ProfileTransform(computeDesignGeometry([forearm]));
    expect(t.maxRadiusMm).toBeCloseTo(11, 10);
    expect(t.toSvgY(0)).toBe(200);
    expect(t.toSvgY(11)).toBeCloseTo(50, 10);
    expect(t.toSvgY(-11)).toBeCloseTo(350, 10);
  });

  it('reports scale factors', () => {
    const { pxPerIn, pxPerMm } = new ProfileTransform(computeDesignGeometry([forearm])).scaleFactors();
    expect(pxPerIn).toBe(110);
    expect(pxPerMm).toBeCloseTo(150 / 11, 10);
  });

  it('offsets by the first start position', () => {
    const shifted = { ...forearm, startPositionIn: 5, endPositionIn: 15 };
    const t = new ProfileTransform(computeDesignGeometry([shifted]));
    expect(t.startIn).toBe(5);
    expect(t.toSvgX(5)).toBe(50);
  });

  it('uses a unit span for an empty design', () => {
    const t = new ProfileTransform([]);
    expect(t.startIn).toBe(0);
    expect(t.spanIn).toBe(1);
    expect(t.maxRadiusMm).toBe(10);
  });

  it('honours a custom viewport', () => {
    const t = new ProfileTransform(computeDesignGeometry([forearm]), { width: 200, height: 100, padding: 0 });
    expect(t.toSvgX(10)).toBe(200);
    expect(t.centerY).toBe(50);
  });
});

describe('buildProfileOutline', () => {
  it('samples each section on the top edge then mirrors it', () => {
    const outline = buildProfileOutline(computeDesignGeometry([forearm, handle]), 4);
    // 2 sections x 5 samples, twice
    expect(outline).toHaveLength(20);
    expect(outline[0]).toEqual({ xIn: 0, radiusMm: 10 });
    expect(outline[9]).toEqual({ xIn: 20, radiusMm: 11 });
    expect(outline[10]).toEqual({ xIn: 20, radiusMm: -11 });
    expect(outline[19]).toEqual({ xIn: 0, radiusMm: -10 });
  });

  it('interpolates along a taper', () => {
    const outline = buildProfileOutline(computeDesignGeometry([handle]), 2);
    expect(outline[1]).toEqual({ xIn: 15, radiusMm: 10.5 });
  });
});

describe('buildProfilePath', () => {
  it('returns an empty path with no sections', () => {
    expect(buildProfilePath([], new ProfileTransform([]))).toBe('');
  });

  it('closes the outline of a cylinder', () => {
    const geometry = computeDesignGeometry([forearm]);
    const path = buildProfilePath(geometry, new ProfileTransform(geometry), 1);
    expect(path).toBe('M 50.0,63.6 L 1150.0,63.6 L 1150.0,336.4 L 50.0,336.4 Z');
  });
});

describe('section shapes and dividers', () => {
  it('builds one trapezoid per section', () => {
    const geometry = computeDesignGeometry([forearm]);
    expect(buildSectionShapes(geometry, new ProfileTransform(geometry))).toEqual([
      {
        sectionId: 'F1',
        label: 'Forearm',
        points: '50.0,63.6 1150.0,63.6 1150.0,336.4 50.0,336.4',
      },
    ]);
  });

  it('places dividers at internal boundaries only', () => {
    const geometry = computeDesignGeometry([forearm, handle]);
    expect(buildSectionDividers(geometry, new ProfileTransform(geometry))).toEqual([
      { x: 600, label: 'Forearm' },
    ]);
  });
});

describe('annotations', () => {
  const geometry = computeDesignGeometry([forearm, handle]);
  const t = new ProfileTransform(geometry);

  it('labels the overall length and the diameter at each end', () => {
    expect(buildDimensionLabels(geometry, t)).toEqual([
      { x: 600, y: 390, text: '20.0"', anchor: 'middle' },
      { x: 50, y: 30, text: 'Ø20.0mm', anchor: 'start' },
      { x: 1150, y: 30, text: 'Ø22.0mm', anchor: 'end' },
    ]);
  });

  it('shows the scale and section count in the legend', () => {
    // 1100px over 20", 150px over 12.1mm
    expect(buildLegend(geometry, t)).toEqual([
      { x: 1150, y: 380, text: 'Scale: 55.0 px/in, 12.4 px/mm', anchor: 'end' },
      { x: 1150, y: 390, text: 'Sections: 2', anchor: 'end' },
    ]);
  });

  it('draws no annotations without sections', () => {
    const empty = new ProfileTransform([]);
    expect(buildDimensionLabels([], empty)).toEqual([]);
    expect(buildLegend([], empty)).toEqual([]);
  });
});
