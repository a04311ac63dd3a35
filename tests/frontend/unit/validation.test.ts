// ============================================================================
// Cue Designer — Constraint validation unit tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import {
  analyzeDesign,
  formatViolation,
  getFieldViolationText,
  getSectionViolations,
  getViolationFieldGroup,
  getViolationCountBadge,
  groupViolationsByCategory,
  sectionHasViolation,
  validate,
  VIOLATION_DESCRIPTIONS,
} from '@/lib/validation';
import { computeDesignGeometry } from '@/lib/geometry';
import { DomainError } from '@/lib/errors';
import type { CueSection, SectionType, Violation, ViolationKind } from '@/types/cue';

function makeSection(
  sectionId: string,
  sectionType: SectionType,
  start: number,
  end: number,
  dStart: number,
  dEnd: number,
): CueSection {
  return {
    sectionId,
    sectionType,
    startPositionIn: start,
    endPositionIn: end,
    outerDiameterStartMm: dStart,
    outerDiameterEndMm: dEnd,
  };
}

/** Five-piece butt inside every bound. */
function classicSections(): CueSection[] {
  return [
    makeSection('J1', 'joint', 0, 1, 20.0, 20.2),
    makeSection('F1', 'forearm', 1, 12, 20.2, 22.0),
    makeSection('H1', 'handle', 12, 22, 22.0, 24.5),
    makeSection('S1', 'sleeve', 22, 28, 24.5, 27.0),
    makeSection('B1', 'butt', 28, 31, 27.0, 28.5),
  ];
}

const kinds = (violations: Violation[]): ViolationKind[] => violations.map((v) => v.kind);

// ---------------------------------------------------------------------------
// Valid designs
// ---------------------------------------------------------------------------

describe('validate — valid designs', () => {
  it('returns no violations for a design inside every limit', () => {
    expect(validate({ sections: classicSections(), overallLengthIn: 31 })).toEqual([]);
  });

  it('returns no violations for an empty design', () => {
    expect(validate({ sections: [] })).toEqual([]);
  });

  it('accepts sections passed out of position order', () => {
    const shuffled = classicSections().reverse();
    expect(validate({ sections: shuffled })).toEqual([]);
  });

  it('accepts touching sections whose positions differ by float rounding', () => {
    const sections = [
      makeSection('J1', 'joint', 0, 0.7 + 0.1, 20.0, 20.2),
      makeSection('F1', 'forearm', 0.8, 10.8, 20.2, 22.0),
    ];
    expect(validate({ sections })).toEqual([]);
  });

  it('accepts a diameter step of exactly 1mm', () => {
    const sections = [
      makeSection('F1', 'forearm', 0, 10, 20.0, 21.0),
      makeSection('H1', 'handle', 10, 20, 22.0, 22.0),
    ];
    expect(validate({ sections })).toEqual([]);
  });

  it('uses the geometry passed in instead of re-deriving', () => {
    const sections = classicSections();
    const derived = computeDesignGeometry(sections);
    expect(validate({ sections }, derived)).toEqual(validate({ sections }));
  });
});

// ---------------------------------------------------------------------------
// Per-section rules
// ---------------------------------------------------------------------------

describe('validate — per-section rules', () => {
  it('reports exactly one length_bound for a 5-inch forearm', () => {
    const violations = validate({ sections: [makeSection('F1', 'forearm', 0, 5, 20, 20)] });
    expect(violations).toEqual([
      {
        kind: 'length_bound',
        severity: 'error',
        sectionIds: ['F1'],
        message: 'Forearm F1 length 5.000" is below minimum 8.000"',
        value: 5,
        limit: 8,
      },
    ]);
  });

  it('caps untabled section types at the single-section maximum', () => {
    const violations = validate({ sections: [makeSection('BS1', 'butt_sleeve', 0, 25, 24, 24)] });
    expect(violations).toHaveLength(1);
    expect(violations[0]?.kind).toBe('length_bound');
    expect(violations[0]?.message).toBe('Butt Sleeve BS1 length 25.000" exceeds maximum 20.000"');
    expect(violations[0]?.limit).toBe(20);
  });

  it('reports each diameter end outside the bounds', () => {
    const violations = validate({ sections: [makeSection('F1', 'forearm', 0, 10, 18.5, 25)] });
    expect(violations.map((v) => v.message)).toEqual([
      'Forearm F1 start diameter 18.50mm is below minimum 19.00mm',
      'Forearm F1 end diameter 25.00mm exceeds maximum 24.00mm',
    ]);
    expect(kinds(violations)).toEqual(['diameter_bound', 'diameter_bound']);
  });

  it('reports length and diameter breaches on the same section independently', () => {
    const violations = validate({ sections: [makeSection('F1', 'forearm', 0, 5, 18.5, 18.5)] });
    expect(kinds(violations)).toEqual(['length_bound', 'diameter_bound', 'diameter_bound']);
  });

  it('reports a taper steeper than 5 degrees', () => {
    const violations = validate({ sections: [makeSection('J1', 'joint', 0, 1, 19, 24)] });
    expect(violations).toHaveLength(1);
    expect(violations[0]?.kind).toBe('taper_exceeded');
    expect(violations[0]?.message).toBe('Joint J1 taper angle 5.62° exceeds maximum 5.00°');
    expect(violations[0]?.value).toBeCloseTo(5.621243, 5);
  });

  it('checks the taper magnitude for narrowing sections', () => {
    const violations = validate({ sections: [makeSection('J1', 'joint', 0, 1, 24, 19)] });
    expect(kinds(violations)).toEqual(['taper_exceeded']);
  });

  it('reports an undersized radius', () => {
    const violations = validate({ sections: [makeSection('BS1', 'butt_sleeve', 0, 8, 8, 8)] });
    expect(violations).toEqual([
      {
        kind: 'radius_out_of_range',
        severity: 'error',
        sectionIds: ['BS1'],
        message: 'Butt Sleeve BS1 radius 4.00mm is below minimum 5.00mm',
        value: 4,
        limit: 5,
      },
    ]);
  });

  it('reports an oversized radius', () => {
    const violations = validate({ sections: [makeSection('BS1', 'butt_sleeve', 0, 8, 52, 52)] });
    expect(violations.map((v) => v.message)).toEqual([
      'Butt Sleeve BS1 radius 26.00mm exceeds maximum 25.00mm',
    ]);
  });
});

// ---------------------------------------------------------------------------
// Sequence
// ---------------------------------------------------------------------------

describe('validate — sequence', () => {
  it('reports the forearm in a [handle, forearm] sequence', () => {
    const violations = validate({
      sections: [
        makeSection('H1', 'handle', 0, 10, 22, 22),
        makeSection('F1', 'forearm', 10, 20, 22, 22),
      ],
    });
    expect(violations).toEqual([
      {
        kind: 'sequence_error',
        severity: 'error',
        sectionIds: ['F1'],
        message:
          'Forearm F1 at 10.000" follows Handle H1; expected order joint → forearm → handle → sleeve → butt',
        value: undefined,
        limit: undefined,
      },
    ]);
  });

  it('allows repeated types in order', () => {
    const violations = validate({
      sections: [
        makeSection('F1', 'forearm', 0, 8, 20, 20.5),
        makeSection('F2', 'forearm', 8, 16, 20.5, 21),
      ],
    });
    expect(violations).toEqual([]);
  });

  it('follows the compact sequence when a butt sleeve is present', () => {
    const violations = validate({
      sections: [
        makeSection('F1', 'forearm', 0, 11, 20.2, 22.0),
        makeSection('H1', 'handle', 11, 21, 22.0, 24.0),
        makeSection('BS1', 'butt_sleeve', 21, 29, 24.0, 28.0),
      ],
    });
    expect(violations).toEqual([]);
  });

  it('reports a type outside the compact sequence', () => {
    const violations = validate({
      sections: [
        makeSection('J1', 'joint', 0, 1, 20.0, 20.2),
        makeSection('F1', 'forearm', 1, 12, 20.2, 22.0),
        makeSection('H1', 'handle', 12, 22, 22.0, 24.0),
        makeSection('BS1', 'butt_sleeve', 22, 30, 24.0, 28.0),
      ],
    });
    expect(violations.map((v) => v.message)).toEqual([
      'Joint J1 is not part of the compact sequence (forearm → handle → butt_sleeve)',
    ]);
  });

  it('honours an explicit schema', () => {
    const violations = validate({
      sections: [makeSection('J1', 'joint', 0, 1, 20, 20.2)],
      schema: 'compact',
    });
    expect(kinds(violations)).toEqual(['sequence_error']);
  });
});

// ---------------------------------------------------------------------------
// Adjacency
// ---------------------------------------------------------------------------

describe('validate — adjacency', () => {
  it('reports one gap and no overlap for a 0.5-inch gap', () => {
    const violations = validate({
      sections: [
        makeSection('F1', 'forearm', 0, 10, 20, 21),
        makeSection('H1', 'handle', 10.5, 20.5, 21, 22),
      ],
    });
    expect(violations).toEqual([
      {
        kind: 'gap',
        severity: 'error',
        sectionIds: ['F1', 'H1'],
        message: 'Gap of 0.500" between Forearm F1 and Handle H1',
        value: 0.5,
        limit: 0,
      },
    ]);
  });

  it('reports an overlap by its magnitude', () => {
    const violations = validate({
      sections: [
        makeSection('F1', 'forearm', 0, 10, 20, 21),
        makeSection('H1', 'handle', 9.5, 19.5, 21, 22),
      ],
    });
    expect(kinds(violations)).toEqual(['overlap']);
    expect(violations[0]?.value).toBe(0.5);
    expect(violations[0]?.message).toBe('Overlap of 0.500" between Forearm F1 and Handle H1');
  });

  it('reports a 3.8mm diameter jump between touching sections', () => {
    const violations = validate({
      sections: [
        makeSection('F1', 'forearm', 0, 10, 20.0, 20.2),
        makeSection('H1', 'handle', 10, 20, 24.0, 24.5),
      ],
    });
    expect(kinds(violations)).toEqual(['diameter_jump']);
    expect(violations[0]?.sectionIds).toEqual(['F1', 'H1']);
    expect(violations[0]?.value).toBeCloseTo(3.8, 10);
    expect(violations[0]?.message).toBe(
      'Diameter jump of 3.80mm between Forearm F1 and Handle H1 exceeds maximum 1.00mm',
    );
  });

  it('reports a diameter jump alongside a gap', () => {
    const violations = validate({
      sections: [
        makeSection('F1', 'forearm', 0, 10, 20.0, 20.2),
        makeSection('H1', 'handle', 10.5, 20.5, 24.0, 24.5),
      ],
    });
    expect(kinds(violations)).toEqual(['gap', 'diameter_jump']);
  });

  it('only compares consecutive sections', () => {
    const violations = validate({
      sections: [
        makeSection('F1', 'forearm', 0, 10, 20, 20.5),
        makeSection('H1', 'handle', 10, 20, 21, 21.5),
        makeSection('S1', 'sleeve', 20, 25, 24, 24),
      ],
    });
    // 21.5 -> 24 is the only step over 1mm
    expect(violations.map((v) => v.sectionIds)).toEqual([['H1', 'S1']]);
  });
});

// ---------------------------------------------------------------------------
// Design-level rules
// ---------------------------------------------------------------------------

describe('validate — design-level rules', () => {
  it('reports exactly one total length violation for five 10-inch sections', () => {
    const violations = validate({
      sections: [
        makeSection('J1', 'joint', 0, 10, 24, 24),
        makeSection('F1', 'forearm', 10, 20, 24, 24),
        makeSection('H1', 'handle', 20, 30, 24, 24),
        makeSection('S1', 'sleeve', 30, 40, 24, 24),
        makeSection('B1', 'butt', 40, 50, 24, 24),
      ],
    });
    expect(violations.filter((v) => v.kind === 'total_length')).toEqual([
      {
        kind: 'total_length',
        severity: 'error',
        sectionIds: [],
        message: 'Total section length 50.000" exceeds maximum 40.000"',
        value: 50,
        limit: 40,
      },
    ]);
    // Per-section breaches are still reported
    expect(violations.filter((v) => v.kind === 'length_bound').map((v) => v.sectionIds[0])).toEqual([
      'J1', 'S1', 'B1',
    ]);
    expect(violations[violations.length - 1]?.kind).toBe('total_length');
  });

  it('reports sections running past the declared overall length', () => {
    const violations = validate({ sections: classicSections(), overallLengthIn: 30 });
    expect(violations).toEqual([
      {
        kind: 'overall_length',
        severity: 'error',
        sectionIds: [],
        message: 'Sections extend to 31.000", beyond the declared overall length 30.000"',
        value: 31,
        limit: 30,
      },
    ]);
  });

  it('skips the overall length check when none is declared', () => {
    expect(validate({ sections: classicSections() })).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Purity
// ---------------------------------------------------------------------------

describe('validate — purity', () => {
  it('returns identical output for repeated calls', () => {
    const design = {
      sections: [
        makeSection('H1', 'handle', 0, 10, 22, 22),
        makeSection('F1', 'forearm', 10.5, 15, 26, 26),
      ],
    };
    expect(validate(design)).toEqual(validate(design));
  });

  it('does not modify its input', () => {
    const sections = classicSections().reverse();
    const snapshot = sections.map((s) => ({ ...s }));
    const derived = computeDesignGeometry(sections).reverse();
    const derivedIds = derived.map((g) => g.sectionId);
    validate({ sections }, derived);
    expect(sections).toEqual(snapshot);
    expect(derived.map((g) => g.sectionId)).toEqual(derivedIds);
  });
});

// ---------------------------------------------------------------------------
// analyzeDesign
// ---------------------------------------------------------------------------

describe('analyzeDesign', () => {
  it('returns sorted geometry, a summary and the violations', () => {
    const analysis = analyzeDesign({ sections: classicSections().reverse(), overallLengthIn: 31 });
    expect(analysis.geometry.map((g) => g.sectionId)).toEqual(['J1', 'F1', 'H1', 'S1', 'B1']);
    expect(analysis.summary.sectionCount).toBe(5);
    expect(analysis.summary.spanIn).toBe(31);
    expect(analysis.violations).toEqual([]);
  });

  it('throws a DomainError for a non-positive section length', () => {
    expect(() =>
      analyzeDesign({ sections: [makeSection('F1', 'forearm', 4, 2, 20, 20)] }),
    ).toThrow(DomainError);
  });
});

// ---------------------------------------------------------------------------
// Display helpers
// ---------------------------------------------------------------------------

describe('violation display helpers', () => {
  const gap: Violation = {
    kind: 'gap',
    severity: 'error',
    sectionIds: ['F1', 'H1'],
    message: 'Gap of 0.500" between Forearm F1 and Handle H1',
  };
  const length: Violation = {
    kind: 'length_bound',
    severity: 'error',
    sectionIds: ['F1'],
    message: 'Forearm F1 length 5.000" is below minimum 8.000"',
  };
  const total: Violation = {
    kind: 'total_length',
    severity: 'error',
    sectionIds: [],
    message: 'Total section length 50.000" exceeds maximum 40.000"',
  };

  it('formatViolation prefixes the kind', () => {
    expect(formatViolation(gap)).toBe('[gap] Gap of 0.500" between Forearm F1 and Handle H1');
  });

  it('getViolationCountBadge pluralizes', () => {
    expect(getViolationCountBadge([])).toBe('');
    expect(getViolationCountBadge([gap])).toBe('1 problem');
    expect(getViolationCountBadge([gap, length, total])).toBe('3 problems');
  });

  it('groupViolationsByCategory keeps order within groups', () => {
    expect(groupViolationsByCategory([total, gap, length])).toEqual({
      section: [length],
      continuity: [gap],
      design: [total],
    });
  });

  it('finds violations by section id, adjacency pairs included', () => {
    const all = [gap, length, total];
    expect(sectionHasViolation(all, 'H1')).toBe(true);
    expect(sectionHasViolation(all, 'J1')).toBe(false);
    expect(getSectionViolations(all, 'F1')).toEqual([gap, length]);
  });

  it('routes diameter rules to the diameter inputs', () => {
    expect(getViolationFieldGroup('diameter_bound')).toBe('diameter');
    expect(getViolationFieldGroup('radius_out_of_range')).toBe('diameter');
    expect(getViolationFieldGroup('diameter_jump')).toBe('diameter');
    expect(getViolationFieldGroup('overlap')).toBe('position');
    expect(getViolationFieldGroup('length_bound')).toBe('position');
  });

  it('getFieldViolationText joins only the matching group', () => {
    const jump: Violation = {
      kind: 'diameter_jump',
      severity: 'error',
      sectionIds: ['F1', 'H1'],
      message: 'Diameter jump of 8.000mm between Forearm F1 and Handle H1',
    };
    const all = [gap, length, jump, total];
    expect(getFieldViolationText(all, 'F1', 'position')).toBe(`${gap.message}\n${length.message}`);
    expect(getFieldViolationText(all, 'F1', 'diameter')).toBe(jump.message);
    expect(getFieldViolationText(all, 'J1', 'diameter')).toBe('');
  });

  it('describes every violation kind', () => {
    const described: ViolationKind[] = [
      'sequence_error', 'length_bound', 'diameter_bound', 'taper_exceeded', 'radius_out_of_range',
      'diameter_jump', 'gap', 'overlap', 'total_length', 'overall_length',
    ];
    for (const kind of described) {
      expect(VIOLATION_DESCRIPTIONS[kind]).toBeTruthy();
    }
  });
});
