// ============================================================================
// Cue Designer — Canonical Frontend Type Definitions
// Mirrors the /api/cues/ REST payloads (snake_case -> camelCase)
// ============================================================================

// ---------------------------------------------------------------------------
// Enum / Literal Types
// ---------------------------------------------------------------------------

/** Section kinds. `butt_sleeve` only appears in the compact (3-piece) schema. */
export type SectionType = 'joint' | 'forearm' | 'handle' | 'sleeve' | 'butt' | 'butt_sleeve';

/** Which canonical section sequence a design follows. */
export type SectionSchema = 'standard' | 'compact';

export type DesignStyle =
  | 'traditional_classic' | 'modern_minimal' | 'ornate' | 'art_deco' | 'contemporary';

export type SymmetryType = 'radial' | 'bilateral' | 'asymmetric';

export type EraInfluence = 'vintage' | 'traditional' | 'modern' | 'contemporary';

export type ComplexityLevel = 'low' | 'medium' | 'high';

/** Starter template names. 'Custom' once the user edits anything. */
export type TemplateName = 'Classic' | 'Sneaky' | 'Compact' | 'Custom';

// ---------------------------------------------------------------------------
// CueSection / CueDesign — mirror backend models
// ---------------------------------------------------------------------------

/** One axial segment of the butt, modelled as a linear taper. */
export interface CueSection {
  /** Backend primary key. Absent until saved. */
  id?: number;
  /** Stable key within a design, e.g. "SEC_FOREARM". */
  sectionId: string;
  sectionType: SectionType;
  /** @unit in */
  startPositionIn: number;
  /** @unit in. Must exceed startPositionIn. */
  endPositionIn: number;
  /** @unit mm */
  outerDiameterStartMm: number;
  /** @unit mm */
  outerDiameterEndMm: number;
}

export interface CueDesign {
  id?: number;
  /** User-facing identifier, unique on the backend (max 20 chars). */
  cueId: string;
  designStyle: DesignStyle;
  /** Declared butt length. @unit in */
  overallLengthIn: number;
  symmetryType: SymmetryType;
  eraInfluence: EraInfluence;
  complexityLevel: ComplexityLevel;
  notes: string;
  sections: CueSection[];
  createdAt?: string;
  updatedAt?: string;
}

/** Summary row for the design list (GET /api/cues/). */
export interface CueDesignSummary {
  id: number;
  cueId: string;
  designStyle: DesignStyle;
  overallLengthIn: number;
  sectionCount: number;
  updatedAt?: string;
}

// ---------------------------------------------------------------------------
// Derived geometry — computed client side, never persisted
// ---------------------------------------------------------------------------

export interface DerivedSectionGeometry {
  sectionId: string;
  sectionType: SectionType;
  /** @unit in */
  startPositionIn: number;
  /** @unit in */
  endPositionIn: number;
  /** @unit in */
  lengthIn: number;
  /** @unit mm */
  startDiameterMm: number;
  /** @unit mm */
  endDiameterMm: number;
  /** @unit mm */
  startRadiusMm: number;
  /** @unit mm */
  endRadiusMm: number;
  /** Diameter change per inch of length. @unit mm/in */
  taperMmPerIn: number;
  /** Half-angle of the taper. @unit deg */
  taperAngleDeg: number;
}

/**
 * Solid-cylinder approximation at the widest radius over the full span.
 * @unit g·in2
 */
export interface MomentOfInertia {
  /** About the cue's own axis. */
  axial: number;
  /** About a transverse axis through the centre. */
  perpendicular: number;
}

export interface DesignGeometrySummary {
  sectionCount: number;
  /** First start to last end. @unit in */
  spanIn: number;
  /** Sum of section lengths. @unit in */
  totalSectionLengthIn: number;
  /** Lateral surface. @unit in2 */
  surfaceAreaIn2: number;
  /** @unit in3 */
  volumeIn3: number;
  /** Volume-weighted axial centre, null when the design has no volume. @unit in */
  centerOfMassIn: number | null;
  /** @unit oz */
  estimatedWeightOz: number;
  /** Null for an empty design. */
  momentOfInertia: MomentOfInertia | null;
  /** @unit mm */
  minRadiusMm: number | null;
  /** @unit mm */
  maxRadiusMm: number | null;
  /** @unit mm */
  averageRadiusMm: number | null;
}

// ---------------------------------------------------------------------------
// Violation
// ---------------------------------------------------------------------------

/** Per-section rule kinds. */
export type SectionViolationKind =
  | 'sequence_error' | 'length_bound' | 'diameter_bound' | 'taper_exceeded' | 'radius_out_of_range';
/** Rule kinds evaluated between consecutive sections. */
export type ContinuityViolationKind = 'diameter_jump' | 'gap' | 'overlap';
/** Rule kinds evaluated on the assembled design. */
export type DesignViolationKind = 'total_length' | 'overall_length';
export type ViolationKind = SectionViolationKind | ContinuityViolationKind | DesignViolationKind;

/** Manufacturing rule breach. All are hard failures; there is no warning tier. */
export interface Violation {
  kind: ViolationKind;
  severity: 'error';
  /** One id for per-section rules, two for adjacency, none for design-level rules. */
  sectionIds: string[];
  message: string;
  /** Offending value, in the unit of the rule. */
  value?: number;
  /** The limit that was crossed. */
  limit?: number;
}

/** Input to the validator. `schema` defaults to the one detected from the section types. */
export interface DesignInput {
  sections: readonly CueSection[];
  overallLengthIn?: number;
  schema?: SectionSchema;
}
