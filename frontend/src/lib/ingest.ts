// ============================================================================
// Cue Designer — Backend Record Ingestion
// Zod schemas for the REST payloads (snake_case) and the mapping to the
// camelCase frontend types. Anything that fails here never reaches the
// geometry core.
// ============================================================================

import { z } from 'zod';
import type { CueDesign, CueDesignSummary, CueSection } from '../types/cue';
import { DomainError } from './errors';

/** Largest outer diameter the backend accepts at all. @unit mm */
export const MAX_OUTER_DIAMETER_MM = 50;

/** Longest declared butt length the backend accepts. @unit inches */
export const MAX_OVERALL_LENGTH_IN = 40;

export const MAX_SECTION_ID_LENGTH = 50;

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const sectionTypeSchema = z.enum(['joint', 'forearm', 'handle', 'sleeve', 'butt', 'butt_sleeve']);

const diameterSchema = z
  .number()
  .finite()
  .positive('Outer diameters must be positive')
  .max(MAX_OUTER_DIAMETER_MM, `Outer diameters cannot exceed ${MAX_OUTER_DIAMETER_MM}mm`);

export const rawSectionSchema = z.object({
  id: z.number().int().optional(),
  section_id: z.string().min(1).max(MAX_SECTION_ID_LENGTH),
  section_type: sectionTypeSchema,
  start_position_in: z.number().finite().min(0, 'Start position cannot be negative'),
  end_position_in: z.number().finite(),
  outer_diameter_start_mm: diameterSchema,
  outer_diameter_end_mm: diameterSchema,
});

export const rawDesignSchema = z.object({
  id: z.number().int().optional(),
  cue_id: z.string().min(1).max(20),
  design_style: z.enum(['traditional_classic', 'modern_minimal', 'ornate', 'art_deco', 'contemporary']),
  overall_length_in: z
    .number()
    .finite()
    .positive('Overall length must be positive')
    .max(MAX_OVERALL_LENGTH_IN, `Overall length cannot exceed ${MAX_OVERALL_LENGTH_IN} inches`),
  symmetry_type: z.enum(['radial', 'bilateral', 'asymmetric']),
  era_influence: z.enum(['vintage', 'traditional', 'modern', 'contemporary']),
  complexity_level: z.enum(['low', 'medium', 'high']),
  notes: z.string().default(''),
  sections: z
    .array(rawSectionSchema)
    .default([])
    .superRefine((sections, ctx) => {
      // Section ids are unique within a design
      const seen = new Set<string>();
      sections.forEach((section, index) => {
        if (seen.has(section.section_id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'section_id'],
            message: `Duplicate section id ${section.section_id}`,
          });
        }
        seen.add(section.section_id);
      });
    }),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type RawCueSection = z.infer<typeof rawSectionSchema>;
export type RawCueDesign = z.infer<typeof rawDesignSchema>;

// ---------------------------------------------------------------------------
// Error Mapping
// ---------------------------------------------------------------------------

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid value';
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function toSection(raw: RawCueSection): CueSection {
  return {
    id: raw.id,
    sectionId: raw.section_id,
    sectionType: raw.section_type,
    startPositionIn: raw.start_position_in,
    endPositionIn: raw.end_position_in,
    outerDiameterStartMm: raw.outer_diameter_start_mm,
    outerDiameterEndMm: raw.outer_diameter_end_mm,
  };
}

/** @throws DomainError('malformed_section') naming the first offending field. */
export function parseSection(raw: unknown): CueSection {
  const result = rawSectionSchema.safeParse(raw);
  if (!result.success) {
    throw new DomainError('malformed_section', `Malformed section — ${describeIssue(result.error)}`);
  }
  return toSection(result.data);
}

/**
 * Parse a full design record.
 *
 * @throws DomainError('malformed_section') when a nested section is bad,
 *   DomainError('malformed_design') for the design's own fields.
 */
export function parseDesign(raw: unknown): CueDesign {
  const result = rawDesignSchema.safeParse(raw);
  if (!result.success) {
    const inSections = result.error.issues[0]?.path[0] === 'sections';
    throw new DomainError(
      inSections ? 'malformed_section' : 'malformed_design',
      `Malformed design — ${describeIssue(result.error)}`,
    );
  }
  const data = result.data;
  return {
    id: data.id,
    cueId: data.cue_id,
    designStyle: data.design_style,
    overallLengthIn: data.overall_length_in,
    symmetryType: data.symmetry_type,
    eraInfluence: data.era_influence,
    complexityLevel: data.complexity_level,
    notes: data.notes,
    sections: data.sections.map(toSection),
    createdAt: data.created_at,
    updatedAt: data.updated_at,
  };
}

/** Parse the design list endpoint into summary rows. */
export function parseDesignList(raw: unknown): CueDesignSummary[] {
  if (!Array.isArray(raw)) {
    throw new DomainError('malformed_design', 'Malformed design list — expected an array');
  }
  return raw.map((item) => {
    const design = parseDesign(item);
    if (design.id === undefined) {
      throw new DomainError('malformed_design', `Malformed design list — ${design.cueId} has no id`);
    }
    return {
      id: design.id,
      cueId: design.cueId,
      designStyle: design.designStyle,
      overallLengthIn: design.overallLengthIn,
      sectionCount: design.sections.length,
      updatedAt: design.updatedAt,
    };
  });
}

export function serializeSection(section: CueSection): RawCueSection {
  return {
    id: section.id,
    section_id: section.sectionId,
    section_type: section.sectionType,
    start_position_in: section.startPositionIn,
    end_position_in: section.endPositionIn,
    outer_diameter_start_mm: section.outerDiameterStartMm,
    outer_diameter_end_mm: section.outerDiameterEndMm,
  };
}

/** Convert to the backend's snake_case shape for POST / PUT. Timestamps are server-owned. */
export function serializeDesign(design: CueDesign): Omit<RawCueDesign, 'created_at' | 'updated_at'> {
  return {
    id: design.id,
    cue_id: design.cueId,
    design_style: design.designStyle,
    overall_length_in: design.overallLengthIn,
    symmetry_type: design.symmetryType,
    era_influence: design.eraInfluence,
    complexity_level: design.complexityLevel,
    notes: design.notes,
    sections: design.sections.map(serializeSection),
  };
}
