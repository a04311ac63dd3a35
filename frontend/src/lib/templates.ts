// ============================================================================
// Cue Designer — Starter Templates
// Every template passes all manufacturing checks.
// ============================================================================

import type { CueDesign, CueSection, SectionType, TemplateName } from '../types/cue';

export type StarterTemplate = Exclude<TemplateName, 'Custom'>;

export const STARTER_TEMPLATES: readonly StarterTemplate[] = ['Classic', 'Sneaky', 'Compact'];

// ---------------------------------------------------------------------------
// Template Descriptions
// ---------------------------------------------------------------------------

export const TEMPLATE_DESCRIPTIONS: Record<StarterTemplate, string> = {
  Classic: 'Five-piece playing cue butt: joint, forearm, handle, sleeve and butt',
  Sneaky: 'Four-piece sneaky pete with no separate sleeve',
  Compact: 'Three-piece travel butt with a combined butt sleeve',
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function section(
  sectionId: string,
  sectionType: SectionType,
  [startPositionIn, endPositionIn]: [number, number],
  [outerDiameterStartMm, outerDiameterEndMm]: [number, number],
): CueSection {
  return { sectionId, sectionType, startPositionIn, endPositionIn, outerDiameterStartMm, outerDiameterEndMm };
}

const DESIGN_DEFAULTS = {
  designStyle: 'traditional_classic' as const,
  symmetryType: 'radial' as const,
  eraInfluence: 'traditional' as const,
  complexityLevel: 'medium' as const,
  notes: '',
};

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

function createClassicTemplate(): CueDesign {
  return {
    ...DESIGN_DEFAULTS,
    cueId: 'CLASSIC',
    overallLengthIn: 31,
    sections: [
      section('J1', 'joint', [0, 1], [20.0, 20.2]),
      section('F1', 'forearm', [1, 12], [20.2, 22.0]),
      section('H1', 'handle', [12, 22], [22.0, 24.5]),
      section('S1', 'sleeve', [22, 28], [24.5, 27.0]),
      section('B1', 'butt', [28, 31], [27.0, 28.5]),
    ],
  };
}

function createSneakyTemplate(): CueDesign {
  return {
    ...DESIGN_DEFAULTS,
    cueId: 'SNEAKY',
    overallLengthIn: 29,
    designStyle: 'modern_minimal',
    complexityLevel: 'low',
    sections: [
      section('J1', 'joint', [0, 1], [20.0, 20.2]),
      section('F1', 'forearm', [1, 13], [20.2, 23.0]),
      section('H1', 'handle', [13, 24], [23.0, 25.5]),
      section('B1', 'butt', [24, 29], [26.0, 28.0]),
    ],
  };
}

function createCompactTemplate(): CueDesign {
  return {
    ...DESIGN_DEFAULTS,
    cueId: 'COMPACT',
    overallLengthIn: 29,
    designStyle: 'contemporary',
    eraInfluence: 'modern',
    complexityLevel: 'low',
    sections: [
      section('F1', 'forearm', [0, 11], [20.2, 22.0]),
      section('H1', 'handle', [11, 21], [22.0, 24.0]),
      section('BS1', 'butt_sleeve', [21, 29], [24.0, 28.0]),
    ],
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export const TEMPLATE_FACTORIES: Record<StarterTemplate, () => CueDesign> = {
  Classic: createClassicTemplate,
  Sneaky: createSneakyTemplate,
  Compact: createCompactTemplate,
};

export function createDesignFromTemplate(name: StarterTemplate): CueDesign {
  return TEMPLATE_FACTORIES[name]();
}

export const DEFAULT_TEMPLATE: StarterTemplate = 'Classic';
