import { create } from 'zustand';
import { temporal } from 'zundo';
import { produce } from 'immer';
import type {
  CueDesign,
  CueSection,
  DerivedSectionGeometry,
  DesignGeometrySummary,
  SectionType,
  TemplateName,
  Violation,
} from '../types/cue';
import { createDesignFromTemplate, DEFAULT_TEMPLATE, STARTER_TEMPLATES, type StarterTemplate } from '../lib/templates';
import { getSectionBounds } from '../lib/constraints';
import { summarizeDesign } from '../lib/geometry';
import { analyzeDesign } from '../lib/validation';
import { isDomainError, type DomainErrorCode } from '../lib/errors';
import * as cueApi from '../lib/cueApi';

/** Section fields compared when detecting whether a design matches a template. */
const TEMPLATE_COMPARE_KEYS: (keyof CueSection)[] = [
  'sectionId', 'sectionType', 'startPositionIn', 'endPositionIn',
  'outerDiameterStartMm', 'outerDiameterEndMm',
];

function detectTemplate(design: CueDesign): TemplateName {
  for (const name of STARTER_TEMPLATES) {
    const ref = createDesignFromTemplate(name);
    const match =
      design.overallLengthIn === ref.overallLengthIn &&
      design.sections.length === ref.sections.length &&
      design.sections.every((s, i) => {
        const r = ref.sections[i];
        return r !== undefined && TEMPLATE_COMPARE_KEYS.every((k) => s[k] === r[k]);
      });
    if (match) return name;
  }
  return 'Custom';
}

// ---------------------------------------------------------------------------
// New Section Defaults
// ---------------------------------------------------------------------------

const SECTION_ID_PREFIX: Record<SectionType, string> = {
  joint: 'J',
  forearm: 'F',
  handle: 'H',
  sleeve: 'S',
  butt: 'B',
  butt_sleeve: 'BS',
};

/** Used for types without a bound row. */
const FALLBACK_LENGTH_IN = 8;
const FALLBACK_DIAMETER_MM = 24;

function nextSectionId(sections: readonly CueSection[], type: SectionType): string {
  const taken = new Set(sections.map((s) => s.sectionId));
  let n = 1;
  while (taken.has(`${SECTION_ID_PREFIX[type]}${n}`)) n++;
  return `${SECTION_ID_PREFIX[type]}${n}`;
}

/**
 * A new section of `type` placed after the furthest section, continuous with
 * it in both position and diameter. Length (and diameter, for a first
 * section) sit mid-range in the type's bounds.
 */
export function createNextSection(sections: readonly CueSection[], type: SectionType): CueSection {
  const bounds = getSectionBounds(type);
  const lengthIn = bounds ? (bounds.minLengthIn + bounds.maxLengthIn) / 2 : FALLBACK_LENGTH_IN;
  const last = sections.reduce<CueSection | undefined>(
    (acc, s) => (acc === undefined || s.endPositionIn > acc.endPositionIn ? s : acc),
    undefined,
  );
  const startPositionIn = last?.endPositionIn ?? 0;
  const diameterMm =
    last?.outerDiameterEndMm ??
    (bounds ? (bounds.minDiameterMm + bounds.maxDiameterMm) / 2 : FALLBACK_DIAMETER_MM);
  return {
    sectionId: nextSectionId(sections, type),
    sectionType: type,
    startPositionIn,
    endPositionIn: startPositionIn + lengthIn,
    outerDiameterStartMm: diameterMm,
    outerDiameterEndMm: diameterMm,
  };
}

// ---------------------------------------------------------------------------
// Derived State
// ---------------------------------------------------------------------------

export interface StructuralError {
  code: DomainErrorCode;
  message: string;
  sectionId?: string;
}

interface DerivedState {
  geometry: DerivedSectionGeometry[];
  summary: DesignGeometrySummary;
  violations: Violation[];
  structuralError: StructuralError | null;
}

/** Re-derive and re-validate. Structural failures become state, never exceptions. */
export function deriveState(design: CueDesign): DerivedState {
  try {
    const analysis = analyzeDesign({ sections: design.sections, overallLengthIn: design.overallLengthIn });
    return { ...analysis, structuralError: null };
  } catch (err) {
    if (!isDomainError(err)) throw err;
    return {
      geometry: [],
      summary: summarizeDesign([]),
      violations: [],
      structuralError: { code: err.code, message: err.message, sectionId: err.sectionId },
    };
  }
}

// ---------------------------------------------------------------------------
// Store Interface
// ---------------------------------------------------------------------------

/** Design fields edited directly; sections go through the section actions. */
export type DesignField = Exclude<keyof CueDesign, 'id' | 'sections' | 'createdAt' | 'updatedAt'>;

export type SectionPatch = Partial<Omit<CueSection, 'id' | 'sectionId'>>;

export interface CueStore extends DerivedState {
  // ── Design (undo/redo tracked) ──────────────────────────────────
  design: CueDesign;
  activeTemplate: TemplateName;

  setDesignField: <K extends DesignField>(key: K, value: CueDesign[K]) => void;
  addSection: (type: SectionType) => string;
  updateSection: (sectionId: string, patch: SectionPatch) => void;
  removeSection: (sectionId: string) => void;
  loadTemplate: (name: StarterTemplate) => void;

  // ── Selection ───────────────────────────────────────────────────
  selectedSectionId: string | null;
  selectSection: (sectionId: string | null) => void;

  // ── File Operations ─────────────────────────────────────────────
  /** Backend record id. Kept outside undo history so an undo never forgets the record. */
  designId: number | null;
  lastSavedAt: string | null;
  isDirty: boolean;
  isSaving: boolean;
  isLoading: boolean;
  fileError: string | null;
  clearFileError: () => void;
  newDesign: () => void;
  loadDesign: (id: number) => Promise<void>;
  saveDesign: () => Promise<number>;
}

/** Subset of state tracked by Zundo for undo/redo. */
export type UndoableState = Pick<CueStore, 'design' | 'activeTemplate'>;

// ---------------------------------------------------------------------------
// Store Implementation
// ---------------------------------------------------------------------------

const initialDesign = createDesignFromTemplate(DEFAULT_TEMPLATE);

/** Bumped by every load; only the latest response is applied. */
let loadRequestId = 0;

export const useCueStore = create<CueStore>()(
  temporal(
    (set, get) => ({
      // ── Design State ──────────────────────────────────────────────
      design: initialDesign,
      activeTemplate: DEFAULT_TEMPLATE,
      ...deriveState(initialDesign),

      setDesignField: (key, value) => {
        const { design } = get();
        if (design[key] === value) return;
        set({ design: { ...design, [key]: value }, activeTemplate: 'Custom', isDirty: true });
      },

      addSection: (type) => {
        const created = createNextSection(get().design.sections, type);
        set(
          produce((state: CueStore) => {
            state.design.sections.push(created);
            state.activeTemplate = 'Custom';
            state.selectedSectionId = created.sectionId;
            state.isDirty = true;
          }),
        );
        return created.sectionId;
      },

      updateSection: (sectionId, patch) => {
        if (!get().design.sections.some((s) => s.sectionId === sectionId)) return;
        set(
          produce((state: CueStore) => {
            const target = state.design.sections.find((s) => s.sectionId === sectionId);
            if (!target) return;
            Object.assign(target, patch);
            state.activeTemplate = 'Custom';
            state.isDirty = true;
          }),
        );
      },

      removeSection: (sectionId) => {
        if (!get().design.sections.some((s) => s.sectionId === sectionId)) return;
        set(
          produce((state: CueStore) => {
            state.design.sections = state.design.sections.filter((s) => s.sectionId !== sectionId);
            if (state.selectedSectionId === sectionId) state.selectedSectionId = null;
            state.activeTemplate = 'Custom';
            state.isDirty = true;
          }),
        );
      },

      loadTemplate: (name) =>
        set(
          produce((state: CueStore) => {
            const template = createDesignFromTemplate(name);
            // A saved design keeps its cue id
            if (state.designId !== null) template.cueId = state.design.cueId;
            state.design = template;
            state.activeTemplate = name;
            state.selectedSectionId = null;
            state.isDirty = true;
          }),
        ),

      // ── Selection ─────────────────────────────────────────────────
      selectedSectionId: null,
      selectSection: (sectionId) => set({ selectedSectionId: sectionId }),

      // ── File Operations ───────────────────────────────────────────
      designId: null,
      lastSavedAt: null,
      isDirty: false,
      isSaving: false,
      isLoading: false,
      fileError: null,

      clearFileError: () => set({ fileError: null }),

      newDesign: () => {
        set({
          design: createDesignFromTemplate(DEFAULT_TEMPLATE),
          activeTemplate: DEFAULT_TEMPLATE,
          designId: null,
          lastSavedAt: null,
          selectedSectionId: null,
          isDirty: false,
          fileError: null,
        });
      },

      loadDesign: async (id) => {
        const request = ++loadRequestId;
        set({ isLoading: true, fileError: null });
        try {
          const design = await cueApi.loadDesign(id);
          // A newer load superseded this one
          if (request !== loadRequestId) return;
          set({
            design,
            activeTemplate: detectTemplate(design),
            designId: design.id ?? id,
            lastSavedAt: design.updatedAt ?? null,
            selectedSectionId: null,
            isDirty: false,
            isLoading: false,
          });
        } catch (err) {
          if (request !== loadRequestId) return;
          const msg = err instanceof Error ? err.message : 'Failed to load design';
          console.error('[CueStore]', msg);
          set({ isLoading: false, fileError: msg });
        }
      },

      saveDesign: async () => {
        set({ isSaving: true, fileError: null });
        try {
          const { design, designId } = get();
          const saved =
            designId === null
              ? await cueApi.createDesign(design)
              : await cueApi.updateDesign(designId, { ...design, id: designId });
          const savedId = saved.id;
          if (savedId === undefined) throw new Error('Saved design has no id');
          // The design itself is untouched, so saving adds no history entry
          set({
            designId: savedId,
            lastSavedAt: saved.updatedAt ?? null,
            isDirty: false,
            isSaving: false,
          });
          return savedId;
        } catch (err) {
          const msg = err instanceof Error ? err.message : 'Failed to save design';
          console.error('[CueStore]', msg);
          set({ isSaving: false, fileError: msg });
          throw err;
        }
      },
    }),
    {
      // Zundo: only track the design and template for undo/redo
      partialize: (state): UndoableState => ({
        design: state.design,
        activeTemplate: state.activeTemplate,
      }),
      // Re-derivation and file flags do not create history entries
      equality: (past, current) =>
        past.design === current.design && past.activeTemplate === current.activeTemplate,
      limit: 50,
    },
  ),
);

// Geometry and violations follow the design, including undo/redo restores.
useCueStore.subscribe((state, prev) => {
  if (state.design !== prev.design) {
    useCueStore.setState(deriveState(state.design));
  }
});
