// ============================================================================
// Cue Designer — Design Panel
// Design-level fields and the whole-butt geometry summary.
// ============================================================================

import React from 'react';
import { useCueStore } from '../store/cueStore';
import type { ComplexityLevel, DesignStyle, EraInfluence, SymmetryType } from '../types/cue';
import { DerivedField, ParamNumber, ParamSelect } from './ui';

const DESIGN_STYLES: readonly DesignStyle[] = [
  'traditional_classic', 'modern_minimal', 'ornate', 'art_deco', 'contemporary',
];
const DESIGN_STYLE_LABELS: Record<DesignStyle, string> = {
  traditional_classic: 'Traditional Classic',
  modern_minimal: 'Modern Minimal',
  ornate: 'Ornate',
  art_deco: 'Art Deco',
  contemporary: 'Contemporary',
};
const SYMMETRY_TYPES: readonly SymmetryType[] = ['radial', 'bilateral', 'asymmetric'];
const ERA_INFLUENCES: readonly EraInfluence[] = ['vintage', 'traditional', 'modern', 'contemporary'];
const COMPLEXITY_LEVELS: readonly ComplexityLevel[] = ['low', 'medium', 'high'];

export function DesignPanel(): React.JSX.Element {
  const design = useCueStore((s) => s.design);
  const summary = useCueStore((s) => s.summary);
  const setDesignField = useCueStore((s) => s.setDesignField);

  return (
    <section aria-label="Design" className="p-3">
      <h2 className="text-xs font-semibold text-zinc-200 mb-2">Design</h2>

      <ParamNumber
        label="Overall Length"
        unit="in"
        step={0.25}
        value={design.overallLengthIn}
        onChange={(v) => setDesignField('overallLengthIn', v)}
        title="Declared butt length; sections may not run past it"
      />
      <ParamSelect
        label="Style"
        value={design.designStyle}
        options={DESIGN_STYLES}
        optionLabels={DESIGN_STYLE_LABELS}
        onChange={(v) => setDesignField('designStyle', v)}
      />
      <ParamSelect
        label="Symmetry"
        value={design.symmetryType}
        options={SYMMETRY_TYPES}
        onChange={(v) => setDesignField('symmetryType', v)}
      />
      <ParamSelect
        label="Era"
        value={design.eraInfluence}
        options={ERA_INFLUENCES}
        onChange={(v) => setDesignField('eraInfluence', v)}
      />
      <ParamSelect
        label="Complexity"
        value={design.complexityLevel}
        options={COMPLEXITY_LEVELS}
        onChange={(v) => setDesignField('complexityLevel', v)}
      />

      <h3 className="text-[10px] uppercase tracking-wide text-zinc-500 mt-3 mb-1">Geometry</h3>
      <DerivedField label="Span" value={summary.spanIn} unit="in" decimals={3} />
      <DerivedField label="Volume" value={summary.volumeIn3} unit="in³" />
      <DerivedField
        label="Balance Point"
        value={summary.centerOfMassIn}
        unit="in"
        suffix="from joint"
        title="Volume-weighted centre along the axis"
      />
      <DerivedField
        label="Estimated Weight"
        value={summary.estimatedWeightOz}
        unit="oz"
        title="Solid wood at 1.2 g/cm³"
      />
      <DerivedField
        label="Axial Inertia"
        value={summary.momentOfInertia?.axial}
        unit="g·in²"
        title="Solid cylinder at the widest radius"
      />
      <DerivedField
        label="Swing Inertia"
        value={summary.momentOfInertia?.perpendicular}
        unit="g·in²"
        decimals={0}
        title="About a transverse axis through the centre"
      />
    </section>
  );
}
