// ============================================================================
// Cue Designer — Read-Only Derived Value Display
// ============================================================================

import React from 'react';

export interface DerivedFieldProps {
  /** Display label */
  label: string;
  /** Value to display, or null/undefined if it cannot be computed */
  value: number | null | undefined;
  /** Unit string (e.g. "in", "mm/in", "oz") */
  unit?: string;
  /** Decimal places */
  decimals?: number;
  /** Optional suffix text after unit (e.g. "from joint") */
  suffix?: string;
  /** Optional hover tooltip explaining what this value means */
  title?: string;
}

/**
 * Displays a derived geometry value in a read-only gray field.
 * Shows an em-dash when value is null (not computable).
 */
export function DerivedField({
  label,
  value,
  unit,
  decimals = 2,
  suffix,
  title,
}: DerivedFieldProps): React.JSX.Element {
  let formatted: string;
  if (value == null) {
    formatted = '—';
  } else {
    formatted = `${value.toFixed(decimals)}${unit ? ` ${unit}` : ''}`;
    if (suffix) formatted += ` ${suffix}`;
  }

  return (
    <div className="mb-2" title={title}>
      <span className="block text-xs font-medium text-zinc-400 mb-0.5">{label}</span>
      <div
        className="w-full px-2 py-1 text-xs text-zinc-300 bg-zinc-800/50
          border border-zinc-700/50 rounded cursor-default"
        aria-readonly="true"
        aria-label={label}
      >
        {formatted}
      </div>
    </div>
  );
}
