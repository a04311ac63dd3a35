// ============================================================================
// Cue Designer — Reusable Select Dropdown for Design Parameters
// ============================================================================

import React, { useCallback, useId } from 'react';

export interface ParamSelectProps<T extends string> {
  /** Display label */
  label: string;
  /** Current value */
  value: T;
  /** Available options */
  options: readonly T[];
  /** Display text per option; defaults to the raw value */
  optionLabels?: Partial<Record<T, string>>;
  /** Called when value changes */
  onChange: (value: T) => void;
  /** Optional tooltip/description */
  title?: string;
  disabled?: boolean;
}

/**
 * Native <select> dropdown for enum/literal type parameters.
 */
export function ParamSelect<T extends string>({
  label,
  value,
  options,
  optionLabels,
  onChange,
  title,
  disabled = false,
}: ParamSelectProps<T>): React.JSX.Element {
  const id = useId();

  const handleChange = useCallback(
    (e: React.ChangeEvent<HTMLSelectElement>) => {
      const next = options.find((opt) => opt === e.target.value);
      if (next !== undefined) onChange(next);
    },
    [options, onChange],
  );

  return (
    <div className="mb-3" title={title}>
      <label htmlFor={id} className="block text-xs font-medium text-zinc-300 mb-1">
        {label}
      </label>
      <select
        id={id}
        value={value}
        onChange={handleChange}
        disabled={disabled}
        className="w-full px-2 py-1.5 text-xs text-zinc-100 bg-zinc-800
          border border-zinc-700 rounded cursor-pointer
          focus:outline-none focus:border-blue-500
          disabled:opacity-50 disabled:cursor-not-allowed"
      >
        {options.map((opt) => (
          <option key={opt} value={opt}>
            {optionLabels?.[opt] ?? opt}
          </option>
        ))}
      </select>
    </div>
  );
}
