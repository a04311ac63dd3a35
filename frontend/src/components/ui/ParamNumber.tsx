// ============================================================================
// Cue Designer — Number Input for Design Parameters
// ============================================================================

import React, { useState, useCallback, useEffect, useId } from 'react';
import * as Tooltip from '@radix-ui/react-tooltip';

export interface ParamNumberProps {
  /** Display label */
  label: string;
  /** Unit string shown beside the label (e.g. "in", "mm") */
  unit?: string;
  value: number;
  step?: number;
  /** Called with the parsed value on blur or Enter */
  onChange: (value: number) => void;
  /** Rule breaches involving this field; shown in a tooltip */
  violationText?: string;
  /** Optional tooltip/description */
  title?: string;
  disabled?: boolean;
}

/**
 * Number input for a design parameter.
 *
 * The input keeps local string state so users can type freely; the value is
 * parsed and committed on blur or Enter. Nothing is clamped here: a value
 * outside manufacturing limits is accepted and reported by the validator.
 */
export function ParamNumber({
  label,
  unit,
  value,
  step = 0.1,
  onChange,
  violationText,
  title,
  disabled = false,
}: ParamNumberProps): React.JSX.Element {
  const id = useId();
  const [localValue, setLocalValue] = useState<string>(String(value));
  const [isFocused, setIsFocused] = useState(false);

  // Sync local value from prop when not focused (template load, undo)
  useEffect(() => {
    if (!isFocused) {
      setLocalValue(String(value));
    }
  }, [value, isFocused]);

  const parsed = parseFloat(localValue);
  const isUnparseable = isFocused && localValue !== '' && Number.isNaN(parsed);

  const commitValue = useCallback(() => {
    const val = parseFloat(localValue);
    if (Number.isNaN(val)) {
      setLocalValue(String(value));
    } else if (val !== value) {
      onChange(val);
    }
    setIsFocused(false);
  }, [localValue, value, onChange]);

  const handleKeyDown = useCallback(
    (e: React.KeyboardEvent<HTMLInputElement>) => {
      if (e.key === 'Enter') {
        commitValue();
        e.currentTarget.blur();
      }
    },
    [commitValue],
  );

  const hasViolation = violationText !== undefined && violationText !== '';
  const violationRing = hasViolation ? 'ring-1 ring-red-500/60' : '';
  const border = isUnparseable ? 'border-red-500' : 'border-zinc-700';

  return (
    <div className="mb-3" title={title}>
      <div className="flex items-center justify-between mb-1">
        <label htmlFor={id} className="text-xs font-medium text-zinc-300">
          {label}
          {hasViolation && (
            <Tooltip.Provider delayDuration={200}>
              <Tooltip.Root>
                <Tooltip.Trigger asChild>
                  <span className="inline-block ml-1 cursor-help text-red-400" aria-label="has violation">
                    {'⚠'}
                  </span>
                </Tooltip.Trigger>
                <Tooltip.Portal>
                  <Tooltip.Content
                    className="z-50 px-2 py-1.5 text-xs text-zinc-100 bg-zinc-800 border border-red-500/50 rounded shadow-lg max-w-[250px] whitespace-normal"
                    side="bottom"
                    align="start"
                    sideOffset={4}
                  >
                    {violationText}
                    <Tooltip.Arrow className="fill-zinc-800" />
                  </Tooltip.Content>
                </Tooltip.Portal>
              </Tooltip.Root>
            </Tooltip.Provider>
          )}
        </label>
        {unit && <span className="text-xs text-zinc-500">{unit}</span>}
      </div>

      <input
        id={id}
        type="number"
        step={step}
        value={localValue}
        onChange={(e) => setLocalValue(e.target.value)}
        onFocus={() => setIsFocused(true)}
        onBlur={commitValue}
        onKeyDown={handleKeyDown}
        disabled={disabled}
        aria-invalid={hasViolation}
        className={`w-full px-2 py-1 text-xs text-zinc-100 bg-zinc-800
          border ${border} rounded focus:outline-none focus:border-blue-500
          [appearance:textfield] [&::-webkit-outer-spin-button]:appearance-none
          [&::-webkit-inner-spin-button]:appearance-none ${violationRing}
          disabled:opacity-50 disabled:cursor-not-allowed`}
      />
    </div>
  );
}
