// ============================================================================
// Cue Designer — Violation Panel
// Grouped list of manufacturing rule breaches with a count badge.
// ============================================================================

import React from 'react';
import type { Violation } from '../types/cue';
import type { StructuralError } from '../store/cueStore';
import {
  VIOLATION_DESCRIPTIONS,
  getViolationCountBadge,
  groupViolationsByCategory,
} from '../lib/validation';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface ViolationPanelProps {
  violations: readonly Violation[];
  /** Select the first section a violation references */
  onSelectSection?: (sectionId: string) => void;
  /** Set when the sections cannot be derived; no check has run */
  structuralError?: StructuralError | null;
}

const GROUPS = [
  { key: 'section', title: 'Sections' },
  { key: 'continuity', title: 'Joins' },
  { key: 'design', title: 'Design' },
] as const;

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export function ViolationPanel({
  violations,
  onSelectSection,
  structuralError,
}: ViolationPanelProps): React.JSX.Element {
  if (structuralError) {
    const target = structuralError.sectionId;
    return (
      <section aria-label="Manufacturing checks" className="p-3">
        <header className="flex items-center justify-between mb-2">
          <h2 className="text-xs font-semibold text-zinc-200">Manufacturing Checks</h2>
          <span className="px-1.5 py-0.5 text-[10px] font-medium text-red-100 bg-red-800 rounded">
            Invalid geometry
          </span>
        </header>
        <p role="alert" className="px-2 py-1 text-xs text-red-300 bg-red-950/40 rounded">
          {structuralError.message}
        </p>
        {target !== undefined && onSelectSection && (
          <button
            type="button"
            onClick={() => onSelectSection(target)}
            className="mt-1 px-2 py-1 text-[10px] text-zinc-400 rounded hover:bg-zinc-800"
          >
            Edit {target}
          </button>
        )}
      </section>
    );
  }

  const badge = getViolationCountBadge(violations);
  const groups = groupViolationsByCategory(violations);

  return (
    <section aria-label="Manufacturing checks" className="p-3">
      <header className="flex items-center justify-between mb-2">
        <h2 className="text-xs font-semibold text-zinc-200">Manufacturing Checks</h2>
        {badge ? (
          <span className="px-1.5 py-0.5 text-[10px] font-medium text-red-100 bg-red-600/70 rounded">
            {badge}
          </span>
        ) : (
          <span className="text-[10px] text-green-400">All checks pass</span>
        )}
      </header>

      {GROUPS.map(({ key, title }) => {
        const items = groups[key];
        if (items.length === 0) return null;
        return (
          <div key={key} className="mb-2">
            <h3 className="text-[10px] uppercase tracking-wide text-zinc-500 mb-1">{title}</h3>
            <ul className="space-y-1">
              {items.map((v, i) => {
                const target = v.sectionIds[0];
                return (
                  <li key={`${v.kind}-${v.sectionIds.join('-')}-${i}`}>
                    <button
                      type="button"
                      disabled={target === undefined || !onSelectSection}
                      onClick={() => {
                        if (target !== undefined) onSelectSection?.(target);
                      }}
                      title={VIOLATION_DESCRIPTIONS[v.kind]}
                      className="w-full text-left px-2 py-1 text-xs text-red-300 bg-red-950/40 rounded
                        hover:bg-red-900/40 disabled:cursor-default"
                    >
                      {v.message}
                    </button>
                  </li>
                );
              })}
            </ul>
          </div>
        );
      })}
    </section>
  );
}
