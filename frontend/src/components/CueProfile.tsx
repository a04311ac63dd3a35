// ============================================================================
// Cue Designer — Side Profile View
// SVG outline of the butt with section dividers, end diameters, overall
// length and scale. Sections with violations are tinted; clicking a section
// selects it for editing.
// ============================================================================

import React, { useMemo } from 'react';
import type { DerivedSectionGeometry, Violation } from '../types/cue';
import {
  DEFAULT_VIEWPORT,
  ProfileTransform,
  buildDimensionLabels,
  buildLegend,
  buildProfilePath,
  buildSectionDividers,
  buildSectionShapes,
  type ProfileLabel,
} from '../lib/profile';
import { sectionHasViolation } from '../lib/validation';

function Labels({ labels, className }: { labels: readonly ProfileLabel[]; className: string }): React.JSX.Element {
  return (
    <g className={className}>
      {labels.map((l, i) => (
        <text key={`${l.anchor}-${i}`} x={l.x} y={l.y} textAnchor={l.anchor}>
          {l.text}
        </text>
      ))}
    </g>
  );
}

// ─── Component ────────────────────────────────────────────────────────────────

interface CueProfileProps {
  geometry: readonly DerivedSectionGeometry[];
  violations: readonly Violation[];
  selectedSectionId: string | null;
  onSelectSection: (sectionId: string) => void;
  /** Message shown instead of the outline when the design cannot be derived. */
  structuralError?: string | null;
}

export function CueProfile({
  geometry,
  violations,
  selectedSectionId,
  onSelectSection,
  structuralError,
}: CueProfileProps): React.JSX.Element {
  const { outline, shapes, dividers, dimensions, legend, centerY } = useMemo(() => {
    const transform = new ProfileTransform(geometry);
    return {
      outline: buildProfilePath(geometry, transform),
      shapes: buildSectionShapes(geometry, transform),
      dividers: buildSectionDividers(geometry, transform),
      dimensions: buildDimensionLabels(geometry, transform),
      legend: buildLegend(geometry, transform),
      centerY: transform.centerY,
    };
  }, [geometry]);

  const { width, height, padding } = DEFAULT_VIEWPORT;

  if (structuralError) {
    return (
      <div role="alert" className="flex items-center justify-center h-full text-xs text-red-400 px-4">
        {structuralError}
      </div>
    );
  }

  if (geometry.length === 0) {
    return (
      <div className="flex items-center justify-center h-full text-xs text-zinc-500">
        No sections yet. Add one to start the profile.
      </div>
    );
  }

  return (
    <svg
      viewBox={`0 0 ${width} ${height}`}
      className="w-full h-full"
      role="img"
      aria-label="Cue side profile"
    >
      {/* Centreline */}
      <line
        x1={padding}
        y1={centerY}
        x2={width - padding}
        y2={centerY}
        className="stroke-zinc-600"
        strokeDasharray="6 4"
      />

      {shapes.map((shape) => {
        const isSelected = shape.sectionId === selectedSectionId;
        const hasViolation = sectionHasViolation(violations, shape.sectionId);
        const fill = hasViolation ? 'fill-red-500/30' : isSelected ? 'fill-blue-500/30' : 'fill-amber-900/40';
        return (
          <polygon
            key={shape.sectionId}
            points={shape.points}
            className={`${fill} cursor-pointer hover:fill-blue-400/30`}
            data-section-id={shape.sectionId}
            data-violation={hasViolation ? 'true' : undefined}
            onClick={() => onSelectSection(shape.sectionId)}
          >
            <title>{`${shape.label} ${shape.sectionId}`}</title>
          </polygon>
        );
      })}

      <path d={outline} className="fill-none stroke-zinc-200" strokeWidth={1.5} />

      {dividers.map((d, i) => (
        <line
          key={`${d.label}-${i}`}
          x1={d.x}
          y1={padding}
          x2={d.x}
          y2={height - padding}
          className="stroke-zinc-500"
          strokeDasharray="3 3"
        />
      ))}

      <Labels labels={dimensions} className="dimensions fill-zinc-300 text-[12px]" />
      <Labels labels={legend} className="legend fill-zinc-500 text-[10px]" />
    </svg>
  );
}
