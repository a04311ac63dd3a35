// ============================================================================
// Cue Designer — Section Editor
// Section list with add/remove, plus numeric fields and derived read-outs
// for the selected section.
// ============================================================================

import React, { useCallback, useState } from 'react';
import * as DropdownMenu from '@radix-ui/react-dropdown-menu';
import * as AlertDialog from '@radix-ui/react-alert-dialog';
import { useCueStore, type SectionPatch } from '../store/cueStore';
import type { CueSection, SectionType } from '../types/cue';
import { SECTION_LABELS, SECTION_SEQUENCES, detectSchema } from '../lib/constraints';
import { getFieldViolationText, sectionHasViolation } from '../lib/validation';
import { DerivedField, ParamNumber, ParamSelect } from './ui';

const ALL_SECTION_TYPES: readonly SectionType[] = [
  'joint', 'forearm', 'handle', 'sleeve', 'butt', 'butt_sleeve',
];

const MENU_CONTENT_CLASS = `min-w-[160px] bg-zinc-800 border border-zinc-700 rounded-md
  p-1 shadow-xl shadow-black/50 z-50`;

const MENU_ITEM_CLASS = `flex items-center px-3 py-1.5 text-xs text-zinc-200
  rounded cursor-pointer outline-none
  data-[highlighted]:bg-zinc-700 data-[highlighted]:text-zinc-100`;

// ---------------------------------------------------------------------------
// Add Section Menu
// ---------------------------------------------------------------------------

function AddSectionMenu({ sections }: { sections: readonly CueSection[] }): React.JSX.Element {
  const addSection = useCueStore((s) => s.addSection);
  // Offer the detected schema's types first
  const schemaTypes = SECTION_SEQUENCES[detectSchema(sections)];
  const otherTypes = ALL_SECTION_TYPES.filter((t) => !schemaTypes.includes(t));

  return (
    <DropdownMenu.Root>
      <DropdownMenu.Trigger asChild>
        <button className="px-2 py-1 text-xs text-zinc-200 bg-zinc-800 border border-zinc-700 rounded hover:bg-zinc-700">
          + Add Section
        </button>
      </DropdownMenu.Trigger>
      <DropdownMenu.Portal>
        <DropdownMenu.Content className={MENU_CONTENT_CLASS} sideOffset={4} align="end">
          {schemaTypes.map((type) => (
            <DropdownMenu.Item key={type} className={MENU_ITEM_CLASS} onSelect={() => addSection(type)}>
              {SECTION_LABELS[type]}
            </DropdownMenu.Item>
          ))}
          {otherTypes.length > 0 && <DropdownMenu.Separator className="h-px bg-zinc-700 my-1" />}
          {otherTypes.map((type) => (
            <DropdownMenu.Item key={type} className={MENU_ITEM_CLASS} onSelect={() => addSection(type)}>
              {SECTION_LABELS[type]}
            </DropdownMenu.Item>
          ))}
        </DropdownMenu.Content>
      </DropdownMenu.Portal>
    </DropdownMenu.Root>
  );
}

// ---------------------------------------------------------------------------
// Selected Section Fields
// ---------------------------------------------------------------------------

function SectionFields({ section }: { section: CueSection }): React.JSX.Element {
  const updateSection = useCueStore((s) => s.updateSection);
  const removeSection = useCueStore((s) => s.removeSection);
  const violations = useCueStore((s) => s.violations);
  const geometry = useCueStore((s) => s.geometry.find((g) => g.sectionId === section.sectionId));
  const [confirmRemove, setConfirmRemove] = useState(false);

  const positionViolations = getFieldViolationText(violations, section.sectionId, 'position');
  const diameterViolations = getFieldViolationText(violations, section.sectionId, 'diameter');

  const update = useCallback(
    (patch: SectionPatch) => updateSection(section.sectionId, patch),
    [updateSection, section.sectionId],
  );

  return (
    <div>
      <div className="flex items-center justify-between mb-2">
        <h3 className="text-xs font-semibold text-zinc-200">
          {SECTION_LABELS[section.sectionType]} {section.sectionId}
        </h3>
        <button
          onClick={() => setConfirmRemove(true)}
          className="px-2 py-0.5 text-[10px] text-red-300 border border-red-900 rounded hover:bg-red-950"
        >
          Remove
        </button>
      </div>

      <ParamSelect
        label="Type"
        value={section.sectionType}
        options={ALL_SECTION_TYPES}
        optionLabels={SECTION_LABELS}
        onChange={(sectionType) => update({ sectionType })}
      />

      <div className="grid grid-cols-2 gap-x-3">
        <ParamNumber
          label="Start"
          unit="in"
          value={section.startPositionIn}
          onChange={(startPositionIn) => update({ startPositionIn })}
          violationText={positionViolations}
        />
        <ParamNumber
          label="End"
          unit="in"
          value={section.endPositionIn}
          onChange={(endPositionIn) => update({ endPositionIn })}
          violationText={positionViolations}
        />
        <ParamNumber
          label="Start Diameter"
          unit="mm"
          value={section.outerDiameterStartMm}
          onChange={(outerDiameterStartMm) => update({ outerDiameterStartMm })}
          violationText={diameterViolations}
        />
        <ParamNumber
          label="End Diameter"
          unit="mm"
          value={section.outerDiameterEndMm}
          onChange={(outerDiameterEndMm) => update({ outerDiameterEndMm })}
          violationText={diameterViolations}
        />
      </div>

      <div className="grid grid-cols-2 gap-x-3">
        <DerivedField label="Length" value={geometry?.lengthIn} unit="in" decimals={3} />
        <DerivedField label="Taper" value={geometry?.taperMmPerIn} unit="mm/in" decimals={3} />
        <DerivedField
          label="Taper Angle"
          value={geometry?.taperAngleDeg}
          unit="deg"
          title="Half-angle of the cone; the lathe limit is 5 degrees"
        />
        <DerivedField label="End Radius" value={geometry?.endRadiusMm} unit="mm" />
      </div>

      <AlertDialog.Root open={confirmRemove} onOpenChange={setConfirmRemove}>
        <AlertDialog.Portal>
          <AlertDialog.Overlay className="fixed inset-0 bg-black/60 z-50" />
          <AlertDialog.Content className="fixed top-1/2 left-1/2 -translate-x-1/2 -translate-y-1/2 w-[340px] bg-zinc-900 border border-zinc-700 rounded-lg shadow-2xl z-50 p-5">
            <AlertDialog.Title className="text-sm font-semibold text-zinc-200 mb-2">
              Remove Section
            </AlertDialog.Title>
            <AlertDialog.Description className="text-xs text-zinc-400 mb-4">
              Remove <span className="text-zinc-200 font-medium">{SECTION_LABELS[section.sectionType]} {section.sectionId}</span>?
              Neighbouring sections are not moved.
            </AlertDialog.Description>
            <div className="flex justify-end gap-2">
              <AlertDialog.Cancel asChild>
                <button className="px-3 py-1.5 text-xs text-zinc-400 bg-zinc-800 border border-zinc-700 rounded hover:bg-zinc-700">
                  Cancel
                </button>
              </AlertDialog.Cancel>
              <AlertDialog.Action asChild>
                <button
                  className="px-3 py-1.5 text-xs font-medium text-zinc-100 bg-red-600 rounded hover:bg-red-500"
                  onClick={() => removeSection(section.sectionId)}
                >
                  Remove
                </button>
              </AlertDialog.Action>
            </div>
          </AlertDialog.Content>
        </AlertDialog.Portal>
      </AlertDialog.Root>
    </div>
  );
}

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export function SectionEditor(): React.JSX.Element {
  const sections = useCueStore((s) => s.design.sections);
  const violations = useCueStore((s) => s.violations);
  const selectedSectionId = useCueStore((s) => s.selectedSectionId);
  const selectSection = useCueStore((s) => s.selectSection);

  const selected = sections.find((s) => s.sectionId === selectedSectionId);

  return (
    <section aria-label="Sections" className="p-3">
      <header className="flex items-center justify-between mb-2">
        <h2 className="text-xs font-semibold text-zinc-200">Sections</h2>
        <AddSectionMenu sections={sections} />
      </header>

      <ul className="flex flex-wrap gap-1 mb-3">
        {sections.map((s) => {
          const isSelected = s.sectionId === selectedSectionId;
          const flagged = sectionHasViolation(violations, s.sectionId);
          return (
            <li key={s.sectionId}>
              <button
                onClick={() => selectSection(s.sectionId)}
                aria-pressed={isSelected}
                className={`px-2 py-1 text-xs rounded border ${
                  isSelected ? 'border-blue-500 text-zinc-100' : 'border-zinc-700 text-zinc-300'
                } ${flagged ? 'bg-red-950/50' : 'bg-zinc-800'}`}
              >
                {SECTION_LABELS[s.sectionType]} {s.sectionId}
              </button>
            </li>
          );
        })}
      </ul>

      {selected ? (
        <SectionFields key={selected.sectionId} section={selected} />
      ) : (
        <p className="text-xs text-zinc-500">Select a section to edit it.</p>
      )}
    </section>
  );
}
