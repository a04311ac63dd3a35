// ============================================================================
// Cue Designer — Toolbar: File / Templates / Export menus, undo/redo, status
// ============================================================================

import React, { useCallback, useEffect, useState } from 'react';
import * as DropdownMenu from '@radix-ui/react-dropdown-menu';
import * as Dialog from '@radix-ui/react-dialog';
import { useStore } from 'zustand';
import { useCueStore } from '../store/cueStore';
import { getViolationCountBadge } from '../lib/validation';
import { deleteDesign, listDesigns } from '../lib/cueApi';
import { exportDesignJson, exportProfileSvg } from '../lib/exportDesign';
import { STARTER_TEMPLATES, TEMPLATE_DESCRIPTIONS, type StarterTemplate } from '../lib/templates';
import type { CueDesignSummary } from '../types/cue';

// ---------------------------------------------------------------------------
// Menu Item Styling Constants
// ---------------------------------------------------------------------------

const MENU_CONTENT_CLASS = `min-w-[180px] bg-zinc-800 border border-zinc-700 rounded-md
  p-1 shadow-xl shadow-black/50 z-50`;

const MENU_ITEM_CLASS = `flex items-center justify-between px-3 py-1.5 text-xs text-zinc-200
  rounded cursor-pointer outline-none
  data-[highlighted]:bg-zinc-700 data-[highlighted]:text-zinc-100`;

const MENU_SHORTCUT_CLASS = 'ml-4 text-[10px] text-zinc-500';

const MENU_TRIGGER_CLASS = `px-3 py-1 text-xs text-zinc-300 rounded hover:bg-zinc-800
  focus:outline-none focus:ring-1 focus:ring-zinc-600`;

// ---------------------------------------------------------------------------
// Open Design Dialog
// ---------------------------------------------------------------------------

export function OpenDesignDialog({
  open,
  onOpenChange,
}: {
  open: boolean;
  onOpenChange: (open: boolean) => void;
}): React.JSX.Element {
  const [designs, setDesigns] = useState<CueDesignSummary[]>([]);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const loadDesign = useCueStore((s) => s.loadDesign);
  const isDirty = useCueStore((s) => s.isDirty);

  useEffect(() => {
    if (!open) return;
    setLoading(true);
    setError(null);
    listDesigns()
      .then(setDesigns)
      .catch((err: unknown) => {
        setError(err instanceof Error ? err.message : 'Failed to fetch designs');
      })
      .finally(() => setLoading(false));
  }, [open]);

  const handleSelect = useCallback(
    (id: number) => {
      if (isDirty) {
        const confirmed = window.confirm('You have unsaved changes. Open a different design anyway?');
        if (!confirmed) return;
      }
      loadDesign(id)
        .then(() => {
          // loadDesign records failures instead of rejecting
          const { fileError } = useCueStore.getState();
          if (fileError) {
            setError(fileError);
            return;
          }
          onOpenChange(false);
        })
        .catch((err: unknown) => {
          setError(err instanceof Error ? err.message : 'Failed to load design');
        });
    },
    [isDirty, loadDesign, onOpenChange],
  );

  const handleDelete = useCallback((summary: CueDesignSummary) => {
    if (!window.confirm(`Delete ${summary.cueId}? This cannot be undone.`)) return;
    deleteDesign(summary.id)
      .then(() => setDesigns((prev) => prev.filter((d) => d.id !== summary.id)))
      .catch((err: unknown) => {
        setError(err instanceof Error ? err.message : 'Failed to delete design');
      });
  }, []);

  return (
    <Dialog.Root open={open} onOpenChange={onOpenChange}>
      <Dialog.Portal>
        <Dialog.Overlay className="fixed inset-0 bg-black/60 z-50" />
        <Dialog.Content className="fixed top-1/2 left-1/2 -translate-x-1/2 -translate-y-1/2 w-[400px] max-h-[70vh] bg-zinc-900 border border-zinc-700 rounded-lg shadow-2xl z-50 flex flex-col">
          <Dialog.Title className="px-4 pt-4 pb-2 text-sm font-semibold text-zinc-200">
            Open Design
          </Dialog.Title>
          <Dialog.Description className="sr-only">Choose a saved cue design</Dialog.Description>

          <div className="flex-1 overflow-y-auto px-4 pb-4 min-h-0">
            {loading && <p className="text-xs text-zinc-500 py-4 text-center">Loading...</p>}
            {error && <p className="text-xs text-red-400 py-4 text-center">{error}</p>}
            {!loading && !error && designs.length === 0 && (
              <p className="text-xs text-zinc-500 py-4 text-center">No saved designs found.</p>
            )}
            {!loading && !error && designs.length > 0 && (
              <ul className="space-y-1">
                {designs.map((d) => (
                  <li key={d.id} className="flex items-center gap-1">
                    <button
                      onClick={() => handleSelect(d.id)}
                      className="flex-1 text-left px-3 py-2 rounded text-xs text-zinc-200 hover:bg-zinc-800 focus:outline-none focus:ring-1 focus:ring-zinc-600 flex items-center justify-between"
                    >
                      <span className="truncate mr-2">{d.cueId}</span>
                      <span className="text-zinc-500 text-[10px] whitespace-nowrap">
                        {d.sectionCount} sections · {d.overallLengthIn}"
                      </span>
                    </button>
                    <button
                      onClick={() => handleDelete(d)}
                      className="px-2 py-2 text-[10px] text-zinc-500 rounded hover:text-red-400 hover:bg-zinc-800"
                      aria-label={`Delete ${d.cueId}`}
                    >
                      ✕
                    </button>
                  </li>
                ))}
              </ul>
            )}
          </div>

          <div className="px-4 py-3 border-t border-zinc-800 flex justify-end">
            <Dialog.Close asChild>
              <button className="px-3 py-1 text-xs text-zinc-400 rounded hover:bg-zinc-800">Cancel</button>
            </Dialog.Close>
          </div>
        </Dialog.Content>
      </Dialog.Portal>
    </Dialog.Root>
  );
}

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export function Toolbar(): React.JSX.Element {
  const violations = useCueStore((s) => s.violations);
  const structuralError = useCueStore((s) => s.structuralError);
  const design = useCueStore((s) => s.design);
  const designId = useCueStore((s) => s.designId);
  const isDirty = useCueStore((s) => s.isDirty);
  const isSaving = useCueStore((s) => s.isSaving);
  const fileError = useCueStore((s) => s.fileError);
  const activeTemplate = useCueStore((s) => s.activeTemplate);
  const setDesignField = useCueStore((s) => s.setDesignField);
  const newDesign = useCueStore((s) => s.newDesign);
  const saveDesign = useCueStore((s) => s.saveDesign);
  const loadTemplate = useCueStore((s) => s.loadTemplate);
  const clearFileError = useCueStore((s) => s.clearFileError);

  const [openDialogOpen, setOpenDialogOpen] = useState(false);
  const [saveFlash, setSaveFlash] = useState(false);
  const [exportFailed, setExportFailed] = useState(false);

  const violationBadge = getViolationCountBadge(violations);

  // ── File Operations ────────────────────────────────────────────────

  const handleNew = useCallback(() => {
    if (isDirty) {
      const confirmed = window.confirm('You have unsaved changes. Create a new design anyway?');
      if (!confirmed) return;
    }
    newDesign();
  }, [isDirty, newDesign]);

  const handleSave = useCallback(() => {
    saveDesign()
      .then(() => {
        setSaveFlash(true);
        setTimeout(() => setSaveFlash(false), 2000);
      })
      .catch((err: unknown) => {
        console.error('[CueStore] Failed to save design:', err);
      });
  }, [saveDesign]);

  const handleTemplate = useCallback(
    (name: StarterTemplate) => {
      if (isDirty && !window.confirm(`Replace the current sections with the ${name} template?`)) return;
      loadTemplate(name);
    },
    [isDirty, loadTemplate],
  );

  // ── Export ─────────────────────────────────────────────────────────

  const handleExportJson = useCallback(() => {
    exportDesignJson(design);
  }, [design]);

  const handleExportSvg = useCallback(() => {
    void exportProfileSvg(design.cueId).then((ok) => setExportFailed(!ok));
  }, [design.cueId]);

  // ── Undo/Redo ──────────────────────────────────────────────────────

  const handleUndo = useCallback(() => {
    useCueStore.temporal.getState().undo();
  }, []);

  const handleRedo = useCallback(() => {
    useCueStore.temporal.getState().redo();
  }, []);

  const canUndo = useStore(useCueStore.temporal, (s) => s.pastStates.length > 0);
  const canRedo = useStore(useCueStore.temporal, (s) => s.futureStates.length > 0);

  // ── Keyboard Shortcuts ─────────────────────────────────────────────

  useEffect(() => {
    const handler = (e: KeyboardEvent) => {
      if (!(e.ctrlKey || e.metaKey)) return;
      switch (e.key.toLowerCase()) {
        case 'z':
          e.preventDefault();
          if (e.shiftKey) {
            handleRedo();
          } else {
            handleUndo();
          }
          break;
        case 'y':
          e.preventDefault();
          handleRedo();
          break;
        case 's':
          e.preventDefault();
          handleSave();
          break;
      }
    };

    window.addEventListener('keydown', handler);
    return () => window.removeEventListener('keydown', handler);
  }, [handleSave, handleUndo, handleRedo]);

  return (
    <>
      <div className="flex items-center h-10 px-2 bg-zinc-900 border-b border-zinc-800 gap-1">
        <DropdownMenu.Root>
          <DropdownMenu.Trigger asChild>
            <button className={MENU_TRIGGER_CLASS}>File</button>
          </DropdownMenu.Trigger>
          <DropdownMenu.Portal>
            <DropdownMenu.Content className={MENU_CONTENT_CLASS} sideOffset={4}>
              <DropdownMenu.Item className={MENU_ITEM_CLASS} onSelect={handleNew}>
                New Design
              </DropdownMenu.Item>
              <DropdownMenu.Item className={MENU_ITEM_CLASS} onSelect={handleSave} disabled={isSaving}>
                {isSaving ? 'Saving...' : 'Save'}
                <span className={MENU_SHORTCUT_CLASS}>Ctrl+S</span>
              </DropdownMenu.Item>
              <DropdownMenu.Item className={MENU_ITEM_CLASS} onSelect={() => setOpenDialogOpen(true)}>
                Open...
              </DropdownMenu.Item>
            </DropdownMenu.Content>
          </DropdownMenu.Portal>
        </DropdownMenu.Root>

        <DropdownMenu.Root>
          <DropdownMenu.Trigger asChild>
            <button className={MENU_TRIGGER_CLASS}>Templates</button>
          </DropdownMenu.Trigger>
          <DropdownMenu.Portal>
            <DropdownMenu.Content className={MENU_CONTENT_CLASS} sideOffset={4}>
              {STARTER_TEMPLATES.map((name) => (
                <DropdownMenu.Item
                  key={name}
                  className={MENU_ITEM_CLASS}
                  onSelect={() => handleTemplate(name)}
                  title={TEMPLATE_DESCRIPTIONS[name]}
                >
                  {name}
                  {activeTemplate === name && <span className={MENU_SHORTCUT_CLASS}>active</span>}
                </DropdownMenu.Item>
              ))}
            </DropdownMenu.Content>
          </DropdownMenu.Portal>
        </DropdownMenu.Root>

        <DropdownMenu.Root>
          <DropdownMenu.Trigger asChild>
            <button className={MENU_TRIGGER_CLASS}>Export</button>
          </DropdownMenu.Trigger>
          <DropdownMenu.Portal>
            <DropdownMenu.Content className={MENU_CONTENT_CLASS} sideOffset={4}>
              <DropdownMenu.Item className={MENU_ITEM_CLASS} onSelect={handleExportJson}>
                Design (JSON)
              </DropdownMenu.Item>
              <DropdownMenu.Item
                className={MENU_ITEM_CLASS}
                onSelect={handleExportSvg}
                disabled={designId === null}
              >
                Profile (SVG)
              </DropdownMenu.Item>
            </DropdownMenu.Content>
          </DropdownMenu.Portal>
        </DropdownMenu.Root>

        <div className="h-5 w-px bg-zinc-700 mx-1" aria-hidden="true" />

        <div className="flex items-center gap-0.5" role="group" aria-label="Undo and redo">
          <button
            onClick={handleUndo}
            disabled={!canUndo}
            className="w-7 h-7 flex items-center justify-center text-sm rounded
              text-zinc-300 hover:bg-zinc-800 hover:text-zinc-100
              disabled:text-zinc-600 disabled:cursor-not-allowed"
            title="Undo (Ctrl+Z)"
            aria-label="Undo"
          >
            <span aria-hidden="true">↩</span>
          </button>
          <button
            onClick={handleRedo}
            disabled={!canRedo}
            className="w-7 h-7 flex items-center justify-center text-sm rounded
              text-zinc-300 hover:bg-zinc-800 hover:text-zinc-100
              disabled:text-zinc-600 disabled:cursor-not-allowed"
            title="Redo (Ctrl+Y)"
            aria-label="Redo"
          >
            <span aria-hidden="true">↪</span>
          </button>
        </div>

        <div className="flex-1" />

        <input
          aria-label="Cue ID"
          maxLength={20}
          className="text-xs text-zinc-200 bg-transparent border border-transparent rounded px-1.5 py-0.5 mr-2 w-[140px]
            hover:border-zinc-700 focus:outline-none focus:border-blue-500"
          value={design.cueId}
          onChange={(e) => setDesignField('cueId', e.target.value)}
        />
        {isDirty && <span className="text-zinc-600 mr-2">*</span>}

        {saveFlash && <span className="text-[10px] text-green-400 mr-2 animate-pulse">Saved!</span>}
        {fileError && (
          <span
            className="text-[10px] text-red-400 mr-2 cursor-pointer truncate max-w-[160px]"
            title={fileError}
            onClick={clearFileError}
          >
            {fileError}
          </span>
        )}
        {exportFailed && <span className="text-[10px] text-red-400 mr-2">SVG export failed</span>}

        {structuralError ? (
          <span className="px-2 py-0.5 text-[10px] font-medium text-red-100 bg-red-800 rounded-full">
            Invalid geometry
          </span>
        ) : (
          violationBadge && (
            <span className="px-2 py-0.5 text-[10px] font-medium text-amber-100 bg-amber-600 rounded-full">
              {violationBadge}
            </span>
          )
        )}
      </div>

      <OpenDesignDialog open={openDialogOpen} onOpenChange={setOpenDialogOpen} />
    </>
  );
}
