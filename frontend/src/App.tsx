import { Toolbar } from '@/components/Toolbar';
import { CueProfile } from '@/components/CueProfile';
import { SectionEditor } from '@/components/SectionEditor';
import { DesignPanel } from '@/components/DesignPanel';
import { ViolationPanel } from '@/components/ViolationPanel';
import { useCueStore } from '@/store/cueStore';

/**
 * Root application layout:
 *
 * +------------------------------------------+
 * |  TOOLBAR (File / Templates / Export)     |
 * +------------------------------+-----------+
 * |                              |  DESIGN   |
 * |        SIDE PROFILE          |  PANEL    |
 * |                              |           |
 * +------------------------------+-----------+
 * |  SECTION EDITOR              | CHECKS    |
 * +------------------------------+-----------+
 *
 * Geometry and violations are derived in the store on every edit, so the
 * profile and the checks list always reflect the current sections.
 */
export default function App() {
  const geometry = useCueStore((s) => s.geometry);
  const violations = useCueStore((s) => s.violations);
  const structuralError = useCueStore((s) => s.structuralError);
  const selectedSectionId = useCueStore((s) => s.selectedSectionId);
  const selectSection = useCueStore((s) => s.selectSection);

  return (
    <div className="flex flex-col h-screen min-w-[1024px] bg-zinc-950 text-zinc-200">
      <Toolbar />

      <div className="flex flex-1 min-h-0">
        <main aria-label="Cue Designer" className="flex-1 min-w-0 flex flex-col">
          <div className="flex-1 min-h-0 p-4 bg-zinc-900/60">
            <CueProfile
              geometry={geometry}
              violations={violations}
              selectedSectionId={selectedSectionId}
              onSelectSection={selectSection}
              structuralError={structuralError?.message}
            />
          </div>
          <div className="grid grid-cols-[2fr_1fr] border-t border-zinc-800 max-h-[45vh] overflow-y-auto">
            <SectionEditor />
            <div className="border-l border-zinc-800">
              <ViolationPanel
                violations={violations}
                onSelectSection={selectSection}
                structuralError={structuralError}
              />
            </div>
          </div>
        </main>

        <aside className="w-[260px] border-l border-zinc-800 overflow-y-auto">
          <DesignPanel />
        </aside>
      </div>
    </div>
  );
}
