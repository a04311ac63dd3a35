// ============================================================================
// Cue Designer — Design Export
// Downloads the design as JSON (client side) or the backend-rendered profile
// as SVG.
// ============================================================================

import type { CueDesign } from '../types/cue';
import { fetchProfileSvg } from './cueApi';
import { serializeDesign } from './ingest';

function fileStem(cueId: string): string {
  return cueId.trim().replace(/\s+/g, '_') || 'cue';
}

/** Object URLs are revoked after this delay so the browser can start the download. @unit ms */
const REVOKE_DELAY_MS = 1000;

/** Trigger a browser download of `blob`. */
export function downloadBlob(blob: Blob, filename: string): void {
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = filename;
  document.body.appendChild(a);
  a.click();
  document.body.removeChild(a);
  setTimeout(() => URL.revokeObjectURL(url), REVOKE_DELAY_MS);
}

/** Download the design in the backend's wire format. Returns the filename used. */
export function exportDesignJson(design: CueDesign): string {
  const filename = `${fileStem(design.cueId)}_design.json`;
  const body = JSON.stringify(serializeDesign(design), null, 2);
  downloadBlob(new Blob([body], { type: 'application/json' }), filename);
  return filename;
}

/**
 * Download the server-rendered profile SVG. Returns false (after logging)
 * when the backend could not produce it.
 */
export async function exportProfileSvg(cueId: string): Promise<boolean> {
  try {
    const svg = await fetchProfileSvg(cueId);
    downloadBlob(new Blob([svg], { type: 'image/svg+xml' }), `${fileStem(cueId)}_profile.svg`);
    return true;
  } catch (err) {
    const msg = err instanceof Error ? err.message : 'SVG export failed';
    console.warn('[Export]', msg);
    return false;
  }
}
