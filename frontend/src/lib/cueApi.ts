/**
 * API functions for cue design CRUD against the `/api/cues/` resource.
 * Every JSON response passes through the ingestion boundary before use.
 */

import type { CueDesign, CueDesignSummary } from '../types/cue';
import { getApiUrl } from './config';
import { parseDesign, parseDesignList, serializeDesign } from './ingest';

function cuesUrl(path = ''): string {
  return `${getApiUrl()}/api/cues/${path}`;
}

/**
 * List all saved designs.
 */
export async function listDesigns(): Promise<CueDesignSummary[]> {
  const res = await fetch(cuesUrl());
  if (!res.ok) throw new Error(`Failed to list designs: ${res.status}`);
  return parseDesignList(await res.json());
}

/**
 * Load a single design with its sections.
 */
export async function loadDesign(id: number): Promise<CueDesign> {
  const res = await fetch(cuesUrl(`${id}/`));
  if (!res.ok) throw new Error(`Failed to load design: ${res.status}`);
  return parseDesign(await res.json());
}

/**
 * Create a new design. Returns the stored record, including its id.
 */
export async function createDesign(design: CueDesign): Promise<CueDesign> {
  const res = await fetch(cuesUrl(), {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(serializeDesign(design)),
  });
  if (!res.ok) throw new Error(`Failed to save design: ${res.status}`);
  return parseDesign(await res.json());
}

/**
 * Replace an existing design.
 */
export async function updateDesign(id: number, design: CueDesign): Promise<CueDesign> {
  const res = await fetch(cuesUrl(`${id}/`), {
    method: 'PUT',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(serializeDesign(design)),
  });
  if (!res.ok) throw new Error(`Failed to save design: ${res.status}`);
  return parseDesign(await res.json());
}

/**
 * Delete a design by id.
 */
export async function deleteDesign(id: number): Promise<void> {
  const res = await fetch(cuesUrl(`${id}/`), { method: 'DELETE' });
  if (!res.ok) throw new Error(`Failed to delete design: ${res.status}`);
}

/**
 * Fetch the server-rendered side-profile SVG for a cue.
 */
export async function fetchProfileSvg(cueId: string): Promise<string> {
  const res = await fetch(`${getApiUrl()}/api/svg/${encodeURIComponent(cueId)}/`);
  if (!res.ok) throw new Error(`Failed to fetch profile SVG: ${res.status}`);
  return res.text();
}
