// ============================================================================
// Cue Designer — API Configuration Helpers
// ============================================================================

/**
 * Get the base URL for REST API calls.
 *
 * Uses VITE_API_URL env var if set, otherwise defaults to empty string
 * (same-origin). Empty default works with the Vite dev proxy and with the
 * backend serving the built bundle.
 */
export function getApiUrl(): string {
  return import.meta.env.VITE_API_URL ?? '';
}
