// ============================================================================
// Cue Designer — Structural Input Errors
// ============================================================================
//
// Manufacturing rule breaches are reported as Violation data and never
// thrown. DomainError is reserved for input the geometry core cannot work
// with at all.
// ============================================================================

export type DomainErrorCode =
  | 'non_positive_length'
  | 'malformed_section'
  | 'malformed_design'
  | 'position_out_of_range';

export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly sectionId?: string;

  constructor(code: DomainErrorCode, message: string, sectionId?: string) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.sectionId = sectionId;
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}
