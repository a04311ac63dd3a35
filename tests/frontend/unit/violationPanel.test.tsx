// ============================================================================
// Cue Designer — ViolationPanel component tests
// ============================================================================

import { describe, it, expect, vi } from 'vitest';
import { render, screen, fireEvent } from '@testing-library/react';
import { ViolationPanel } from '@/components/ViolationPanel';
import type { Violation } from '@/types/cue';
import type { StructuralError } from '@/store/cueStore';

const LENGTH: Violation = {
  kind: 'length_bound',
  severity: 'error',
  sectionIds: ['F1'],
  message: 'Forearm F1 length 5.000" is below minimum 8.000"',
  value: 5,
  limit: 8,
};

const GAP: Violation = {
  kind: 'gap',
  severity: 'error',
  sectionIds: ['F1', 'H1'],
  message: 'Gap of 0.500" between Forearm F1 and Handle H1',
  value: 0.5,
  limit: 0,
};

const TOTAL: Violation = {
  kind: 'total_length',
  severity: 'error',
  sectionIds: [],
  message: 'Total section length 50.000" exceeds maximum 40.000"',
  value: 50,
  limit: 40,
};

const INVERTED: StructuralError = {
  code: 'non_positive_length',
  message: 'Handle H1: end position 12" must be greater than start position 12"',
  sectionId: 'H1',
};

describe('ViolationPanel', () => {
  it('shows a pass state with no violations', () => {
    render(<ViolationPanel violations={[]} />);
    expect(screen.getByText('All checks pass')).toBeTruthy();
    expect(screen.queryAllByRole('button')).toHaveLength(0);
  });

  it('shows the count badge and every message', () => {
    render(<ViolationPanel violations={[LENGTH, GAP, TOTAL]} onSelectSection={() => {}} />);
    expect(screen.getByText('3 problems')).toBeTruthy();
    expect(screen.getByRole('button', { name: LENGTH.message })).toBeTruthy();
    expect(screen.getByRole('button', { name: GAP.message })).toBeTruthy();
    expect(screen.getByRole('button', { name: TOTAL.message })).toBeTruthy();
  });

  it('groups violations under their category headings', () => {
    render(<ViolationPanel violations={[GAP]} />);
    expect(screen.getByText('Joins')).toBeTruthy();
    expect(screen.queryByText('Sections')).toBeNull();
    expect(screen.queryByText('Design')).toBeNull();
  });

  it('selects the first referenced section on click', () => {
    const onSelect = vi.fn();
    render(<ViolationPanel violations={[GAP]} onSelectSection={onSelect} />);
    fireEvent.click(screen.getByRole('button', { name: GAP.message }));
    expect(onSelect).toHaveBeenCalledWith('F1');
  });

  it('disables design-level entries that reference no section', () => {
    render(<ViolationPanel violations={[TOTAL]} onSelectSection={() => {}} />);
    expect(screen.getByRole('button', { name: TOTAL.message }).hasAttribute('disabled')).toBe(true);
  });

  it('explains the rule in the entry tooltip', () => {
    render(<ViolationPanel violations={[LENGTH]} />);
    expect(screen.getByRole('button', { name: LENGTH.message }).getAttribute('title')).toBe(
      'Section length outside the range for its type',
    );
  });

  it('reports a structural error instead of the pass state', () => {
    render(<ViolationPanel violations={[]} structuralError={INVERTED} />);
    expect(screen.getByRole('alert').textContent).toBe(INVERTED.message);
    expect(screen.getByText('Invalid geometry')).toBeTruthy();
    expect(screen.queryByText('All checks pass')).toBeNull();
  });

  it('jumps to the section behind a structural error', () => {
    const onSelect = vi.fn();
    render(<ViolationPanel violations={[]} structuralError={INVERTED} onSelectSection={onSelect} />);
    fireEvent.click(screen.getByRole('button', { name: 'Edit H1' }));
    expect(onSelect).toHaveBeenCalledWith('H1');
  });

  it('shows the pass state when the structural error is cleared', () => {
    render(<ViolationPanel violations={[]} structuralError={null} />);
    expect(screen.getByText('All checks pass')).toBeTruthy();
    expect(screen.queryByRole('alert')).toBeNull();
  });
});
