/**
 * Tri-state logic
 *
 * Boolean logic extended with `indeterminate` for unresolved evidence.
 * Strong Kleene is the default; Bochvar treats indeterminate as infectious.
 */

export type TriState = 'true' | 'false' | 'indeterminate';

export type LogicMode = 'kleene' | 'bochvar';

export const LOGIC_MODES: readonly LogicMode[] = ['kleene', 'bochvar'];

/** Child outcome tallies for an at-least-N group */
export interface GroupCounts {
  satisfied: number;
  failed: number;
  unknown: number;
}

export function fromBoolean(value: boolean): TriState {
  return value ? 'true' : 'false';
}

export function and(lhs: TriState, rhs: TriState, mode: LogicMode = 'kleene'): TriState {
  if (mode === 'bochvar' && (lhs === 'indeterminate' || rhs === 'indeterminate')) {
    return 'indeterminate';
  }
  if (lhs === 'false' || rhs === 'false') return 'false';
  if (lhs === 'true' && rhs === 'true') return 'true';
  return 'indeterminate';
}

export function or(lhs: TriState, rhs: TriState, mode: LogicMode = 'kleene'): TriState {
  if (mode === 'bochvar' && (lhs === 'indeterminate' || rhs === 'indeterminate')) {
    return 'indeterminate';
  }
  if (lhs === 'true' || rhs === 'true') return 'true';
  if (lhs === 'false' && rhs === 'false') return 'false';
  return 'indeterminate';
}

export function not(value: TriState): TriState {
  switch (value) {
    case 'true':
      return 'false';
    case 'false':
      return 'true';
    case 'indeterminate':
      return 'indeterminate';
  }
}

/**
 * Threshold outcome from child tallies. The same counting rule applies in
 * both logic modes: true once `min` children hold, false once they cannot.
 */
export function requireGroup(min: number, counts: GroupCounts): TriState {
  if (min <= 0) return 'true';
  if (counts.satisfied >= min) return 'true';
  if (counts.satisfied + counts.unknown < min) return 'false';
  return 'indeterminate';
}

export function tally(results: readonly TriState[]): GroupCounts {
  const counts: GroupCounts = { satisfied: 0, failed: 0, unknown: 0 };
  for (const result of results) {
    if (result === 'true') counts.satisfied++;
    else if (result === 'false') counts.failed++;
    else counts.unknown++;
  }
  return counts;
}
