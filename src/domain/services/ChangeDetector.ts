export type ChangeDecision =
  | { kind: 'unavailable' }
  | { kind: 'baseline'; current: number }
  | { kind: 'unchanged'; current: number; previous: number; delta: number }
  | { kind: 'changed'; current: number; previous: number; delta: number };

// A change must exceed one øre (0.01 kr). The epsilon absorbs float noise such as 100.01 - 100.
const CHANGE_THRESHOLD = 0.01;
const EPSILON = 1e-9;

const roundDelta = (delta: number): number => Math.round(delta * 1e6) / 1e6;

export const detectChange = (previousBalance: number | null, currentBalance: number | null): ChangeDecision => {
  if (currentBalance === null) {
    return { kind: 'unavailable' };
  }

  if (previousBalance === null) {
    return { kind: 'baseline', current: currentBalance };
  }

  const delta = currentBalance - previousBalance;
  const kind = Math.abs(delta) - CHANGE_THRESHOLD > EPSILON ? 'changed' : 'unchanged';

  return {
    kind,
    current: currentBalance,
    previous: previousBalance,
    delta: roundDelta(delta),
  };
};

export const shouldNotify = (decision: ChangeDecision): decision is Extract<ChangeDecision, { kind: 'changed' }> =>
  decision.kind === 'changed';

export const deltaOf = (decision: ChangeDecision): number | null => {
  switch (decision.kind) {
    case 'changed':
    case 'unchanged':
      return decision.delta;
    default:
      return null;
  }
};
