import type { Phase } from '../types/narrative';
import { StateTransitionError } from '../utils/errors';

const FORWARD: Record<Phase, readonly Phase[]> = {
  analysis: ['questioning', 'outlining'],
  questioning: ['outlining'],
  outlining: ['writing'],
  writing: ['critique', 'complete'],
  critique: ['writing', 'complete'],
  complete: ['critique'],
};

export const REOPENABLE_PHASES = ['questioning', 'outlining'] as const;
export type ReopenablePhase = (typeof REOPENABLE_PHASES)[number];

const REGRESSION_SOURCES: readonly Phase[] = ['questioning', 'outlining', 'writing', 'critique', 'complete'];

export function isReopenable(phase: Phase): phase is ReopenablePhase {
  return phase === 'questioning' || phase === 'outlining';
}

export interface TransitionOptions {
  explicitRevision?: boolean;
}

export function canTransition(from: Phase, to: Phase, { explicitRevision = false }: TransitionOptions = {}): boolean {
  if (from === to) {
    return true;
  }
  if (FORWARD[from].includes(to)) {
    return true;
  }
  return explicitRevision && isReopenable(to) && REGRESSION_SOURCES.includes(from);
}

export function assertTransition(from: Phase, to: Phase, options: TransitionOptions = {}): void {
  if (!canTransition(from, to, options)) {
    throw new StateTransitionError(`Cannot move from "${from}" to "${to}"`, {
      from,
      to,
      allowed: FORWARD[from],
    });
  }
}

export function assertPhase(current: Phase, expected: Phase | readonly Phase[], command: string): void {
  const accepted = typeof expected === 'string' ? [expected] : expected;
  if (!accepted.includes(current)) {
    throw new StateTransitionError(`"${command}" is not available while the project is in "${current}"`, {
      phase: current,
      expected: accepted,
    });
  }
}
