// packages/core/src/engine/run-lifecycle.ts — Phase state machine for one pattern run

import type { RunPhase } from '../types/run.js';

const TRANSITIONS: Record<RunPhase, readonly RunPhase[]> = {
  loaded: ['validating'],
  validating: ['executing', 'aborted'],
  executing: ['extracting', 'aborted'],
  extracting: ['done'],
  done: [],
  aborted: [],
};

export class PhaseTransitionError extends Error {
  constructor(
    public readonly from: RunPhase,
    public readonly to: RunPhase,
  ) {
    super(`Illegal run phase transition ${from} -> ${to}`);
    this.name = 'PhaseTransitionError';
  }
}

export class RunLifecycle {
  private current: RunPhase = 'loaded';

  constructor(private onTransition?: (from: RunPhase, to: RunPhase) => void) {}

  get phase(): RunPhase {
    return this.current;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(to: RunPhase): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: RunPhase): void {
    const from = this.current;
    if (!this.canTransition(to)) {
      throw new PhaseTransitionError(from, to);
    }
    this.current = to;
    this.onTransition?.(from, to);
  }
}
