export type CycleState =
  | 'idle'
  | 'computing-cutoff'
  | 'fetching'
  | 'dispatching'
  // Terminal states
  | 'done'
  | 'failed';

const NEXT_STATES: Record<CycleState, readonly CycleState[]> = {
  idle: ['computing-cutoff'],
  'computing-cutoff': ['fetching'],
  fetching: ['dispatching', 'failed'],
  dispatching: ['done', 'failed'],
  done: [],
  failed: []
};

export function canTransition(from: CycleState, to: CycleState): boolean {
  return NEXT_STATES[from].includes(to);
}

export class IllegalCycleTransitionError extends Error {
  constructor(
    public readonly from: CycleState,
    public readonly to: CycleState
  ) {
    super(`Illegal triage cycle transition: ${from} → ${to}`);
    this.name = 'IllegalCycleTransitionError';
  }
}

/** Tracks one cycle's progress; a fresh tracker is made for every cycle. */
export class CycleStateTracker {
  private readonly history: CycleState[] = ['idle'];

  get current(): CycleState {
    return this.history[this.history.length - 1];
  }

  transition(to: CycleState): void {
    if (!canTransition(this.current, to)) {
      throw new IllegalCycleTransitionError(this.current, to);
    }
    this.history.push(to);
  }

  getHistory(): CycleState[] {
    return [...this.history];
  }
}
