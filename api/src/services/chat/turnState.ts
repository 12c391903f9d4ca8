/**
 * Chat turn state machine
 *
 *   Idle → AwaitingContext → AwaitingCompletion → Streaming → Finalized
 *                    ↘               ↘                ↘
 *                                 Errored
 *
 * AwaitingCompletion may also go straight to Finalized when a completion
 * finishes without emitting a token.
 */

export type TurnState =
  | 'Idle'
  | 'AwaitingContext'
  | 'AwaitingCompletion'
  | 'Streaming'
  | 'Finalized'
  | 'Errored';

const TRANSITIONS: Record<TurnState, readonly TurnState[]> = {
  Idle: ['AwaitingContext'],
  AwaitingContext: ['AwaitingCompletion', 'Errored'],
  AwaitingCompletion: ['Streaming', 'Finalized', 'Errored'],
  Streaming: ['Finalized', 'Errored'],
  Finalized: [],
  Errored: [],
};

export class IllegalTurnTransitionError extends Error {
  constructor(from: TurnState, to: TurnState) {
    super(`Illegal chat turn transition ${from} -> ${to}`);
    this.name = 'IllegalTurnTransitionError';
  }
}

export class TurnStateMachine {
  private current: TurnState = 'Idle';
  private readonly visited: TurnState[] = ['Idle'];

  get state(): TurnState {
    return this.current;
  }

  get history(): readonly TurnState[] {
    return this.visited;
  }

  get isTerminal(): boolean {
    return this.current === 'Finalized' || this.current === 'Errored';
  }

  transition(next: TurnState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTurnTransitionError(this.current, next);
    }
    this.current = next;
    this.visited.push(next);
  }
}
