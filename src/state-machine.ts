import { getLogger, type Logger } from './logger';

export type TransitionCallback<S extends string> = (from: S, to: S) => void;

export type TransitionTable<S extends string> = Readonly<
  Record<S, readonly S[]>
>;

export interface StateMachine<S extends string> {
  getState(): S;
  canTransition(to: S): boolean;
  transition(to: S): void;
  onTransition(callback: TransitionCallback<S>): () => void;
}

export interface StateMachineOptions {
  /** Name used in error messages and logs */
  name?: string;
  logger?: Logger;
}

/**
 * Creates a table-driven state machine.
 * @param transitions Allowed targets for each state
 * @param initialState The starting state
 */
export function createStateMachine<S extends string>(
  transitions: TransitionTable<S>,
  initialState: S,
  options: StateMachineOptions = {},
): StateMachine<S> {
  const name = options.name ?? 'StateMachine';
  let state: S = initialState;
  const callbacks = new Set<TransitionCallback<S>>();

  function getState(): S {
    return state;
  }

  function canTransition(to: S): boolean {
    return transitions[state].includes(to);
  }

  function transition(to: S): void {
    if (!canTransition(to)) {
      throw new Error(`[${name}] Invalid state transition: ${state} -> ${to}`);
    }
    const from = state;
    state = to;

    for (const cb of callbacks) {
      try {
        cb(from, to);
      } catch (e) {
        (options.logger ?? getLogger()).error(
          `[${name}] Transition callback error:`,
          e,
        );
      }
    }
  }

  function onTransition(callback: TransitionCallback<S>): () => void {
    callbacks.add(callback);
    return () => {
      callbacks.delete(callback);
    };
  }

  return {
    getState,
    canTransition,
    transition,
    onTransition,
  };
}
