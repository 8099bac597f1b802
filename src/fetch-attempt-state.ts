// Fetch attempt — pure state machine.
//
// States:
//   Attempting → a request is in flight (attempt n, 1-based)
//   Retrying   → attempt n failed, budget left; wait the backoff, then n + 1
//   Degraded   → gave up on this path; the caller has a fallback to take
//   Failed     → gave up and there is nowhere left to go
//   Succeeded  → terminal, the request answered
//
// This module contains only types and pure transition functions.

// --- State ---

export type Attempting = { readonly _tag: "Attempting"; readonly attempt: number };
export type Retrying<E> = {
  readonly _tag: "Retrying";
  readonly attempt: number;
  readonly error: E;
};
export type Degraded<E> = {
  readonly _tag: "Degraded";
  readonly attempts: number;
  readonly error: E;
};
export type Failed<E> = {
  readonly _tag: "Failed";
  readonly attempts: number;
  readonly error: E;
};
export type Succeeded = { readonly _tag: "Succeeded"; readonly attempts: number };

export type AttemptState<E> =
  | Attempting
  | Retrying<E>
  | Degraded<E>
  | Failed<E>
  | Succeeded;

export const Attempting = (attempt: number): Attempting => ({
  _tag: "Attempting",
  attempt,
});

export const Retrying = <E>(attempt: number, error: E): Retrying<E> => ({
  _tag: "Retrying",
  attempt,
  error,
});

export const Degraded = <E>(attempts: number, error: E): Degraded<E> => ({
  _tag: "Degraded",
  attempts,
  error,
});

export const Failed = <E>(attempts: number, error: E): Failed<E> => ({
  _tag: "Failed",
  attempts,
  error,
});

export const Succeeded = (attempts: number): Succeeded => ({
  _tag: "Succeeded",
  attempts,
});

export const initialState: Attempting = Attempting(1);

// --- Policy ---

export interface AttemptPolicy {
  /** Extra attempts after the first. */
  readonly retries: number;
  /** Whether exhausting the budget leads to a fallback path. */
  readonly canDegrade: boolean;
}

// --- Transitions ---

export function onSuccess(state: Attempting): Succeeded {
  return Succeeded(state.attempt);
}

export function onFailure<E>(
  state: Attempting,
  error: E,
  retryable: boolean,
  policy: AttemptPolicy,
): Retrying<E> | Degraded<E> | Failed<E> {
  if (retryable && state.attempt <= policy.retries) {
    return Retrying(state.attempt, error);
  }
  return policy.canDegrade
    ? Degraded(state.attempt, error)
    : Failed(state.attempt, error);
}

/** Backoff has elapsed: go again. */
export function resume<E>(state: Retrying<E>): Attempting {
  return Attempting(state.attempt + 1);
}
