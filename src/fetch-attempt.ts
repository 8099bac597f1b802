// Fetch attempt — Effect shell.
//
// Drives an effect through the pure state machine in fetch-attempt-state.ts:
// attempts run one after another, separated by a fixed backoff, until the
// effect succeeds or the budget runs out.

import { Console, Duration, Effect, Either } from "effect";
import {
  type AttemptPolicy,
  type Attempting,
  type Degraded,
  type Failed,
  initialState,
  onFailure,
  onSuccess,
  resume,
} from "./fetch-attempt-state.ts";

// --- Config ---

export interface FetchAttemptConfig<E> extends AttemptPolicy {
  readonly name?: string;
  readonly backoff: Duration.DurationInput;
  readonly isRetryable: (e: E) => boolean;
}

// --- Outcome ---

export type AttemptOutcome<A, E> =
  | { readonly _tag: "Succeeded"; readonly attempts: number; readonly value: A }
  | Degraded<E>
  | Failed<E>;

/** Run `effect` under the retry policy. Never fails: giving up is reported
 *  as a Degraded or Failed outcome carrying the last error. */
export function runAttempts<A, E, R>(
  effect: Effect.Effect<A, E, R>,
  config: FetchAttemptConfig<E>,
): Effect.Effect<AttemptOutcome<A, E>, never, R> {
  const label = config.name ?? "attempt";
  const backoff = Duration.decode(config.backoff);

  const step = (state: Attempting): Effect.Effect<AttemptOutcome<A, E>, never, R> =>
    Effect.either(effect).pipe(
      Effect.flatMap((result): Effect.Effect<AttemptOutcome<A, E>, never, R> => {
        if (Either.isRight(result)) {
          const done = onSuccess(state);
          return Console.debug(`[${label}] succeeded on attempt ${done.attempts}`).pipe(
            Effect.as({ _tag: "Succeeded", attempts: done.attempts, value: result.right } as const),
          );
        }

        const next = onFailure(state, result.left, config.isRetryable(result.left), config);
        switch (next._tag) {
          case "Retrying":
            return Console.debug(
              `[${label}] attempt ${next.attempt} failed, retrying in ${Duration.format(backoff)}`,
            ).pipe(
              Effect.zipRight(Effect.sleep(backoff)),
              Effect.zipRight(Effect.suspend(() => step(resume(next)))),
            );
          case "Degraded":
            return Console.warn(`[${label}] degraded after ${next.attempts} attempt(s)`).pipe(
              Effect.as(next),
            );
          case "Failed":
            return Console.warn(`[${label}] failed after ${next.attempts} attempt(s)`).pipe(
              Effect.as(next),
            );
        }
      }),
    );

  return step(initialState);
}
