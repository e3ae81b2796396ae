// Circuit breaker: Effect shell.
//
// Wires the pure state machine (circuit-breaker-state.ts) to Effect's Ref,
// Clock and logging.

import { Clock, Data, Duration, Effect, Ref } from "effect";
import {
  type CircuitState,
  gate,
  initialState,
  onNonTrippableFailure,
  onProbeAbandoned,
  onSuccess,
  onTrippableFailure,
} from "./circuit-breaker-state.ts";

export type { CircuitState } from "./circuit-breaker-state.ts";
export { Closed, HalfOpen, initialState, Open } from "./circuit-breaker-state.ts";

// --- Config ---

export interface CircuitBreakerConfig<E> {
  readonly name?: string;
  readonly maxFailures: number;
  readonly resetTimeout: Duration.DurationInput;
  readonly isTrippable: (e: E) => boolean;
}

// --- Error ---

export class CircuitOpenError extends Data.TaggedError("CircuitOpenError")<{
  readonly message: string;
}> {}

// --- Circuit breaker ---

export interface CircuitBreaker<E> {
  /** Run `effect` through the breaker. Errors matching `isTrippable` count
   *  toward the failure threshold; others pass through unchanged. */
  readonly execute: <A, R>(
    effect: Effect.Effect<A, E, R>,
  ) => Effect.Effect<A, E | CircuitOpenError, R>;

  readonly state: Effect.Effect<CircuitState>;
}

export function makeCircuitBreaker<E>(
  config: CircuitBreakerConfig<E>,
): Effect.Effect<CircuitBreaker<E>> {
  return Effect.gen(function* () {
    const resetMs = Duration.toMillis(Duration.decode(config.resetTimeout));
    const { isTrippable, maxFailures } = config;
    const label = config.name ?? "cb";
    const ref = yield* Ref.make<CircuitState>(initialState);

    const execute = <A, R>(
      effect: Effect.Effect<A, E, R>,
    ): Effect.Effect<A, E | CircuitOpenError, R> =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;

        const decision = yield* Ref.modify(ref, (s) => gate(s, now, resetMs));

        if (decision === "reject") {
          yield* Effect.logDebug(`[${label}] circuit open, rejecting`);
          return yield* Effect.fail(
            new CircuitOpenError({ message: `${label}: circuit is open` }),
          );
        }

        if (decision === "probe") {
          yield* Effect.logDebug(`[${label}] half-open, sending probe`);
        }

        return yield* effect.pipe(
          Effect.tap(() => Ref.set(ref, onSuccess())),
          Effect.tapError((e) => {
            if (!isTrippable(e)) {
              return Ref.update(ref, onNonTrippableFailure);
            }
            return Ref.modify(ref, (s) => {
              const next = onTrippableFailure(s, now, maxFailures);
              return [next, next] as const;
            }).pipe(
              Effect.flatMap((next) =>
                next._tag === "Open"
                  ? Effect.logWarning(`[${label}] circuit opened`)
                  : next._tag === "Closed"
                  ? Effect.logDebug(
                    `[${label}] failure ${next.failures}/${maxFailures}`,
                  )
                  : Effect.void
              ),
            );
          }),
          Effect.onInterrupt(() =>
            decision === "probe"
              ? Clock.currentTimeMillis.pipe(
                Effect.flatMap((at) =>
                  Ref.update(ref, (s) => onProbeAbandoned(s, at))
                ),
              )
              : Effect.void
          ),
        );
      });

    return {
      execute,
      state: Ref.get(ref),
    } satisfies CircuitBreaker<E>;
  });
}
