// Circuit breaker: pure state machine.
//
// States:
//   Closed   → requests flow through, consecutive trippable failures counted
//   Open     → requests rejected until the reset timeout elapses
//   HalfOpen → a single probe is in flight; everything else is rejected.
//              Probe success (or any non-trippable answer) → Closed,
//              trippable failure → Open.
//
// Only types and pure transition functions live here; the Effect shell is
// in circuit-breaker.ts.

// --- State ---

export type Closed = { readonly _tag: "Closed"; readonly failures: number };
export type Open = { readonly _tag: "Open"; readonly openedAt: number };
export type HalfOpen = { readonly _tag: "HalfOpen" };

export type CircuitState = Closed | Open | HalfOpen;

export const Closed = (failures: number): Closed => ({
  _tag: "Closed",
  failures,
});

export const Open = (openedAt: number): Open => ({
  _tag: "Open",
  openedAt,
});

export const HalfOpen: HalfOpen = { _tag: "HalfOpen" };

export const initialState: CircuitState = Closed(0);

// --- Transitions ---

export type GateDecision = "allow" | "probe" | "reject";

/** Decide whether a request may run, and the resulting state. */
export function gate(
  state: CircuitState,
  now: number,
  resetMs: number,
): [GateDecision, CircuitState] {
  switch (state._tag) {
    case "Closed":
      return ["allow", state];
    case "HalfOpen":
      return ["reject", state];
    case "Open":
      return now - state.openedAt >= resetMs
        ? ["probe", HalfOpen]
        : ["reject", state];
  }
}

/** State after a successful execution. */
export function onSuccess(): CircuitState {
  return Closed(0);
}

/** State after a trippable failure. */
export function onTrippableFailure(
  state: CircuitState,
  now: number,
  maxFailures: number,
): CircuitState {
  switch (state._tag) {
    case "HalfOpen":
      return Open(now);
    case "Closed": {
      const next = state.failures + 1;
      return next >= maxFailures ? Open(now) : Closed(next);
    }
    case "Open":
      return state;
  }
}

/** State after a failure that says nothing about provider health. The
 *  provider did answer, so a pending probe counts as passed. */
export function onNonTrippableFailure(state: CircuitState): CircuitState {
  return state._tag === "HalfOpen" ? Closed(0) : state;
}

/** State after the probe's fiber was interrupted before it answered. */
export function onProbeAbandoned(
  state: CircuitState,
  now: number,
): CircuitState {
  return state._tag === "HalfOpen" ? Open(now) : state;
}
