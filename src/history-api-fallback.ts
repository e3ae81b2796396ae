// Fallback HistoryApi: tries providers in order, each behind a circuit breaker.

import { Config, Duration, Effect, Layer, Option } from "effect";
import { FetchTimeout } from "./config.ts";
import type { HistoryRange, PriceRecord } from "./domain.ts";
import {
  type CircuitBreaker,
  type CircuitOpenError,
  makeCircuitBreaker,
} from "./circuit-breaker.ts";
import {
  HistoryApi,
  type HistoryApiError,
  NetworkError,
  ServiceError,
} from "./history-api.ts";
import { makeYahooFinanceApi } from "./providers/yahoo-finance.ts";
import { makeAlphaVantageApi } from "./providers/alpha-vantage.ts";

// --- Types ---

type FetchHistory = (
  symbol: string,
  range: HistoryRange,
) => Effect.Effect<ReadonlyArray<PriceRecord>, HistoryApiError>;

export interface NamedProvider {
  readonly name: string;
  readonly fetchHistory: FetchHistory;
}

// --- Trippable error predicate ---

/** Errors that say the provider is unhealthy. SymbolNotFound and client
 *  HTTP errors are answers about the symbol and propagate immediately. */
export function isTrippable(e: HistoryApiError | CircuitOpenError): boolean {
  switch (e._tag) {
    case "NetworkError":
    case "ParseError":
    case "ServiceError":
    case "RateLimited":
    case "CircuitOpenError":
      return true;
    case "HttpError":
      return e.status >= 500;
    case "SymbolNotFound":
      return false;
  }
}

// --- Circuit breaker boundary ---

/** Providers split nine tenths of the per-ticker fetch budget equally, so
 *  every provider timeout fires before the caller's and a provider that
 *  times out still leaves the next one its full share. */
export function providerTimeout(
  fetchTimeout: Duration.DurationInput,
  providers: number,
): Duration.Duration {
  const budget = Duration.toMillis(fetchTimeout) * 0.9;
  return Duration.millis(Math.floor(budget / Math.max(1, providers)));
}

/** Wrap a provider with a per-request timeout and its circuit breaker,
 *  mapping CircuitOpenError to ServiceError so the fallback loop only
 *  sees HistoryApiError. */
export function withBreaker(
  name: string,
  fetchHistory: FetchHistory,
  breaker: CircuitBreaker<HistoryApiError>,
  timeout: Duration.DurationInput,
): FetchHistory {
  return (symbol, range) =>
    breaker.execute(
      fetchHistory(symbol, range).pipe(
        Effect.timeoutFail({
          duration: timeout,
          onTimeout: () =>
            new NetworkError({ message: `${name}: request timed out` }),
        }),
      ),
    ).pipe(
      Effect.mapError((e) =>
        e._tag === "CircuitOpenError"
          ? new ServiceError({ message: `${name}: circuit open` })
          : e
      ),
    );
}

// --- Fallback logic ---

export function tryProviders(
  providers: ReadonlyArray<NamedProvider>,
  symbol: string,
  range: HistoryRange,
): Effect.Effect<ReadonlyArray<PriceRecord>, HistoryApiError> {
  const loop = (
    index: number,
    lastError: HistoryApiError,
  ): Effect.Effect<ReadonlyArray<PriceRecord>, HistoryApiError> => {
    if (index >= providers.length) return Effect.fail(lastError);

    const { name, fetchHistory } = providers[index];

    return Effect.logDebug(`[fallback] ${symbol}: trying ${name}`).pipe(
      Effect.flatMap(() => fetchHistory(symbol, range)),
      Effect.tapError((e) =>
        Effect.logDebug(`[fallback] ${symbol}: ${name} failed with ${e._tag}`)
      ),
      Effect.catchIf(isTrippable, (e) => loop(index + 1, e)),
    );
  };

  return loop(0, new ServiceError({ message: "No providers configured" }));
}

// --- Layer ---

const BreakerSettings = Config.all({
  maxFailures: Config.integer("BREAKER_MAX_FAILURES").pipe(
    Config.withDefault(5),
  ),
  resetTimeout: Config.duration("BREAKER_RESET_TIMEOUT").pipe(
    Config.withDefault(Duration.seconds(60)),
  ),
});

export const FallbackHistoryApiLive = Layer.effect(
  HistoryApi,
  Effect.gen(function* () {
    const settings = yield* BreakerSettings;
    const fetchTimeout = yield* FetchTimeout;
    const yahoo = yield* makeYahooFinanceApi;
    // Alpha Vantage requires an API key; without one it is left out.
    const alphavantage = yield* Effect.option(makeAlphaVantageApi);

    const apis: NamedProvider[] = [
      { name: "yahoo", fetchHistory: yahoo.fetchHistory },
    ];
    if (Option.isSome(alphavantage)) {
      apis.push({
        name: "alphavantage",
        fetchHistory: alphavantage.value.fetchHistory,
      });
    }
    const timeout = providerTimeout(fetchTimeout, apis.length);

    const providers = yield* Effect.forEach(apis, ({ name, fetchHistory }) =>
      makeCircuitBreaker<HistoryApiError>({
        name: `cb:${name}`,
        maxFailures: settings.maxFailures,
        resetTimeout: settings.resetTimeout,
        isTrippable,
      }).pipe(
        Effect.map((breaker): NamedProvider => ({
          name,
          fetchHistory: withBreaker(name, fetchHistory, breaker, timeout),
        })),
      ));

    yield* Effect.logDebug(
      `[fallback] providers: ${providers.map((p) => p.name).join(", ")}`,
    );

    return HistoryApi.of({
      fetchHistory: (symbol, range) => tryProviders(providers, symbol, range),
    });
  }),
);
