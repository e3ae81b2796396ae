// Alpha Vantage: implementation of HistoryApi over TIME_SERIES_DAILY_ADJUSTED.

import { HttpClient } from "@effect/platform";
import { Config, Effect, Layer, Schema } from "effect";
import type { HistoryRange, PriceRecord } from "../domain.ts";
import {
  HistoryApi,
  HttpError,
  NetworkError,
  ParseError,
  RateLimited,
  ServiceError,
  SymbolNotFound,
} from "../history-api.ts";
import { clipToRange, normalizeHistory } from "../price-history.ts";

// --- Alpha Vantage response schema ---

// Service-level problems arrive as 200 responses carrying one of these
// top-level string fields instead of a series.
const AlphaVantageEnvelope = Schema.Struct({
  "Error Message": Schema.optional(Schema.String),
  Note: Schema.optional(Schema.String),
  Information: Schema.optional(Schema.String),
  "Time Series (Daily)": Schema.optional(Schema.Unknown),
});

const AlphaVantageDailyBar = Schema.Struct({
  "1. open": Schema.NumberFromString,
  "2. high": Schema.NumberFromString,
  "3. low": Schema.NumberFromString,
  "4. close": Schema.NumberFromString,
  "5. adjusted close": Schema.NumberFromString,
  "6. volume": Schema.NumberFromString,
});

const AlphaVantageSeries = Schema.Record({
  key: Schema.String.pipe(Schema.pattern(/^\d{4}-\d{2}-\d{2}$/)),
  value: AlphaVantageDailyBar,
});

type AlphaVantageSeriesType = typeof AlphaVantageSeries.Type;

// --- Decode Alpha Vantage response into PriceRecords ---

export function decodeAlphaVantageHistory(
  json: unknown,
  symbol: string,
  range: HistoryRange,
): Effect.Effect<
  ReadonlyArray<PriceRecord>,
  ParseError | SymbolNotFound | RateLimited | ServiceError
> {
  return Schema.decodeUnknown(AlphaVantageEnvelope)(json).pipe(
    Effect.mapError(
      (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
    ),
    Effect.flatMap((envelope): Effect.Effect<
      ReadonlyArray<PriceRecord>,
      ParseError | SymbolNotFound | RateLimited | ServiceError
    > => {
      if (envelope["Error Message"] !== undefined) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      if (envelope.Note !== undefined) {
        return Effect.fail(
          new RateLimited({ message: `alphavantage: ${envelope.Note}` }),
        );
      }
      if (envelope.Information !== undefined) {
        return Effect.fail(
          /rate limit/i.test(envelope.Information)
            ? new RateLimited({ message: `alphavantage: ${envelope.Information}` })
            : new ServiceError({ message: `alphavantage: ${envelope.Information}` }),
        );
      }
      if (envelope["Time Series (Daily)"] === undefined) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      return Schema.decodeUnknown(AlphaVantageSeries)(
        envelope["Time Series (Daily)"],
      ).pipe(
        Effect.mapError(
          (e) => new ParseError({ message: `Invalid series: ${e.message}` }),
        ),
        Effect.flatMap((series) => {
          const records = toPriceRecords(series);
          return records.length === 0
            ? Effect.fail(new SymbolNotFound({ symbol }))
            : Effect.succeed(clipToRange(normalizeHistory(records), range));
        }),
      );
    }),
  );
}

function toPriceRecords(series: AlphaVantageSeriesType): PriceRecord[] {
  return Object.entries(series).map(([date, bar]) => ({
    date,
    open: bar["1. open"],
    high: bar["2. high"],
    low: bar["3. low"],
    close: bar["4. close"],
    adjustedClose: bar["5. adjusted close"],
    volume: Math.max(0, Math.round(bar["6. volume"])),
  }));
}

// --- Alpha Vantage service ---

export const makeAlphaVantageApi = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
  );
  const apiKey = yield* Config.string("ALPHA_VANTAGE_API_KEY");
  const baseUrl = yield* Config.string("ALPHA_VANTAGE_BASE_URL").pipe(
    Config.withDefault("https://www.alphavantage.co/query"),
  );

  return HistoryApi.of({
    fetchHistory: (symbol, range) =>
      Effect.gen(function* () {
        const url =
          `${baseUrl}?function=TIME_SERIES_DAILY_ADJUSTED&symbol=${encodeURIComponent(symbol)}&outputsize=full&apikey=${apiKey}`;
        const response = yield* client.get(url);
        const json = yield* response.json;
        return yield* decodeAlphaVantageHistory(json, symbol, range);
      }).pipe(
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new NetworkError({ message: e.message })),
          ResponseError: (e) =>
            e.reason !== "StatusCode"
              ? Effect.fail(
                new ParseError({ message: `JSON parse failed: ${e.message}` }),
              )
              : e.response.status === 429
              ? Effect.fail(
                new RateLimited({ message: "alphavantage: HTTP 429" }),
              )
              : Effect.fail(new HttpError({ status: e.response.status })),
        }),
      ),
  });
});

export const AlphaVantageLive = Layer.effect(HistoryApi, makeAlphaVantageApi);
