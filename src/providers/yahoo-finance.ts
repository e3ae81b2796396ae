// Yahoo Finance: implementation of HistoryApi over the v8 chart endpoint.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Either, Layer, Schema } from "effect";
import type { HistoryRange, PriceRecord } from "../domain.ts";
import {
  HistoryApi,
  HttpError,
  NetworkError,
  ParseError,
  RateLimited,
  SymbolNotFound,
} from "../history-api.ts";
import {
  clipToRange,
  normalizeHistory,
  toIsoDate,
} from "../price-history.ts";

// --- Yahoo response schema ---

const NullableSeries = Schema.Array(Schema.NullOr(Schema.Number));

const YahooQuote = Schema.Struct({
  open: Schema.optional(NullableSeries),
  high: Schema.optional(NullableSeries),
  low: Schema.optional(NullableSeries),
  close: Schema.optional(NullableSeries),
  volume: Schema.optional(NullableSeries),
});

const YahooChartResult = Schema.Struct({
  meta: Schema.Struct({
    symbol: Schema.String,
    gmtoffset: Schema.optional(Schema.Int),
  }),
  timestamp: Schema.optional(Schema.Array(Schema.Int)),
  indicators: Schema.Struct({
    quote: Schema.Array(YahooQuote),
    adjclose: Schema.optional(
      Schema.Array(Schema.Struct({ adjclose: Schema.optional(NullableSeries) })),
    ),
  }),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(YahooChartResult)),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooChartResultType = typeof YahooChartResult.Type;

// --- Request parameters ---

const DAY_SECONDS = 86_400;

export function yahooRangeParams(range: HistoryRange): Record<string, string> {
  const base = { interval: "1d", includeAdjustedClose: "true" };
  switch (range._tag) {
    case "FullHistory":
      return { ...base, range: "max" };
    case "DateWindow": {
      const start = Date.parse(`${range.start}T00:00:00Z`) / 1000;
      const end = Date.parse(`${range.end}T00:00:00Z`) / 1000 + DAY_SECONDS;
      return { ...base, period1: String(start), period2: String(end) };
    }
  }
}

// --- Decode Yahoo response into PriceRecords ---

export function decodeYahooHistory(
  json: unknown,
  symbol: string,
  range: HistoryRange,
): Effect.Effect<ReadonlyArray<PriceRecord>, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap(({ chart }): Effect.Effect<
      ReadonlyArray<PriceRecord>,
      ParseError | SymbolNotFound
    > => {
      if (chart.error !== null || chart.result === null) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      const result = chart.result.at(0);
      if (result === undefined) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      const records = toPriceRecords(result);
      if (Either.isLeft(records)) return Effect.fail(records.left);
      if (records.right.length === 0) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      return Effect.succeed(
        clipToRange(normalizeHistory(records.right), range),
      );
    }),
  );
}

function toPriceRecords(
  result: YahooChartResultType,
): Either.Either<PriceRecord[], ParseError> {
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote.at(0);
  const adjclose = result.indicators.adjclose?.at(0)?.adjclose;
  const offset = result.meta.gmtoffset ?? 0;
  if (quote === undefined) return Either.right([]);

  const records: PriceRecord[] = [];
  for (const [i, ts] of timestamps.entries()) {
    const open = quote.open?.[i] ?? null;
    const high = quote.high?.[i] ?? null;
    const low = quote.low?.[i] ?? null;
    const close = quote.close?.[i] ?? null;
    // Halted sessions and the live bar come back with null prices.
    if (open === null || high === null || low === null || close === null) {
      continue;
    }
    const day = new Date((ts + offset) * 1000);
    if (Number.isNaN(day.getTime())) {
      return Either.left(
        new ParseError({ message: `Invalid response: timestamp ${ts} is not a date` }),
      );
    }
    records.push({
      date: toIsoDate(day),
      open,
      high,
      low,
      close,
      adjustedClose: adjclose?.[i] ?? close,
      volume: Math.max(0, Math.round(quote.volume?.[i] ?? 0)),
    });
  }
  return Either.right(records);
}

// --- Yahoo Finance service ---

export const makeYahooFinanceApi = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
  );
  const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
  );

  return HistoryApi.of({
    fetchHistory: (symbol, range) =>
      Effect.gen(function* () {
        const response = yield* client.get(
          `${baseUrl}/${encodeURIComponent(symbol)}`,
          { urlParams: yahooRangeParams(range) },
        );
        const json = yield* response.json;
        return yield* decodeYahooHistory(json, symbol, range);
      }).pipe(
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new NetworkError({ message: e.message })),
          ResponseError: (e) => {
            if (e.reason !== "StatusCode") {
              return Effect.fail(
                new ParseError({ message: `JSON parse failed: ${e.message}` }),
              );
            }
            switch (e.response.status) {
              case 404:
                return Effect.fail(new SymbolNotFound({ symbol }));
              case 429:
                return Effect.fail(
                  new RateLimited({ message: "yahoo: HTTP 429" }),
                );
              default:
                return Effect.fail(new HttpError({ status: e.response.status }));
            }
          },
        }),
      ),
  });
});

export const YahooFinanceLive = Layer.effect(HistoryApi, makeYahooFinanceApi);
