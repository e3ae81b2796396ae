// History API: service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type { HistoryRange, PriceRecord, TickerSymbol } from "./domain.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export class RateLimited extends Data.TaggedError("RateLimited")<{
  readonly message: string;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

export type HistoryApiError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound
  | RateLimited
  | ServiceError;

// --- Service ---

export class HistoryApi extends Context.Tag("HistoryApi")<
  HistoryApi,
  {
    /** Daily history for `symbol`, ascending by date with no duplicate
     *  dates, clipped to `range`. */
    readonly fetchHistory: (
      symbol: TickerSymbol,
      range: HistoryRange,
    ) => Effect.Effect<ReadonlyArray<PriceRecord>, HistoryApiError>;
  }
>() {}
