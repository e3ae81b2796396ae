// HistoryApiTest: offline implementation of HistoryApi for tests and dry runs.
//
// Every registry symbol gets the same ten trading days (2025-06-02 to
// 2025-06-13) with prices derived from the symbol, so output is stable.

import { Effect, Layer } from "effect";
import type { PriceRecord, TickerSymbol } from "../domain.ts";
import { HistoryApi, SymbolNotFound } from "../history-api.ts";
import { clipToRange } from "../price-history.ts";
import { knownTickers } from "../registry.ts";

// --- Sample data ---

const SAMPLE_DATES = [
  "2025-06-02",
  "2025-06-03",
  "2025-06-04",
  "2025-06-05",
  "2025-06-06",
  "2025-06-09",
  "2025-06-10",
  "2025-06-11",
  "2025-06-12",
  "2025-06-13",
];

export function basePrice(symbol: TickerSymbol): number {
  let sum = 0;
  for (const ch of symbol) sum += ch.charCodeAt(0);
  return 20 + (sum % 400);
}

export function sampleHistory(symbol: TickerSymbol): PriceRecord[] {
  const base = basePrice(symbol);
  return SAMPLE_DATES.map((date, i) => {
    const close = base + i * 0.5;
    const open = close - 0.25;
    return {
      date,
      open,
      high: close + 1,
      low: open - 1,
      close,
      adjustedClose: close,
      volume: 1_000_000 + i * 1_000,
    };
  });
}

// --- Mock layer ---

export const HistoryApiTestLive = Layer.sync(HistoryApi, () => {
  const symbols = knownTickers();
  return HistoryApi.of({
    fetchHistory: (symbol, range) =>
      symbols.has(symbol)
        ? Effect.succeed(clipToRange(sampleHistory(symbol), range))
        : Effect.fail(new SymbolNotFound({ symbol })),
  });
});
