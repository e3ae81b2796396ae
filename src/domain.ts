// Pure domain types: no framework dependency, no I/O.

export type TickerSymbol = string;

export type GroupName = "sp500" | "hangseng" | "mag7" | "indexes";

export interface Group {
  readonly name: GroupName;
  readonly folder: string;
  readonly title: string;
  readonly description: string;
  readonly tickers: ReadonlyArray<TickerSymbol>;
}

export interface PriceRecord {
  readonly date: string; // YYYY-MM-DD
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly adjustedClose: number;
  readonly volume: number;
}

// --- History range ---

export type FullHistory = { readonly _tag: "FullHistory" };
export type DateWindow = {
  readonly _tag: "DateWindow";
  readonly start: string; // inclusive, YYYY-MM-DD
  readonly end: string; // inclusive, YYYY-MM-DD
};

export type HistoryRange = FullHistory | DateWindow;

export const FullHistory: FullHistory = { _tag: "FullHistory" };

export const DateWindow = (start: string, end: string): DateWindow => ({
  _tag: "DateWindow",
  start,
  end,
});

// --- Sharding ---

export interface ShardSpec {
  readonly chunkIndex: number;
  readonly totalChunks: number;
}
