// Group updater: fetches every ticker of a (possibly sharded) group and
// replaces its CSV file. Per-ticker errors are collected, never raised.

import { FileSystem, Path } from "@effect/platform";
import {
  Data,
  Duration,
  Effect,
  Either,
  Option,
  Schedule,
} from "effect";
import type {
  Group,
  HistoryRange,
  ShardSpec,
  TickerSymbol,
} from "./domain.ts";
import {
  HistoryApi,
  type HistoryApiError,
  NetworkError,
} from "./history-api.ts";
import { InvalidChunkSpec, partition } from "./partition.ts";
import { describeFailure, formatCsv } from "./format.ts";
import { replaceFile, StorageError } from "./storage.ts";

// --- Errors ---

export class NoData extends Data.TaggedError("NoData")<{
  readonly symbol: string;
}> {}

export type TickerFailure = HistoryApiError | NoData | StorageError;

// --- Types ---

export interface UpdateOptions {
  readonly dataDir: string;
  readonly range: HistoryRange;
  readonly concurrency: number;
  readonly requestTimeout: Duration.DurationInput;
  /** Extra attempts after a NetworkError, with exponential backoff. */
  readonly retries: number;
}

export interface UpdateResult {
  readonly group: Group;
  readonly shard: ShardSpec | undefined;
  readonly attempted: ReadonlyArray<TickerSymbol>;
  readonly succeeded: ReadonlyArray<TickerSymbol>;
  readonly failed: ReadonlyMap<TickerSymbol, TickerFailure>;
}

// --- Paths ---

export function groupDirectory(
  path: Path.Path,
  dataDir: string,
  group: Group,
): string {
  return path.join(dataDir, group.folder);
}

export function outputPath(
  path: Path.Path,
  dataDir: string,
  group: Group,
  ticker: TickerSymbol,
): string {
  return path.join(groupDirectory(path, dataDir, group), `${ticker}.csv`);
}

// --- Shard selection ---

export function selectTickers(
  group: Group,
  shard: Option.Option<ShardSpec>,
): Either.Either<ReadonlyArray<TickerSymbol>, InvalidChunkSpec> {
  return Option.match(shard, {
    onNone: () => Either.right(group.tickers),
    onSome: ({ chunkIndex, totalChunks }) =>
      partition(group.tickers, chunkIndex, totalChunks),
  });
}

// --- Update ---

export const updateGroup = (
  group: Group,
  shard: Option.Option<ShardSpec>,
  options: UpdateOptions,
): Effect.Effect<
  UpdateResult,
  InvalidChunkSpec | StorageError,
  HistoryApi | FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function* () {
    const api = yield* HistoryApi;
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const tickers = yield* selectTickers(group, shard);
    const directory = groupDirectory(path, options.dataDir, group);

    yield* fs.makeDirectory(directory, { recursive: true }).pipe(
      Effect.mapError((e) =>
        new StorageError({ path: directory, message: e.message })
      ),
    );

    yield* Effect.logInfo(
      `Updating ${group.title}: ${tickers.length} tickers, concurrency ${options.concurrency}`,
    );

    const updateTicker = (ticker: TickerSymbol) =>
      api.fetchHistory(ticker, options.range).pipe(
        Effect.timeoutFail({
          duration: options.requestTimeout,
          onTimeout: () =>
            new NetworkError({ message: `${ticker}: request timed out` }),
        }),
        Effect.retry({
          while: (e) => e._tag === "NetworkError",
          schedule: Schedule.exponential("1 second").pipe(
            Schedule.compose(Schedule.recurs(options.retries)),
          ),
        }),
        Effect.filterOrFail(
          (records) => records.length > 0,
          () => new NoData({ symbol: ticker }),
        ),
        Effect.flatMap((records) => {
          const file = outputPath(path, options.dataDir, group, ticker);
          return replaceFile(file, formatCsv(records)).pipe(
            Effect.zipRight(
              Effect.logInfo(
                `${ticker}: ${records.length} rows written to ${file}`,
              ),
            ),
          );
        }),
        Effect.tapError((e) =>
          Effect.logWarning(`${ticker}: skipped, ${describeFailure(e)}`)
        ),
        Effect.either,
      );

    const outcomes = yield* Effect.forEach(tickers, updateTicker, {
      concurrency: options.concurrency,
    });

    const succeeded: TickerSymbol[] = [];
    const failed = new Map<TickerSymbol, TickerFailure>();
    tickers.forEach((ticker, i) => {
      const outcome = outcomes[i];
      if (Either.isRight(outcome)) succeeded.push(ticker);
      else failed.set(ticker, outcome.left);
    });

    return {
      group,
      shard: Option.getOrUndefined(shard),
      attempted: tickers,
      succeeded,
      failed,
    };
  });
