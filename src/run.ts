// Run orchestrator: turns CLI options into a run mode and executes it.

import { FileSystem, Path } from "@effect/platform";
import { Console, Data, Effect, Either, Option } from "effect";
import {
  DateWindow,
  FullHistory,
  type Group,
  type HistoryRange,
  type ShardSpec,
} from "./domain.ts";
import type { RunSettings } from "./config.ts";
import { formatSummary } from "./format.ts";
import { updateGroup, type UpdateResult } from "./group-updater.ts";
import type { HistoryApi } from "./history-api.ts";
import { InvalidChunkSpec, validateShardSpec } from "./partition.ts";
import { isIsoDate } from "./price-history.ts";
import { writeReadme } from "./readme.ts";
import { getGroup, type UnknownGroup } from "./registry.ts";
import type { StorageError } from "./storage.ts";

// --- Errors ---

export class UsageError extends Data.TaggedError("UsageError")<{
  readonly message: string;
}> {}

export type RunError =
  | UsageError
  | UnknownGroup
  | InvalidChunkSpec
  | StorageError;

// --- Modes ---

export type ReadmeOnly = { readonly _tag: "ReadmeOnly" };
export type GroupUpdate = {
  readonly _tag: "GroupUpdate";
  readonly group: Group;
  readonly shard: Option.Option<ShardSpec>;
  readonly range: HistoryRange;
  readonly concurrency: Option.Option<number>;
};

export type RunMode = ReadmeOnly | GroupUpdate;

export interface RunOptions {
  readonly group: Option.Option<string>;
  readonly readmeOnly: boolean;
  readonly chunkIndex: Option.Option<number>;
  readonly totalChunks: Option.Option<number>;
  readonly start: Option.Option<string>;
  readonly end: Option.Option<string>;
  readonly concurrency: Option.Option<number>;
}

const EARLIEST_DATE = "1970-01-01";

// --- Mode resolution ---

export function resolveShard(
  chunkIndex: Option.Option<number>,
  totalChunks: Option.Option<number>,
): Either.Either<Option.Option<ShardSpec>, InvalidChunkSpec> {
  if (Option.isNone(chunkIndex) && Option.isNone(totalChunks)) {
    return Either.right(Option.none());
  }
  if (Option.isNone(chunkIndex) || Option.isNone(totalChunks)) {
    return Either.left(
      new InvalidChunkSpec({
        message: "--chunk-index and --total-chunks must be given together",
      }),
    );
  }
  return validateShardSpec({
    chunkIndex: chunkIndex.value,
    totalChunks: totalChunks.value,
  }).pipe(Either.map(Option.some));
}

/** `today` is the default end of a window opened with only `--start`. */
export function resolveRange(
  start: Option.Option<string>,
  end: Option.Option<string>,
  today: string,
): Either.Either<HistoryRange, UsageError> {
  if (Option.isNone(start) && Option.isNone(end)) {
    return Either.right(FullHistory);
  }
  const from = Option.getOrElse(start, () => EARLIEST_DATE);
  const to = Option.getOrElse(end, () => today);
  for (const [flag, value] of [["--start", from], ["--end", to]] as const) {
    if (!isIsoDate(value)) {
      return Either.left(
        new UsageError({ message: `${flag} must be a YYYY-MM-DD date, got "${value}"` }),
      );
    }
  }
  if (from > to) {
    return Either.left(
      new UsageError({ message: `--start ${from} is after --end ${to}` }),
    );
  }
  return Either.right(DateWindow(from, to));
}

export function resolveRunMode(
  options: RunOptions,
  today: string,
): Either.Either<RunMode, UsageError | UnknownGroup | InvalidChunkSpec> {
  return Either.gen(function* () {
    if (options.readmeOnly) {
      return { _tag: "ReadmeOnly" } as const;
    }
    if (Option.isNone(options.group)) {
      return yield* Either.left(
        new UsageError({
          message: "--group is required when not using --update-readme-only",
        }),
      );
    }
    const group = yield* getGroup(options.group.value);
    const shard = yield* resolveShard(options.chunkIndex, options.totalChunks);
    const range = yield* resolveRange(options.start, options.end, today);
    if (Option.exists(options.concurrency, (n) => n < 1)) {
      return yield* Either.left(
        new UsageError({ message: "--concurrency must be at least 1" }),
      );
    }
    return {
      _tag: "GroupUpdate",
      group,
      shard,
      range,
      concurrency: options.concurrency,
    } as const;
  });
}

// --- Execution ---

export const executeRun = (
  mode: RunMode,
  settings: RunSettings,
  now: Date,
): Effect.Effect<
  UpdateResult | undefined,
  InvalidChunkSpec | StorageError,
  HistoryApi | FileSystem.FileSystem | Path.Path
> => {
  switch (mode._tag) {
    case "ReadmeOnly":
      return Effect.logInfo("Only updating README as requested").pipe(
        Effect.zipRight(
          writeReadme(settings.readmePath, now, { dataDir: settings.dataDir }),
        ),
        Effect.as(undefined),
      );
    case "GroupUpdate":
      return updateGroup(mode.group, mode.shard, {
        dataDir: settings.dataDir,
        range: mode.range,
        concurrency: Option.getOrElse(
          mode.concurrency,
          () => settings.concurrency,
        ),
        requestTimeout: settings.requestTimeout,
        retries: settings.retries,
      }).pipe(Effect.tap((result) => Console.log(formatSummary(result))));
  }
};
