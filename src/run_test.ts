import { FileSystem, Path } from "@effect/platform";
import { Duration, Effect, Either, Layer, Logger, LogLevel, Option } from "effect";
import { expect, test } from "vitest";
import { DateWindow, FullHistory } from "./domain.ts";
import { InvalidChunkSpec } from "./partition.ts";
import { HistoryApiTestLive } from "./providers/history-api-mock.ts";
import { renderReadme } from "./readme.ts";
import { UnknownGroup } from "./registry.ts";
import {
  executeRun,
  resolveRange,
  resolveRunMode,
  resolveShard,
  type RunOptions,
  UsageError,
} from "./run.ts";

const TODAY = "2025-06-13";

const noOptions: RunOptions = {
  group: Option.none(),
  readmeOnly: false,
  chunkIndex: Option.none(),
  totalChunks: Option.none(),
  start: Option.none(),
  end: Option.none(),
  concurrency: Option.none(),
};

// --- resolveRange ---

test("resolveRange: no dates means the full history", () => {
  expect(resolveRange(Option.none(), Option.none(), TODAY)).toEqual(
    Either.right(FullHistory),
  );
});

test("resolveRange: a start alone runs to today", () => {
  expect(resolveRange(Option.some("2025-01-02"), Option.none(), TODAY))
    .toEqual(Either.right(DateWindow("2025-01-02", TODAY)));
});

test("resolveRange: an end alone starts at the epoch", () => {
  expect(resolveRange(Option.none(), Option.some("2000-12-29"), TODAY))
    .toEqual(Either.right(DateWindow("1970-01-01", "2000-12-29")));
});

test("resolveRange: a malformed date names its flag", () => {
  expect(resolveRange(Option.some("2025/01/02"), Option.none(), TODAY))
    .toEqual(
      Either.left(
        new UsageError({
          message: '--start must be a YYYY-MM-DD date, got "2025/01/02"',
        }),
      ),
    );
});

test("resolveRange: start after end is rejected", () => {
  expect(
    resolveRange(Option.some("2025-02-01"), Option.some("2025-01-01"), TODAY),
  ).toEqual(
    Either.left(
      new UsageError({ message: "--start 2025-02-01 is after --end 2025-01-01" }),
    ),
  );
});

test("resolveRange: a single-day window is allowed", () => {
  expect(
    resolveRange(Option.some("2025-01-02"), Option.some("2025-01-02"), TODAY),
  ).toEqual(Either.right(DateWindow("2025-01-02", "2025-01-02")));
});

// --- resolveShard ---

test("resolveShard: both flags absent means no sharding", () => {
  expect(resolveShard(Option.none(), Option.none())).toEqual(
    Either.right(Option.none()),
  );
});

test("resolveShard: one flag without the other is rejected", () => {
  expect(resolveShard(Option.some(1), Option.none())).toEqual(
    Either.left(
      new InvalidChunkSpec({
        message: "--chunk-index and --total-chunks must be given together",
      }),
    ),
  );
  expect(Either.isLeft(resolveShard(Option.none(), Option.some(8)))).toBe(true);
});

test("resolveShard: a valid pair becomes a shard", () => {
  expect(resolveShard(Option.some(3), Option.some(8))).toEqual(
    Either.right(Option.some({ chunkIndex: 3, totalChunks: 8 })),
  );
});

// --- resolveRunMode ---

test("resolveRunMode: readme-only wins over every other option", () => {
  const mode = resolveRunMode(
    { ...noOptions, readmeOnly: true, group: Option.some("nope") },
    TODAY,
  );
  expect(mode).toEqual(Either.right({ _tag: "ReadmeOnly" }));
});

test("resolveRunMode: a group is required otherwise", () => {
  expect(resolveRunMode(noOptions, TODAY)).toEqual(
    Either.left(
      new UsageError({
        message: "--group is required when not using --update-readme-only",
      }),
    ),
  );
});

test("resolveRunMode: an unknown group is rejected", () => {
  expect(
    resolveRunMode({ ...noOptions, group: Option.some("ftse") }, TODAY),
  ).toEqual(Either.left(new UnknownGroup({ group: "ftse" })));
});

test("resolveRunMode: a sharded group update", () => {
  const mode = resolveRunMode(
    {
      ...noOptions,
      group: Option.some("sp500"),
      chunkIndex: Option.some(0),
      totalChunks: Option.some(8),
    },
    TODAY,
  );

  if (Either.isLeft(mode)) throw new Error(mode.left.message);
  if (mode.right._tag !== "GroupUpdate") throw new Error("expected update");
  expect(mode.right.group.folder).toBe("SP500");
  expect(mode.right.shard).toEqual(
    Option.some({ chunkIndex: 0, totalChunks: 8 }),
  );
  expect(mode.right.range).toEqual(FullHistory);
});

test("resolveRunMode: an out-of-range chunk is rejected", () => {
  const mode = resolveRunMode(
    {
      ...noOptions,
      group: Option.some("sp500"),
      chunkIndex: Option.some(8),
      totalChunks: Option.some(8),
    },
    TODAY,
  );
  expect(mode).toEqual(
    Either.left(
      new InvalidChunkSpec({ message: "chunk index must be in [0, 8), got 8" }),
    ),
  );
});

test("resolveRunMode: concurrency must be positive", () => {
  const mode = resolveRunMode(
    { ...noOptions, group: Option.some("mag7"), concurrency: Option.some(0) },
    TODAY,
  );
  expect(mode).toEqual(
    Either.left(new UsageError({ message: "--concurrency must be at least 1" })),
  );
});

// --- executeRun ---

const settings = {
  dataDir: "data",
  readmePath: "README.md",
  concurrency: 2,
  requestTimeout: Duration.seconds(30),
  retries: 0,
};

function memoryLayer(files: Map<string, string>) {
  return Layer.mergeAll(
    FileSystem.layerNoop({
      makeDirectory: () => Effect.void,
      writeFileString: (path, data) =>
        Effect.sync(() => {
          files.set(path, data);
        }),
      rename: (from, to) =>
        Effect.sync(() => {
          const data = files.get(from);
          if (data !== undefined) files.set(to, data);
          files.delete(from);
        }),
    }),
    Path.layer,
    HistoryApiTestLive,
  );
}

const NOW = new Date("2025-06-13T21:05:09Z");

test("executeRun: readme-only writes the README and no data", async () => {
  const files = new Map<string, string>();
  await Effect.runPromise(
    executeRun({ _tag: "ReadmeOnly" }, settings, NOW).pipe(
      Effect.provide(memoryLayer(files)),
      Logger.withMinimumLogLevel(LogLevel.None),
    ),
  );

  expect([...files.keys()]).toEqual(["README.md"]);
  expect(files.get("README.md")).toBe(renderReadme(NOW));
});

test("executeRun: a group update does not touch the README", async () => {
  const files = new Map<string, string>();
  const mode = resolveRunMode(
    { ...noOptions, group: Option.some("indexes") },
    TODAY,
  );
  if (Either.isLeft(mode)) throw new Error(mode.left.message);

  const result = await Effect.runPromise(
    executeRun(mode.right, settings, NOW).pipe(
      Effect.provide(memoryLayer(files)),
      Logger.withMinimumLogLevel(LogLevel.None),
    ),
  );

  expect(result?.succeeded).toEqual(["^GSPC", "^DJI", "^IXIC", "^RUT", "^VIX"]);
  expect(files.has("README.md")).toBe(false);
  expect(files.has("data/Indexes/^VIX.csv")).toBe(true);
});
