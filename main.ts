import { Command, Options, ValidationError } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Clock, Config, Console, Effect, Layer } from "effect";
import { RunSettings } from "./src/config.ts";
import { executeRun, resolveRunMode } from "./src/run.ts";
import { formatRunError } from "./src/format.ts";
import { toIsoDate } from "./src/price-history.ts";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import { AlphaVantageLive } from "./src/providers/alpha-vantage.ts";
import { HistoryApiTestLive } from "./src/providers/history-api-mock.ts";
import { FallbackHistoryApiLive } from "./src/history-api-fallback.ts";

// --- CLI ---

const group = Options.text("group").pipe(
  Options.withDescription("Group to update: sp500, hangseng, mag7 or indexes"),
  Options.optional,
);

const readmeOnly = Options.boolean("update-readme-only").pipe(
  Options.withDescription("Only regenerate README.md"),
);

const chunkIndex = Options.integer("chunk-index").pipe(
  Options.withDescription("Index of the chunk to process (for matrix jobs)"),
  Options.optional,
);

const totalChunks = Options.integer("total-chunks").pipe(
  Options.withDescription("Total number of chunks (for matrix jobs)"),
  Options.optional,
);

const start = Options.text("start").pipe(
  Options.withDescription("First date to fetch (YYYY-MM-DD); default is the full history"),
  Options.optional,
);

const end = Options.text("end").pipe(
  Options.withDescription("Last date to fetch (YYYY-MM-DD); default is today"),
  Options.optional,
);

const concurrency = Options.integer("concurrency").pipe(
  Options.withDescription("Fetches in flight at once (overrides FETCH_CONCURRENCY)"),
  Options.optional,
);

const command = Command.make("market-history", {
  group,
  readmeOnly,
  chunkIndex,
  totalChunks,
  start,
  end,
  concurrency,
}).pipe(
  Command.withHandler((options) =>
    Effect.gen(function* () {
      const settings = yield* RunSettings;
      const now = new Date(yield* Clock.currentTimeMillis);
      const mode = yield* resolveRunMode(options, toIsoDate(now));
      yield* executeRun(mode, settings, now);
    })
  ),
);

// --- Layers ---
// Set STOCK_PROVIDER to "fallback" (default), "yahoo", "alphavantage", or "test".

const HistoryApiLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("STOCK_PROVIDER").pipe(
      Config.withDefault("fallback"),
    );
    switch (provider) {
      case "yahoo":
        return YahooFinanceLive;
      case "alphavantage":
        return AlphaVantageLive;
      case "test":
        return HistoryApiTestLive;
      default:
        return FallbackHistoryApiLive;
    }
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "market-history",
  version: "0.1.0",
});

// Per-ticker failures never reach this point; anything that does is fatal
// and ends the process with a non-zero exit code.
cli(process.argv).pipe(
  Effect.provide(HistoryApiLive),
  Effect.tapError((e) =>
    ValidationError.isValidationError(e)
      ? Effect.void
      : Console.error(formatRunError(e))
  ),
  Effect.provide(NodeContext.layer),
  (program) => NodeRuntime.runMain(program, { disableErrorReporting: true }),
);
