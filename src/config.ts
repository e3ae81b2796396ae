// Run settings read from the environment.

import { Config, Duration } from "effect";

export const DEFAULT_DATA_DIR = "data";

/** Budget for one ticker's fetch, fallback providers included. */
export const FetchTimeout: Config.Config<Duration.Duration> = Config.duration(
  "FETCH_TIMEOUT",
).pipe(Config.withDefault(Duration.seconds(40)));

export interface RunSettings {
  readonly dataDir: string;
  readonly readmePath: string;
  readonly concurrency: number;
  readonly requestTimeout: Duration.Duration;
  readonly retries: number;
}

export const RunSettings: Config.Config<RunSettings> = Config.all({
  dataDir: Config.string("DATA_DIR").pipe(
    Config.withDefault(DEFAULT_DATA_DIR),
  ),
  readmePath: Config.string("README_PATH").pipe(
    Config.withDefault("README.md"),
  ),
  concurrency: Config.integer("FETCH_CONCURRENCY").pipe(
    Config.withDefault(4),
    Config.validate({
      message: "FETCH_CONCURRENCY must be at least 1",
      validation: (n) => n >= 1,
    }),
  ),
  requestTimeout: FetchTimeout,
  retries: Config.integer("FETCH_RETRIES").pipe(
    Config.withDefault(2),
    Config.validate({
      message: "FETCH_RETRIES must not be negative",
      validation: (n) => n >= 0,
    }),
  ),
});
