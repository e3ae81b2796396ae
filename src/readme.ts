// README generator: status document built from the clock and the registry.

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { Group } from "./domain.ts";
import { DEFAULT_DATA_DIR } from "./config.ts";
import { CSV_HEADER } from "./format.ts";
import { allGroups } from "./registry.ts";
import { replaceFile, type StorageError } from "./storage.ts";

export interface ReadmeOptions {
  readonly dataDir?: string;
  readonly groups?: ReadonlyArray<Group>;
}

/** `2025-06-13 21:05:09 UTC` */
export function formatTimestamp(now: Date): string {
  const iso = now.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

export function renderReadme(now: Date, options: ReadmeOptions = {}): string {
  const dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
  const groups = options.groups ?? allGroups;

  const rows = groups.map((g) =>
    `| **${g.title}** | \`${dataDir}/${g.folder}/\` | ${g.tickers.length} | ${g.description} |`
  );

  return [
    "# Market History Data",
    "",
    "Daily historical prices for major stock groups and market indexes, one CSV file per ticker.",
    "",
    "## Data Collections",
    "",
    "| Collection | Directory | Tickers | Description |",
    "| --- | --- | --- | --- |",
    ...rows,
    "",
    "## Data Update Frequency",
    "",
    "Data is refreshed daily by a scheduled workflow. Each update replaces every file in full and creates a fresh repository state.",
    "",
    "## Last Updated",
    "",
    formatTimestamp(now),
    "",
    "## Data Source",
    "",
    "Daily bars come from the Yahoo Finance chart API, with Alpha Vantage as a fallback when it is configured. A ticker the provider could not serve keeps its previous file.",
    "",
    "## File Format",
    "",
    "Each file has a header row followed by one row per trading day, oldest first:",
    "",
    "```",
    CSV_HEADER,
    "```",
    "",
    "## Usage",
    "",
    "The files can be used for financial analysis, machine learning models, or visualization projects.",
    "",
  ].join("\n");
}

export const writeReadme = (
  readmePath: string,
  now: Date,
  options: ReadmeOptions = {},
): Effect.Effect<void, StorageError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* replaceFile(readmePath, renderReadme(now, options));
    yield* Effect.logInfo(`${readmePath} updated`);
  });
