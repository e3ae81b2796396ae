// Pure formatting functions: no I/O.

import { ConfigError } from "effect";
import type { PriceRecord } from "./domain.ts";
import type { HttpError } from "./history-api.ts";
import type { TickerFailure, UpdateResult } from "./group-updater.ts";
import { GROUP_NAMES } from "./registry.ts";
import type { RunError } from "./run.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- CSV ---

export const CSV_HEADER = "date,open,high,low,close,adjusted_close,volume";

export function formatCsv(records: ReadonlyArray<PriceRecord>): string {
  const rows = records.map((r) =>
    [r.date, r.open, r.high, r.low, r.close, r.adjustedClose, r.volume]
      .join(",")
  );
  return [CSV_HEADER, ...rows].join("\n") + "\n";
}

// --- Per-ticker failures ---

/** One-line reason for a ticker that was skipped. */
export function describeFailure(error: TickerFailure): string {
  switch (error._tag) {
    case "NetworkError":
      return `network error: ${error.message}`;
    case "HttpError":
      return `${classifyHttpStatus(error)} (HTTP ${error.status})`;
    case "ParseError":
      return `unexpected response: ${error.message}`;
    case "SymbolNotFound":
      return "symbol not found (delisted or unknown to the provider)";
    case "RateLimited":
      return `rate limited: ${error.message}`;
    case "ServiceError":
      return `service unavailable: ${error.message}`;
    case "NoData":
      return "provider returned no rows for the requested range";
    case "StorageError":
      return `could not write ${error.path}: ${error.message}`;
  }
}

// --- Run summary ---

export function formatSummary(result: UpdateResult): string {
  const shard = result.shard === undefined
    ? ""
    : ` (chunk ${result.shard.chunkIndex + 1}/${result.shard.totalChunks})`;
  const failedColor = result.failed.size > 0 ? RED : DIM;

  const lines = [
    "",
    `${BOLD}  ${result.group.title}${shard}${RESET}`,
    `  ${GREEN}✓ ${result.succeeded.length}/${result.attempted.length} updated${RESET}`,
    `  ${failedColor}✗ ${result.failed.size} failed${RESET}`,
  ];
  for (const [ticker, error] of result.failed) {
    lines.push(`    ${DIM}${ticker}: ${describeFailure(error)}${RESET}`);
  }
  lines.push("");

  return lines.join("\n");
}

// --- Fatal error formatting ---

export function formatRunError(
  error: RunError | ConfigError.ConfigError,
): string {
  const friendly = classifyRunError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyRunError(
  error: RunError | ConfigError.ConfigError,
): ClassifiedError {
  if (ConfigError.isConfigError(error)) {
    return { title: "Invalid configuration", hint: String(error) };
  }
  switch (error._tag) {
    case "UsageError":
      return { title: "Invalid arguments", hint: error.message };
    case "UnknownGroup":
      return {
        title: `Unknown group "${error.group}"`,
        hint: `Choose one of: ${GROUP_NAMES.join(", ")}.`,
      };
    case "InvalidChunkSpec":
      return { title: "Invalid chunk selection", hint: error.message };
    case "StorageError":
      return {
        title: "Could not write output",
        hint: `${error.path}: ${error.message}`,
      };
  }
}

function classifyHttpStatus(error: HttpError): string {
  if (error.status === 404) return "symbol not found";
  if (error.status === 429) return "rate limited";
  if (error.status >= 500 && error.status < 600) return "server error";
  return "client error";
}
