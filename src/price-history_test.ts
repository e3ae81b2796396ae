import { expect, test } from "vitest";
import { DateWindow, FullHistory, type PriceRecord } from "./domain.ts";
import {
  clipToRange,
  isIsoDate,
  isStrictlyIncreasing,
  normalizeHistory,
  toIsoDate,
} from "./price-history.ts";

function bar(date: string, close = 10): PriceRecord {
  return {
    date,
    open: close,
    high: close,
    low: close,
    close,
    adjustedClose: close,
    volume: 100,
  };
}

test("isIsoDate: accepts real calendar dates", () => {
  expect(isIsoDate("2024-02-29")).toBe(true);
  expect(isIsoDate("1970-01-01")).toBe(true);
});

test("isIsoDate: rejects impossible or misformatted dates", () => {
  expect(isIsoDate("2023-02-29")).toBe(false);
  expect(isIsoDate("2024-13-01")).toBe(false);
  expect(isIsoDate("2024-1-5")).toBe(false);
  expect(isIsoDate("yesterday")).toBe(false);
});

test("toIsoDate: uses the UTC calendar date", () => {
  expect(toIsoDate(new Date("2025-06-13T23:59:59Z"))).toBe("2025-06-13");
});

test("normalizeHistory: sorts ascending by date", () => {
  const result = normalizeHistory([
    bar("2025-06-04"),
    bar("2025-06-02"),
    bar("2025-06-03"),
  ]);
  expect(result.map((r) => r.date)).toEqual([
    "2025-06-02",
    "2025-06-03",
    "2025-06-04",
  ]);
});

test("normalizeHistory: a repeated date keeps the last row", () => {
  const result = normalizeHistory([
    bar("2025-06-02", 1),
    bar("2025-06-03", 2),
    bar("2025-06-02", 3),
  ]);
  expect(result).toEqual([bar("2025-06-02", 3), bar("2025-06-03", 2)]);
  expect(isStrictlyIncreasing(result)).toBe(true);
});

test("isStrictlyIncreasing: rejects equal or descending neighbours", () => {
  expect(isStrictlyIncreasing([])).toBe(true);
  expect(isStrictlyIncreasing([bar("2025-06-02"), bar("2025-06-02")])).toBe(
    false,
  );
  expect(isStrictlyIncreasing([bar("2025-06-03"), bar("2025-06-02")])).toBe(
    false,
  );
});

test("clipToRange: full history keeps every row", () => {
  const records = [bar("1999-01-04"), bar("2025-06-02")];
  expect(clipToRange(records, FullHistory)).toEqual(records);
});

test("clipToRange: a window keeps both endpoints", () => {
  const records = [
    bar("2025-06-02"),
    bar("2025-06-03"),
    bar("2025-06-04"),
    bar("2025-06-05"),
  ];
  expect(
    clipToRange(records, DateWindow("2025-06-03", "2025-06-04")).map((r) =>
      r.date
    ),
  ).toEqual(["2025-06-03", "2025-06-04"]);
});
