// Pure helpers over daily price series: no I/O.

import type { HistoryRange, PriceRecord } from "./domain.ts";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True for a real calendar date written as YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (match === null) return false;
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && toIsoDate(date) === value;
}

/** UTC calendar date of `date`. */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Sort ascending by date and drop duplicate dates, keeping the row that
 *  appeared last for each date. */
export function normalizeHistory(
  records: Iterable<PriceRecord>,
): PriceRecord[] {
  const byDate = new Map<string, PriceRecord>();
  for (const record of records) {
    byDate.set(record.date, record);
  }
  return [...byDate.values()].sort((a, b) =>
    a.date < b.date ? -1 : a.date > b.date ? 1 : 0
  );
}

export function isStrictlyIncreasing(
  records: ReadonlyArray<PriceRecord>,
): boolean {
  for (let i = 1; i < records.length; i++) {
    if (records[i - 1].date >= records[i].date) return false;
  }
  return true;
}

export function clipToRange(
  records: ReadonlyArray<PriceRecord>,
  range: HistoryRange,
): PriceRecord[] {
  switch (range._tag) {
    case "FullHistory":
      return [...records];
    case "DateWindow":
      return records.filter((r) =>
        r.date >= range.start && r.date <= range.end
      );
  }
}
