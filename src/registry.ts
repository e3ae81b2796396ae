// Ticker registry: static group definitions, validated once at load.

import { Data, Either, Schema } from "effect";
import type { Group, GroupName, TickerSymbol } from "./domain.ts";
import tickerLists from "./tickers.json";

// --- Errors ---

export class UnknownGroup extends Data.TaggedError("UnknownGroup")<{
  readonly group: string;
}> {}

// --- Ticker list schema ---

const TickerList = Schema.Array(Schema.NonEmptyTrimmedString).pipe(
  Schema.filter((symbols) =>
    new Set(symbols).size === symbols.length || "duplicate ticker symbols"
  ),
);

const TickerLists = Schema.Struct({
  sp500: TickerList,
  hangseng: TickerList,
  mag7: TickerList,
  indexes: TickerList,
});

const lists = Schema.decodeUnknownSync(TickerLists)(tickerLists);

// --- Groups ---

export const GROUP_NAMES = [
  "sp500",
  "hangseng",
  "mag7",
  "indexes",
] as const satisfies ReadonlyArray<GroupName>;

const groups: Readonly<Record<GroupName, Group>> = {
  sp500: {
    name: "sp500",
    folder: "SP500",
    title: "S&P 500",
    description: "All companies in the Standard & Poor's 500 Index",
    tickers: lists.sp500,
  },
  hangseng: {
    name: "hangseng",
    folder: "HangSengTech",
    title: "Hang Seng Tech Index",
    description:
      "Technology companies listed on the Hong Kong Stock Exchange",
    tickers: lists.hangseng,
  },
  mag7: {
    name: "mag7",
    folder: "MAG7",
    title: "MAG7",
    description:
      'The "Magnificent Seven" tech giants (Apple, Amazon, Google, Meta, Microsoft, Netflix, Tesla)',
    tickers: lists.mag7,
  },
  indexes: {
    name: "indexes",
    folder: "Indexes",
    title: "Market Indexes",
    description:
      "Major market indexes including Dow Jones, S&P 500, Nasdaq Composite, Russell 2000, and VIX",
    tickers: lists.indexes,
  },
};

export const allGroups: ReadonlyArray<Group> = GROUP_NAMES.map((name) =>
  groups[name]
);

export function isGroupName(value: string): value is GroupName {
  return GROUP_NAMES.some((name) => name === value);
}

export function getGroup(name: string): Either.Either<Group, UnknownGroup> {
  return isGroupName(name)
    ? Either.right(groups[name])
    : Either.left(new UnknownGroup({ group: name }));
}

export function listGroup(
  name: string,
): Either.Either<ReadonlyArray<TickerSymbol>, UnknownGroup> {
  return getGroup(name).pipe(Either.map((group) => group.tickers));
}

/** Every ticker the registry knows, across groups, without repeats. */
export function knownTickers(): ReadonlySet<TickerSymbol> {
  return new Set(allGroups.flatMap((group) => group.tickers));
}
