import { ConfigProvider, Duration, Effect, Either } from "effect";
import { expect, test } from "vitest";
import { RunSettings } from "./config.ts";
import { providerTimeout } from "./history-api-fallback.ts";

function readSettings(env: ReadonlyArray<readonly [string, string]> = []) {
  return Effect.runPromise(
    Effect.either(RunSettings).pipe(
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map(env))),
    ),
  );
}

test("RunSettings: defaults", async () => {
  const settings = await readSettings();
  if (Either.isLeft(settings)) throw new Error("Expected default settings");
  expect(settings.right.dataDir).toBe("data");
  expect(settings.right.readmePath).toBe("README.md");
  expect(settings.right.concurrency).toBe(4);
  expect(settings.right.retries).toBe(2);
  expect(Duration.toMillis(settings.right.requestTimeout)).toBe(40_000);
});

test("RunSettings: the default timeout covers both fallback providers timing out", async () => {
  const settings = await readSettings();
  if (Either.isLeft(settings)) throw new Error("Expected default settings");
  const budget = settings.right.requestTimeout;
  const share = providerTimeout(budget, 2);
  expect(Duration.toMillis(share) * 2).toBeLessThan(Duration.toMillis(budget));
});

test("RunSettings: FETCH_CONCURRENCY below one is rejected", async () => {
  const settings = await readSettings([["FETCH_CONCURRENCY", "0"]]);
  expect(Either.isLeft(settings)).toBe(true);
});

test("RunSettings: a negative FETCH_RETRIES is rejected", async () => {
  const settings = await readSettings([["FETCH_RETRIES", "-1"]]);
  expect(Either.isLeft(settings)).toBe(true);
});
