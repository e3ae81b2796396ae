import { Error as PlatformError, FileSystem } from "@effect/platform";
import { Effect, Either } from "effect";
import { expect, test } from "vitest";
import { replaceFile, StorageError } from "./storage.ts";

function memoryFileSystem(files: Map<string, string>, renameFails = false) {
  return FileSystem.layerNoop({
    writeFileString: (path, data) =>
      Effect.sync(() => {
        files.set(path, data);
      }),
    rename: (from, to) =>
      renameFails
        ? Effect.fail(
          new PlatformError.SystemError({
            reason: "PermissionDenied",
            module: "FileSystem",
            method: "rename",
            pathOrDescriptor: to,
          }),
        )
        : Effect.sync(() => {
          const data = files.get(from);
          if (data !== undefined) files.set(to, data);
          files.delete(from);
        }),
  });
}

test("replaceFile: the content lands at the target with no staging file left", async () => {
  const files = new Map([["data/MAG7/AAPL.csv", "old"]]);
  const result = await Effect.runPromise(
    replaceFile("data/MAG7/AAPL.csv", "new").pipe(
      Effect.either,
      Effect.provide(memoryFileSystem(files)),
    ),
  );

  expect(Either.isRight(result)).toBe(true);
  expect([...files.entries()]).toEqual([["data/MAG7/AAPL.csv", "new"]]);
});

test("replaceFile: a failed rename is a StorageError for the target", async () => {
  const files = new Map([["README.md", "old"]]);
  const result = await Effect.runPromise(
    replaceFile("README.md", "new").pipe(
      Effect.either,
      Effect.provide(memoryFileSystem(files, true)),
    ),
  );

  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  expect(result.left).toBeInstanceOf(StorageError);
  expect(result.left.path).toBe("README.md");
  expect(files.get("README.md")).toBe("old");
});
