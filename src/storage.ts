// Output storage: whole-file replacement shared by the CSV and README writers.

import { FileSystem } from "@effect/platform";
import { Data, Effect } from "effect";

export class StorageError extends Data.TaggedError("StorageError")<{
  readonly path: string;
  readonly message: string;
}> {}

/** Write beside the target, then rename over it, so readers never see a
 *  half-written file. */
export const replaceFile = (
  file: string,
  content: string,
): Effect.Effect<void, StorageError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const staging = `${file}.tmp`;
    yield* fs.writeFileString(staging, content).pipe(
      Effect.zipRight(fs.rename(staging, file)),
      Effect.mapError((e) => new StorageError({ path: file, message: e.message })),
    );
  });
