// Chunk partitioner: splits a ticker list into contiguous shards.
//
// Every chunk holds ceil(n / totalChunks) items; trailing chunks may be
// shorter or empty. The union of all chunks is the input, in order, with
// each item exactly once.

import { Data, Either } from "effect";
import type { ShardSpec } from "./domain.ts";

export class InvalidChunkSpec extends Data.TaggedError("InvalidChunkSpec")<{
  readonly message: string;
}> {}

export function validateShardSpec(
  spec: ShardSpec,
): Either.Either<ShardSpec, InvalidChunkSpec> {
  const { chunkIndex, totalChunks } = spec;
  if (!Number.isInteger(totalChunks) || totalChunks < 1) {
    return Either.left(
      new InvalidChunkSpec({
        message: `total chunks must be a positive integer, got ${totalChunks}`,
      }),
    );
  }
  if (
    !Number.isInteger(chunkIndex) || chunkIndex < 0 || chunkIndex >= totalChunks
  ) {
    return Either.left(
      new InvalidChunkSpec({
        message:
          `chunk index must be in [0, ${totalChunks}), got ${chunkIndex}`,
      }),
    );
  }
  return Either.right(spec);
}

/** Half-open [start, end) slice owned by `spec` in a list of `length`. */
export function chunkBounds(
  length: number,
  spec: ShardSpec,
): readonly [number, number] {
  const size = Math.ceil(length / spec.totalChunks);
  const start = Math.min(spec.chunkIndex * size, length);
  return [start, Math.min(start + size, length)];
}

export function partition<A>(
  items: ReadonlyArray<A>,
  chunkIndex: number,
  totalChunks: number,
): Either.Either<ReadonlyArray<A>, InvalidChunkSpec> {
  return validateShardSpec({ chunkIndex, totalChunks }).pipe(
    Either.map((spec) => {
      const [start, end] = chunkBounds(items.length, spec);
      return items.slice(start, end);
    }),
  );
}
