/**
 * Metadata Store
 *
 * Reads and writes the metadata file: a JSON object mapping routine names
 * to their BuildMetadata. A missing file means no routine was built before.
 */
import { Effect, ParseResult, Schema as S } from "effect";
import { FileSystem, Path } from "@effect/platform";
import { MetadataInvalid, WriteError } from "../errors.js";
import { MetadataFile, type BuildMetadata } from "../ir/routine-metadata.js";

const MetadataJson = S.parseJson(MetadataFile);

/**
 * Read the metadata of the previous build
 */
export const readMetadata = (
  path: string,
): Effect.Effect<ReadonlyMap<string, BuildMetadata>, MetadataInvalid, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const readFailed = (cause: unknown) =>
      new MetadataInvalid({
        message: `Unable to read metadata file '${path}'`,
        path,
        cause,
      });

    const exists = yield* fs.exists(path).pipe(Effect.mapError(readFailed));
    if (!exists) {
      yield* Effect.logDebug(`No metadata file at ${path}`);
      return new Map<string, BuildMetadata>();
    }

    const text = yield* fs.readFileString(path).pipe(Effect.mapError(readFailed));
    const decoded = yield* S.decodeUnknown(MetadataJson)(text).pipe(
      Effect.mapError(
        (error: ParseResult.ParseError) =>
          new MetadataInvalid({
            message: `Invalid metadata file '${path}': ${error.message}`,
            path,
            cause: error,
          }),
      ),
    );

    return new Map(Object.entries(decoded));
  });

/**
 * Write metadata for the next build, routines sorted by name
 */
export const writeMetadata = (
  path: string,
  metadata: ReadonlyMap<string, BuildMetadata>,
): Effect.Effect<void, WriteError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const writeFailed = (cause: unknown) =>
      new WriteError({
        message: `Unable to write metadata file '${path}'`,
        path,
        cause,
      });

    const sorted = Object.fromEntries(
      [...metadata.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    );
    const encoded = yield* S.encode(MetadataFile)(sorted).pipe(Effect.mapError(writeFailed));

    yield* fs
      .makeDirectory(pathService.dirname(path), { recursive: true })
      .pipe(Effect.mapError(writeFailed));
    yield* fs
      .writeFileString(path, JSON.stringify(encoded, null, 2) + "\n")
      .pipe(Effect.mapError(writeFailed));

    yield* Effect.logDebug(`Wrote metadata of ${metadata.size} routines to ${path}`);
  });
