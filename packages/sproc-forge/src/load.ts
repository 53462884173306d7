/**
 * Load Orchestration Function
 *
 * Threads together a full run over the source directory:
 * 1. Discover routine sources
 * 2. Read the metadata of the previous build
 * 3. Read the routine catalog and build the replace pairs
 * 4. Compile every routine, one at a time
 * 5. Drop routines that no longer have a source (full runs only)
 * 6. Write the metadata for the next build
 *
 * Logging:
 * - Effect.log (INFO) - Progress messages shown by default
 * - Effect.logDebug (DEBUG) - Detailed info (file lists, staleness reasons)
 *
 * Configure via Logger.withMinimumLogLevel at the call site.
 */
import { Effect } from "effect";
import { FileSystem, Path } from "@effect/platform";
import type { ResolvedConfig } from "./config.js";
import {
  DuplicateRoutineSource,
  SourceReadFailed,
  type ConnectionLost,
  type MetadataInvalid,
  type QueryFailed,
  type WriteError,
} from "./errors.js";
import { compileRoutine, RoutineOutcome } from "./compile-routine.js";
import type { BuildMetadata, SessionSettings } from "./ir/routine-metadata.js";
import { routineNameFromPath } from "./ir/routine-source.js";
import { ConfigService } from "./services/config.js";
import type { DataLayerService } from "./services/data-layer.js";
import { readMetadata, writeMetadata } from "./services/metadata-store.js";
import { buildReplacePairs, dropRoutine, fetchRoutineCatalog } from "./services/routine-catalog.js";

/**
 * Options for the load function
 */
export interface LoadOptions {
  /**
   * Load only these source files. Obsolete routines are not dropped and
   * metadata of other routines is kept as is.
   */
  readonly files?: readonly string[];
}

/**
 * Result of a load run
 */
export interface LoadResult {
  readonly outcomes: readonly RoutineOutcome[];
  readonly loaded: readonly string[];
  readonly unchanged: readonly string[];
  readonly failed: readonly string[];
  /** Routines dropped because their source is gone */
  readonly dropped: readonly string[];
  /** Metadata as written for the next build */
  readonly metadata: ReadonlyMap<string, BuildMetadata>;
}

/**
 * All possible errors from the load pipeline
 */
export type LoadError = SourceReadFailed | MetadataInvalid | WriteError | QueryFailed | ConnectionLost;

/**
 * Session settings from config
 */
export const sessionSettings = (config: ResolvedConfig): SessionSettings => ({
  sqlMode: config.sqlMode,
  characterSet: config.characterSet,
  collation: config.collation,
});

/**
 * Find all routine sources below `sourceDir`, sorted by path
 */
export const discoverSources = (
  sourceDir: string,
  extension: string,
): Effect.Effect<readonly string[], SourceReadFailed, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const entries = yield* fs.readDirectory(sourceDir, { recursive: true }).pipe(
      Effect.mapError(
        cause =>
          new SourceReadFailed({
            message: `Unable to read source directory '${sourceDir}': ${cause.message}`,
            file: sourceDir,
            cause,
          }),
      ),
    );
    return entries
      .filter(entry => entry.endsWith(extension))
      .map(entry => path.join(sourceDir, entry))
      .sort();
  });

/**
 * The main load pipeline
 */
export const load = (
  options: LoadOptions = {},
): Effect.Effect<
  LoadResult,
  LoadError,
  ConfigService | DataLayerService | FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const path = yield* Path.Path;
    const baseDir = config.configDir ?? process.cwd();
    const sourceDir = path.resolve(baseDir, config.sourceDir);
    const metadataFile = path.resolve(baseDir, config.metadataFile);
    const fullRun = options.files === undefined;

    // 1. Discover sources
    const files = fullRun
      ? yield* discoverSources(sourceDir, config.sourceExtension)
      : (options.files ?? []).map(file => path.resolve(file));
    yield* Effect.log(`Found ${files.length} routine sources`);
    yield* Effect.logDebug(`Sources: ${files.join(", ")}`);

    // 2. Previous build
    const previous = yield* readMetadata(metadataFile);

    // 3. Database state
    const catalog = yield* fetchRoutineCatalog();
    const replacePairs = yield* buildReplacePairs(config.constants);
    const session = sessionSettings(config);

    // 4. Compile
    const seen = new Map<string, string>();
    const outcomes = yield* Effect.forEach(
      files,
      (file): Effect.Effect<RoutineOutcome, ConnectionLost, DataLayerService | FileSystem.FileSystem> => {
        const routineName = routineNameFromPath(file, config.sourceExtension);
        const otherFile = seen.get(routineName);
        if (otherFile !== undefined) {
          const error = new DuplicateRoutineSource({
            message: `Files '${otherFile}' and '${file}' define the same routine '${routineName}'`,
            file,
            routineName,
            otherFile,
          });
          return Effect.logError(error.message).pipe(
            Effect.as(RoutineOutcome.Failed({ routineName, error })),
          );
        }
        seen.set(routineName, file);

        return compileRoutine({
          path: file,
          extension: config.sourceExtension,
          previous: previous.get(routineName),
          catalogEntry: catalog.get(routineName),
          replacePairs,
          session,
        });
      },
    );

    const metadata = new Map(previous);
    for (const outcome of outcomes) {
      if (outcome._tag === "Loaded") metadata.set(outcome.routineName, outcome.metadata);
    }

    // 5. Obsolete routines
    const dropped: string[] = [];
    if (fullRun) {
      for (const entry of catalog.values()) {
        if (!seen.has(entry.routineName)) {
          yield* dropRoutine(entry);
          dropped.push(entry.routineName);
        }
      }
      for (const routineName of [...metadata.keys()]) {
        if (!seen.has(routineName)) metadata.delete(routineName);
      }
    }

    // 6. Metadata for the next build
    yield* writeMetadata(metadataFile, metadata);

    const namesOf = (tag: RoutineOutcome["_tag"]) =>
      outcomes.filter(outcome => outcome._tag === tag).map(outcome => outcome.routineName);
    const result: LoadResult = {
      outcomes,
      loaded: namesOf("Loaded"),
      unchanged: namesOf("Unchanged"),
      failed: namesOf("Failed"),
      dropped,
      metadata,
    };

    yield* Effect.log(
      `Loaded ${result.loaded.length}, unchanged ${result.unchanged.length}, failed ${result.failed.length}, dropped ${dropped.length}`,
    );

    return result;
  });
