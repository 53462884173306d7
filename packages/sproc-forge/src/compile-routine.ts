/**
 * Single Routine Compiler
 *
 * Compiles one source file into a loaded routine and its BuildMetadata:
 * 1. Decide staleness (stop here when the routine is up to date)
 * 2. Read the source and scan its annotations
 * 3. Drop and create the routine
 * 4. Reconcile with the catalog (parameters, bulk insert columns)
 * 5. Reconcile documentation and map types
 * 6. Synthesize metadata
 *
 * A failure in any stage fails this routine only: it is returned as a
 * `Failed` outcome. Only a lost connection escapes the error channel.
 */
import { Data, Effect, Option } from "effect";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { SourceReadFailed, type ConnectionLost, type RoutineError } from "./errors.js";
import type {
  BuildMetadata,
  ReplacePairs,
  RoutineCatalogEntry,
  SessionSettings,
} from "./ir/routine-metadata.js";
import { makeRoutineSource, routineNameFromPath } from "./ir/routine-source.js";
import { scanAnnotations } from "./services/annotation-scanner.js";
import { reconcileCatalog } from "./services/catalog-reconciler.js";
import type { DataLayerService } from "./services/data-layer.js";
import { reconcileDocumentation, sourceDocBlock } from "./services/doc-reconciler.js";
import { synthesizeMetadata } from "./services/metadata-synthesizer.js";
import { executeRoutine } from "./services/routine-executor.js";
import { staleReason } from "./services/staleness.js";

/**
 * Result of compiling one routine
 */
export type RoutineOutcome = Data.TaggedEnum<{
  /** Up to date; the previous metadata still holds */
  Unchanged: { readonly routineName: string; readonly metadata: BuildMetadata };
  /** (Re)loaded into the database */
  Loaded: {
    readonly routineName: string;
    readonly metadata: BuildMetadata;
    readonly warnings: readonly string[];
  };
  /** Not loaded; the previous metadata (if any) stays authoritative */
  Failed: { readonly routineName: string; readonly error: RoutineError };
}>;

export const RoutineOutcome = Data.taggedEnum<RoutineOutcome>();

export interface CompileRoutineInput {
  /** Path of the source file */
  readonly path: string;
  /** Source file extension, e.g. ".psql" */
  readonly extension: string;
  /** Metadata of the previous successful build */
  readonly previous: BuildMetadata | undefined;
  /** The routine as currently stored in the database */
  readonly catalogEntry: RoutineCatalogEntry | undefined;
  readonly replacePairs: ReplacePairs;
  readonly session: SessionSettings;
}

const sourceReadFailed = (file: string) => (cause: PlatformError) =>
  new SourceReadFailed({
    message: `Unable to read file '${file}': ${cause.message}`,
    file,
    cause,
  });

const compile = (input: CompileRoutineInput) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const { path, previous } = input;
    const routineName = routineNameFromPath(path, input.extension);

    const info = yield* fs.stat(path).pipe(Effect.mapError(sourceReadFailed(path)));
    const mtime = yield* Option.match(info.mtime, {
      onNone: () =>
        Effect.fail(
          new SourceReadFailed({
            message: `Unable to get the modification time of file '${path}'`,
            file: path,
            cause: null,
          }),
        ),
      onSome: date => Effect.succeed(date.getTime()),
    });

    const reason = staleReason({
      previous,
      mtime,
      replacePairs: input.replacePairs,
      catalogEntry: input.catalogEntry,
      session: input.session,
    });
    if (reason === undefined && previous !== undefined) {
      yield* Effect.logDebug(`${routineName} is up to date`);
      return RoutineOutcome.Unchanged({ routineName, metadata: previous });
    }
    yield* Effect.logDebug(`${routineName} must be loaded: ${reason ?? "new"}`);

    const text = yield* fs.readFileString(path).pipe(Effect.mapError(sourceReadFailed(path)));
    const source = makeRoutineSource({ path, extension: input.extension, text, mtime });
    const annotations = yield* scanAnnotations(source, input.replacePairs);
    const realPath = yield* fs.realPath(path).pipe(Effect.mapError(sourceReadFailed(path)));

    yield* executeRoutine({
      source,
      header: annotations.header,
      placeholders: annotations.placeholders,
      catalogEntry: input.catalogEntry,
      session: input.session,
      realPath,
    });

    const catalog = yield* reconcileCatalog({
      file: path,
      routineName,
      designation: annotations.designation,
      extendedParameters: annotations.extendedParameters,
    });

    const documentation = yield* reconcileDocumentation(
      sourceDocBlock(source, annotations.header.line),
      catalog.parameters,
      path,
    );
    for (const warning of documentation.warnings) {
      yield* Effect.logWarning(`${warning} of ${routineName}`);
    }

    const metadata = synthesizeMetadata({ source, annotations, catalog, documentation });
    return RoutineOutcome.Loaded({ routineName, metadata, warnings: documentation.warnings });
  });

/**
 * Compile one routine source.
 */
export const compileRoutine = (
  input: CompileRoutineInput,
): Effect.Effect<RoutineOutcome, ConnectionLost, DataLayerService | FileSystem.FileSystem> =>
  compile(input).pipe(
    Effect.catchAll(error =>
      error._tag === "ConnectionLost"
        ? Effect.fail(error)
        : Effect.logError(`${input.path}: ${error.message}`).pipe(
            Effect.as(
              RoutineOutcome.Failed({
                routineName: routineNameFromPath(input.path, input.extension),
                error,
              }),
            ),
          ),
    ),
  );
