/**
 * Core error types for sproc-forge
 * Using Effect's Data.TaggedError for typed error handling
 */
import { Data } from "effect"

// Base error type with common fields
interface ErrorBase {
  readonly message: string
}

// Errors that name the source file they were found in
interface SourceErrorBase extends ErrorBase {
  readonly file: string
}

// Configuration errors
export class ConfigNotFound extends Data.TaggedError("ConfigNotFound")<
  ErrorBase & { readonly searchPaths: readonly string[] }
> {}

export class ConfigInvalid extends Data.TaggedError("ConfigInvalid")<
  ErrorBase & { readonly path: string; readonly errors: readonly string[] }
> {}

// Database errors
export class ConnectionFailed extends Data.TaggedError("ConnectionFailed")<
  ErrorBase & { readonly host: string; readonly cause: unknown }
> {}

/** The connection dropped while a batch was running; nothing more can be loaded. */
export class ConnectionLost extends Data.TaggedError("ConnectionLost")<
  ErrorBase & { readonly sql: string; readonly cause: unknown }
> {}

export class QueryFailed extends Data.TaggedError("QueryFailed")<
  ErrorBase & { readonly sql: string; readonly cause: unknown }
> {}

export class WrongRowCount extends Data.TaggedError("WrongRowCount")<
  ErrorBase & {
    readonly expected: readonly number[]
    readonly actual: number
    readonly sql: string
  }
> {}

// Source errors
export class SourceReadFailed extends Data.TaggedError("SourceReadFailed")<
  SourceErrorBase & { readonly cause: unknown }
> {}

export class DuplicateRoutineSource extends Data.TaggedError("DuplicateRoutineSource")<
  SourceErrorBase & { readonly routineName: string; readonly otherFile: string }
> {}

// Annotation errors
export class UnknownPlaceholder extends Data.TaggedError("UnknownPlaceholder")<
  SourceErrorBase & { readonly placeholders: readonly string[] }
> {}

export class DesignationNotFound extends Data.TaggedError("DesignationNotFound")<
  SourceErrorBase
> {}

export class DesignationSyntax extends Data.TaggedError("DesignationSyntax")<
  SourceErrorBase & { readonly line: number }
> {}

export class ParamSyntax extends Data.TaggedError("ParamSyntax")<
  SourceErrorBase & { readonly line: number }
> {}

export class DuplicateParameter extends Data.TaggedError("DuplicateParameter")<
  SourceErrorBase & { readonly parameter: string }
> {}

export class RoutineHeaderNotFound extends Data.TaggedError("RoutineHeaderNotFound")<
  SourceErrorBase
> {}

export class RoutineNameMismatch extends Data.TaggedError("RoutineNameMismatch")<
  SourceErrorBase & { readonly expected: string; readonly found: string }
> {}

// Reconciliation errors
export class ColumnCountMismatch extends Data.TaggedError("ColumnCountMismatch")<
  SourceErrorBase & {
    readonly tableName: string
    readonly fields: number
    readonly columns: number
  }
> {}

export class UnknownSpecificParameter extends Data.TaggedError("UnknownSpecificParameter")<
  SourceErrorBase & { readonly parameter: string }
> {}

export class UnsupportedColumnType extends Data.TaggedError("UnsupportedColumnType")<
  SourceErrorBase & { readonly dataType: string; readonly parameter?: string }
> {}

// Metadata errors
export class MetadataInvalid extends Data.TaggedError("MetadataInvalid")<
  ErrorBase & { readonly path: string; readonly cause: unknown }
> {}

export class WriteError extends Data.TaggedError("WriteError")<
  ErrorBase & { readonly path: string; readonly cause: unknown }
> {}

// Batch errors
export class RoutinesFailed extends Data.TaggedError("RoutinesFailed")<
  ErrorBase & { readonly routines: readonly string[] }
> {}

/**
 * Errors that abort the compilation of a single routine.
 * The batch loader records them and moves on to the next source.
 */
export type RoutineError =
  | SourceReadFailed
  | DuplicateRoutineSource
  | UnknownPlaceholder
  | DesignationNotFound
  | DesignationSyntax
  | ParamSyntax
  | DuplicateParameter
  | RoutineHeaderNotFound
  | RoutineNameMismatch
  | ColumnCountMismatch
  | UnknownSpecificParameter
  | UnsupportedColumnType
  | QueryFailed
  | WrongRowCount

/** Database errors as seen by callers of the DataLayer */
export type DatabaseError = QueryFailed | ConnectionLost

// Union of all errors for convenience
export type SprocForgeError =
  | ConfigNotFound
  | ConfigInvalid
  | ConnectionFailed
  | ConnectionLost
  | MetadataInvalid
  | WriteError
  | RoutinesFailed
  | RoutineError
