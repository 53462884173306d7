/**
 * Routine Metadata - the calling contract of a stored routine
 *
 * Persisted between runs (see services/metadata-store.ts) and consumed by
 * wrapper generators. Everything here is plain JSON once encoded.
 */
import { Schema as S } from "effect";

/**
 * Kind of stored routine, as reported by information_schema.ROUTINES (lowercased)
 */
export const RoutineType = S.Literal("procedure", "function");
export type RoutineType = S.Schema.Type<typeof RoutineType>;

// ============================================================================
// Designation
// ============================================================================

/** `-- type: bulk_insert <table> <col>,<col>` */
export const BulkInsertDesignation = S.TaggedStruct("bulk_insert", {
  tableName: S.String,
  columns: S.Array(S.String),
});

/** `-- type: rows_with_key <col>,<col>` */
export const RowsWithKeyDesignation = S.TaggedStruct("rows_with_key", {
  columns: S.Array(S.String),
});

/** `-- type: rows_with_index <col>,<col>` */
export const RowsWithIndexDesignation = S.TaggedStruct("rows_with_index", {
  columns: S.Array(S.String),
});

/** Every designation that takes no arguments (none, row0, rows, singleton1, ...) */
export const SimpleDesignation = S.TaggedStruct("simple", {
  type: S.String,
});

/**
 * Calling convention of a routine. Decides how generated wrappers
 * interpret the routine's result.
 */
export const Designation = S.Union(
  BulkInsertDesignation,
  RowsWithKeyDesignation,
  RowsWithIndexDesignation,
  SimpleDesignation,
);
export type Designation = S.Schema.Type<typeof Designation>;
export type BulkInsertDesignation = S.Schema.Type<typeof BulkInsertDesignation>;

/**
 * Key or index columns (or bulk insert fields) of a designation.
 */
export function designationColumns(designation: Designation): readonly string[] {
  return designation._tag === "simple" ? [] : designation.columns;
}

// ============================================================================
// Parameters
// ============================================================================

/**
 * A parameter whose value is a delimited list packed into one string.
 * Declared with `-- param: <name> <type> [delimiter enclosure escape]`.
 */
export const ExtendedParameter = S.Struct({
  name: S.String,
  dataType: S.String,
  delimiter: S.String,
  enclosure: S.String,
  escape: S.String,
});
export type ExtendedParameter = S.Schema.Type<typeof ExtendedParameter>;

/**
 * A routine parameter as reported by information_schema.PARAMETERS,
 * merged with its extended declaration (if any).
 *
 * When merged, `dataType` is the declared list type (e.g. `list_of_int`).
 */
export const RoutineParameter = S.Struct({
  name: S.String,
  dataType: S.String,
  numericPrecision: S.NullOr(S.Number),
  numericScale: S.NullOr(S.Number),
  characterSetName: S.NullOr(S.String),
  collationName: S.NullOr(S.String),
  dtdIdentifier: S.String,
  /** dtd identifier plus character set and collation clauses */
  dataTypeDescriptor: S.String,
  delimiter: S.optional(S.String),
  enclosure: S.optional(S.String),
  escape: S.optional(S.String),
});
export type RoutineParameter = S.Schema.Type<typeof RoutineParameter>;

// ============================================================================
// Documentation
// ============================================================================

export const SemanticType = S.Literal("integer", "float", "text", "text-or-integer-list");
export type SemanticType = S.Schema.Type<typeof SemanticType>;

export const DocumentedParameter = S.Struct({
  name: S.String,
  semanticType: SemanticType,
  dataTypeDescriptor: S.String,
  description: S.NullOr(S.String),
});
export type DocumentedParameter = S.Schema.Type<typeof DocumentedParameter>;

export const RoutineDocBlock = S.Struct({
  shortDescription: S.String,
  longDescription: S.String,
  parameters: S.Array(DocumentedParameter),
});
export type RoutineDocBlock = S.Schema.Type<typeof RoutineDocBlock>;

// ============================================================================
// Build metadata
// ============================================================================

export const BuildMetadata = S.Struct({
  routineName: S.String,
  routineType: RoutineType,
  designation: Designation,
  /** Target table of a bulk insert routine */
  tableName: S.NullOr(S.String),
  parameters: S.Array(RoutineParameter),
  /** Key/index columns or bulk insert fields from the designation */
  columns: S.Array(S.String),
  /** Column names of the bulk insert table */
  fields: S.Array(S.String),
  /** Base column types of the bulk insert table */
  columnTypes: S.Array(S.String),
  /** Modification time of the source file (ms since epoch) */
  timestamp: S.Number,
  /** Placeholders found in the source and their values, sorted by placeholder */
  replace: S.Record({ key: S.String, value: S.String }),
  docBlock: RoutineDocBlock,
  extendedParameters: S.Record({ key: S.String, value: ExtendedParameter }),
});
export type BuildMetadata = S.Schema.Type<typeof BuildMetadata>;

/**
 * The persisted metadata file: routine name → metadata
 */
export const MetadataFile = S.Record({ key: S.String, value: BuildMetadata });
export type MetadataFile = S.Schema.Type<typeof MetadataFile>;

// ============================================================================
// Catalog state
// ============================================================================

/**
 * A routine as currently stored in the database.
 */
export interface RoutineCatalogEntry {
  readonly routineName: string;
  readonly routineType: RoutineType;
  readonly sqlMode: string;
  readonly characterSetClient: string;
  readonly collationConnection: string;
}

/**
 * Session settings under which routines are loaded and run.
 */
export interface SessionSettings {
  readonly sqlMode: string;
  readonly characterSet: string;
  readonly collation: string;
}

/**
 * Placeholder values keyed by uppercased placeholder (`@NAME@`, `@TABLE.COLUMN%TYPE@`).
 */
export type ReplacePairs = ReadonlyMap<string, string>;
