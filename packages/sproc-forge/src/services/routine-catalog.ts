/**
 * Routine Catalog
 *
 * The stored routines currently present in the database, and the
 * `@TABLE.COLUMN%TYPE@` placeholders derived from its columns.
 */
import { Effect, Schema as S } from "effect";
import type { DatabaseError } from "../errors.js";
import { RoutineType, type RoutineCatalogEntry } from "../ir/routine-metadata.js";
import { DataLayerService, queryRows } from "./data-layer.js";

const RoutineRow = S.Struct({
  routine_name: S.String,
  routine_type: RoutineType,
  sql_mode: S.String,
  character_set_client: S.String,
  collation_connection: S.String,
});

export const ROUTINES_SQL = `
select routine_name         as routine_name
,      lower(routine_type)  as routine_type
,      sql_mode             as sql_mode
,      character_set_client as character_set_client
,      collation_connection as collation_connection
from   information_schema.ROUTINES
where  routine_schema = database()
order by routine_name`;

/**
 * Routines of the current schema, by name
 */
export const fetchRoutineCatalog = (): Effect.Effect<
  ReadonlyMap<string, RoutineCatalogEntry>,
  DatabaseError,
  DataLayerService
> =>
  queryRows(RoutineRow, ROUTINES_SQL).pipe(
    Effect.map(
      rows =>
        new Map(
          rows.map(row => {
            const entry: RoutineCatalogEntry = {
              routineName: row.routine_name,
              routineType: row.routine_type,
              sqlMode: row.sql_mode,
              characterSetClient: row.character_set_client,
              collationConnection: row.collation_connection,
            };
            return [entry.routineName, entry] as const;
          }),
        ),
    ),
  );

/**
 * Drop a routine that no longer has a source
 */
export const dropRoutine = (
  entry: RoutineCatalogEntry,
): Effect.Effect<void, DatabaseError, DataLayerService> =>
  Effect.gen(function* () {
    const db = yield* DataLayerService;
    yield* Effect.log(`Dropping ${entry.routineType} ${entry.routineName}`);
    yield* db.executeNone(`drop ${entry.routineType} if exists ${entry.routineName}`);
  });

// ============================================================================
// Replace pairs
// ============================================================================

const ColumnRow = S.Struct({
  table_name: S.String,
  column_name: S.String,
  column_type: S.String,
  character_set_name: S.NullOr(S.String),
});

export const COLUMNS_SQL = `
select table_name         as table_name
,      column_name        as column_name
,      column_type        as column_type
,      character_set_name as character_set_name
from   information_schema.COLUMNS
where  table_schema = database()
order by table_name
,        ordinal_position`;

/**
 * Placeholder for a configured constant: `@NAME@`
 */
export const constantPlaceholder = (name: string): string => `@${name}@`.toUpperCase();

/**
 * Placeholder for the type of a column: `@TABLE.COLUMN%TYPE@`
 */
export const columnTypePlaceholder = (table: string, column: string): string =>
  `@${table}.${column}%type@`.toUpperCase();

/**
 * Build the replace pairs: the type of every column in the schema, then
 * the configured constants (which win on a clash).
 */
export const buildReplacePairs = (
  constants: Readonly<Record<string, string | number>>,
): Effect.Effect<ReadonlyMap<string, string>, DatabaseError, DataLayerService> =>
  Effect.gen(function* () {
    const columns = yield* queryRows(ColumnRow, COLUMNS_SQL);
    const pairs = new Map<string, string>();

    for (const column of columns) {
      const type =
        column.character_set_name === null
          ? column.column_type
          : `${column.column_type} character set ${column.character_set_name}`;
      pairs.set(columnTypePlaceholder(column.table_name, column.column_name), type);
    }

    for (const [name, value] of Object.entries(constants)) {
      pairs.set(constantPlaceholder(name), String(value));
    }

    yield* Effect.logDebug(`Built ${pairs.size} replace pairs`);
    return pairs;
  });
