/**
 * Testing Utilities
 *
 * An in-memory stand-in for the MySQL data layer. It answers the catalog
 * queries the compiler issues, keeps the routine catalog up to date as
 * routines are dropped and created, and records every statement.
 *
 * ```typescript
 * import { makeFakeDatabase } from "sproc-forge/testing"
 *
 * const db = makeFakeDatabase({
 *   parameters: { usr_get_users: [{ name: "p_ids", dataType: "text" }] },
 * })
 *
 * it.effect("loads the routine", () =>
 *   Effect.gen(function* () {
 *     yield* load()
 *     expect(db.catalog.has("usr_get_users")).toBe(true)
 *   }).pipe(Effect.provide(db.layer))
 * )
 * ```
 */
import { Effect, Layer } from "effect";
import { QueryFailed, type DatabaseError } from "./errors.js";
import type { RoutineCatalogEntry } from "./ir/routine-metadata.js";
import { ROUTINE_HEADER } from "./services/annotation-scanner.js";
import { DataLayerService, type DataLayer, type SqlValue } from "./services/data-layer.js";

/**
 * A routine parameter known to the fake catalog
 */
export interface FakeParameter {
  readonly name: string;
  readonly dataType: string;
  readonly numericPrecision?: number | null;
  readonly numericScale?: number | null;
  readonly characterSetName?: string | null;
  readonly collationName?: string | null;
  /** Defaults to `dataType` */
  readonly dtdIdentifier?: string;
}

/**
 * A column as `describe` reports it
 */
export interface FakeColumn {
  readonly field: string;
  readonly type: string;
}

/**
 * A column as information_schema.COLUMNS reports it
 */
export interface FakeSchemaColumn {
  readonly tableName: string;
  readonly columnName: string;
  readonly columnType: string;
  readonly characterSetName?: string | null;
}

export interface FakeDatabaseOptions {
  /** Routines present before the run */
  readonly routines?: readonly RoutineCatalogEntry[];
  /** Parameters by routine name, in declaration order */
  readonly parameters?: Readonly<Record<string, readonly FakeParameter[]>>;
  /** Permanent tables by name */
  readonly tables?: Readonly<Record<string, readonly FakeColumn[]>>;
  /** Temporary tables created by calling a routine, by routine name */
  readonly temporaryTables?: Readonly<
    Record<string, { readonly tableName: string; readonly columns: readonly FakeColumn[] }>
  >;
  /** Columns reported by information_schema.COLUMNS */
  readonly schemaColumns?: readonly FakeSchemaColumn[];
  /** Fail a statement: return the error to fail it with */
  readonly failOn?: (sql: string) => DatabaseError | undefined;
}

export interface RecordedStatement {
  readonly sql: string;
  readonly params: readonly SqlValue[];
}

export interface FakeDatabase {
  readonly layer: Layer.Layer<DataLayerService>;
  readonly dataLayer: DataLayer;
  /** Every statement and query, in order */
  readonly statements: RecordedStatement[];
  /** The routine catalog as it stands now */
  readonly catalog: Map<string, RoutineCatalogEntry>;
  /** Temporary tables currently alive */
  readonly temporaryTables: Set<string>;
}

/**
 * Quote a string literal the way MySQL's escaping does for `\` and `'`
 */
export const quoteStringForTest = (value: string): string =>
  `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;

const DROP_ROUTINE = /^drop\s+(procedure|function)\s+if\s+exists\s+(\w+)$/i;
const CALL_ROUTINE = /^call\s+(\w+)\(\)$/i;
const DROP_TEMPORARY_TABLE = /^drop\s+temporary\s+table\s+`(\w+)`$/i;
const DESCRIBE_TABLE = /^describe\s+`(\w+)`$/i;

const queryFailed = (sql: string, message: string) =>
  new QueryFailed({ message, sql, cause: null });

/**
 * Create a fake database
 */
export function makeFakeDatabase(options: FakeDatabaseOptions = {}): FakeDatabase {
  const statements: RecordedStatement[] = [];
  const catalog = new Map((options.routines ?? []).map(entry => [entry.routineName, entry] as const));
  const temporaryTables = new Set<string>();
  const session = { sqlMode: "", characterSet: "", collation: "" };

  const columnsOf = (tableName: string): readonly FakeColumn[] | undefined => {
    const permanent = options.tables?.[tableName];
    if (permanent !== undefined) return permanent;
    if (!temporaryTables.has(tableName)) return undefined;
    return Object.values(options.temporaryTables ?? {}).find(t => t.tableName === tableName)?.columns;
  };

  const parameterRows = (routineName: string): readonly unknown[] => {
    if (!catalog.has(routineName)) return [];
    const parameters = options.parameters?.[routineName] ?? [];
    if (parameters.length === 0) {
      return [
        {
          parameter_name: null,
          data_type: null,
          numeric_precision: null,
          numeric_scale: null,
          character_set_name: null,
          collation_name: null,
          dtd_identifier: null,
        },
      ];
    }
    return parameters.map(parameter => ({
      parameter_name: parameter.name,
      data_type: parameter.dataType,
      numeric_precision: parameter.numericPrecision ?? null,
      numeric_scale: parameter.numericScale ?? null,
      character_set_name: parameter.characterSetName ?? null,
      collation_name: parameter.collationName ?? null,
      dtd_identifier: parameter.dtdIdentifier ?? parameter.dataType,
    }));
  };

  const rows = (sql: string, params: readonly SqlValue[]): readonly unknown[] | string => {
    const describe = DESCRIBE_TABLE.exec(sql.trim());
    if (describe?.[1]) {
      const columns = columnsOf(describe[1]);
      if (columns === undefined) return `Table '${describe[1]}' doesn't exist`;
      return columns.map(column => ({ Field: column.field, Type: column.type }));
    }
    if (sql.includes("information_schema.PARAMETERS")) {
      return parameterRows(String(params[0]));
    }
    if (sql.includes("information_schema.TABLES")) {
      return options.tables?.[String(params[0])] === undefined ? [] : [{ 1: 1 }];
    }
    if (sql.includes("information_schema.ROUTINES")) {
      return [...catalog.values()]
        .sort((a, b) => (a.routineName < b.routineName ? -1 : 1))
        .map(entry => ({
          routine_name: entry.routineName,
          routine_type: entry.routineType,
          sql_mode: entry.sqlMode,
          character_set_client: entry.characterSetClient,
          collation_connection: entry.collationConnection,
        }));
    }
    if (sql.includes("information_schema.COLUMNS")) {
      return (options.schemaColumns ?? []).map(column => ({
        table_name: column.tableName,
        column_name: column.columnName,
        column_type: column.columnType,
        character_set_name: column.characterSetName ?? null,
      }));
    }
    return `Unexpected query: ${sql.trim()}`;
  };

  const execute = (sql: string, params: readonly SqlValue[]): string | undefined => {
    const statement = sql.trim();

    if (statement === "set sql_mode = ?") {
      session.sqlMode = String(params[0]);
      return undefined;
    }
    if (statement === "set names ? collate ?") {
      session.characterSet = String(params[0]);
      session.collation = String(params[1]);
      return undefined;
    }

    const drop = DROP_ROUTINE.exec(statement);
    if (drop?.[2]) {
      catalog.delete(drop[2]);
      return undefined;
    }

    const call = CALL_ROUTINE.exec(statement);
    if (call?.[1]) {
      const created = options.temporaryTables?.[call[1]];
      if (created !== undefined) temporaryTables.add(created.tableName);
      return undefined;
    }

    const dropTemporary = DROP_TEMPORARY_TABLE.exec(statement);
    if (dropTemporary?.[1]) {
      if (!temporaryTables.delete(dropTemporary[1])) {
        return `Unknown table '${dropTemporary[1]}'`;
      }
      return undefined;
    }

    const header = ROUTINE_HEADER.exec(statement);
    if (header?.[1] && header[2]) {
      if (catalog.has(header[2])) {
        return `${header[1].toUpperCase()} ${header[2]} already exists`;
      }
      catalog.set(header[2], {
        routineName: header[2],
        routineType: header[1].toLowerCase() === "function" ? "function" : "procedure",
        sqlMode: session.sqlMode,
        characterSetClient: session.characterSet,
        collationConnection: session.collation,
      });
    }
    return undefined;
  };

  const run = <A>(
    sql: string,
    params: readonly SqlValue[] | undefined,
    f: (params: readonly SqlValue[]) => A | string,
  ): Effect.Effect<A, DatabaseError> =>
    Effect.suspend(() => {
      const bound = params ?? [];
      statements.push({ sql, params: bound });
      const injected = options.failOn?.(sql);
      if (injected !== undefined) return Effect.fail(injected);
      const result = f(bound);
      return typeof result === "string" ? Effect.fail(queryFailed(sql, result)) : Effect.succeed(result);
    });

  const dataLayer: DataLayer = {
    executeNone: (sql, params) =>
      run<true>(sql, params, bound => execute(sql, bound) ?? true).pipe(Effect.asVoid),
    executeRows: (sql, params) => run<readonly unknown[]>(sql, params, bound => rows(sql, bound)),
    quoteString: quoteStringForTest,
  };

  return {
    layer: Layer.succeed(DataLayerService, dataLayer),
    dataLayer,
    statements,
    catalog,
    temporaryTables,
  };
}
