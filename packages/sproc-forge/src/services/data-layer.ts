/**
 * Data Layer Service
 *
 * The statements and queries the routine compiler issues against MySQL.
 * One connection is held for the whole run: session settings (`sql_mode`,
 * `set names`) and temporary tables are per connection.
 */
import { Context, Effect, Layer, Option, Schema as S } from "effect";
import mysql from "mysql2/promise";
import type { Connection, ResultSetHeader, RowDataPacket } from "mysql2/promise";
import {
  ConnectionFailed,
  ConnectionLost,
  QueryFailed,
  WrongRowCount,
  type DatabaseError,
} from "../errors.js";

/**
 * Values bound to `?` markers
 */
export type SqlValue = string | number | null;

/**
 * Data layer service interface
 */
export interface DataLayer {
  /**
   * Execute a statement, discarding any result
   */
  readonly executeNone: (
    sql: string,
    params?: readonly SqlValue[],
  ) => Effect.Effect<void, DatabaseError>;

  /**
   * Execute a query and return its raw rows
   */
  readonly executeRows: (
    sql: string,
    params?: readonly SqlValue[],
  ) => Effect.Effect<readonly unknown[], DatabaseError>;

  /**
   * Quote and escape a string literal for inclusion in SQL text
   */
  readonly quoteString: (value: string) => string;
}

/**
 * Service tag for dependency injection
 */
export class DataLayerService extends Context.Tag("DataLayer")<DataLayerService, DataLayer>() {}

/**
 * Connection settings for the live data layer
 */
export interface ConnectionOptions {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
}

// mysql2 / node socket codes meaning the connection itself is gone
const LOST_CONNECTION_CODES = new Set([
  "PROTOCOL_CONNECTION_LOST",
  "ECONNRESET",
  "EPIPE",
  "ETIMEDOUT",
]);

function errorCode(error: unknown): string | undefined {
  return typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const toDatabaseError =
  (sql: string) =>
  (error: unknown): DatabaseError => {
    const code = errorCode(error);
    if (code !== undefined && LOST_CONNECTION_CODES.has(code)) {
      return new ConnectionLost({
        message: `Lost connection to database: ${errorMessage(error)}`,
        sql,
        cause: error,
      });
    }
    return new QueryFailed({
      message: errorMessage(error),
      sql,
      cause: error,
    });
  };

/**
 * Create a DataLayer backed by a single mysql2 connection
 */
export function createMySqlDataLayer(connection: Connection): DataLayer {
  // Values are only bound when given: routine bodies may contain literal `?`
  const run = <T extends RowDataPacket[] | ResultSetHeader>(sql: string, params?: readonly SqlValue[]) =>
    Effect.tryPromise({
      try: () =>
        params && params.length > 0
          ? connection.query<T>(sql, [...params])
          : connection.query<T>(sql),
      catch: toDatabaseError(sql),
    });

  return {
    executeNone: (sql, params) => run<ResultSetHeader>(sql, params).pipe(Effect.asVoid),

    executeRows: (sql, params) =>
      run<RowDataPacket[]>(sql, params).pipe(Effect.map(([rows]) => rows)),

    quoteString: value => connection.escape(value),
  };
}

/**
 * Live layer: opens one connection for the lifetime of the scope
 */
export const MySqlDataLayerLive = (
  options: ConnectionOptions,
): Layer.Layer<DataLayerService, ConnectionFailed> =>
  Layer.scoped(
    DataLayerService,
    Effect.gen(function* () {
      const connection = yield* Effect.acquireRelease(
        Effect.tryPromise({
          try: () =>
            mysql.createConnection({
              host: options.host,
              port: options.port,
              user: options.user,
              password: options.password,
              database: options.database,
            }),
          catch: error =>
            new ConnectionFailed({
              message: `Failed to connect to database '${options.database}': ${errorMessage(error)}`,
              host: options.host,
              cause: error,
            }),
        }),
        connection => Effect.promise(() => connection.end().catch(() => connection.destroy())),
      );

      yield* Effect.logDebug(`Connected to ${options.host}:${options.port}/${options.database}`);

      return createMySqlDataLayer(connection);
    }),
  );

// ============================================================================
// Query helpers
// ============================================================================

/**
 * Execute a statement through the DataLayer service
 */
export const executeNone = (
  sql: string,
  params?: readonly SqlValue[],
): Effect.Effect<void, DatabaseError, DataLayerService> =>
  Effect.flatMap(DataLayerService, db => db.executeNone(sql, params));

/**
 * Execute a query and decode every row with `schema`.
 * A row of unexpected shape fails as QueryFailed.
 */
export const queryRows = <A, I>(
  schema: S.Schema<A, I>,
  sql: string,
  params?: readonly SqlValue[],
): Effect.Effect<readonly A[], DatabaseError, DataLayerService> =>
  Effect.gen(function* () {
    const db = yield* DataLayerService;
    const rows = yield* db.executeRows(sql, params);
    return yield* S.decodeUnknown(S.Array(schema))(rows).pipe(
      Effect.mapError(
        error =>
          new QueryFailed({
            message: `Unexpected row shape: ${error.message}`,
            sql,
            cause: error,
          }),
      ),
    );
  });

/**
 * Compose the message of a WrongRowCount error
 */
export function wrongRowCountMessage(
  expected: readonly number[],
  actual: number,
  sql: string,
): string {
  const query = sql.trim();
  return [
    "Wrong number of rows selected.",
    `Expected number of rows: ${expected.join(", ")}.`,
    `Actual number of rows: ${actual}.`,
    `Query:${query.includes("\n") ? "\n" : " "}${query}`,
  ].join("\n");
}

const firstColumn = (row: unknown): unknown =>
  typeof row === "object" && row !== null ? Object.values(row)[0] : undefined;

const checkRowCount = (
  rows: readonly unknown[],
  expected: readonly number[],
  sql: string,
): Effect.Effect<readonly unknown[], WrongRowCount> =>
  expected.includes(rows.length)
    ? Effect.succeed(rows)
    : Effect.fail(
        new WrongRowCount({
          message: wrongRowCountMessage(expected, rows.length, sql),
          expected,
          actual: rows.length,
          sql,
        }),
      );

/**
 * Execute a query selecting 0 or 1 rows; returns the first column of the row, if any
 */
export const executeSingleton0 = (
  sql: string,
  params?: readonly SqlValue[],
): Effect.Effect<Option.Option<unknown>, DatabaseError | WrongRowCount, DataLayerService> =>
  Effect.gen(function* () {
    const db = yield* DataLayerService;
    const rows = yield* db.executeRows(sql, params).pipe(
      Effect.flatMap(rows => checkRowCount(rows, [0, 1], sql)),
    );
    return rows.length === 0 ? Option.none() : Option.some(firstColumn(rows[0]));
  });

/**
 * Execute a query selecting exactly 1 row; returns its first column
 */
export const executeSingleton1 = (
  sql: string,
  params?: readonly SqlValue[],
): Effect.Effect<unknown, DatabaseError | WrongRowCount, DataLayerService> =>
  Effect.gen(function* () {
    const db = yield* DataLayerService;
    const rows = yield* db.executeRows(sql, params).pipe(
      Effect.flatMap(rows => checkRowCount(rows, [1], sql)),
    );
    return firstColumn(rows[0]);
  });
