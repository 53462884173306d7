/**
 * Catalog Reconciler
 *
 * Reads back what MySQL knows about a freshly loaded routine (its parameters,
 * and for bulk insert routines the columns of the target table) and merges
 * the `-- param:` declarations into it.
 */
import { Cause, Effect, Exit, Option, Schema as S } from "effect";
import {
  ColumnCountMismatch,
  UnknownSpecificParameter,
  type DatabaseError,
  type WrongRowCount,
} from "../errors.js";
import type {
  BulkInsertDesignation,
  Designation,
  ExtendedParameter,
  RoutineParameter,
} from "../ir/routine-metadata.js";
import {
  DataLayerService,
  executeNone,
  executeSingleton0,
  queryRows,
} from "./data-layer.js";

// information_schema returns some numeric columns as strings
const NumberLike = S.Union(S.Number, S.NumberFromString);

/**
 * A row of the routine parameters query
 */
export const ParameterRow = S.Struct({
  parameter_name: S.NullOr(S.String),
  data_type: S.NullOr(S.String),
  numeric_precision: S.NullOr(NumberLike),
  numeric_scale: S.NullOr(NumberLike),
  character_set_name: S.NullOr(S.String),
  collation_name: S.NullOr(S.String),
  dtd_identifier: S.NullOr(S.String),
});
export type ParameterRow = S.Schema.Type<typeof ParameterRow>;

/**
 * A row of `describe <table>`
 */
export const DescribeRow = S.Struct({
  Field: S.String,
  Type: S.String,
});

// A routine without parameters yields one row with a null parameter name
export const ROUTINE_PARAMETERS_SQL = `
select t2.parameter_name     as parameter_name
,      t2.data_type          as data_type
,      t2.numeric_precision  as numeric_precision
,      t2.numeric_scale      as numeric_scale
,      t2.character_set_name as character_set_name
,      t2.collation_name     as collation_name
,      t2.dtd_identifier     as dtd_identifier
from            information_schema.ROUTINES   t1
left outer join information_schema.PARAMETERS t2  on  t2.specific_schema = t1.routine_schema
                                                  and t2.specific_name   = t1.routine_name
                                                  and t2.parameter_mode  is not null
where t1.routine_schema = database()
and   t1.routine_name   = ?
order by t2.ordinal_position`;

export const TABLE_EXISTS_SQL = `
select 1
from   information_schema.TABLES
where  table_schema = database()
and    table_name   = ?`;

/**
 * Type descriptor of a parameter: its dtd identifier plus character set and collation
 */
export function dataTypeDescriptor(row: ParameterRow): string {
  let descriptor = row.dtd_identifier ?? row.data_type ?? "";
  if (row.character_set_name !== null) descriptor += ` character set ${row.character_set_name}`;
  if (row.collation_name !== null) descriptor += ` collation ${row.collation_name}`;
  return descriptor;
}

/**
 * The parameters of a routine, in declaration order
 */
export const fetchRoutineParameters = (
  routineName: string,
): Effect.Effect<readonly RoutineParameter[], DatabaseError, DataLayerService> =>
  queryRows(ParameterRow, ROUTINE_PARAMETERS_SQL, [routineName]).pipe(
    Effect.map(rows =>
      rows.flatMap(row =>
        row.parameter_name === null
          ? []
          : [
              {
                name: row.parameter_name,
                dataType: row.data_type ?? "",
                numericPrecision: row.numeric_precision,
                numericScale: row.numeric_scale,
                characterSetName: row.character_set_name,
                collationName: row.collation_name,
                dtdIdentifier: row.dtd_identifier ?? "",
                dataTypeDescriptor: dataTypeDescriptor(row),
              },
            ],
      ),
    ),
  );

export interface BulkInsertColumns {
  /** Column names of the table */
  readonly fields: readonly string[];
  /** Base type (leading word of the column type) of each column */
  readonly columnTypes: readonly string[];
}

/**
 * Columns of the table a bulk insert routine targets.
 *
 * A table unknown to information_schema is a temporary table created by the
 * routine itself: the routine is called once to create it and the table is
 * dropped again after `describe`, whether or not `describe` succeeded.
 */
export const fetchBulkInsertColumns = (
  file: string,
  routineName: string,
  designation: BulkInsertDesignation,
): Effect.Effect<
  BulkInsertColumns,
  DatabaseError | WrongRowCount | ColumnCountMismatch,
  DataLayerService
> =>
  Effect.gen(function* () {
    const { tableName } = designation;
    const permanent = Option.isSome(yield* executeSingleton0(TABLE_EXISTS_SQL, [tableName]));
    const describe = queryRows(DescribeRow, `describe \`${tableName}\``);

    let rows: readonly S.Schema.Type<typeof DescribeRow>[];
    if (permanent) {
      rows = yield* describe;
    } else {
      yield* Effect.logDebug(`Creating temporary table ${tableName} by calling ${routineName}`);
      yield* executeNone(`call ${routineName}()`);
      const described = yield* Effect.exit(describe);
      const describeFailure = Exit.isFailure(described)
        ? Cause.failureOption(described.cause)
        : Option.none();
      yield* executeNone(`drop temporary table \`${tableName}\``).pipe(
        Effect.tapError(() =>
          Option.match(describeFailure, {
            onNone: () => Effect.void,
            onSome: error => Effect.logWarning(`Unable to describe table '${tableName}': ${error.message}`),
          }),
        ),
      );
      rows = yield* described;
    }

    if (rows.length !== designation.columns.length) {
      return yield* Effect.fail(
        new ColumnCountMismatch({
          message: `Number of fields ${designation.columns.length} and number of columns ${rows.length} of table '${tableName}' don't match in file '${file}'`,
          file,
          tableName,
          fields: designation.columns.length,
          columns: rows.length,
        }),
      );
    }

    return {
      fields: rows.map(row => row.Field),
      columnTypes: rows.map(row => /\w+/.exec(row.Type)?.[0] ?? row.Type),
    };
  });

/**
 * Merge `-- param:` declarations into the catalog parameters of the same name.
 * The declared list type replaces the catalog data type.
 */
export function mergeExtendedParameters(
  file: string,
  parameters: readonly RoutineParameter[],
  extended: readonly ExtendedParameter[],
): Effect.Effect<readonly RoutineParameter[], UnknownSpecificParameter> {
  const unknown = extended.find(spec => !parameters.some(p => p.name === spec.name));
  if (unknown !== undefined) {
    return Effect.fail(
      new UnknownSpecificParameter({
        message: `Specific parameter '${unknown.name}' does not exist in file '${file}'`,
        file,
        parameter: unknown.name,
      }),
    );
  }

  return Effect.succeed(
    parameters.map(parameter => {
      const spec = extended.find(s => s.name === parameter.name);
      return spec === undefined
        ? parameter
        : {
            ...parameter,
            dataType: spec.dataType,
            delimiter: spec.delimiter,
            enclosure: spec.enclosure,
            escape: spec.escape,
          };
    }),
  );
}

export interface CatalogReconciliation {
  readonly parameters: readonly RoutineParameter[];
  readonly bulkInsert: BulkInsertColumns | undefined;
}

/**
 * Everything the catalog contributes to a routine's metadata
 */
export const reconcileCatalog = (input: {
  readonly file: string;
  readonly routineName: string;
  readonly designation: Designation;
  readonly extendedParameters: readonly ExtendedParameter[];
}): Effect.Effect<
  CatalogReconciliation,
  DatabaseError | WrongRowCount | ColumnCountMismatch | UnknownSpecificParameter,
  DataLayerService
> =>
  Effect.gen(function* () {
    const { file, routineName, designation } = input;

    const bulkInsert =
      designation._tag === "bulk_insert"
        ? yield* fetchBulkInsertColumns(file, routineName, designation)
        : undefined;

    const catalogParameters = yield* fetchRoutineParameters(routineName);
    const parameters = yield* mergeExtendedParameters(file, catalogParameters, input.extendedParameters);

    return { parameters, bulkInsert };
  });
