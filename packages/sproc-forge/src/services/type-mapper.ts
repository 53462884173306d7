/**
 * MySQL Type Mapping
 *
 * Maps catalog base types to the semantic types generated wrappers use.
 * The supported set is closed: an unknown type is an error rather than a
 * guess, since a wrong guess ends up in generated code.
 */
import { Effect } from "effect";
import { UnsupportedColumnType } from "../errors.js";
import type { SemanticType } from "../ir/routine-metadata.js";

/**
 * Synthetic type of extended parameters holding a list of integers
 */
export const LIST_OF_INT = "list_of_int";

const INTEGER_TYPES = ["tinyint", "smallint", "mediumint", "int", "bigint", "year", "bit"];

const FLOAT_TYPES = ["float", "double"];

const TEXT_TYPES = [
  // Binary strings
  "varbinary",
  "binary",
  // Character strings
  "char",
  "varchar",
  // Temporal
  "time",
  "timestamp",
  "date",
  "datetime",
  // Enumerations
  "enum",
  "set",
  // Text
  "tinytext",
  "text",
  "mediumtext",
  "longtext",
  // Blobs
  "tinyblob",
  "blob",
  "mediumblob",
  "longblob",
];

/**
 * Default mapping from base type to semantic type. `decimal` depends on its scale.
 */
const SEMANTIC_TYPES: ReadonlyMap<string, SemanticType> = new Map<string, SemanticType>([
  ...INTEGER_TYPES.map(type => [type, "integer"] as const),
  ...FLOAT_TYPES.map(type => [type, "float"] as const),
  ...TEXT_TYPES.map(type => [type, "text"] as const),
  [LIST_OF_INT, "text-or-integer-list"] as const,
]);

/**
 * Every base type the mapper accepts
 */
export const SUPPORTED_TYPES: readonly string[] = [...SEMANTIC_TYPES.keys(), "decimal"].sort();

/**
 * Map a base type to its semantic type, or undefined if unsupported.
 */
export function semanticTypeOf(
  dataType: string,
  numericScale: number | null = null,
): SemanticType | undefined {
  if (dataType === "decimal") {
    return numericScale === 0 ? "integer" : "float";
  }
  return SEMANTIC_TYPES.get(dataType);
}

/**
 * Map a parameter's base type to its semantic type; fails on unsupported types.
 */
export function toSemanticType(
  parameter: {
    readonly name?: string;
    readonly dataType: string;
    readonly numericScale: number | null;
  },
  file: string,
): Effect.Effect<SemanticType, UnsupportedColumnType> {
  const semanticType = semanticTypeOf(parameter.dataType, parameter.numericScale);
  if (semanticType !== undefined) {
    return Effect.succeed(semanticType);
  }
  const subject =
    parameter.name === undefined
      ? `Unsupported column type '${parameter.dataType}'`
      : `Unsupported column type '${parameter.dataType}' of parameter '${parameter.name}'`;
  return Effect.fail(
    new UnsupportedColumnType({
      message: `${subject} in file '${file}'`,
      file,
      dataType: parameter.dataType,
      parameter: parameter.name,
    }),
  );
}
