/**
 * Annotation Scanner
 *
 * Line-oriented parser for the comment DSL of routine sources:
 *
 * ```sql
 * /**
 *  * Selects users by key.
 *  *
 *  * @param p_ids The IDs of the users.
 *  *\/
 * create procedure usr_get_users(in p_ids text)
 * reads sql data
 * -- type: rows_with_key usr_id
 * -- param: p_ids list_of_int , " \
 * begin
 *   select ... where usr_id in (select ... from @PREFIX@usr ...);
 * end
 * ```
 *
 * Everything here is pure; failures carry the source file.
 */
import { Effect } from "effect";
import {
  DesignationNotFound,
  DesignationSyntax,
  DuplicateParameter,
  ParamSyntax,
  RoutineHeaderNotFound,
  RoutineNameMismatch,
  UnknownPlaceholder,
} from "../errors.js";
import type {
  Designation,
  ExtendedParameter,
  ReplacePairs,
  RoutineType,
} from "../ir/routine-metadata.js";
import type { RoutineSource } from "../ir/routine-source.js";

// ============================================================================
// Placeholders
// ============================================================================

const PLACEHOLDER_PATTERN = /@[A-Za-z0-9_.]+(?:%type)?@/g;

/**
 * Find the placeholders in a source and resolve them against the replace pairs
 * (looked up by uppercased placeholder).
 *
 * @returns placeholder (as written) → value, sorted by placeholder
 */
export function scanPlaceholders(
  source: RoutineSource,
  replacePairs: ReplacePairs,
): Effect.Effect<Readonly<Record<string, string>>, UnknownPlaceholder> {
  const found = [...new Set(source.text.match(PLACEHOLDER_PATTERN) ?? [])].sort();
  const unknown = found.filter(placeholder => !replacePairs.has(placeholder.toUpperCase()));

  if (unknown.length > 0) {
    return Effect.fail(
      new UnknownPlaceholder({
        message: `Unknown placeholder${unknown.length > 1 ? "s" : ""} ${unknown.map(p => `'${p}'`).join(", ")} in file '${source.path}'`,
        file: source.path,
        placeholders: unknown,
      }),
    );
  }

  const replace: Record<string, string> = {};
  for (const placeholder of found) {
    replace[placeholder] = replacePairs.get(placeholder.toUpperCase()) ?? "";
  }
  return Effect.succeed(replace);
}

// ============================================================================
// Designation
// ============================================================================

/**
 * Designation found in a source, with its (0-based) line
 */
export interface ScannedDesignation {
  readonly designation: Designation;
  readonly line: number;
}

const DESIGNATION_LINE = /^\s*--\s+type:\s*(\w+)\s*(.+)?\s*$/;
const IDENTIFIER_LIST = /^[a-zA-Z0-9_]+(?:,[a-zA-Z0-9_]+)*$/;
const BULK_INSERT_ARGS = /^([a-zA-Z0-9_]+)\s+([a-zA-Z0-9_]+(?:,[a-zA-Z0-9_]+)*)$/;

/**
 * Index of the first line that is exactly `begin`, or -1
 */
export function findBeginLine(source: RoutineSource): number {
  return source.lines.indexOf("begin");
}

/**
 * Parse the arguments of a designation comment into a Designation.
 * Returns a reason string when the arguments do not fit the type.
 */
export function parseDesignation(type: string, args: string | undefined): Designation | string {
  switch (type) {
    case "bulk_insert": {
      const match = args === undefined ? null : BULK_INSERT_ARGS.exec(args);
      if (!match?.[1] || !match[2]) {
        return "Expected: -- type: bulk_insert <table_name> <columns>";
      }
      return { _tag: "bulk_insert", tableName: match[1], columns: match[2].split(",") };
    }

    case "rows_with_key":
    case "rows_with_index": {
      if (args === undefined || !IDENTIFIER_LIST.test(args)) {
        return `Expected: -- type: ${type} <columns>`;
      }
      const columns = args.split(",");
      return type === "rows_with_key"
        ? { _tag: "rows_with_key", columns }
        : { _tag: "rows_with_index", columns };
    }

    default:
      if (args !== undefined) {
        return `Designation type '${type}' does not take arguments`;
      }
      return { _tag: "simple", type };
  }
}

/**
 * Extract the designation from the comment lines above `begin`.
 */
export function scanDesignation(
  source: RoutineSource,
): Effect.Effect<ScannedDesignation, DesignationNotFound | DesignationSyntax> {
  const notFound = new DesignationNotFound({
    message: `Unable to find the designation type of the stored routine in file '${source.path}'`,
    file: source.path,
  });

  const begin = findBeginLine(source);
  if (begin === -1) {
    return Effect.fail(notFound);
  }

  const candidates: { readonly line: number; readonly type: string; readonly args: string | undefined }[] = [];
  for (let line = begin - 1; line >= 0; line--) {
    const match = DESIGNATION_LINE.exec(source.lines[line] ?? "");
    if (match?.[1]) {
      candidates.push({ line, type: match[1], args: match[2]?.trim() || undefined });
    }
  }

  const [nearest, ...others] = candidates;
  if (!nearest) {
    return Effect.fail(notFound);
  }
  if (others.length > 0) {
    return Effect.fail(
      new DesignationSyntax({
        message: `Found ${candidates.length} designation types, expected one, in file '${source.path}'`,
        file: source.path,
        line: nearest.line + 1,
      }),
    );
  }

  const designation = parseDesignation(nearest.type, nearest.args);
  if (typeof designation === "string") {
    return Effect.fail(
      new DesignationSyntax({
        message: `${designation} in file '${source.path}'`,
        file: source.path,
        line: nearest.line + 1,
      }),
    );
  }

  return Effect.succeed({ designation, line: nearest.line });
}

// ============================================================================
// Extended parameters
// ============================================================================

const PARAM_LINE = /^\s*--\s+param:(.*)$/;
const PARAM_ARGS = /^(\w+)\s+(\w+)(?:\s+([^\s-])\s+([^\s-])\s+([^\s-]))?$/;

export const DEFAULT_LIST_DELIMITER = ",";
export const DEFAULT_LIST_ENCLOSURE = '"';
export const DEFAULT_LIST_ESCAPE = "\\";

/**
 * Parse one `-- param:` comment.
 *
 * @returns undefined when the line is not a param comment or declares nothing,
 *   null when it is malformed
 */
export function parseParamLine(line: string): ExtendedParameter | undefined | null {
  const comment = PARAM_LINE.exec(line);
  if (!comment) return undefined;

  const rest = (comment[1] ?? "").trim();
  if (rest === "") return undefined;

  const match = PARAM_ARGS.exec(rest);
  if (!match?.[1] || !match[2]) return null;

  return {
    name: match[1],
    dataType: match[2],
    delimiter: match[3] ?? DEFAULT_LIST_DELIMITER,
    enclosure: match[4] ?? DEFAULT_LIST_ENCLOSURE,
    escape: match[5] ?? DEFAULT_LIST_ESCAPE,
  };
}

/**
 * Collect the `-- param:` declarations between the designation comment and `begin`.
 */
export function scanExtendedParameters(
  source: RoutineSource,
  designationLine: number,
): Effect.Effect<readonly ExtendedParameter[], ParamSyntax | DuplicateParameter> {
  const begin = findBeginLine(source);
  const parameters: ExtendedParameter[] = [];

  for (let line = designationLine + 1; line < begin; line++) {
    const parameter = parseParamLine(source.lines[line] ?? "");
    if (parameter === undefined) continue;

    if (parameter === null) {
      return Effect.fail(
        new ParamSyntax({
          message: `Expected: -- param: <field_name> <type_of_list> [delimiter enclosure escape] in file '${source.path}'`,
          file: source.path,
          line: line + 1,
        }),
      );
    }

    if (parameters.some(p => p.name === parameter.name)) {
      return Effect.fail(
        new DuplicateParameter({
          message: `Duplicate parameter '${parameter.name}' in file '${source.path}'`,
          file: source.path,
          parameter: parameter.name,
        }),
      );
    }

    parameters.push(parameter);
  }

  return Effect.succeed(parameters);
}

// ============================================================================
// Routine header
// ============================================================================

export const ROUTINE_HEADER = /create\s+(procedure|function)\s+([a-zA-Z0-9_]+)/i;

export interface RoutineHeader {
  readonly routineType: RoutineType;
  readonly routineName: string;
  /** 0-based line of the header */
  readonly line: number;
}

/**
 * Find the `create procedure|function <name>` header and check the name
 * against the file name.
 */
export function scanRoutineHeader(
  source: RoutineSource,
): Effect.Effect<RoutineHeader, RoutineHeaderNotFound | RoutineNameMismatch> {
  for (const [line, text] of source.lines.entries()) {
    const match = ROUTINE_HEADER.exec(text);
    if (!match?.[1] || !match[2]) continue;

    if (match[2] !== source.routineName) {
      return Effect.fail(
        new RoutineNameMismatch({
          message: `Stored routine name '${match[2]}' does not match filename in file '${source.path}'`,
          file: source.path,
          expected: source.routineName,
          found: match[2],
        }),
      );
    }

    return Effect.succeed({
      routineType: match[1].toLowerCase() === "function" ? "function" : "procedure",
      routineName: match[2],
      line,
    });
  }

  return Effect.fail(
    new RoutineHeaderNotFound({
      message: `Unable to find the stored routine name and type in file '${source.path}'`,
      file: source.path,
    }),
  );
}

// ============================================================================
// All annotations
// ============================================================================

export interface RoutineAnnotations {
  readonly placeholders: Readonly<Record<string, string>>;
  readonly designation: Designation;
  readonly extendedParameters: readonly ExtendedParameter[];
  readonly header: RoutineHeader;
}

/**
 * Run every scanner over a source. Stops at the first failure.
 */
export const scanAnnotations = (source: RoutineSource, replacePairs: ReplacePairs) =>
  Effect.gen(function* () {
    const placeholders = yield* scanPlaceholders(source, replacePairs);
    const { designation, line } = yield* scanDesignation(source);
    const extendedParameters = yield* scanExtendedParameters(source, line);
    const header = yield* scanRoutineHeader(source);
    const annotations: RoutineAnnotations = { placeholders, designation, extendedParameters, header };
    return annotations;
  });
