/**
 * Routine Executor
 *
 * Substitutes placeholders and magic constants into a routine's source and
 * (re)creates the routine in the database:
 *
 * 1. drop the existing routine, if the catalog has one
 * 2. set sql_mode
 * 3. set names / collate
 * 4. run the create statement
 */
import { Effect } from "effect";
import { dirname } from "node:path";
import type { DatabaseError } from "../errors.js";
import type { RoutineCatalogEntry, SessionSettings } from "../ir/routine-metadata.js";
import type { RoutineSource } from "../ir/routine-source.js";
import type { RoutineHeader } from "./annotation-scanner.js";
import { DataLayerService } from "./data-layer.js";

/**
 * Constants available in every routine body. They are bound while the create
 * statement is built and never recorded in metadata.
 */
export const MAGIC_CONSTANTS = ["__FILE__", "__ROUTINE__", "__DIR__", "__LINE__"] as const;
export type MagicConstant = (typeof MAGIC_CONSTANTS)[number];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Build a single-pass replacer: at each position the longest matching key wins
 * and replaced text is never scanned again.
 */
export function makeReplacer(
  keys: readonly string[],
): (text: string, lookup: (key: string) => string | undefined) => string {
  const sorted = keys.filter(key => key !== "").sort((a, b) => b.length - a.length);
  if (sorted.length === 0) return text => text;
  const pattern = new RegExp(sorted.map(escapeRegExp).join("|"), "g");
  return (text, lookup) => text.replace(pattern, match => lookup(match) ?? match);
}

/**
 * Replace every key of `pairs` found in `text`
 */
export function substitute(text: string, pairs: Readonly<Record<string, string>>): string {
  return makeReplacer(Object.keys(pairs))(text, key => pairs[key]);
}

export interface ExecuteRoutineInput {
  readonly source: RoutineSource;
  readonly header: RoutineHeader;
  /** Placeholders found in the source and their values */
  readonly placeholders: Readonly<Record<string, string>>;
  /** The routine as currently stored in the database, if it exists */
  readonly catalogEntry: RoutineCatalogEntry | undefined;
  readonly session: SessionSettings;
  /** Canonical absolute path of the source file */
  readonly realPath: string;
}

/**
 * Build the create statement: the source with placeholders and magic constants
 * replaced, `__LINE__` bound to each line's 1-based number.
 */
export const buildRoutineBody = (
  input: Pick<ExecuteRoutineInput, "source" | "header" | "placeholders" | "realPath">,
  quoteString: (value: string) => string,
): string => {
  const constants: Readonly<Record<Exclude<MagicConstant, "__LINE__">, string>> = {
    __FILE__: quoteString(input.realPath),
    __ROUTINE__: `'${input.header.routineName}'`,
    __DIR__: quoteString(dirname(input.realPath)),
  };
  const table: Readonly<Record<string, string>> = { ...input.placeholders, ...constants };
  const replace = makeReplacer([...Object.keys(table), "__LINE__"]);

  return input.source.lines
    .map((line, index) => replace(line, key => (key === "__LINE__" ? String(index + 1) : table[key])))
    .join("\n");
};

/**
 * Drop (if present) and create the routine. Returns the executed create statement.
 */
export const executeRoutine = (
  input: ExecuteRoutineInput,
): Effect.Effect<string, DatabaseError, DataLayerService> =>
  Effect.gen(function* () {
    const db = yield* DataLayerService;
    const { header, catalogEntry, session } = input;

    yield* Effect.log(`Loading ${header.routineType} ${header.routineName}`);

    const body = buildRoutineBody(input, db.quoteString);

    if (catalogEntry !== undefined) {
      yield* db.executeNone(`drop ${catalogEntry.routineType} if exists ${header.routineName}`);
    }

    yield* db.executeNone("set sql_mode = ?", [session.sqlMode]);
    yield* db.executeNone("set names ? collate ?", [session.characterSet, session.collation]);

    yield* db.executeNone(body);

    return body;
  });
