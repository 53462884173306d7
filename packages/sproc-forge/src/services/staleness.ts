/**
 * Staleness Detector
 *
 * Decides whether a routine must be (re)loaded. Pure: all inputs are
 * gathered by the caller before compiling.
 */
import type {
  BuildMetadata,
  ReplacePairs,
  RoutineCatalogEntry,
  SessionSettings,
} from "../ir/routine-metadata.js";

export interface StalenessInput {
  /** Metadata of the previous successful build, if any */
  readonly previous: BuildMetadata | undefined;
  /** Current modification time of the source */
  readonly mtime: number;
  readonly replacePairs: ReplacePairs;
  /** The routine as currently stored in the database, if it exists */
  readonly catalogEntry: RoutineCatalogEntry | undefined;
  readonly session: SessionSettings;
}

/**
 * Why a routine must be recompiled. Checked in this order.
 */
export type StaleReason =
  | "new"
  | "modified"
  | "placeholder-changed"
  | "missing-in-database"
  | "session-changed";

/**
 * The first reason the routine is stale, or undefined when it is up to date.
 *
 * Only placeholders recorded by the previous build are compared; a placeholder
 * added to the source also changes the file's modification time.
 */
export function staleReason(input: StalenessInput): StaleReason | undefined {
  const { previous, catalogEntry, session } = input;

  if (previous === undefined) return "new";

  if (previous.timestamp !== input.mtime) return "modified";

  for (const [placeholder, oldValue] of Object.entries(previous.replace)) {
    if (input.replacePairs.get(placeholder.toUpperCase()) !== oldValue) {
      return "placeholder-changed";
    }
  }

  if (catalogEntry === undefined) return "missing-in-database";

  if (
    catalogEntry.sqlMode !== session.sqlMode ||
    catalogEntry.characterSetClient !== session.characterSet ||
    catalogEntry.collationConnection !== session.collation
  ) {
    return "session-changed";
  }

  return undefined;
}

/**
 * True if the routine must be recompiled
 */
export const mustRecompile = (input: StalenessInput): boolean => staleReason(input) !== undefined;
