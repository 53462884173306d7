/**
 * Routine Source - immutable view of one pseudo-SQL source file
 */
import { basename } from "node:path";

export interface RoutineSource {
  /** Path of the source file as discovered */
  readonly path: string;
  /** Extension stripped from the file name to get the routine name (e.g. ".psql") */
  readonly extension: string;
  /** File name minus extension */
  readonly routineName: string;
  readonly text: string;
  /** `text` split on "\n" */
  readonly lines: readonly string[];
  /** Modification time in ms since epoch */
  readonly mtime: number;
}

/**
 * Routine name implied by a source path: its base name minus the extension.
 */
export function routineNameFromPath(path: string, extension: string): string {
  return basename(path, extension);
}

export function makeRoutineSource(input: {
  readonly path: string;
  readonly extension: string;
  readonly text: string;
  readonly mtime: number;
}): RoutineSource {
  return {
    ...input,
    routineName: routineNameFromPath(input.path, input.extension),
    lines: input.text.split("\n"),
  };
}
