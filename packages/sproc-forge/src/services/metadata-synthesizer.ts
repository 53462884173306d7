/**
 * Assemble the BuildMetadata of a successfully loaded routine
 */
import {
  designationColumns,
  type BuildMetadata,
  type ExtendedParameter,
} from "../ir/routine-metadata.js";
import type { RoutineSource } from "../ir/routine-source.js";
import type { RoutineAnnotations } from "./annotation-scanner.js";
import type { CatalogReconciliation } from "./catalog-reconciler.js";
import type { ReconciledDocumentation } from "./doc-reconciler.js";

const sortedByKey = <V>(record: Readonly<Record<string, V>>): Record<string, V> =>
  Object.fromEntries(Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));

export function synthesizeMetadata(input: {
  readonly source: RoutineSource;
  readonly annotations: RoutineAnnotations;
  readonly catalog: CatalogReconciliation;
  readonly documentation: ReconciledDocumentation;
}): BuildMetadata {
  const { source, annotations, catalog, documentation } = input;
  const { designation } = annotations;

  const extendedParameters: Record<string, ExtendedParameter> = {};
  for (const parameter of annotations.extendedParameters) {
    extendedParameters[parameter.name] = parameter;
  }

  return {
    routineName: annotations.header.routineName,
    routineType: annotations.header.routineType,
    designation,
    tableName: designation._tag === "bulk_insert" ? designation.tableName : null,
    parameters: catalog.parameters,
    columns: designationColumns(designation),
    fields: catalog.bulkInsert?.fields ?? [],
    columnTypes: catalog.bulkInsert?.columnTypes ?? [],
    timestamp: source.mtime,
    replace: sortedByKey(annotations.placeholders),
    docBlock: documentation.docBlock,
    extendedParameters,
  };
}
