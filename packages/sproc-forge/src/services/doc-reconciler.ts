/**
 * Documentation Reconciler
 *
 * Pairs the routine's parameters with their `@param` documentation and
 * reports (without failing) parameters that are documented but unknown or
 * known but undocumented.
 */
import { Effect } from "effect";
import type { UnsupportedColumnType } from "../errors.js";
import type { RoutineDocBlock, RoutineParameter } from "../ir/routine-metadata.js";
import type { RoutineSource } from "../ir/routine-source.js";
import { paramDocs, parseDocBlock, type DocBlock } from "./doc-block.js";
import { toSemanticType } from "./type-mapper.js";

export interface ReconciledDocumentation {
  readonly docBlock: RoutineDocBlock;
  readonly warnings: readonly string[];
}

/**
 * Parse the doc comment written above the create header
 */
export function sourceDocBlock(source: RoutineSource, headerLine: number): DocBlock {
  return parseDocBlock(source.lines.slice(0, headerLine).join("\n"));
}

/**
 * Warnings for parameters missing from, or unknown to, the doc block
 */
export function parameterListWarnings(
  databaseNames: readonly string[],
  documentedNames: readonly string[],
): string[] {
  const missing = databaseNames
    .filter(name => !documentedNames.includes(name))
    .map(name => `Parameter '${name}' is missing from doc block`);
  const unknown = documentedNames
    .filter(name => !databaseNames.includes(name))
    .map(name => `Unknown parameter '${name}' found in doc block`);
  return [...missing, ...unknown];
}

export const reconcileDocumentation = (
  docBlock: DocBlock,
  parameters: readonly RoutineParameter[],
  file: string,
): Effect.Effect<ReconciledDocumentation, UnsupportedColumnType> =>
  Effect.gen(function* () {
    const docs = paramDocs(docBlock);

    const documented = yield* Effect.forEach(parameters, parameter =>
      toSemanticType(parameter, file).pipe(
        Effect.map(semanticType => ({
          name: parameter.name,
          semanticType,
          dataTypeDescriptor: parameter.dataTypeDescriptor,
          description: docs.find(doc => doc.name === parameter.name)?.description ?? null,
        })),
      ),
    );

    return {
      docBlock: {
        shortDescription: docBlock.shortDescription,
        longDescription: docBlock.longDescription,
        parameters: documented,
      },
      warnings: parameterListWarnings(
        parameters.map(p => p.name),
        docs.map(doc => doc.name),
      ),
    };
  });
