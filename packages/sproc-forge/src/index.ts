/**
 * sproc-forge - MySQL stored routine compiler
 *
 * Main entry point
 */

// Config
export { Config, DatabaseConfig, type ResolvedConfig, type ConfigInput } from "./config.js";

// Config Loader Service
export {
  type ConfigLoader,
  createConfigLoader,
  defineConfig,
  CONFIG_FILE_NAMES,
} from "./services/config-loader.js";

// Config Service (Effect DI)
export {
  ConfigService,
  ConfigFromFile,
  ConfigTest,
  getConfigSearchPaths,
} from "./services/config.js";

// Errors
export * from "./errors.js";

// Metadata
export {
  RoutineType,
  Designation,
  ExtendedParameter,
  RoutineParameter,
  SemanticType,
  DocumentedParameter,
  RoutineDocBlock,
  BuildMetadata,
  MetadataFile,
  designationColumns,
  type RoutineCatalogEntry,
  type SessionSettings,
  type ReplacePairs,
} from "./ir/routine-metadata.js";
export { type RoutineSource, makeRoutineSource, routineNameFromPath } from "./ir/routine-source.js";

// Data layer
export {
  type DataLayer,
  type SqlValue,
  type ConnectionOptions,
  DataLayerService,
  MySqlDataLayerLive,
  createMySqlDataLayer,
  executeNone,
  executeSingleton0,
  executeSingleton1,
  queryRows,
} from "./services/data-layer.js";

// Stages
export {
  type RoutineAnnotations,
  type RoutineHeader,
  scanAnnotations,
  scanPlaceholders,
  scanDesignation,
  scanExtendedParameters,
  scanRoutineHeader,
} from "./services/annotation-scanner.js";
export { type StaleReason, type StalenessInput, staleReason, mustRecompile } from "./services/staleness.js";
export { semanticTypeOf, toSemanticType, SUPPORTED_TYPES, LIST_OF_INT } from "./services/type-mapper.js";
export { type DocBlock, type DocTag, parseDocBlock, paramDocs } from "./services/doc-block.js";
export { reconcileDocumentation, sourceDocBlock } from "./services/doc-reconciler.js";
export { reconcileCatalog, fetchRoutineParameters, fetchBulkInsertColumns } from "./services/catalog-reconciler.js";
export { executeRoutine, buildRoutineBody, MAGIC_CONSTANTS } from "./services/routine-executor.js";
export { synthesizeMetadata } from "./services/metadata-synthesizer.js";
export { readMetadata, writeMetadata } from "./services/metadata-store.js";
export { fetchRoutineCatalog, buildReplacePairs, dropRoutine } from "./services/routine-catalog.js";

// Pipeline
export { compileRoutine, RoutineOutcome, type CompileRoutineInput } from "./compile-routine.js";
export { load, discoverSources, type LoadOptions, type LoadResult, type LoadError } from "./load.js";
