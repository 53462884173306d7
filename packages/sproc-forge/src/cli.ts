#!/usr/bin/env node
/**
 * sproc-forge CLI
 *
 * Loads stored routines from their sources and writes the routine metadata.
 *
 *   sprocforge                 Load every source below sourceDir
 *   sprocforge a.psql b.psql   Load only the given sources
 *
 * Log verbosity is controlled via the built-in --log-level flag:
 *   --log-level debug   Show detailed output (staleness reasons, file paths)
 *   --log-level info    Default - show progress messages
 *   --log-level none    Suppress all output except errors
 */
import { Args, Command, Options } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Console, Effect, Layer, Option } from "effect";
import { RoutinesFailed, type SprocForgeError } from "./errors.js";
import { load, type LoadResult } from "./load.js";
import { ConfigFromFile, ConfigService } from "./services/config.js";
import { MySqlDataLayerLive } from "./services/data-layer.js";
import packageJson from "../package.json" with { type: "json" };

// ============================================================================
// Options
// ============================================================================

const configPath = Options.file("config").pipe(
  Options.withAlias("c"),
  Options.withDescription("Path to config file"),
  Options.optional,
);

const files = Args.file({ name: "file", exists: "yes" }).pipe(
  Args.withDescription("Routine sources to load (default: all sources below sourceDir)"),
  Args.repeated,
);

// ============================================================================
// Load Command Logic
// ============================================================================

interface LoadArgs {
  readonly configPath: Option.Option<string>;
  readonly files: readonly string[];
}

/** Data layer connected with the settings of the loaded config */
const DataLayerFromConfig = Layer.unwrapEffect(
  Effect.map(ConfigService, config => MySqlDataLayerLive(config.database)),
);

const failIfAnyFailed = (result: LoadResult) =>
  result.failed.length === 0
    ? Effect.void
    : Effect.fail(
        new RoutinesFailed({
          message: `Failed to load ${result.failed.length} routine(s): ${result.failed.join(", ")}`,
          routines: result.failed,
        }),
      );

/** Log an error with a list of detail messages */
const logError = (error: SprocForgeError) => {
  const details = error._tag === "ConfigInvalid" ? error.errors : [];
  return Console.error(`\n✗ Error: ${error._tag}`).pipe(
    Effect.andThen(Console.error(`  ${error.message}`)),
    Effect.andThen(Effect.forEach(details, detail => Console.error(`    - ${detail}`))),
    Effect.andThen(Effect.fail(error)),
  );
};

const runLoadCommand = (args: LoadArgs) => {
  const configLayer = ConfigFromFile({ configPath: Option.getOrUndefined(args.configPath) });
  const appLayer = Layer.provideMerge(DataLayerFromConfig, configLayer);

  return load(args.files.length > 0 ? { files: args.files } : {}).pipe(
    Effect.tap(failIfAnyFailed),
    Effect.tap(result => Console.log(`\n✓ Loaded ${result.loaded.length} routines`)),
    Effect.provide(appLayer),
    Effect.catchAll(logError),
  );
};

// ============================================================================
// CLI App
// ============================================================================

const rootCommand = Command.make("sprocforge", { configPath, files }, runLoadCommand);

const cli = Command.run(rootCommand, {
  name: "sprocforge",
  version: packageJson.version,
});

// Run with Node.js platform
cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
