/**
 * Config Service
 *
 * Provides loaded configuration via Effect DI.
 *
 * The config-loader.ts provides the loading logic, while this module
 * provides the service tag and layer constructors:
 * - ConfigFromFile: Load from file, fail if not found
 * - ConfigTest: Provide config directly for testing
 */
import { Context, Effect, Layer } from "effect";
import type { ResolvedConfig } from "../config.js";
import type { ConfigNotFound, ConfigInvalid } from "../errors.js";
import { createConfigLoader, CONFIG_FILE_NAMES } from "./config-loader.js";

/**
 * Service that provides the loaded configuration.
 * The service value IS the ResolvedConfig directly.
 */
export class ConfigService extends Context.Tag("ConfigService")<ConfigService, ResolvedConfig>() {}

/**
 * Load config from file. Fails with ConfigNotFound if not found.
 */
export const ConfigFromFile = (opts?: {
  configPath?: string;
  searchFrom?: string;
}): Layer.Layer<ConfigService, ConfigNotFound | ConfigInvalid> =>
  Layer.effect(
    ConfigService,
    Effect.gen(function* () {
      const loader = createConfigLoader();
      const config = yield* loader.load(opts);
      yield* Effect.logDebug(`Loaded config from ${config.configDir ?? "memory"}`);
      return config;
    }),
  );

/**
 * Provide config directly for testing.
 */
export const ConfigTest = (config: ResolvedConfig): Layer.Layer<ConfigService> =>
  Layer.succeed(ConfigService, config);

/**
 * Get the default search paths for config files.
 */
export const getConfigSearchPaths = (searchFrom: string = process.cwd()): string[] =>
  CONFIG_FILE_NAMES.map(name => `${searchFrom}/${name}`);
