/**
 * Config Loader
 *
 * Loads and validates sprocforge.config.{json,js,mjs,cjs} using lilconfig.
 * Wraps the async config loading in Effect for proper error handling.
 */
import { Effect, Schema as S, ParseResult, pipe } from "effect";
import { lilconfig } from "lilconfig";
import { dirname } from "node:path";
import { Config, type ConfigInput, type ResolvedConfig } from "../config.js";
import { ConfigNotFound, ConfigInvalid } from "../errors.js";

/**
 * Config Loader service interface
 */
export interface ConfigLoader {
  /**
   * Load configuration from file.
   * @param configPath - Optional explicit path to config file
   * @param searchFrom - Directory to search from (default: cwd)
   */
  readonly load: (options?: {
    readonly configPath?: string;
    readonly searchFrom?: string;
  }) => Effect.Effect<ResolvedConfig, ConfigNotFound | ConfigInvalid>;
}

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  "sprocforge.config.json",
  "sprocforge.config.js",
  "sprocforge.config.mjs",
  "sprocforge.config.cjs",
];

/**
 * Create the lilconfig instance
 */
function createLilconfig() {
  return lilconfig("sprocforge", {
    searchPlaces: CONFIG_FILE_NAMES,
  });
}

/**
 * Format Schema decode errors into readable strings
 */
function formatSchemaErrors(error: ParseResult.ParseError): readonly string[] {
  return ParseResult.ArrayFormatter.formatErrorSync(error).map(
    issue => `${issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ` : ""}${issue.message}`,
  );
}

/**
 * Create a ConfigLoader implementation
 */
export function createConfigLoader(): ConfigLoader {
  const lc = createLilconfig();

  return {
    load: options =>
      Effect.gen(function* () {
        const searchFrom = options?.searchFrom ?? process.cwd();
        const configPath = options?.configPath;

        // Search for or load specific config file
        const result = yield* Effect.tryPromise({
          try: async () => {
            if (configPath) {
              return await lc.load(configPath);
            }
            return await lc.search(searchFrom);
          },
          catch: error =>
            new ConfigInvalid({
              message: `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
              path: configPath ?? searchFrom,
              errors: [String(error)],
            }),
        });

        // Check if config was found
        if (!result || result.isEmpty) {
          return yield* Effect.fail(
            new ConfigNotFound({
              message: "No configuration file found",
              searchPaths: CONFIG_FILE_NAMES.map(name => `${searchFrom}/${name}`),
            }),
          );
        }

        const filepath = result.filepath;

        // Validate with Effect Schema
        const parsed = yield* pipe(
          S.decodeUnknown(Config, { errors: "all" })(result.config),
          Effect.mapError(
            parseError =>
              new ConfigInvalid({
                message: `Invalid configuration in ${filepath}`,
                path: filepath,
                errors: formatSchemaErrors(parseError),
              }),
          ),
        );

        const resolved: ResolvedConfig = {
          ...parsed,
          configDir: dirname(filepath),
        };

        return resolved;
      }),
  };
}

/**
 * Helper to define a config in sprocforge.config.js (provides type safety for users)
 */
export function defineConfig(config: ConfigInput): ConfigInput {
  return config;
}
