/**
 * Configuration schema for sproc-forge
 */
import { Schema as S } from "effect";

/**
 * MySQL connection settings
 */
export const DatabaseConfig = S.Struct({
  host: S.optionalWith(S.String, { default: () => "localhost" }),
  port: S.optionalWith(S.Number, { default: () => 3306 }),
  user: S.String,
  password: S.optionalWith(S.String, { default: () => "" }),
  /** Schema the routines are loaded into */
  database: S.String,
});
export type DatabaseConfig = S.Schema.Type<typeof DatabaseConfig>;

/**
 * Main configuration schema
 */
export const Config = S.Struct({
  database: S.propertySignature(DatabaseConfig).annotations({
    missingMessage: () => "is required - add the MySQL connection settings to your config",
  }),

  /**
   * SQL mode under which routines are loaded and run. Write the modes in the
   * order MySQL reports them (e.g. ONLY_FULL_GROUP_BY before STRICT_ALL_TABLES),
   * otherwise the stored routine's mode never compares equal and every run
   * reloads it.
   */
  sqlMode: S.String,

  /** Default character set under which routines are loaded and run */
  characterSet: S.String,

  /** Default collation under which routines are loaded and run */
  collation: S.String,

  /** Directory holding the routine sources */
  sourceDir: S.optionalWith(S.String, { default: () => "lib/psql" }),

  /** Extension of routine source files */
  sourceExtension: S.optionalWith(S.String, { default: () => ".psql" }),

  /** File holding the metadata of the previous build */
  metadataFile: S.optionalWith(S.String, { default: () => "etc/routines.json" }),

  /** Placeholder values: `{ PREFIX: "app_" }` replaces `@PREFIX@` */
  constants: S.optionalWith(S.Record({ key: S.String, value: S.Union(S.String, S.Number) }), {
    default: () => ({}),
  }),
});

export type Config = S.Schema.Type<typeof Config>;

/**
 * User-facing configuration input type
 */
export interface ConfigInput {
  readonly database: {
    readonly host?: string;
    readonly port?: number;
    readonly user: string;
    readonly password?: string;
    readonly database: string;
  };

  readonly sqlMode: string;
  readonly characterSet: string;
  readonly collation: string;

  /** Directory holding the routine sources (default: "lib/psql") */
  readonly sourceDir?: string;

  /** Extension of routine source files (default: ".psql") */
  readonly sourceExtension?: string;

  /** Metadata file (default: "etc/routines.json") */
  readonly metadataFile?: string;

  /**
   * Placeholder values. Names are matched case-insensitively.
   *
   * @example
   * ```typescript
   * constants: {
   *   PREFIX: "app_",          // @PREFIX@
   *   MAX_ROWS: 100,           // @MAX_ROWS@
   * }
   * ```
   */
  readonly constants?: Readonly<Record<string, string | number>>;
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
  readonly database: DatabaseConfig;
  readonly sqlMode: string;
  readonly characterSet: string;
  readonly collation: string;
  readonly sourceDir: string;
  readonly sourceExtension: string;
  readonly metadataFile: string;
  readonly constants: Readonly<Record<string, string | number>>;
  /**
   * Directory containing the config file.
   * Relative `sourceDir` and `metadataFile` resolve against it.
   */
  readonly configDir?: string;
}
