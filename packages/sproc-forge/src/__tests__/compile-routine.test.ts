/**
 * Single Routine Compiler Tests
 *
 * Sources live in a temporary directory; the database is the in-memory fake.
 */
import { expect, layer } from "@effect/vitest"
import { Effect, Logger, LogLevel, Option } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { compileRoutine, type RoutineOutcome } from "../compile-routine.js"
import { ConnectionLost, QueryFailed } from "../errors.js"
import type { BuildMetadata } from "../ir/routine-metadata.js"
import { makeFakeDatabase, type FakeDatabaseOptions } from "../testing.js"
import { captureLogs, session, tstBroken, tstNone, usrGetUsers } from "./fixtures/index.js"

const quiet = Logger.withMinimumLogLevel(LogLevel.None)

const databaseOptions: FakeDatabaseOptions = {
  parameters: {
    usr_get_users: [
      {
        name: "p_ids",
        dataType: "text",
        characterSetName: "utf8mb4",
        collationName: "utf8mb4_general_ci",
      },
    ],
  },
}

const queryFailedFor = (sql: string) => new QueryFailed({ message: "Syntax error near 'create'", sql, cause: null })

const prefix = (value: string) => new Map([["@PREFIX@", value]])

/** Write a source into a fresh temporary directory; returns its path and mtime */
const writeSource = (routineName: string, text: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    const dir = yield* fs.makeTempDirectoryScoped()
    const file = path.join(dir, `${routineName}.psql`)
    yield* fs.writeFileString(file, text)
    const info = yield* fs.stat(file)
    const mtime = Option.getOrElse(Option.map(info.mtime, date => date.getTime()), () => 0)
    return { file, mtime }
  })

const loaded = (outcome: RoutineOutcome) =>
  outcome._tag === "Loaded"
    ? Effect.succeed(outcome)
    : Effect.dieMessage(`Expected a loaded routine, got ${outcome._tag}`)

const expectedMetadata = (mtime: number, prefixValue: string): BuildMetadata => ({
  routineName: "usr_get_users",
  routineType: "procedure",
  designation: { _tag: "rows_with_key", columns: ["usr_id"] },
  tableName: null,
  parameters: [
    {
      name: "p_ids",
      dataType: "list_of_int",
      numericPrecision: null,
      numericScale: null,
      characterSetName: "utf8mb4",
      collationName: "utf8mb4_general_ci",
      dtdIdentifier: "text",
      dataTypeDescriptor: "text character set utf8mb4 collation utf8mb4_general_ci",
      delimiter: ",",
      enclosure: '"',
      escape: "\\",
    },
  ],
  columns: ["usr_id"],
  fields: [],
  columnTypes: [],
  timestamp: mtime,
  replace: { "@PREFIX@": prefixValue },
  docBlock: {
    shortDescription: "Selects users by ID.",
    longDescription: "",
    parameters: [
      {
        name: "p_ids",
        semanticType: "text-or-integer-list",
        dataTypeDescriptor: "text character set utf8mb4 collation utf8mb4_general_ci",
        description: "The IDs of the users.",
      },
    ],
  },
  extendedParameters: {
    p_ids: { name: "p_ids", dataType: "list_of_int", delimiter: ",", enclosure: '"', escape: "\\" },
  },
})

layer(NodeContext.layer)("compileRoutine", it => {
  it.scoped("loads a rows_with_key routine and synthesizes its metadata", () => {
    const db = makeFakeDatabase(databaseOptions)
    return Effect.gen(function* () {
      const { file, mtime } = yield* writeSource("usr_get_users", usrGetUsers)

      const outcome = yield* loaded(
        yield* compileRoutine({
          path: file,
          extension: ".psql",
          previous: undefined,
          catalogEntry: undefined,
          replacePairs: prefix("app_"),
          session,
        }),
      )

      expect(outcome.routineName).toBe("usr_get_users")
      expect(outcome.metadata).toEqual(expectedMetadata(mtime, "app_"))
      expect(outcome.warnings).toEqual([])
      expect(db.statements.some(statement => statement.sql.includes("  from   app_usr"))).toBe(true)
    }).pipe(Effect.provide(db.layer), quiet)
  })

  it.scoped("returns the previous metadata when nothing changed", () => {
    const db = makeFakeDatabase(databaseOptions)
    return Effect.gen(function* () {
      const { file } = yield* writeSource("usr_get_users", usrGetUsers)
      const input = {
        path: file,
        extension: ".psql",
        replacePairs: prefix("app_"),
        session,
      }

      const first = yield* loaded(
        yield* compileRoutine({ ...input, previous: undefined, catalogEntry: undefined }),
      )
      const executed = db.statements.length

      const second = yield* compileRoutine({
        ...input,
        previous: first.metadata,
        catalogEntry: db.catalog.get("usr_get_users"),
      })

      expect(second._tag).toBe("Unchanged")
      if (second._tag === "Unchanged") {
        expect(second.metadata).toEqual(first.metadata)
      }
      expect(db.statements.length).toBe(executed)
    }).pipe(Effect.provide(db.layer), quiet)
  })

  it.scoped("reloads when a placeholder value changed", () => {
    const db = makeFakeDatabase(databaseOptions)
    return Effect.gen(function* () {
      const { file, mtime } = yield* writeSource("usr_get_users", usrGetUsers)
      const input = { path: file, extension: ".psql", session }

      const first = yield* loaded(
        yield* compileRoutine({
          ...input,
          previous: undefined,
          catalogEntry: undefined,
          replacePairs: prefix("app_"),
        }),
      )
      const second = yield* loaded(
        yield* compileRoutine({
          ...input,
          previous: first.metadata,
          catalogEntry: db.catalog.get("usr_get_users"),
          replacePairs: prefix("v2_"),
        }),
      )

      expect(second.metadata).toEqual(expectedMetadata(mtime, "v2_"))
      expect(db.statements.some(statement => statement.sql === "drop procedure if exists usr_get_users")).toBe(
        true,
      )
    }).pipe(Effect.provide(db.layer), quiet)
  })

  it.scoped("binds magic constants without recording them", () => {
    const db = makeFakeDatabase()
    return Effect.gen(function* () {
      const { file } = yield* writeSource(
        "tst_magic",
        "create procedure tst_magic()\n-- type: none\nbegin\n  select __ROUTINE__, __LINE__;\nend\n",
      )

      const outcome = yield* loaded(
        yield* compileRoutine({
          path: file,
          extension: ".psql",
          previous: undefined,
          catalogEntry: undefined,
          replacePairs: new Map<string, string>(),
          session,
        }),
      )

      expect(outcome.metadata.replace).toEqual({})
      expect(db.statements.at(-2)?.sql).toBe(
        "create procedure tst_magic()\n-- type: none\nbegin\n  select 'tst_magic', 4;\nend\n",
      )
    }).pipe(Effect.provide(db.layer), quiet)
  })

  it.scoped("folds a routine failure into a Failed outcome", () => {
    const db = makeFakeDatabase()
    return Effect.gen(function* () {
      const { file } = yield* writeSource("tst_broken", tstBroken)

      const outcome = yield* compileRoutine({
        path: file,
        extension: ".psql",
        previous: undefined,
        catalogEntry: undefined,
        replacePairs: new Map<string, string>(),
        session,
      })

      expect(outcome._tag).toBe("Failed")
      if (outcome._tag === "Failed") {
        expect(outcome.routineName).toBe("tst_broken")
        expect(outcome.error._tag).toBe("UnknownPlaceholder")
      }
      expect(db.statements).toEqual([])
    }).pipe(Effect.provide(db.layer), quiet)
  })

  it.scoped("loads a keyed routine over a documented integer parameter", () => {
    const db = makeFakeDatabase({ parameters: { tst_by_id: [{ name: "id", dataType: "int" }] } })
    return Effect.gen(function* () {
      const { file } = yield* writeSource(
        "tst_by_id",
        [
          "/**",
          " * Selects one row by ID.",
          " *",
          " * @param id The ID of the row.",
          " */",
          "create procedure tst_by_id(in id int)",
          "-- type: rows_with_key id",
          "begin",
          "  select id;",
          "end",
          "",
        ].join("\n"),
      )

      const outcome = yield* loaded(
        yield* compileRoutine({
          path: file,
          extension: ".psql",
          previous: undefined,
          catalogEntry: undefined,
          replacePairs: new Map<string, string>(),
          session,
        }),
      )

      expect(outcome.metadata.designation).toEqual({ _tag: "rows_with_key", columns: ["id"] })
      expect(outcome.metadata.columns).toEqual(["id"])
      expect(outcome.metadata.docBlock.parameters).toEqual([
        { name: "id", semanticType: "integer", dataTypeDescriptor: "int", description: "The ID of the row." },
      ])
      expect(outcome.warnings).toEqual([])
    }).pipe(Effect.provide(db.layer), quiet)
  })

  it.scoped("names the source file when a parameter type is unsupported", () => {
    const db = makeFakeDatabase({ parameters: { tst_json: [{ name: "p_doc", dataType: "json" }] } })
    return Effect.gen(function* () {
      const { file } = yield* writeSource(
        "tst_json",
        "create procedure tst_json(in p_doc json)\n-- type: none\nbegin\n  select p_doc;\nend\n",
      )

      const outcome = yield* compileRoutine({
        path: file,
        extension: ".psql",
        previous: undefined,
        catalogEntry: undefined,
        replacePairs: new Map<string, string>(),
        session,
      })

      expect(outcome._tag).toBe("Failed")
      if (outcome._tag === "Failed") {
        expect(outcome.error._tag).toBe("UnsupportedColumnType")
        expect(outcome.error.message).toBe(
          `Unsupported column type 'json' of parameter 'p_doc' in file '${file}'`,
        )
      }
    }).pipe(Effect.provide(db.layer), quiet)
  })

  it.scoped("logs a failed routine under its source path", () => {
    const db = makeFakeDatabase({
      failOn: sql => (sql.startsWith("create procedure") ? queryFailedFor(sql) : undefined),
    })
    const { logged, layer: capture } = captureLogs(LogLevel.Error)
    return Effect.gen(function* () {
      const { file } = yield* writeSource("tst_cleanup", tstNone("tst_cleanup"))

      const outcome = yield* compileRoutine({
        path: file,
        extension: ".psql",
        previous: undefined,
        catalogEntry: undefined,
        replacePairs: new Map<string, string>(),
        session,
      })

      expect(outcome._tag).toBe("Failed")
      expect(logged).toEqual([`${file}: Syntax error near 'create'`])
    }).pipe(Effect.provide(db.layer), Effect.provide(capture))
  })

  it.scoped("fails the effect when the connection is lost", () => {
    const db = makeFakeDatabase({
      ...databaseOptions,
      failOn: sql =>
        sql === "set sql_mode = ?"
          ? new ConnectionLost({ message: "Lost connection to database", sql, cause: null })
          : undefined,
    })
    return Effect.gen(function* () {
      const { file } = yield* writeSource("usr_get_users", usrGetUsers)

      const error = yield* Effect.flip(
        compileRoutine({
          path: file,
          extension: ".psql",
          previous: undefined,
          catalogEntry: undefined,
          replacePairs: prefix("app_"),
          session,
        }),
      )

      expect(error._tag).toBe("ConnectionLost")
    }).pipe(Effect.provide(db.layer), quiet)
  })
})
