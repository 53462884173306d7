/**
 * Load Pipeline Tests
 *
 * Runs the batch loader over a temporary project directory against the
 * in-memory database.
 */
import { expect, layer } from "@effect/vitest"
import { Effect, Logger, LogLevel } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import type { RoutineCatalogEntry } from "../ir/routine-metadata.js"
import { load } from "../load.js"
import { ConfigTest } from "../services/config.js"
import { readMetadata } from "../services/metadata-store.js"
import { makeFakeDatabase, type FakeDatabase } from "../testing.js"
import { session, testConfig, tstBroken, tstNone, usrGetUsers } from "./fixtures/index.js"

const quiet = Logger.withMinimumLogLevel(LogLevel.None)

const obsolete: RoutineCatalogEntry = {
  routineName: "old_get_all",
  routineType: "function",
  sqlMode: session.sqlMode,
  characterSetClient: session.characterSet,
  collationConnection: session.collation,
}

const newDatabase = (): FakeDatabase =>
  makeFakeDatabase({
    routines: [obsolete],
    parameters: {
      usr_get_users: [{ name: "p_ids", dataType: "text" }],
    },
  })

/** Lay out a project: lib/psql/<relative path> → text */
const makeProject = (sources: Readonly<Record<string, string>>) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    const dir = yield* fs.makeTempDirectoryScoped()
    for (const [relative, text] of Object.entries(sources)) {
      const file = path.join(dir, "lib", "psql", relative)
      yield* fs.makeDirectory(path.dirname(file), { recursive: true })
      yield* fs.writeFileString(file, text)
    }
    return dir
  })

layer(NodeContext.layer)("load", it => {
  it.scoped("loads every source, keeps going after a failure and drops obsolete routines", () => {
    const db = newDatabase()
    return Effect.gen(function* () {
      const path = yield* Path.Path
      const dir = yield* makeProject({
        "usr_get_users.psql": usrGetUsers,
        "tst/tst_broken.psql": tstBroken,
        "README.md": "not a routine",
      })

      const result = yield* load().pipe(Effect.provide(ConfigTest(testConfig(dir))))

      expect(result.outcomes.map(outcome => [outcome.routineName, outcome._tag])).toEqual([
        ["tst_broken", "Failed"],
        ["usr_get_users", "Loaded"],
      ])
      expect(result.loaded).toEqual(["usr_get_users"])
      expect(result.failed).toEqual(["tst_broken"])
      expect(result.dropped).toEqual(["old_get_all"])
      expect([...db.catalog.keys()]).toEqual(["usr_get_users"])

      const written = yield* readMetadata(path.join(dir, "etc", "routines.json"))
      expect([...written.keys()]).toEqual(["usr_get_users"])
      expect(written.get("usr_get_users")?.replace).toEqual({ "@PREFIX@": "app_" })
    }).pipe(Effect.provide(db.layer), quiet)
  })

  it.scoped("reports unchanged routines on the next run", () => {
    const db = newDatabase()
    return Effect.gen(function* () {
      const dir = yield* makeProject({ "usr_get_users.psql": usrGetUsers })
      const run = load().pipe(Effect.provide(ConfigTest(testConfig(dir))))

      yield* run
      const executed = db.statements.filter(statement => statement.sql.startsWith("set sql_mode")).length
      const second = yield* run

      expect(second.unchanged).toEqual(["usr_get_users"])
      expect(second.loaded).toEqual([])
      expect(db.statements.filter(statement => statement.sql.startsWith("set sql_mode")).length).toBe(executed)
    }).pipe(Effect.provide(db.layer), quiet)
  })

  it.scoped("loads only the given files and keeps other routines", () => {
    const db = newDatabase()
    return Effect.gen(function* () {
      const path = yield* Path.Path
      const dir = yield* makeProject({
        "usr_get_users.psql": usrGetUsers,
        "tst_cleanup.psql": tstNone("tst_cleanup"),
      })

      const result = yield* load({ files: [path.join(dir, "lib", "psql", "tst_cleanup.psql")] }).pipe(
        Effect.provide(ConfigTest(testConfig(dir))),
      )

      expect(result.loaded).toEqual(["tst_cleanup"])
      expect(result.dropped).toEqual([])
      expect(db.catalog.has("old_get_all")).toBe(true)
      expect(db.catalog.has("usr_get_users")).toBe(false)
    }).pipe(Effect.provide(db.layer), quiet)
  })

  it.scoped("rejects a second source for the same routine", () => {
    const db = newDatabase()
    return Effect.gen(function* () {
      const dir = yield* makeProject({
        "a/tst_cleanup.psql": tstNone("tst_cleanup"),
        "b/tst_cleanup.psql": tstNone("tst_cleanup"),
      })

      const result = yield* load().pipe(Effect.provide(ConfigTest(testConfig(dir))))

      expect(result.loaded).toEqual(["tst_cleanup"])
      expect(result.failed).toEqual(["tst_cleanup"])
      const failure = result.outcomes[1]
      expect(failure?._tag === "Failed" ? failure.error._tag : undefined).toBe("DuplicateRoutineSource")
    }).pipe(Effect.provide(db.layer), quiet)
  })
})
