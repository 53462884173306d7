/**
 * Staleness Detector Tests
 */
import { describe, expect, it } from "@effect/vitest"
import type { BuildMetadata, RoutineCatalogEntry } from "../ir/routine-metadata.js"
import { mustRecompile, staleReason, type StalenessInput } from "../services/staleness.js"
import { session } from "./fixtures/index.js"

const previous: BuildMetadata = {
  routineName: "usr_get_users",
  routineType: "procedure",
  designation: { _tag: "simple", type: "rows" },
  tableName: null,
  parameters: [],
  columns: [],
  fields: [],
  columnTypes: [],
  timestamp: 1000,
  replace: { "@PREFIX@": "app_", "@usr.usr_id%type@": "int(10) unsigned" },
  docBlock: { shortDescription: "", longDescription: "", parameters: [] },
  extendedParameters: {},
}

const catalogEntry: RoutineCatalogEntry = {
  routineName: "usr_get_users",
  routineType: "procedure",
  sqlMode: session.sqlMode,
  characterSetClient: session.characterSet,
  collationConnection: session.collation,
}

const upToDate: StalenessInput = {
  previous,
  mtime: 1000,
  replacePairs: new Map([
    ["@PREFIX@", "app_"],
    ["@USR.USR_ID%TYPE@", "int(10) unsigned"],
    ["@OTHER@", "unused"],
  ]),
  catalogEntry,
  session,
}

describe("staleReason", () => {
  it("is undefined when nothing changed", () => {
    expect(staleReason(upToDate)).toBeUndefined()
    expect(mustRecompile(upToDate)).toBe(false)
  })

  it("reports a routine without previous metadata as new", () => {
    expect(staleReason({ ...upToDate, previous: undefined })).toBe("new")
  })

  it("reports a changed modification time", () => {
    expect(staleReason({ ...upToDate, mtime: 2000 })).toBe("modified")
  })

  it("reports a changed placeholder value", () => {
    const replacePairs = new Map(upToDate.replacePairs)
    replacePairs.set("@USR.USR_ID%TYPE@", "bigint(20) unsigned")
    expect(staleReason({ ...upToDate, replacePairs })).toBe("placeholder-changed")
  })

  it("reports a placeholder that no longer exists", () => {
    const replacePairs = new Map(upToDate.replacePairs)
    replacePairs.delete("@PREFIX@")
    expect(staleReason({ ...upToDate, replacePairs })).toBe("placeholder-changed")
  })

  it("reports a routine missing from the database", () => {
    expect(staleReason({ ...upToDate, catalogEntry: undefined })).toBe("missing-in-database")
  })

  const changedSessions: readonly [string, RoutineCatalogEntry][] = [
    ["sqlMode", { ...catalogEntry, sqlMode: "ANSI" }],
    ["characterSetClient", { ...catalogEntry, characterSetClient: "latin1" }],
    ["collationConnection", { ...catalogEntry, collationConnection: "utf8mb4_bin" }],
  ]
  for (const [field, entry] of changedSessions) {
    it(`reports a changed ${field}`, () => {
      expect(staleReason({ ...upToDate, catalogEntry: entry })).toBe("session-changed")
    })
  }

  it("checks the modification time before the catalog", () => {
    expect(staleReason({ ...upToDate, mtime: 2000, catalogEntry: undefined })).toBe("modified")
  })
})
