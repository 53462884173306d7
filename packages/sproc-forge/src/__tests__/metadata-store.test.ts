/**
 * Metadata Store Tests
 */
import { expect, layer } from "@effect/vitest"
import { Effect } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import type { BuildMetadata } from "../ir/routine-metadata.js"
import { readMetadata, writeMetadata } from "../services/metadata-store.js"

const metadata = (routineName: string): BuildMetadata => ({
  routineName,
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
  timestamp: 1_700_000_000_000,
  replace: { "@PREFIX@": "app_" },
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

layer(NodeContext.layer)("metadata store", it => {
  it.scoped("reads nothing when the file does not exist", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const dir = yield* fs.makeTempDirectoryScoped()
      const result = yield* readMetadata(path.join(dir, "routines.json"))
      expect(result.size).toBe(0)
    })
  )

  it.scoped("writes routines sorted by name and reads them back", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const dir = yield* fs.makeTempDirectoryScoped()
      const file = path.join(dir, "etc", "routines.json")

      yield* writeMetadata(
        file,
        new Map([
          ["usr_get_users", metadata("usr_get_users")],
          ["abc_get_all", metadata("abc_get_all")],
        ]),
      )

      const text = yield* fs.readFileString(file)
      expect(Object.keys(JSON.parse(text))).toEqual(["abc_get_all", "usr_get_users"])
      expect(text.endsWith("}\n")).toBe(true)

      const result = yield* readMetadata(file)
      expect(result.get("usr_get_users")).toEqual(metadata("usr_get_users"))
    })
  )

  it.scoped("fails on a malformed file", () =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const path = yield* Path.Path
      const dir = yield* fs.makeTempDirectoryScoped()
      const file = path.join(dir, "routines.json")
      yield* fs.writeFileString(file, '{"usr_get_users": {"routineName": 1}}')

      const error = yield* Effect.flip(readMetadata(file))
      expect(error._tag).toBe("MetadataInvalid")
      expect(error.path).toBe(file)
    })
  )
})
