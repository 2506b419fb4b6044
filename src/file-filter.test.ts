import { describe, expect, test } from "vitest"

import {
  fileExtension,
  filterFiles,
  matchesExtensions,
  normalizeExtensions,
} from "@/file-filter"

describe("normalizeExtensions", () => {
  test("drops dots, lowercases, and dedupes", () => {
    expect(normalizeExtensions([".TS", "tsx", " .ts ", "", "."])).toEqual([
      "ts",
      "tsx",
    ])
  })
})

describe("fileExtension", () => {
  test("takes the text after the last dot of the basename", () => {
    expect(fileExtension("src/app.test.TS")).toBe("ts")
    expect(fileExtension("archive.tar.gz")).toBe("gz")
  })

  test("returns null when there is no extension", () => {
    expect(fileExtension("Makefile")).toBeNull()
    expect(fileExtension(".gitignore")).toBeNull()
    expect(fileExtension("releases.v2/notes")).toBeNull()
    expect(fileExtension("trailing.")).toBeNull()
  })
})

describe("matchesExtensions", () => {
  test("an empty filter matches everything", () => {
    expect(matchesExtensions("Makefile", [])).toBe(true)
  })

  test("matches case-insensitively", () => {
    expect(matchesExtensions("src/Main.RS", ["rs"])).toBe(true)
    expect(matchesExtensions("src/main.rs", ["ts"])).toBe(false)
    expect(matchesExtensions("README", ["md"])).toBe(false)
  })
})

describe("filterFiles", () => {
  test("keeps only matching files", () => {
    const files = [
      { path: "a.ts", additions: 1, deletions: 0 },
      { path: "b.md", additions: 5, deletions: 5 },
    ]
    expect(filterFiles(files, ["ts"])).toEqual([files[0]])
    expect(filterFiles(files, [])).toEqual(files)
  })
})
