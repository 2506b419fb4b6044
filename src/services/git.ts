import { stat } from "fs/promises"
import { GitError, simpleGit, type SimpleGit } from "simple-git"

import type { FileChange, RawCommit, RepositoryReader } from "@/types"

const RECORD_SEPARATOR = "\x1e"
const STAT_FIELD = /^(\d+|-)\t(\d+|-)\t([\s\S]*)$/

const NOT_A_REPOSITORY = /not a git repository/i
const UNKNOWN_REVISION = /needed a single revision|unknown revision/i

/** `git log` pretty format: a record separator, hash, parents, author time. */
export const LOG_FORMAT = "--format=%x1e%H%x09%P%x09%at"

function parseCount(value: string): number {
  if (value === "-") return 0
  const n = parseInt(value, 10)
  return isNaN(n) ? 0 : n
}

/**
 * Reads the NUL-separated fields of `--numstat -z`. Paths arrive verbatim.
 * A rename leaves the path of its stat field empty and is followed by the
 * old and new paths as two more fields.
 */
function parseNumstat(fields: string[]): FileChange[] {
  const files: FileChange[] = []
  for (let i = 0; i < fields.length; i++) {
    const match = STAT_FIELD.exec((fields[i] ?? "").replace(/^\n+/, ""))
    if (!match) continue
    const [, additions = "", deletions = "", inline = ""] = match
    let path = inline
    if (path === "") {
      path = fields[i + 2] ?? ""
      i += 2
    }
    if (!path) continue
    files.push({
      path,
      additions: parseCount(additions),
      deletions: parseCount(deletions),
    })
  }
  return files
}

/**
 * Parses `git log --numstat -z` output written with {@link LOG_FORMAT}.
 * Binary files (`-` counts) are kept with zero lines. Renames resolve to
 * the new path.
 */
export function parseLog(text: string): RawCommit[] {
  const commits: RawCommit[] = []
  for (const record of text.split(RECORD_SEPARATOR)) {
    const end = record.search(/[\n\0]/)
    const header = (end === -1 ? record : record.slice(0, end)).trim()
    if (!header) continue

    const [hash = "", parents = "", timestamp = ""] = header.split("\t")
    const seconds = parseInt(timestamp, 10)
    if (!hash || isNaN(seconds)) continue

    const fields = end === -1 ? [] : record.slice(end + 1).split("\0")
    commits.push({
      hash,
      authoredAt: new Date(seconds * 1000),
      parents: parents.split(" ").filter((p) => p.length > 0),
      files: parseNumstat(fields),
    })
  }
  return commits
}

/** Whether git ran and refused with a message matching `pattern`. */
function isRefusal(err: unknown, pattern: RegExp): boolean {
  return err instanceof GitError && pattern.test(err.message)
}

function isMissingPath(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  )
}

/** Reads history from a local git repository through simple-git. */
export class GitService implements RepositoryReader {
  private path: string
  private client: SimpleGit | undefined

  /** @param path - Absolute path to the working tree or bare repository. */
  constructor(path: string) {
    this.path = path
  }

  // simple-git refuses to construct on a missing directory, so defer it.
  private git(): SimpleGit {
    this.client ??= simpleGit(this.path)
    return this.client
  }

  async isRepository(): Promise<boolean> {
    try {
      const info = await stat(this.path)
      if (!info.isDirectory()) return false
    } catch (err) {
      if (isMissingPath(err)) return false
      throw err
    }
    try {
      const out = await this.git().raw(["rev-parse", "--git-dir"])
      return out.trim().length > 0
    } catch (err) {
      if (isRefusal(err, NOT_A_REPOSITORY)) return false
      throw err
    }
  }

  async hasCommits(): Promise<boolean> {
    return this.refExists("HEAD")
  }

  async refExists(ref: string): Promise<boolean> {
    try {
      const out = await this.git().raw([
        "rev-parse",
        "--verify",
        `${ref}^{commit}`,
      ])
      return out.trim().length > 0
    } catch (err) {
      if (isRefusal(err, UNKNOWN_REVISION)) return false
      throw err
    }
  }

  /**
   * Commits reachable from `ref` since the given instant. Merges are diffed
   * against their first parent. `-z` keeps paths unquoted.
   */
  async listCommits(ref: string, since: Date): Promise<RawCommit[]> {
    const out = await this.git().raw([
      "log",
      ref,
      `--since=${since.toISOString()}`,
      "--numstat",
      "-z",
      "--diff-merges=first-parent",
      LOG_FORMAT,
      "--",
    ])
    return parseLog(out)
  }
}
