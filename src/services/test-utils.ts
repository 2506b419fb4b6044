import type {
  CollectionFilters,
  FileChange,
  RawCommit,
  ReaderFactory,
  RepositoryReader,
} from "@/types"

/** In-memory repository served by {@link fakeReaders}. */
export interface FakeRepository {
  commits: RawCommit[]
  /** Branches besides HEAD that resolve. */
  branches?: string[]
  /** No commits yet; HEAD does not resolve. */
  empty?: boolean
  /** Rejects `listCommits` with this error. */
  failWith?: Error
  /** Milliseconds `listCommits` waits before answering. */
  delay?: number
}

/** Calls observed across every fake reader. */
export interface FakeLog {
  listed: { path: string; ref: string; since: Date }[]
  inFlight: number
  maxInFlight: number
}

/** Builds a commit authored at `iso` touching `files`. */
export function commit(
  hash: string,
  iso: string,
  files: FileChange[],
  parents: string[] = ["parent"],
): RawCommit {
  return { hash, authoredAt: new Date(iso), parents, files }
}

export function file(
  path: string,
  additions: number,
  deletions: number,
): FileChange {
  return { path, additions, deletions }
}

export const NO_FILTERS: CollectionFilters = {
  extensions: [],
  includeMerges: false,
}

/**
 * Reader factory over in-memory repositories keyed by path.
 * Paths missing from the map are not repositories.
 */
export function fakeReaders(
  repos: Record<string, FakeRepository>,
  log: FakeLog = { listed: [], inFlight: 0, maxInFlight: 0 },
): ReaderFactory {
  return (path): RepositoryReader => {
    const repo = repos[path]
    return {
      isRepository: async () => repo !== undefined,
      hasCommits: async () => repo !== undefined && !repo.empty,
      refExists: async (ref) => {
        if (!repo || repo.empty) return false
        return ref === "HEAD" || (repo.branches ?? []).includes(ref)
      },
      listCommits: async (ref, since) => {
        log.listed.push({ path, ref, since })
        log.inFlight++
        log.maxInFlight = Math.max(log.maxInFlight, log.inFlight)
        try {
          if (repo?.delay) {
            await new Promise((r) => setTimeout(r, repo.delay))
          }
          if (repo?.failWith) throw repo.failWith
          return (repo?.commits ?? []).filter(
            (c) => c.authoredAt.getTime() >= since.getTime(),
          )
        } finally {
          log.inFlight--
        }
      },
    }
  }
}
