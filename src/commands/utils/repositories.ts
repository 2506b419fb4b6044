import { homedir } from "os"
import { basename, resolve } from "path"

import {
  type Config,
  type RepositoryEntry,
  collapseHome,
  expandHome,
} from "@/config"
import {
  NoRepositoriesError,
  NotARepositoryError,
  NotFoundError,
  ValidationError,
} from "@/errors"
import type { RepositorySpec } from "@/types"
import { GitService } from "@services/git"

/** Checks whether a path holds a git repository. */
export type RepositoryProbe = (path: string) => Promise<boolean>

export const probeRepository: RepositoryProbe = (path) =>
  new GitService(path).isRepository()

/** Which repositories the user asked for on the command line. */
export interface RepositorySelection {
  /** A single repository path, bypassing the config. */
  repo?: string
  /** Names of configured repositories to restrict the run to. */
  names?: string[]
}

function absolutePath(path: string, cwd: string, home: string): string {
  return resolve(cwd, expandHome(path, home))
}

function toSpec(entry: RepositoryEntry, cwd: string, home: string) {
  const repo: RepositorySpec = {
    name: entry.name,
    path: absolutePath(entry.path, cwd, home),
  }
  if (entry.branch) repo.branch = entry.branch
  return repo
}

/**
 * Picks the repositories to analyze: `--repo`, then the configured
 * repositories (narrowed by name), then the current directory.
 */
export async function resolveRepositories(
  selection: RepositorySelection,
  config: Config,
  cwd: string,
  isRepository: RepositoryProbe = probeRepository,
  home: string = homedir(),
): Promise<RepositorySpec[]> {
  if (selection.repo) {
    const path = absolutePath(selection.repo, cwd, home)
    return [{ name: basename(path), path }]
  }

  const names = [...new Set(selection.names ?? [])]
  if (names.length > 0) {
    return names.map((name) => {
      const entry = config.repositories.find((r) => r.name === name)
      if (!entry) {
        throw new NotFoundError(`no repository named "${name}" in config`)
      }
      return toSpec(entry, cwd, home)
    })
  }

  if (config.repositories.length > 0) {
    return config.repositories.map((entry) => toSpec(entry, cwd, home))
  }

  if (await isRepository(cwd)) {
    return [{ name: basename(cwd), path: cwd }]
  }
  throw new NoRepositoriesError()
}

/** Input to `churnscope add`. */
export interface NewRepository {
  path: string
  name?: string
  branch?: string
}

export type RegisterResult =
  | { status: "added"; entry: RepositoryEntry; config: Config }
  | { status: "duplicate"; entry: RepositoryEntry }

/**
 * Adds a repository to the config. The stored path is absolute with the
 * home directory written as `~`. Registering a path twice is reported as a
 * duplicate and leaves the config unchanged.
 */
export async function registerRepository(
  config: Config,
  input: NewRepository,
  cwd: string,
  isRepository: RepositoryProbe = probeRepository,
  home: string = homedir(),
): Promise<RegisterResult> {
  const path = absolutePath(input.path, cwd, home)
  const name = input.name ?? basename(path)

  const existing = config.repositories.find(
    (r) => absolutePath(r.path, cwd, home) === path,
  )
  if (existing) return { status: "duplicate", entry: existing }

  if (config.repositories.some((r) => r.name === name)) {
    throw new ValidationError(
      `a repository named "${name}" is already registered; pick another with --name`,
    )
  }
  if (!(await isRepository(path))) {
    throw new NotARepositoryError(name, path)
  }

  const entry: RepositoryEntry = { name, path: collapseHome(path, home) }
  if (input.branch) entry.branch = input.branch
  return {
    status: "added",
    entry,
    config: { ...config, repositories: [...config.repositories, entry] },
  }
}

/** Removes the repository matching a name or a path. */
export function unregisterRepository(
  config: Config,
  identifier: string,
  cwd: string,
  home: string = homedir(),
): { entry: RepositoryEntry; config: Config } {
  const path = absolutePath(identifier, cwd, home)
  const entry =
    config.repositories.find((r) => r.name === identifier) ??
    config.repositories.find((r) => absolutePath(r.path, cwd, home) === path)
  if (!entry) {
    throw new NotFoundError(`no repository matches "${identifier}"`)
  }
  return {
    entry,
    config: {
      ...config,
      repositories: config.repositories.filter((r) => r !== entry),
    },
  }
}

/** A configured repository and whether its path is currently a repository. */
export interface RepositoryStatus {
  name: string
  path: string
  branch: string | null
  valid: boolean
}

export async function repositoryStatuses(
  config: Config,
  cwd: string,
  isRepository: RepositoryProbe = probeRepository,
  home: string = homedir(),
): Promise<RepositoryStatus[]> {
  return Promise.all(
    config.repositories.map(async (entry) => ({
      name: entry.name,
      path: entry.path,
      branch: entry.branch ?? null,
      valid: await isRepository(absolutePath(entry.path, cwd, home)),
    })),
  )
}
