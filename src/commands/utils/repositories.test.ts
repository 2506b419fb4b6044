import { describe, expect, test } from "vitest"

import type { Config } from "@/config"
import {
  NoRepositoriesError,
  NotARepositoryError,
  NotFoundError,
  ValidationError,
} from "@/errors"
import {
  type RepositoryProbe,
  registerRepository,
  repositoryStatuses,
  resolveRepositories,
  unregisterRepository,
} from "@commands/utils/repositories"

const HOME = "/home/dev"
const CWD = "/work/current"

const CONFIG: Config = {
  repositories: [
    { name: "api", path: "~/code/api", branch: "main" },
    { name: "web", path: "/srv/web" },
  ],
}

function probe(...valid: string[]): RepositoryProbe {
  return async (path) => valid.includes(path)
}

describe("resolveRepositories", () => {
  test("--repo bypasses the config", async () => {
    const repos = await resolveRepositories(
      { repo: "../other" },
      CONFIG,
      CWD,
      probe(),
      HOME,
    )
    expect(repos).toEqual([{ name: "other", path: "/work/other" }])
  })

  test("expands ~ in --repo", async () => {
    const repos = await resolveRepositories(
      { repo: "~/code/tool" },
      CONFIG,
      CWD,
      probe(),
      HOME,
    )
    expect(repos).toEqual([{ name: "tool", path: "/home/dev/code/tool" }])
  })

  test("uses every configured repository by default", async () => {
    const repos = await resolveRepositories({}, CONFIG, CWD, probe(), HOME)
    expect(repos).toEqual([
      { name: "api", path: "/home/dev/code/api", branch: "main" },
      { name: "web", path: "/srv/web" },
    ])
  })

  test("--repo-name narrows the configured repositories", async () => {
    const repos = await resolveRepositories(
      { names: ["web"] },
      CONFIG,
      CWD,
      probe(),
      HOME,
    )
    expect(repos).toEqual([{ name: "web", path: "/srv/web" }])
  })

  test("a repeated --repo-name selects the repository once", async () => {
    const repos = await resolveRepositories(
      { names: ["web", "api", "web"] },
      CONFIG,
      CWD,
      probe(),
      HOME,
    )
    expect(repos).toEqual([
      { name: "web", path: "/srv/web" },
      { name: "api", path: "/home/dev/code/api", branch: "main" },
    ])
  })

  test("an unknown --repo-name is an error", async () => {
    const pending = resolveRepositories(
      { names: ["web", "docs"] },
      CONFIG,
      CWD,
      probe(),
      HOME,
    )
    await expect(pending).rejects.toThrow(NotFoundError)
    await expect(pending).rejects.toThrow(
      'no repository named "docs" in config',
    )
  })

  test("falls back to the current directory", async () => {
    const repos = await resolveRepositories(
      {},
      { repositories: [] },
      CWD,
      probe(CWD),
      HOME,
    )
    expect(repos).toEqual([{ name: "current", path: CWD }])
  })

  test("fails when nothing resolves", async () => {
    await expect(
      resolveRepositories({}, { repositories: [] }, CWD, probe(), HOME),
    ).rejects.toThrow(NoRepositoriesError)
  })
})

describe("registerRepository", () => {
  test("stores the path relative to home and keeps the branch", async () => {
    const result = await registerRepository(
      CONFIG,
      { path: "../docs", branch: "trunk" },
      "/home/dev/code/api",
      probe("/home/dev/code/docs"),
      HOME,
    )
    expect(result.status).toBe("added")
    if (result.status !== "added") return
    expect(result.entry).toEqual({
      name: "docs",
      path: "~/code/docs",
      branch: "trunk",
    })
    expect(result.config.repositories).toHaveLength(3)
    expect(CONFIG.repositories).toHaveLength(2)
  })

  test("honours an explicit name", async () => {
    const result = await registerRepository(
      { repositories: [] },
      { path: "/opt/svc", name: "service" },
      CWD,
      probe("/opt/svc"),
      HOME,
    )
    expect(result.status === "added" && result.entry).toEqual({
      name: "service",
      path: "/opt/svc",
    })
  })

  test("reports a path that is already registered", async () => {
    const result = await registerRepository(
      CONFIG,
      { path: "/home/dev/code/api" },
      CWD,
      probe("/home/dev/code/api"),
      HOME,
    )
    expect(result).toEqual({
      status: "duplicate",
      entry: { name: "api", path: "~/code/api", branch: "main" },
    })
  })

  test("rejects a name that is already taken", async () => {
    await expect(
      registerRepository(
        CONFIG,
        { path: "/elsewhere/web" },
        CWD,
        probe("/elsewhere/web"),
        HOME,
      ),
    ).rejects.toThrow(ValidationError)
  })

  test("rejects a path that is not a repository", async () => {
    await expect(
      registerRepository(
        CONFIG,
        { path: "/tmp/plain" },
        CWD,
        probe(),
        HOME,
      ),
    ).rejects.toThrow(NotARepositoryError)
  })
})

describe("unregisterRepository", () => {
  test("removes by name", () => {
    const { entry, config } = unregisterRepository(CONFIG, "web", CWD, HOME)
    expect(entry.name).toBe("web")
    expect(config.repositories.map((r) => r.name)).toEqual(["api"])
  })

  test("removes by path", () => {
    const { entry } = unregisterRepository(
      CONFIG,
      "/home/dev/code/api",
      CWD,
      HOME,
    )
    expect(entry.name).toBe("api")
  })

  test("throws when nothing matches", () => {
    expect(() => unregisterRepository(CONFIG, "docs", CWD, HOME)).toThrow(
      'no repository matches "docs"',
    )
  })
})

describe("repositoryStatuses", () => {
  test("probes each expanded path", async () => {
    const statuses = await repositoryStatuses(
      CONFIG,
      CWD,
      probe("/home/dev/code/api"),
      HOME,
    )
    expect(statuses).toEqual([
      { name: "api", path: "~/code/api", branch: "main", valid: true },
      { name: "web", path: "/srv/web", branch: null, valid: false },
    ])
  })
})
