import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs"
import { homedir } from "os"
import { dirname, join } from "path"
import { z } from "zod"

import { ConfigError } from "@/errors"
import { PERIODS } from "@/types"

const repositorySchema = z.strictObject({
  name: z.string().min(1),
  path: z.string().min(1),
  branch: z.string().min(1).optional(),
})

const defaultsSchema = z.strictObject({
  days: z.number().int().positive().optional(),
  period: z.enum(PERIODS).optional(),
  timezone: z.string().min(1).optional(),
  includeMerges: z.boolean().optional(),
  extensions: z.array(z.string()).optional(),
})

export const configSchema = z
  .strictObject({
    $schema: z.string().optional(),
    repositories: z.array(repositorySchema).default([]),
    defaults: defaultsSchema.optional(),
  })
  .refine(
    (config) =>
      new Set(config.repositories.map((r) => r.name)).size ===
      config.repositories.length,
    { message: "repository names must be unique", path: ["repositories"] },
  )

/** Registered repositories and default analysis options. */
export type Config = z.infer<typeof configSchema>

/** A repository entry as stored in the config file. */
export type RepositoryEntry = z.infer<typeof repositorySchema>

/** Per-run defaults applied when the matching flag is absent. */
export type ConfigDefaults = z.infer<typeof defaultsSchema>

export const EMPTY_CONFIG: Config = { repositories: [] }

/**
 * Resolves the config file path:
 * explicit path > $CHURNSCOPE_CONFIG > $XDG_CONFIG_HOME > ~/.config.
 */
export function configPath(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicit) return expandHome(explicit)
  if (env.CHURNSCOPE_CONFIG) return expandHome(env.CHURNSCOPE_CONFIG)
  const base = env.XDG_CONFIG_HOME || join(homedir(), ".config")
  return join(base, "churnscope", "config.json")
}

/** Expands a leading `~` to the home directory. */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home
  if (path.startsWith("~/")) return join(home, path.slice(2))
  return path
}

/** Replaces a home-directory prefix with `~`. */
export function collapseHome(path: string, home: string = homedir()): string {
  if (path === home) return "~"
  if (path.startsWith(home + "/")) return "~" + path.slice(home.length)
  return path
}

/**
 * Loads and validates the config file. A missing file is an empty config.
 * Throws ConfigError on unreadable JSON or schema violations.
 */
export function loadConfig(path: string): Config {
  if (!existsSync(path)) return { ...EMPTY_CONFIG, repositories: [] }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"))
  } catch {
    throw new ConfigError(`Invalid config: ${path} is not valid JSON`)
  }

  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue?.path.length ? `"${issue.path.join(".")}": ` : ""
    throw new ConfigError(
      `Invalid config: ${where}${issue?.message ?? "invalid value"} (${path})`,
    )
  }
  return result.data
}

/** Writes the config as pretty JSON, creating parent directories. */
export function saveConfig(path: string, config: Config): void {
  const result = configSchema.safeParse(config)
  if (!result.success) {
    throw new ConfigError(`Invalid config: ${result.error.issues[0]?.message}`)
  }
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, JSON.stringify(result.data, null, 2) + "\n")
}
