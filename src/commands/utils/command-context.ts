import { type Config, configPath, loadConfig } from "@/config"
import { handleError } from "@/errors"
import { resolveFormat } from "@/output"
import type { OutputFormat } from "@/types"

export interface CommandContext {
  format: OutputFormat
  cwd: string
  /** Resolved path of the config file, whether or not it exists yet. */
  configFile: string
  config: Config
}

/** Flags every command accepts for output selection and config location. */
export interface CommonOptions {
  output?: OutputFormat
  json?: boolean
  config?: string
}

/**
 * Loads the config and runs the handler. Any error thrown by either is
 * reported through handleError in the requested output format.
 */
export async function runCommand(
  opts: CommonOptions,
  handler: (ctx: CommandContext) => void | Promise<void>,
): Promise<void> {
  const format = resolveFormat(opts)
  try {
    const configFile = configPath(opts.config)
    const config = loadConfig(configFile)
    await handler({ format, cwd: process.cwd(), configFile, config })
  } catch (err) {
    handleError(err, format)
  }
}
