import { Command } from "@commander-js/extra-typings"
import { render } from "ink"
import React from "react"

import { saveConfig } from "@/config"
import { RemoveCommand } from "@commands/remove/RemoveCommand"
import { runCommand } from "@commands/utils/command-context"
import { unregisterRepository } from "@commands/utils/repositories"

export const removeCommand = new Command("remove")
  .alias("rm")
  .argument("<identifier>", "Repository name or path")
  .option("--config <path>", "Config file path")
  .description("Unregister a repository by name or path")
  .action(async (identifier, opts) => {
    await runCommand(opts, ({ cwd, config, configFile }) => {
      const result = unregisterRepository(config, identifier, cwd)
      saveConfig(configFile, result.config)
      render(<RemoveCommand entry={result.entry} />).unmount()
    })
  })
