import { Command } from "@commander-js/extra-typings"
import { render } from "ink"
import React from "react"

import { formatOutput } from "@/output"
import { ListCommand } from "@commands/list/ListCommand"
import { runCommand } from "@commands/utils/command-context"
import { repositoryStatuses } from "@commands/utils/repositories"

export const listCommand = new Command("list")
  .alias("ls")
  .option("--json", "Print the repositories as a JSON array")
  .option("--config <path>", "Config file path")
  .description("Show registered repositories and whether each path is valid")
  .action(async (opts) => {
    await runCommand(opts, async ({ format, cwd, config }) => {
      const repositories = await repositoryStatuses(config, cwd)
      if (formatOutput(format, repositories)) return
      render(<ListCommand repositories={repositories} />).unmount()
    })
  })
