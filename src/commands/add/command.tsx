import { Command } from "@commander-js/extra-typings"
import { render } from "ink"
import React from "react"

import { saveConfig } from "@/config"
import { AddCommand } from "@commands/add/AddCommand"
import { runCommand } from "@commands/utils/command-context"
import { registerRepository } from "@commands/utils/repositories"

const HELP_TEXT = `
The path must be a git repository. It is stored as an absolute path with
the home directory written as ~. Adding a path twice changes nothing.

Examples:
  churnscope add .
  churnscope add ~/code/api --name api --branch main`

export const addCommand = new Command("add")
  .argument("<path>", "Path to a git repository")
  .option("-n, --name <name>", "Name to show (default: directory name)")
  .option("-b, --branch <branch>", "Branch to analyze (default: HEAD)")
  .option("--config <path>", "Config file path")
  .description("Register a repository in the config file")
  .addHelpText("after", HELP_TEXT)
  .action(async (path, opts) => {
    await runCommand(opts, async ({ cwd, config, configFile }) => {
      const result = await registerRepository(
        config,
        { path, name: opts.name, branch: opts.branch },
        cwd,
      )
      if (result.status === "added") saveConfig(configFile, result.config)

      render(
        <AddCommand
          entry={result.entry}
          added={result.status === "added"}
          configFile={configFile}
        />,
      ).unmount()
    })
  })
