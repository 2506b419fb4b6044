import { Command } from "@commander-js/extra-typings"

import { addCommand } from "@commands/add/command"
import { analyzeCommand } from "@commands/analyze/command"
import { listCommand } from "@commands/list/command"
import { removeCommand } from "@commands/remove/command"

const HELP_TEXT = `
Getting started:
  1. Register repositories:   churnscope add ~/code/api
  2. See the last week:       churnscope
  3. Explore interactively:   churnscope --days 90 --period weekly -o tui

Running without a subcommand runs analyze; see churnscope analyze --help
for every option. The config file lives at $CHURNSCOPE_CONFIG, else
$XDG_CONFIG_HOME/churnscope/config.json, else ~/.config/churnscope/config.json.`

export const program = new Command()
  .name("churnscope")
  .description("Commit churn statistics across local git repositories")
  .version("0.1.0")
  .addHelpText("after", HELP_TEXT)
  .addCommand(analyzeCommand, { isDefault: true })
  .addCommand(addCommand)
  .addCommand(removeCommand)
  .addCommand(listCommand)
