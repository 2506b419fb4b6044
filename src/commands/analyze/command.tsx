import { Command } from "@commander-js/extra-typings"
import { render } from "ink"
import React from "react"

import { RenderError, exitCodeOf } from "@/errors"
import {
  failureWarnings,
  formatCsv,
  formatOutput,
  toJsonReport,
} from "@/output"
import {
  OUTPUT_FORMATS,
  PERIODS,
  type AggregationOutcome,
  type AggregationProgress,
  type RepositoryFailure,
  type RepositorySpec,
} from "@/types"
import { StatsTable } from "@commands/analyze/StatsTable"
import { buildQuery } from "@commands/analyze/request"
import { runCommand } from "@commands/utils/command-context"
import {
  parseChoice,
  parseIsoDate,
  parseList,
  parsePositiveInt,
} from "@commands/utils/parsers"
import { resolveRepositories } from "@commands/utils/repositories"
import {
  AggregatorService,
  type AggregationQuery,
} from "@services/aggregator"
import { CollectorService } from "@services/collector"
import { GitService } from "@services/git"
import { App } from "@tui/App"
import type { ViewMode } from "@tui/mvu/model"

const HELP_TEXT = `
Repositories come from --repo, else the config file (narrowed with
--repo-name), else the current directory when it is a git repository.
Days are calendar dates in --timezone; the window includes both ends.

Chart keys (--output tui): m toggles split/single view, ←/→ or tab
switch metric, ↑/↓ or j/k scroll, q quits.

Examples:
  churnscope --days 30 --period weekly
  churnscope --repo ~/code/api --ext ts,tsx --output csv
  churnscope --from 2024-01-01 --to 2024-03-31 --timezone Europe/Berlin
  churnscope --repo-name api,web -o tui --single-metric`

function warnSkipped(failures: readonly RepositoryFailure[], quiet: boolean) {
  if (quiet) return
  for (const line of failureWarnings(failures)) console.error(line)
}

/**
 * Runs the chart UI. Collection happens inside the UI so the loading view
 * can show progress; a collection failure is rendered by the UI itself and
 * only sets the exit code here.
 */
async function runInteractive(
  aggregator: AggregatorService,
  repos: RepositorySpec[],
  query: AggregationQuery,
  initialMode: ViewMode,
): Promise<AggregationOutcome | undefined> {
  if (!process.stdin.isTTY) {
    throw new RenderError("standard input is not a terminal")
  }

  let outcome: AggregationOutcome | undefined
  let loadError: unknown
  const load = (onProgress: (progress: AggregationProgress) => void) =>
    aggregator.aggregate(repos, query, onProgress).then(
      (result) => {
        outcome = result
        return result
      },
      (err: unknown) => {
        loadError = err
        throw err
      },
    )

  const instance = render(<App load={load} initialMode={initialMode} />, {
    exitOnCtrlC: false,
  })
  try {
    await instance.waitUntilExit()
  } catch (err) {
    if (loadError === undefined) throw new RenderError(err)
    process.exitCode = exitCodeOf(loadError)
  }
  return outcome
}

export const analyzeCommand = new Command("analyze")
  .description("Aggregate commit statistics across repositories (default)")
  .option("-r, --repo <path>", "Analyze one repository, ignoring the config")
  .option(
    "--repo-name <names>",
    "Comma-separated configured repositories to include",
    parseList,
  )
  .option(
    "-d, --days <n>",
    "Days back from today (default: 7)",
    parsePositiveInt,
  )
  .option("--from <date>", "First day of the window (YYYY-MM-DD)", parseIsoDate)
  .option("--to <date>", "Last day of the window (YYYY-MM-DD)", parseIsoDate)
  .option(
    "-p, --period <period>",
    "Bucket size: daily, weekly, monthly or yearly (default: daily)",
    parseChoice(PERIODS),
  )
  .option("-b, --branch <name>", "Branch to walk in every repository")
  .option("--ext <list>", "Only count files with these extensions", parseList)
  .option("--include-merges", "Count merge commits")
  .option(
    "--timezone <tz>",
    'Calendar timezone: "local", "utc" or an IANA name (default: local)',
  )
  .option(
    "-o, --output <format>",
    "Output: table, json, csv or tui (default: table)",
    parseChoice(OUTPUT_FORMATS),
  )
  .option("--json", "Shorthand for --output json")
  .option("--single-metric", "Start the chart UI showing one metric")
  .option(
    "-c, --concurrency <n>",
    "Repositories collected at once (default: CPU count)",
    parsePositiveInt,
  )
  .option("--quiet", "Do not warn about skipped repositories")
  .option("--config <path>", "Config file path")
  .addHelpText("after", HELP_TEXT)
  .action(async (opts) => {
    await runCommand(opts, async ({ format, cwd, config }) => {
      const query = buildQuery(opts, config.defaults)
      const repos = await resolveRepositories(
        { repo: opts.repo, names: opts.repoName },
        config,
        cwd,
      )
      const aggregator = new AggregatorService(
        new CollectorService((path) => new GitService(path)),
        opts.concurrency,
      )
      const quiet = opts.quiet ?? false

      if (format === "tui") {
        const mode = opts.singleMetric ? "single" : "split"
        const outcome = await runInteractive(aggregator, repos, query, mode)
        if (outcome) warnSkipped(outcome.failures, quiet)
        return
      }

      const { snapshot, failures } = await aggregator.aggregate(repos, query)
      if (formatOutput(format, toJsonReport(snapshot, failures))) return

      if (format === "csv") {
        process.stdout.write(formatCsv(snapshot))
      } else {
        render(<StatsTable snapshot={snapshot} />).unmount()
      }
      warnSkipped(failures, quiet)
    })
  })
