import {
  METRIC_COLORS,
  METRIC_LABELS,
  METRICS,
  WEEKDAY_LABELS,
  type ActivityStats,
  type AggregatedSnapshot,
  type Metric,
} from "@/types"
import type { TerminalSize, ViewMode, ViewState } from "@tui/mvu/model"

/** Rows taken by the header above the chart. */
export const HEADER_ROWS = 3
/** Rows taken by the footer below the chart. */
export const FOOTER_ROWS = 4

const ACTIVITY_COLOR = "magenta"
const MIN_BAR_WIDTH = 4

export type ChartLine =
  | { kind: "title"; text: string; color: string }
  | {
      kind: "bar"
      label: string
      value: number
      /** Largest magnitude in the section; bars scale against it. */
      max: number
      color: string
      /** Negative values extend left of a center axis. */
      diverging: boolean
    }
  | { kind: "blank" }

type BarLine = Extract<ChartLine, { kind: "bar" }>

export function formatNumber(n: number): string {
  return n.toLocaleString("en-US")
}

export function viewportHeight(size: TerminalSize): number {
  return Math.max(1, size.rows - HEADER_ROWS - FOOTER_ROWS)
}

function barSection(
  title: string,
  color: string,
  entries: { label: string; value: number }[],
  diverging: boolean,
): ChartLine[] {
  const max = entries.reduce((m, e) => Math.max(m, Math.abs(e.value)), 0)
  return [
    { kind: "title", text: title, color },
    ...entries.map(
      (e): ChartLine => ({ kind: "bar", ...e, max, color, diverging }),
    ),
  ]
}

/** Title plus one bar per bucket for a single metric. */
export function metricSection(
  snapshot: AggregatedSnapshot,
  metric: Metric,
): ChartLine[] {
  return barSection(
    `${METRIC_LABELS[metric]} (total ${formatNumber(snapshot.total[metric])})`,
    METRIC_COLORS[metric],
    snapshot.series.map((e) => ({
      label: e.key.label,
      value: e.value[metric],
    })),
    metric === "netLines",
  )
}

/** Commits by weekday, then by hour of day. */
export function activitySections(activity: ActivityStats): ChartLine[] {
  return [
    ...barSection(
      "Commits by weekday",
      ACTIVITY_COLOR,
      WEEKDAY_LABELS.map((label, i) => ({
        label,
        value: activity.weekday[i] ?? 0,
      })),
      false,
    ),
    { kind: "blank" },
    ...barSection(
      "Commits by hour",
      ACTIVITY_COLOR,
      activity.hourly.map((value, hour) => ({
        label: String(hour).padStart(2, "0"),
        value,
      })),
      false,
    ),
  ]
}

/** Every content line for the given mode, before scrolling. */
export function chartLines(
  snapshot: AggregatedSnapshot,
  mode: ViewMode,
  metric: Metric,
): ChartLine[] {
  if (mode === "single") return metricSection(snapshot, metric)

  const lines: ChartLine[] = []
  for (const m of METRICS) {
    lines.push(...metricSection(snapshot, m), { kind: "blank" })
  }
  lines.push(...activitySections(snapshot.activity))
  return lines
}

export function metricAt(index: number): Metric {
  return METRICS[index] ?? METRICS[0]
}

export function contentHeight(
  snapshot: AggregatedSnapshot,
  view: Pick<ViewState, "mode" | "metricIndex">,
): number {
  return chartLines(snapshot, view.mode, metricAt(view.metricIndex)).length
}

export function maxScrollOffset(
  snapshot: AggregatedSnapshot,
  view: Pick<ViewState, "mode" | "metricIndex" | "size">,
): number {
  return Math.max(0, contentHeight(snapshot, view) - viewportHeight(view.size))
}

/** Number of filled cells for a value; any non-zero value gets at least one. */
export function barCells(value: number, max: number, width: number): number {
  if (value === 0 || max <= 0 || width <= 0) return 0
  const cells = Math.round((Math.abs(value) / max) * width)
  return Math.min(width, Math.max(1, cells))
}

/** Column widths shared by every bar row so they line up. */
export interface RowLayout {
  labelWidth: number
  valueWidth: number
  barWidth: number
}

export function rowLayout(lines: ChartLine[], columns: number): RowLayout {
  let labelWidth = 0
  let valueWidth = 0
  for (const line of lines) {
    if (line.kind !== "bar") continue
    labelWidth = Math.max(labelWidth, line.label.length)
    valueWidth = Math.max(valueWidth, formatNumber(line.value).length)
  }
  const barWidth = Math.max(
    MIN_BAR_WIDTH,
    columns - labelWidth - valueWidth - 2,
  )
  return { labelWidth, valueWidth, barWidth }
}

/** The bar itself, exactly `width` characters wide. */
export function renderBar(line: BarLine, width: number): string {
  if (!line.diverging) {
    const cells = barCells(line.value, line.max, width)
    return "█".repeat(cells) + " ".repeat(width - cells)
  }
  const half = Math.floor((width - 1) / 2)
  const rest = width - 1 - half
  if (line.value < 0) {
    const cells = barCells(line.value, line.max, half)
    return (
      " ".repeat(half - cells) + "█".repeat(cells) + "│" + " ".repeat(rest)
    )
  }
  const cells = barCells(line.value, line.max, rest)
  return (
    " ".repeat(half) + "│" + "█".repeat(cells) + " ".repeat(rest - cells)
  )
}

/** Label and value columns of a bar row, padded to the layout. */
export function rowParts(
  line: BarLine,
  layout: RowLayout,
): { label: string; bar: string; value: string } {
  return {
    label: line.label.padEnd(layout.labelWidth),
    bar: renderBar(line, layout.barWidth),
    value: formatNumber(line.value).padStart(layout.valueWidth),
  }
}
