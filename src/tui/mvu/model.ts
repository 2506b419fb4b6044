import type {
  AggregatedSnapshot,
  AggregationProgress,
  RepositoryFailure,
} from "@/types"

/** Split shows every metric at once; Single shows the selected one. */
export type ViewMode = "split" | "single"

export interface TerminalSize {
  columns: number
  rows: number
}

/** Interactive state once data has arrived. */
export interface ViewState {
  /** Index into METRICS. */
  metricIndex: number
  mode: ViewMode
  /** First visible content line; always within [0, maxScrollOffset]. */
  scrollOffset: number
  size: TerminalSize
}

export type Model =
  | {
      status: "loading"
      size: TerminalSize
      progress: AggregationProgress
      /** Mode the Ready state starts in. */
      initialMode: ViewMode
    }
  | {
      status: "ready"
      snapshot: AggregatedSnapshot
      failures: RepositoryFailure[]
      view: ViewState
    }
  | { status: "failed"; error: Error; size: TerminalSize }
  | { status: "exiting" }

export function initialModel(
  size: TerminalSize,
  initialMode: ViewMode = "split",
): Model {
  return {
    status: "loading",
    size,
    progress: { completed: 0, total: 0 },
    initialMode,
  }
}
