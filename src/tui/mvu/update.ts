import { METRICS } from "@/types"
import { maxScrollOffset } from "@tui/chart"
import type { Action } from "@tui/mvu/action"
import type { Model, TerminalSize, ViewState } from "@tui/mvu/model"

type ReadyModel = Extract<Model, { status: "ready" }>

function clamp(model: ReadyModel, view: ViewState): ReadyModel {
  const max = maxScrollOffset(model.snapshot, view)
  const scrollOffset = Math.min(Math.max(0, view.scrollOffset), max)
  return { ...model, view: { ...view, scrollOffset } }
}

function sizeOf(action: { columns: number; rows: number }): TerminalSize {
  return { columns: action.columns, rows: action.rows }
}

function cycle(index: number, step: number): number {
  return (index + step + METRICS.length) % METRICS.length
}

function updateReady(model: ReadyModel, action: Action): Model {
  const { view } = model
  switch (action.type) {
    case "nextMetric":
    case "prevMetric": {
      if (view.mode !== "single") return model
      const step = action.type === "nextMetric" ? 1 : -1
      const metricIndex = cycle(view.metricIndex, step)
      return clamp(model, { ...view, metricIndex })
    }
    case "scrollUp":
      return clamp(model, { ...view, scrollOffset: view.scrollOffset - 1 })
    case "scrollDown":
      return clamp(model, { ...view, scrollOffset: view.scrollOffset + 1 })
    case "toggleViewMode":
      return clamp(model, {
        ...view,
        mode: view.mode === "split" ? "single" : "split",
      })
    case "resize":
      return clamp(model, { ...view, size: sizeOf(action) })
    default:
      return model
  }
}

/**
 * Pure transition function of the chart UI. Exiting is terminal; quit
 * from any other state exits. Scroll is re-clamped on every Ready transition.
 */
export function update(model: Model, action: Action): Model {
  if (model.status === "exiting") return model
  if (action.type === "quit" || action.type === "forceQuit") {
    return { status: "exiting" }
  }

  switch (model.status) {
    case "loading":
      switch (action.type) {
        case "progress":
          return { ...model, progress: action.progress }
        case "resize":
          return { ...model, size: sizeOf(action) }
        case "loaded": {
          const view: ViewState = {
            metricIndex: 0,
            mode: model.initialMode,
            scrollOffset: 0,
            size: model.size,
          }
          return {
            status: "ready",
            snapshot: action.snapshot,
            failures: action.failures,
            view,
          }
        }
        case "failed":
          return { status: "failed", error: action.error, size: model.size }
        default:
          return model
      }
    case "ready":
      return updateReady(model, action)
    case "failed":
      if (action.type === "resize") {
        return { ...model, size: sizeOf(action) }
      }
      return model
  }
}
