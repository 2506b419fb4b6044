import { describe, expect, test } from "vitest"

import { METRICS } from "@/types"
import { maxScrollOffset } from "@tui/chart"
import type { Action } from "@tui/mvu/action"
import { initialModel, type Model, type ViewMode } from "@tui/mvu/model"
import { update } from "@tui/mvu/update"
import { failureOf, weekSnapshot } from "@tui/test-utils"

const SIZE = { columns: 80, rows: 20 }

function ready(mode: ViewMode = "split"): Extract<Model, { status: "ready" }> {
  const model = update(initialModel(SIZE, mode), {
    type: "loaded",
    snapshot: weekSnapshot(),
    failures: [],
  })
  if (model.status !== "ready") throw new Error("expected ready")
  return model
}

function run(model: Model, ...actions: Action[]): Model {
  return actions.reduce(update, model)
}

function view(model: Model) {
  if (model.status !== "ready") {
    throw new Error(`expected ready, got ${model.status}`)
  }
  return model.view
}

function times(n: number, action: Action): Action[] {
  return Array.from({ length: n }, () => action)
}

describe("update: loading", () => {
  test("tracks progress and size", () => {
    const model = run(
      initialModel(SIZE),
      {
        type: "progress",
        progress: { completed: 1, total: 3, current: "api" },
      },
      { type: "resize", columns: 100, rows: 40 },
    )
    expect(model).toEqual({
      status: "loading",
      size: { columns: 100, rows: 40 },
      progress: { completed: 1, total: 3, current: "api" },
      initialMode: "split",
    })
  })

  test("enters ready in the requested mode", () => {
    const failures = [failureOf("ghost", "/repos/ghost")]
    const model = update(initialModel(SIZE, "single"), {
      type: "loaded",
      snapshot: weekSnapshot(),
      failures,
    })
    expect(model.status).toBe("ready")
    if (model.status !== "ready") return
    expect(model.failures).toBe(failures)
    expect(model.view).toEqual({
      metricIndex: 0,
      mode: "single",
      scrollOffset: 0,
      size: SIZE,
    })
  })

  test("enters failed on a collection failure", () => {
    const error = new Error("nothing collected")
    expect(update(initialModel(SIZE), { type: "failed", error })).toEqual({
      status: "failed",
      error,
      size: SIZE,
    })
  })

  test("ignores navigation keys", () => {
    const model = initialModel(SIZE)
    expect(update(model, { type: "scrollDown" })).toBe(model)
  })
})

describe("update: quitting", () => {
  test("quit exits from every state", () => {
    expect(update(initialModel(SIZE), { type: "quit" })).toEqual({
      status: "exiting",
    })
    expect(update(ready(), { type: "forceQuit" })).toEqual({
      status: "exiting",
    })
    const failed = update(initialModel(SIZE), {
      type: "failed",
      error: new Error("x"),
    })
    expect(update(failed, { type: "quit" })).toEqual({ status: "exiting" })
  })

  test("exiting is terminal", () => {
    const exiting: Model = { status: "exiting" }
    expect(update(exiting, { type: "scrollDown" })).toBe(exiting)
    expect(
      update(exiting, {
        type: "loaded",
        snapshot: weekSnapshot(),
        failures: [],
      }),
    ).toBe(exiting)
  })
})

describe("update: metric cycling", () => {
  test("cycling next metricCount times returns to the start", () => {
    const start = ready("single")
    const model = run(start, ...times(METRICS.length, { type: "nextMetric" }))
    expect(view(model).metricIndex).toBe(0)
  })

  test("wraps in both directions", () => {
    const previous = run(ready("single"), { type: "prevMetric" })
    expect(view(previous).metricIndex).toBe(4)
    expect(
      view(run(ready("single"), ...times(6, { type: "nextMetric" })))
        .metricIndex,
    ).toBe(1)
  })

  test("is a no-op in split mode", () => {
    const model = ready("split")
    expect(update(model, { type: "nextMetric" })).toBe(model)
    expect(update(model, { type: "prevMetric" })).toBe(model)
  })
})

describe("update: view mode", () => {
  test("toggling twice restores mode and metric", () => {
    const start = run(
      ready("single"),
      { type: "nextMetric" },
      { type: "nextMetric" },
    )
    const model = run(
      start,
      { type: "toggleViewMode" },
      { type: "toggleViewMode" },
    )
    expect(view(model).mode).toBe("single")
    expect(view(model).metricIndex).toBe(2)
  })

  test("toggle flips between split and single", () => {
    expect(view(run(ready("split"), { type: "toggleViewMode" })).mode).toBe(
      "single",
    )
  })
})

describe("update: scrolling", () => {
  test("split content is taller than the viewport", () => {
    // 7 buckets: 5 sections of 8 lines, 5 spacers, 34 activity lines = 79;
    // viewport is 20 - 7 = 13 rows.
    expect(maxScrollOffset(weekSnapshot(), view(ready()))).toBe(66)
  })

  test("scrolling past the end pins at the maximum", () => {
    const model = run(ready(), ...times(100, { type: "scrollDown" }))
    expect(view(model).scrollOffset).toBe(66)
  })

  test("scrolling up never goes below zero", () => {
    const model = run(
      ready(),
      { type: "scrollDown" },
      ...times(5, { type: "scrollUp" }),
    )
    expect(view(model).scrollOffset).toBe(0)
  })

  test("switching to a shorter chart re-clamps", () => {
    const scrolled = run(ready(), ...times(30, { type: "scrollDown" }))
    expect(view(scrolled).scrollOffset).toBe(30)
    // Single view of 7 buckets is 8 lines and fits entirely.
    const toggled = update(scrolled, { type: "toggleViewMode" })
    expect(view(toggled).scrollOffset).toBe(0)
  })

  test("growing the terminal re-clamps", () => {
    const scrolled = run(ready(), ...times(100, { type: "scrollDown" }))
    const resized = update(scrolled, { type: "resize", columns: 80, rows: 60 })
    // viewport 53 rows: max offset 79 - 53 = 26
    expect(view(resized).scrollOffset).toBe(26)
    expect(view(resized).size).toEqual({ columns: 80, rows: 60 })
  })

  test("single view that fits does not scroll", () => {
    const model = run(ready("single"), ...times(3, { type: "scrollDown" }))
    expect(view(model).scrollOffset).toBe(0)
  })
})
