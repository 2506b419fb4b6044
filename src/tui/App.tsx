import { Box, useApp, useInput, useStdout } from "ink"
import React, { useEffect, useReducer } from "react"

import type { AggregationOutcome, AggregationProgress } from "@/types"
import { chartLines, metricAt, viewportHeight } from "@tui/chart"
import { ChartView } from "@tui/components/ChartView"
import { Footer } from "@tui/components/Footer"
import { Header } from "@tui/components/Header"
import { FailedView, LoadingView } from "@tui/components/StatusViews"
import { actionFromKey } from "@tui/mvu/action"
import { initialModel, type TerminalSize, type ViewMode } from "@tui/mvu/model"
import { update } from "@tui/mvu/update"

const DEFAULT_SIZE: TerminalSize = { columns: 80, rows: 24 }

/** Props for the App component. */
interface AppProps {
  /** Runs collection; called once on mount. */
  load: (
    onProgress: (progress: AggregationProgress) => void,
  ) => Promise<AggregationOutcome>
  initialMode?: ViewMode
}

function terminalSize(stdout: NodeJS.WriteStream): TerminalSize {
  return {
    columns: stdout.columns > 0 ? stdout.columns : DEFAULT_SIZE.columns,
    rows: stdout.rows > 0 ? stdout.rows : DEFAULT_SIZE.rows,
  }
}

/**
 * Interactive chart UI. State lives in one reducer driven by key presses,
 * terminal resizes and the collection result; rendering is a pure
 * function of that state.
 */
export function App({ load, initialMode = "split" }: AppProps) {
  const { exit } = useApp()
  const { stdout } = useStdout()
  const [model, dispatch] = useReducer(update, undefined, () =>
    initialModel(terminalSize(stdout), initialMode),
  )

  useInput((input, key) => dispatch(actionFromKey(input, key)))

  useEffect(() => {
    const onResize = () =>
      dispatch({ type: "resize", ...terminalSize(stdout) })
    stdout.on("resize", onResize)
    return () => {
      stdout.off("resize", onResize)
    }
  }, [stdout])

  useEffect(() => {
    let active = true
    load((progress) => {
      if (active) dispatch({ type: "progress", progress })
    })
      .then((outcome) => {
        if (active) dispatch({ type: "loaded", ...outcome })
      })
      .catch((err: unknown) => {
        const error = err instanceof Error ? err : new Error(String(err))
        if (active) dispatch({ type: "failed", error })
      })
    return () => {
      active = false
    }
  }, [load])

  useEffect(() => {
    if (model.status === "exiting") exit()
    else if (model.status === "failed") exit(model.error)
  }, [model, exit])

  switch (model.status) {
    case "loading":
      return <LoadingView progress={model.progress} />
    case "failed":
      return <FailedView error={model.error} />
    case "exiting":
      return null
    case "ready": {
      const { snapshot, view } = model
      const metric = metricAt(view.metricIndex)
      const lines = chartLines(snapshot, view.mode, metric)
      const height = viewportHeight(view.size)
      const last = Math.min(lines.length, view.scrollOffset + height)
      return (
        <Box flexDirection="column">
          <Header snapshot={snapshot} columns={view.size.columns} />
          <ChartView
            lines={lines}
            offset={view.scrollOffset}
            height={height}
            columns={view.size.columns}
          />
          <Footer
            mode={view.mode}
            metric={metric}
            total={snapshot.total}
            skipped={model.failures.length}
            position={{
              first: Math.min(lines.length, view.scrollOffset + 1),
              last,
              height: lines.length,
            }}
            columns={view.size.columns}
          />
        </Box>
      )
    }
  }
}
