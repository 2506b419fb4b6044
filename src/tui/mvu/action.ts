import type { Key } from "ink"

import type {
  AggregatedSnapshot,
  AggregationProgress,
  RepositoryFailure,
} from "@/types"

/** Every event the chart UI reacts to. */
export type Action =
  | { type: "quit" }
  | { type: "forceQuit" }
  | { type: "nextMetric" }
  | { type: "prevMetric" }
  | { type: "scrollUp" }
  | { type: "scrollDown" }
  | { type: "toggleViewMode" }
  | { type: "resize"; columns: number; rows: number }
  | { type: "progress"; progress: AggregationProgress }
  | {
      type: "loaded"
      snapshot: AggregatedSnapshot
      failures: RepositoryFailure[]
    }
  | { type: "failed"; error: Error }
  | { type: "noop" }

/** The key flags the key map looks at. */
export type KeyPress = Pick<
  Key,
  | "escape"
  | "ctrl"
  | "shift"
  | "tab"
  | "leftArrow"
  | "rightArrow"
  | "upArrow"
  | "downArrow"
>

/** Maps a key press to an action. Unbound keys map to `noop`. */
export function actionFromKey(input: string, key: KeyPress): Action {
  if (key.ctrl && input === "c") return { type: "forceQuit" }
  if (key.escape || input === "q") return { type: "quit" }
  if (key.tab) return { type: key.shift ? "prevMetric" : "nextMetric" }
  if (key.rightArrow || input === "l") return { type: "nextMetric" }
  if (key.leftArrow || input === "h") return { type: "prevMetric" }
  if (key.upArrow || input === "k") return { type: "scrollUp" }
  if (key.downArrow || input === "j") return { type: "scrollDown" }
  if (input === "m") return { type: "toggleViewMode" }
  return { type: "noop" }
}
