/**
 * Polls the rendered frames until one satisfies the predicate.
 * Searches every frame rather than the last one, because a component that
 * exits may unmount before the test looks.
 * @returns The first matching frame, or the latest frame on timeout.
 */
export async function waitForFrame(
  frames: readonly string[],
  predicate: (frame: string) => boolean,
  timeout = 2000,
): Promise<string> {
  const deadline = Date.now() + timeout
  while (Date.now() < deadline) {
    const match = frames.find(predicate)
    if (match !== undefined) return match
    await new Promise((r) => setTimeout(r, 10))
  }
  return frames[frames.length - 1] ?? ""
}

// Color and style (SGR) sequences.
// eslint-disable-next-line no-control-regex
const ANSI_STYLE = /\u001b\[[0-9;]*m/g

/** Splits a frame into lines with styling and trailing padding removed. */
export function linesOf(frame: string): string[] {
  return frame
    .replace(ANSI_STYLE, "")
    .split("\n")
    .map((line) => line.trimEnd())
}
