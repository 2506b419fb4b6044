import { render } from "ink-testing-library"
import React from "react"
import { describe, expect, test } from "vitest"

import { ListCommand } from "@commands/list/ListCommand"
import { linesOf } from "@commands/utils/test-utils"

describe("ListCommand", () => {
  test("shows a message when nothing is registered", () => {
    const { lastFrame } = render(<ListCommand repositories={[]} />)
    expect(linesOf(lastFrame() ?? "")).toEqual(["No repositories registered."])
  })

  test("aligns columns and marks invalid paths", () => {
    const { lastFrame } = render(
      <ListCommand
        repositories={[
          { name: "api", path: "~/code/api", branch: "main", valid: true },
          { name: "web", path: "/srv/web", branch: null, valid: false },
        ]}
      />,
    )
    expect(linesOf(lastFrame() ?? "")).toEqual([
      "Name  Path        Branch  Status",
      "api   ~/code/api  main    ✓",
      "web   /srv/web    HEAD    ✗",
    ])
  })
})
