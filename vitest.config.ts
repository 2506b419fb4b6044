import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const fromRoot = (path: string) =>
  fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      "@commands": fromRoot("./src/commands"),
      "@services": fromRoot("./src/services"),
      "@stats": fromRoot("./src/stats"),
      "@tui": fromRoot("./src/tui"),
      "@": fromRoot("./src"),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "src/**/*.test.tsx"],
  },
})
