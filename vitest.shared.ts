import * as path from "node:path"
import { fileURLToPath } from "node:url"

import type { ViteUserConfig } from "vitest/config"

const root = fileURLToPath(new URL(".", import.meta.url))

const alias = (dir: string, name = `@batch-target/${dir}`) => ({
  [`${name}`]: path.join(root, "packages", dir, "src")
})

const config: ViteUserConfig = {
  test: {
    alias: {
      ...alias("core")
    },
    watch: false,
    globals: true,
    environment: "node",
    include: ["test/**/*.{test,spec}.ts"],
    reporters: ["default"]
  }
}

export default config
