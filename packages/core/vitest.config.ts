/// <reference types="vitest" />

import { fileURLToPath } from "node:url"
import { mergeConfig, type ViteUserConfig } from "vitest/config"

import shared from "../../vitest.shared.ts"

const config: ViteUserConfig = {
  root: fileURLToPath(new URL(".", import.meta.url)),
  cacheDir: "../../node_modules/.vite/@batch-target/core",
  test: {
    ...shared.test
  }
}

export default mergeConfig(shared, config)
