import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { defaultConfig, resolveConfig } from "../../src/core/config.js"

describe("resolveConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig({}, undefined)).toEqual(defaultConfig)
      expect(defaultConfig).toEqual({ emitDiscriminator: true, dateFormat: "iso", logLevel: "Info" })
    }))

  it.effect("prefers explicit options over the config file", () =>
    Effect.sync(() => {
      const resolved = resolveConfig(
        { emitDiscriminator: false },
        { emitDiscriminator: true, dateFormat: "epoch" }
      )
      expect(resolved).toEqual({ emitDiscriminator: false, dateFormat: "epoch", logLevel: "Info" })
    }))
})
