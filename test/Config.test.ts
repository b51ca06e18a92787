import { describe, it, expect } from "@effect/vitest"
import { ConfigProvider, Effect, Exit, Layer } from "effect"
import { DEFAULT_SETTINGS, EngineConfig } from "../src/Config.js"

const fromEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  EngineConfig.layer.pipe(Layer.provide(Layer.setConfigProvider(ConfigProvider.fromMap(new Map(entries)))))

describe("EngineConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.gen(function* () {
      const settings = yield* EngineConfig

      expect(settings).toEqual(DEFAULT_SETTINGS)
    }).pipe(Effect.provide(fromEnv([]))))

  it.effect("reads settings from the provider", () =>
    Effect.gen(function* () {
      const settings = yield* EngineConfig

      expect(settings.partitionTolerance).toBe(0.05)
      expect(settings.concurrency).toBe(4)
    }).pipe(Effect.provide(fromEnv([["ET_PARTITION_TOLERANCE", "0.05"], ["ET_CONCURRENCY", "4"]]))))

  it.effect("rejects a non-positive tolerance", () =>
    Effect.gen(function* () {
      const exit = yield* Effect.exit(
        EngineConfig.pipe(Effect.provide(fromEnv([["ET_PARTITION_TOLERANCE", "0"]]))),
      )

      expect(Exit.isFailure(exit)).toBe(true)
    }))

  it.effect("rejects a fractional concurrency", () =>
    Effect.gen(function* () {
      const exit = yield* Effect.exit(EngineConfig.pipe(Effect.provide(fromEnv([["ET_CONCURRENCY", "1.5"]]))))

      expect(Exit.isFailure(exit)).toBe(true)
    }))

  it.effect("fills unspecified fields of fixed settings", () =>
    Effect.gen(function* () {
      const settings = yield* EngineConfig

      expect(settings).toEqual({ partitionTolerance: 0.2, concurrency: 1 })
    }).pipe(Effect.provide(EngineConfig.make({ partitionTolerance: 0.2 }))))
})
