/**
 * Engine configuration.
 *
 * Read from the active `ConfigProvider` (environment variables by default):
 *
 * - `ET_PARTITION_TOLERANCE`: relative tolerance for partition checks, default `0.01`
 * - `ET_CONCURRENCY`: formulas run at once by `runAll`, default `1`
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer } from "effect"

/**
 * @category Config
 * @since 0.1.0
 */
export interface EngineSettings {
  readonly partitionTolerance: number
  readonly concurrency: number
}

/**
 * @category Config
 * @since 0.1.0
 */
export const DEFAULT_SETTINGS: EngineSettings = {
  partitionTolerance: 0.01,
  concurrency: 1,
}

/**
 * `Config` description of {@link EngineSettings}.
 *
 * @category Config
 * @since 0.1.0
 */
export const engineSettings: Config.Config<EngineSettings> = Config.all({
  partitionTolerance: Config.number("ET_PARTITION_TOLERANCE").pipe(
    Config.validate({
      message: "partition tolerance must be a positive number",
      validation: (value) => Number.isFinite(value) && value > 0,
    }),
    Config.withDefault(DEFAULT_SETTINGS.partitionTolerance),
  ),
  concurrency: Config.integer("ET_CONCURRENCY").pipe(
    Config.validate({
      message: "concurrency must be at least 1",
      validation: (value) => value >= 1,
    }),
    Config.withDefault(DEFAULT_SETTINGS.concurrency),
  ),
})

/**
 * @category Services
 * @since 0.1.0
 */
export class EngineConfig extends Context.Tag("et-intercompare/EngineConfig")<EngineConfig, EngineSettings>() {
  /** Settings read from the active `ConfigProvider`. */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const settings = yield* engineSettings
      yield* Effect.logDebug("engine configuration loaded").pipe(
        Effect.annotateLogs({
          partitionTolerance: settings.partitionTolerance,
          concurrency: settings.concurrency,
        }),
      )
      return settings
    }),
  )

  /** Fixed settings, for tests and embedding. Missing fields take their defaults. */
  static make(settings: Partial<EngineSettings> = {}) {
    return Layer.succeed(this, { ...DEFAULT_SETTINGS, ...settings })
  }
}
