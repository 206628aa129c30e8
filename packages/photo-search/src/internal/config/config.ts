import { Config, ConfigError, Context, Effect, Layer, Option } from 'effect'

export interface PhotoSearchConfigShape {
  readonly debounceMs: number
  readonly loadSuggestions: boolean
}

export interface PhotoSearchConfigSnapshot extends PhotoSearchConfigShape {
  readonly source: 'runtime' | 'config'
}

// Runtime-grade override, takes precedence over ConfigProvider values.
export class PhotoSearchConfigTag extends Context.Tag('@photo-search/core/Config')<
  PhotoSearchConfigTag,
  PhotoSearchConfigShape
>() {}

export const DEFAULT_CONFIG: PhotoSearchConfigShape = {
  debounceMs: 0,
  loadSuggestions: true,
}

const isNonNegativeInteger = (n: number) => Number.isInteger(n) && n >= 0

// Runtime overrides bypass ConfigProvider, so validation happens in load.
const checkOverride = (config: PhotoSearchConfigShape): Effect.Effect<PhotoSearchConfigShape, ConfigError.ConfigError> =>
  isNonNegativeInteger(config.debounceMs)
    ? Effect.succeed(config)
    : Effect.fail(
        ConfigError.InvalidData(
          ['photo_search.debounce_ms'],
          `Expected a non-negative integer, got ${config.debounceMs}`,
        ),
      )

const PhotoSearchConfigFromEnv = {
  /**
   * Quiet period (ms) a keyword must survive before its search starts.
   * - 0 disables the timer: keywords are only conflated while the consumer is busy.
   */
  debounceMs: Config.integer('photo_search.debounce_ms').pipe(
    Config.validate({ message: 'Expected a non-negative integer', validation: isNonNegativeInteger }),
    Config.withDefault(DEFAULT_CONFIG.debounceMs),
  ),

  loadSuggestions: Config.boolean('photo_search.load_suggestions').pipe(
    Config.withDefault(DEFAULT_CONFIG.loadSuggestions),
  ),
}

export const PhotoSearchConfig = {
  tag: PhotoSearchConfigTag,

  /**
   * Overlays a partial config on top of the current one.
   * - If the Env already contains PhotoSearchConfigTag, merge on top of it.
   * - Otherwise, use DEFAULT_CONFIG as the base.
   */
  replace(config: Partial<PhotoSearchConfigShape>): Layer.Layer<PhotoSearchConfigTag> {
    return Layer.effect(
      PhotoSearchConfigTag,
      Effect.gen(function* () {
        const current = yield* Effect.serviceOption(PhotoSearchConfigTag)
        const base = Option.isSome(current) ? current.value : DEFAULT_CONFIG
        return {
          ...base,
          ...config,
        }
      }),
    )
  },

  load: Effect.gen(function* () {
    const override = yield* Effect.serviceOption(PhotoSearchConfigTag)
    if (Option.isSome(override)) {
      const checked = yield* checkOverride(override.value)
      const snapshot: PhotoSearchConfigSnapshot = { ...checked, source: 'runtime' }
      return snapshot
    }
    const debounceMs = yield* PhotoSearchConfigFromEnv.debounceMs
    const loadSuggestions = yield* PhotoSearchConfigFromEnv.loadSuggestions
    const snapshot: PhotoSearchConfigSnapshot = { debounceMs, loadSuggestions, source: 'config' }
    return snapshot
  }),
}
