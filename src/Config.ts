/**
 * Tunables read through the active `ConfigProvider`.
 *
 * @since 0.1.0
 */

import { Config } from "effect"

/**
 * @category Models
 * @since 0.1.0
 */
export interface ConverterSettings {
  /** Passes allowed before expansion of a unit is considered cyclic. */
  readonly maxExpansionDepth: number
  /** Longest conversion path, in edges, that path discovery will compose. */
  readonly maxPathHops: number
}

export const DEFAULT_CONVERTER_SETTINGS: ConverterSettings = {
  maxExpansionDepth: 16,
  maxPathHops: 32,
}

const positive = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must be a positive integer`, validation: (n) => n > 0 }),
    Config.withDefault(fallback),
  )

/**
 * @category Config
 * @since 0.1.0
 * @example
 * ```ts
 * const settings = yield* ConverterConfig
 * settings.maxPathHops // 32 unless UNITPATH_MAX_PATH_HOPS is set
 * ```
 */
export const ConverterConfig: Config.Config<ConverterSettings> = Config.all({
  maxExpansionDepth: positive("UNITPATH_MAX_EXPANSION_DEPTH", DEFAULT_CONVERTER_SETTINGS.maxExpansionDepth),
  maxPathHops: positive("UNITPATH_MAX_PATH_HOPS", DEFAULT_CONVERTER_SETTINGS.maxPathHops),
})
