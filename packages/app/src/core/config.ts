// CHANGE: define decoder configuration, defaults and merging rules
// WHY: explicit options override the config file, which overrides defaults
// FORMAT THEOREM: ∀k: resolve(o, f).k = o.k ?? f.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved config has every field set
// COMPLEXITY: O(1)/O(1)

export type KeyDecodingStrategy = "useDefaultKeys" | "convertFromSnakeCase"

export interface DecoderConfig {
  readonly keyDecodingStrategy: KeyDecodingStrategy
  /** When true, `optional` reads a present `null` as absent. */
  readonly treatNullAsAbsent: boolean
}

export interface FileConfig {
  readonly keyDecodingStrategy?: KeyDecodingStrategy
  readonly treatNullAsAbsent?: boolean
}

export const defaultDecoderConfig: DecoderConfig = {
  keyDecodingStrategy: "useDefaultKeys",
  treatNullAsAbsent: true
}

/**
 * Resolve the effective config from explicit overrides, file config, and defaults.
 *
 * @param overrides - Options passed by the caller.
 * @param fileConfig - Optional config loaded from a JSON file.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveDecoderConfig = (
  overrides: FileConfig = {},
  fileConfig: FileConfig | undefined = undefined
): DecoderConfig => ({
  keyDecodingStrategy: overrides.keyDecodingStrategy ??
    fileConfig?.keyDecodingStrategy ??
    defaultDecoderConfig.keyDecodingStrategy,
  treatNullAsAbsent: overrides.treatNullAsAbsent ??
    fileConfig?.treatNullAsAbsent ??
    defaultDecoderConfig.treatNullAsAbsent
})
