// CHANGE: define engine config merging rules and defaults
// WHY: explicit options override the config file, which overrides defaults
// QUOTE(TZ): n/a
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(opts, cfg).k = opts.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every resolved field is defined
// COMPLEXITY: O(1)/O(1)

export type DateFormat = "iso" | "epoch"

export type LogLevelName = "All" | "Trace" | "Debug" | "Info" | "Warning" | "Error" | "Fatal" | "None"

export interface FileConfig {
  readonly emitDiscriminator?: boolean
  readonly dateFormat?: DateFormat
  readonly logLevel?: LogLevelName
}

export type EngineOptions = FileConfig

export interface ResolvedConfig {
  readonly emitDiscriminator: boolean
  readonly dateFormat: DateFormat
  readonly logLevel: LogLevelName
}

export const defaultConfig: ResolvedConfig = {
  emitDiscriminator: true,
  dateFormat: "iso",
  logLevel: "Info"
}

/**
 * Resolve the effective config from explicit options, file config, and defaults.
 *
 * @param options - Options passed by the caller.
 * @param fileConfig - Optional config loaded from .cereal.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  options: EngineOptions,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  emitDiscriminator: options.emitDiscriminator ?? fileConfig?.emitDiscriminator ?? defaultConfig.emitDiscriminator,
  dateFormat: options.dateFormat ?? fileConfig?.dateFormat ?? defaultConfig.dateFormat,
  logLevel: options.logLevel ?? fileConfig?.logLevel ?? defaultConfig.logLevel
})
