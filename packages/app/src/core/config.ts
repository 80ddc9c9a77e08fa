import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, the config file overrides defaults
// QUOTE(TZ): n/a
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: indent ≥ 0, maxDepth ≥ 1, searchLimit ≥ 1
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly pretty?: boolean
  readonly indent?: number
  readonly maxDepth?: number
  readonly searchLimit?: number
}

export interface ResolvedConfig {
  readonly pretty: boolean
  readonly indent: number
  readonly maxDepth: number
  readonly searchLimit: number
}

export const defaultConfig: ResolvedConfig = {
  pretty: true,
  indent: 2,
  maxDepth: 64,
  searchLimit: 500
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-mend.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  pretty: cli.pretty ?? fileConfig?.pretty ?? defaultConfig.pretty,
  indent: fileConfig?.indent ?? defaultConfig.indent,
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? defaultConfig.maxDepth,
  searchLimit: cli.searchLimit ?? fileConfig?.searchLimit ?? defaultConfig.searchLimit
})
