import type * as Option from "effect/Option"

import type { Json } from "./json.js"
import type { NormalizationResult } from "./normalize.js"
import type { NodeStats } from "./stats.js"

// CHANGE: define report types for every inspection command
// WHY: keep IO-free data structures reusable across output formats and tests
// QUOTE(TZ): n/a
// REF: req-report-types-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r ∈ Report: r.outcome._tag determines the rendered section
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: outcome is Empty iff normalization.primary is None
// COMPLEXITY: O(1)/O(1)

export interface SearchHit {
  readonly path: string
  readonly value: Option.Option<Json>
}

export type CommandOutcome =
  | { readonly _tag: "Normalized"; readonly value: Json }
  | { readonly _tag: "Tree"; readonly lines: ReadonlyArray<string> }
  | {
    readonly _tag: "Search"
    readonly query: string
    readonly total: number
    readonly hits: ReadonlyArray<SearchHit>
  }
  | { readonly _tag: "Extract"; readonly path: string; readonly value: Json }
  | { readonly _tag: "Stats"; readonly stats: NodeStats }
  | { readonly _tag: "Empty" }

export interface Report {
  readonly normalization: NormalizationResult
  readonly outcome: CommandOutcome
}
