import { stripByteOrderMark } from "./normalize.js"

// CHANGE: decode uploaded or piped bytes into normalizer input
// WHY: files arrive as UTF-8, possibly with a byte-order mark or stray invalid bytes
// QUOTE(TZ): "decoded as UTF-8, tolerating a leading byte-order mark"
// REF: req-input-1
// SOURCE: n/a
// FORMAT THEOREM: ∀b: decodeInput(b) never starts with U+FEFF
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: invalid sequences become U+FFFD instead of failing
// COMPLEXITY: O(n)

export const decodeInput = (bytes: Uint8Array): string =>
  stripByteOrderMark(new TextDecoder("utf-8", { fatal: false, ignoreBOM: true }).decode(bytes))
