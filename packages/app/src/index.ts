export type { AppError, PathError, SegmentFailure, StrictParseError } from "./core/errors.js"
export { decodeSegment, decodeSteps, decodeStringLiteral, parseLayered } from "./core/decode.js"
export type { DecodeStep } from "./core/decode.js"
export { decodeInput } from "./core/input.js"
export { isJson, isJsonArray, isJsonObject } from "./core/json.js"
export type { Json, JsonArray, JsonObject } from "./core/json.js"
export { countSegmentFailures, normalize, stripByteOrderMark } from "./core/normalize.js"
export type { NormalizationResult } from "./core/normalize.js"
export { looksLikeJson, parseStrict } from "./core/parse.js"
export { extractByPath, parsePath } from "./core/path.js"
export type { PathToken } from "./core/path.js"
export { search, typeLabel } from "./core/query.js"
export { segment } from "./core/segment.js"
export { serializeJson } from "./core/serialize.js"
export type { SerializeOptions } from "./core/serialize.js"
export { countNodes } from "./core/stats.js"
export type { NodeStats } from "./core/stats.js"
export { renderTree } from "./core/tree.js"
export type { TreeOptions } from "./core/tree.js"
