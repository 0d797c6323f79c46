/**
 * strkit - character classification and string helpers for narrow and wide
 * text
 */

export {
  NARROW,
  WIDE,
  canRepresent,
  isRepresentable,
  toNarrow,
  toWide,
} from "./core/char-width.js";
export type { CharWidth, CharWidthName } from "./core/char-width.js";
export {
  CLASSIC_POLICY,
  DEFAULT_POLICY,
  createPolicy,
  getDefaultPolicy,
} from "./core/policy.js";
export type { ClassificationPolicy, Ruleset } from "./core/policy.js";
export { BAD_FILE_CHARS, WILDCARD_CHARS, XML_MARKUP } from "./core/char-tables.js";
export type { FileCharMap, XmlMarkup } from "./core/char-tables.js";
export {
  AllowWildcards,
  CharUtil,
  CharUtilT,
  CharUtilW,
  ConvertWildcards,
} from "./core/char-util.js";
export { StrUtil, StrUtilT, StrUtilW } from "./core/str-util.js";
export type { TextRef } from "./core/str-util.js";
export { StrList } from "./core/str-list.js";
export { DEFAULT_MIN_DAYS, formatDuration } from "./utils/duration.js";
export { chars } from "./utils/traverse.js";
export {
  CharArgumentError,
  InvariantError,
  PolicyError,
  assertInvariant,
} from "./core/errors.js";
