/**
 * Whole-string operations built on the character classifier
 *
 * Every transform comes in two forms: `toX` rewrites a TextRef in place,
 * `getX` returns a new string and leaves its argument alone.
 */

import {
  AllowWildcards,
  CharUtil,
  CharUtilW,
  ConvertWildcards,
  type CharUtilT,
} from "./char-util.js";
import { XML_MARKUP } from "./char-tables.js";
import { assertInvariant } from "./errors.js";
import { chars, every, filter, map, some } from "../utils/traverse.js";
import { DEFAULT_MIN_DAYS, formatDuration } from "../utils/duration.js";

/**
 * A mutable handle on a string. In-place operations assign `value` once,
 * after the new text is complete.
 */
export interface TextRef {
  value: string;
}

/**
 * Narrow instances reject text with code units above 0xFF; convert with
 * toNarrow first or use StrUtilW.
 */
export class StrUtilT {
  readonly chars: CharUtilT;

  constructor(charUtil: CharUtilT) {
    this.chars = charUtil;
  }

  /**
   * Replaces XML metacharacters with entities:
   *
   *   &  ->  &amp;
   *   <  ->  &lt;
   *   >  ->  &gt;
   *   "  ->  &quot;
   *   '  ->  &apos;
   */
  toXmlSafe(ref: TextRef): void {
    ref.value = this.getXmlSafe(ref.value);
  }

  getXmlSafe(str: string): string {
    const width = this.chars.width.name;
    let result = str;
    for (const markup of XML_MARKUP) {
      result = result.split(markup.symbol).join(markup[width]);
    }
    return result;
  }

  /**
   * Trims leading characters found in `trimCharset`.
   * e.g. getTrimmedLeading(str, " \t") drops leading blanks and tabs
   */
  toTrimmedLeading(ref: TextRef, trimCharset: string): void {
    ref.value = this.getTrimmedLeading(ref.value, trimCharset);
  }

  getTrimmedLeading(str: string, trimCharset: string): string {
    const firstNot = findFirstNotOf(str, trimCharset);
    return firstNot === -1 ? "" : str.slice(firstNot);
  }

  toTrimmedTrailing(ref: TextRef, trimCharset: string): void {
    ref.value = this.getTrimmedTrailing(ref.value, trimCharset);
  }

  getTrimmedTrailing(str: string, trimCharset: string): string {
    const lastNot = findLastNotOf(str, trimCharset);
    return str.slice(0, lastNot + 1);
  }

  toTrimmed(ref: TextRef, trimCharset: string): void {
    ref.value = this.getTrimmed(ref.value, trimCharset);
  }

  getTrimmed(str: string, trimCharset: string): string {
    const firstNot = findFirstNotOf(str, trimCharset);
    if (firstNot === -1) {
      return "";
    }

    const lastNot = findLastNotOf(str, trimCharset);
    assertInvariant(
      lastNot >= firstNot,
      "trimmed text has a first kept character but no last one",
    );
    return str.slice(firstNot, lastNot + 1);
  }

  isDigit(str: string): boolean {
    return str.length > 0 && every(chars(str), (c) => this.chars.isDigit(c));
  }

  /**
   * Digits and decimal points with an optional leading minus sign. A minus
   * sign on its own is not a number.
   */
  isNumeric(str: string): boolean {
    const digits = str.startsWith("-") ? str.slice(1) : str;
    return (
      digits.length > 0 && every(chars(digits), (c) => this.chars.isNumeric(c))
    );
  }

  isAlphaNum(str: string): boolean {
    return str.length > 0 && every(chars(str), (c) => this.chars.isAlphaNum(c));
  }

  isPrintable(str: string): boolean {
    return (
      str.length > 0 && every(chars(str), (c) => this.chars.isPrintable(c))
    );
  }

  isExtendedAscii(str: string): boolean {
    return (
      str.length > 0 && every(chars(str), (c) => this.chars.isExtendedAscii(c))
    );
  }

  isGoodFileName(
    str: string,
    allowWildcards: AllowWildcards = AllowWildcards.No,
  ): boolean {
    return every(chars(str), (c) =>
      this.chars.isGoodFileCharEx(c, allowWildcards),
    );
  }

  containsWildcard(str: string): boolean {
    return some(chars(str), (c) => this.chars.isWildcardFileChar(c));
  }

  toGoodFileName(
    ref: TextRef,
    convertWildcards: ConvertWildcards = ConvertWildcards.No,
  ): void {
    ref.value = this.getGoodFileName(ref.value, convertWildcards);
  }

  getGoodFileName(
    str: string,
    convertWildcards: ConvertWildcards = ConvertWildcards.No,
  ): string {
    switch (convertWildcards) {
      case ConvertWildcards.Yes:
        return map(chars(str), (c) =>
          this.chars.toGoodFileCharConvertWildcards(c),
        );
      case ConvertWildcards.Remove: {
        const repaired = map(chars(str), (c) => this.chars.toGoodFileChar(c));
        return filter(chars(repaired), (c) => !this.chars.isWildcardFileChar(c));
      }
      case ConvertWildcards.No:
      default:
        return map(chars(str), (c) => this.chars.toGoodFileChar(c));
    }
  }

  toUpper(ref: TextRef): void {
    ref.value = this.getUpper(ref.value);
  }

  toLower(ref: TextRef): void {
    ref.value = this.getLower(ref.value);
  }

  getUpper(str: string): string {
    return map(chars(str), (c) => this.chars.toUpper(c));
  }

  getLower(str: string): string {
    return map(chars(str), (c) => this.chars.toLower(c));
  }

  /**
   * Format as DDd:HHh:MMm:SSs; see formatDuration
   */
  getDurationStr(totalSeconds: number, minDays = DEFAULT_MIN_DAYS): string {
    return formatDuration(totalSeconds, minDays);
  }
}

function findFirstNotOf(str: string, charset: string): number {
  for (let i = 0; i < str.length; i++) {
    if (!charset.includes(str.charAt(i))) {
      return i;
    }
  }
  return -1;
}

function findLastNotOf(str: string, charset: string): number {
  for (let i = str.length - 1; i >= 0; i--) {
    if (!charset.includes(str.charAt(i))) {
      return i;
    }
  }
  return -1;
}

export const StrUtil = new StrUtilT(CharUtil);
export const StrUtilW = new StrUtilT(CharUtilW);
