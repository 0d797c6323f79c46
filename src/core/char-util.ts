/**
 * Single-character classification and transformation
 */

import { canRepresent, NARROW, WIDE, type CharWidth } from "./char-width.js";
import {
  BAD_FILE_CHARS,
  WILDCARD_CHARS,
  findFileCharMap,
} from "./char-tables.js";
import { CharArgumentError } from "./errors.js";
import {
  CLASSIC_POLICY,
  DEFAULT_POLICY,
  type ClassificationPolicy,
  type Ruleset,
} from "./policy.js";

export enum AllowWildcards {
  No = "no",
  Yes = "yes",
}

export enum ConvertWildcards {
  No = "no",
  Yes = "yes",
  Remove = "remove",
}

/**
 * Primitive character classes of a ruleset. Every function receives exactly
 * one code unit.
 */
interface Rules {
  isUpper(c: string): boolean;
  isLower(c: string): boolean;
  isAlpha(c: string): boolean;
  isPrintable(c: string): boolean;
  isWhitespace(c: string): boolean;
  isControl(c: string): boolean;
  toUpper(c: string): string;
  toLower(c: string): string;
}

const UNICODE_RULES: Rules = {
  isUpper: (c) => /^\p{Uppercase}$/u.test(c),
  isLower: (c) => /^\p{Lowercase}$/u.test(c),
  isAlpha: (c) => /^\p{Alphabetic}$/u.test(c),
  isPrintable: (c) => !/^[\p{Cc}\p{Cs}\p{Cn}\p{Zl}\p{Zp}]$/u.test(c),
  isWhitespace: (c) => /^\p{White_Space}$/u.test(c),
  isControl: (c) => /^\p{Cc}$/u.test(c),
  toUpper: (c) => c.toUpperCase(),
  toLower: (c) => c.toLowerCase(),
};

// The classic C locale: ASCII only
const POSIX_RULES: Rules = {
  isUpper: (c) => /^[A-Z]$/.test(c),
  isLower: (c) => /^[a-z]$/.test(c),
  isAlpha: (c) => /^[A-Za-z]$/.test(c),
  isPrintable: (c) => /^[\x20-\x7e]$/.test(c),
  isWhitespace: (c) => /^[ \t\n\v\f\r]$/.test(c),
  isControl: (c) => /^[\x00-\x1f\x7f]$/.test(c),
  toUpper: (c) => (/^[a-z]$/.test(c) ? c.toUpperCase() : c),
  toLower: (c) => (/^[A-Z]$/.test(c) ? c.toLowerCase() : c),
};

const RULES: Record<Ruleset, Rules> = {
  unicode: UNICODE_RULES,
  posix: POSIX_RULES,
};

/**
 * Character predicates and single-character transforms for one character
 * width, evaluated under a fixed classification policy. Narrow text defaults
 * to the classic C rules, wide text to Unicode.
 */
export class CharUtilT {
  readonly width: CharWidth;
  readonly policy: ClassificationPolicy;
  private rules: Rules;

  constructor(
    width: CharWidth,
    policy: ClassificationPolicy = width.name === "narrow"
      ? CLASSIC_POLICY
      : DEFAULT_POLICY,
  ) {
    this.width = width;
    this.policy = policy;
    this.rules = RULES[policy.ruleset];
  }

  isUpper(c: string): boolean {
    return this.rules.isUpper(this.checkChar(c));
  }

  isLower(c: string): boolean {
    return this.rules.isLower(this.checkChar(c));
  }

  toUpper(c: string): string {
    return this.mapCase(c, this.rules.toUpper);
  }

  toLower(c: string): string {
    return this.mapCase(c, this.rules.toLower);
  }

  forwardSlashToBackslash(c: string): string {
    return this.checkChar(c) === "/" ? "\\" : c;
  }

  isDigit(c: string): boolean {
    return /^[0-9]$/.test(this.checkChar(c));
  }

  isNumeric(c: string): boolean {
    return this.isDigit(c) || c === ".";
  }

  isAlpha(c: string): boolean {
    return this.rules.isAlpha(this.checkChar(c));
  }

  isAlphaNum(c: string): boolean {
    return this.isAlpha(c) || this.isDigit(c);
  }

  isPrintable(c: string): boolean {
    return this.rules.isPrintable(this.checkChar(c));
  }

  isWhitespace(c: string): boolean {
    return this.rules.isWhitespace(this.checkChar(c));
  }

  isControlChar(c: string): boolean {
    return this.rules.isControl(this.checkChar(c));
  }

  /**
   * True for anything outside 7-bit ASCII.
   */
  isExtendedAscii(c: string): boolean {
    const unit = this.checkChar(c).charCodeAt(0);
    return unit > 0x7f;
  }

  isGoodFileCharWildcardsOK(c: string): boolean {
    return this.isGoodFileCharEx(c, AllowWildcards.Yes);
  }

  isGoodFileChar(c: string): boolean {
    return this.isGoodFileCharEx(c, AllowWildcards.No);
  }

  isGoodFileCharEx(c: string, allowWildcards: AllowWildcards): boolean {
    if (this.isControlChar(c)) {
      return false;
    }
    if (findFileCharMap(BAD_FILE_CHARS, c)) {
      return false;
    }
    if (allowWildcards === AllowWildcards.No && this.isWildcardFileChar(c)) {
      return false;
    }
    return true;
  }

  isWildcardFileChar(c: string): boolean {
    return findFileCharMap(WILDCARD_CHARS, this.checkChar(c)) !== undefined;
  }

  toGoodFileCharConvertWildcards(c: string): string {
    return this.toGoodFileCharEx(c, ConvertWildcards.Yes);
  }

  toGoodFileChar(c: string): string {
    return this.toGoodFileCharEx(c, ConvertWildcards.No);
  }

  /**
   * Repairs one file name character. Control characters win over reserved
   * characters, which win over wildcards. Remove acts like No here; dropping
   * wildcards is a whole-string operation.
   */
  toGoodFileCharEx(c: string, convertWildcards: ConvertWildcards): string {
    if (this.isControlChar(c)) {
      return "!";
    }

    const bad = findFileCharMap(BAD_FILE_CHARS, c);
    if (bad) {
      return bad.replacement;
    }

    if (convertWildcards === ConvertWildcards.Yes) {
      const wildcard = findFileCharMap(WILDCARD_CHARS, c);
      if (wildcard) {
        return wildcard.replacement;
      }
    }

    return c;
  }

  private mapCase(c: string, mapping: (c: string) => string): string {
    const mapped = mapping(this.checkChar(c));
    // Multi-unit results (e.g. "ß" -> "SS") and units outside the width have
    // no single-character equivalent
    if (mapped.length !== 1 || !canRepresent(this.width, mapped.charCodeAt(0))) {
      return c;
    }
    return mapped;
  }

  private checkChar(c: string): string {
    if (c.length !== 1) {
      throw new CharArgumentError(
        `Expected a single character, got ${c.length} code units`,
        c,
      );
    }
    if (!canRepresent(this.width, c.charCodeAt(0))) {
      throw new CharArgumentError(
        `Character U+${c.charCodeAt(0).toString(16).toUpperCase().padStart(4, "0")} is not representable in ${this.width.name} width`,
        c,
      );
    }
    return c;
  }
}

export const CharUtil = new CharUtilT(NARROW);
export const CharUtilW = new CharUtilT(WIDE);
