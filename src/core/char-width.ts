/**
 * Character widths
 *
 * A character is a single UTF-16 code unit. The narrow width only admits
 * units that fit in 8 bits; the wide width admits every code unit.
 */

export type CharWidthName = "narrow" | "wide";

export interface CharWidth {
  readonly name: CharWidthName;
  readonly bits: 8 | 16;
  readonly maxUnit: number;
}

export const NARROW: CharWidth = Object.freeze({
  name: "narrow",
  bits: 8,
  maxUnit: 0xff,
});

export const WIDE: CharWidth = Object.freeze({
  name: "wide",
  bits: 16,
  maxUnit: 0xffff,
});

export function canRepresent(width: CharWidth, unit: number): boolean {
  return Number.isInteger(unit) && unit >= 0 && unit <= width.maxUnit;
}

/**
 * Returns true if every code unit of the text fits the width.
 */
export function isRepresentable(text: string, width: CharWidth): boolean {
  for (let i = 0; i < text.length; i++) {
    if (!canRepresent(width, text.charCodeAt(i))) {
      return false;
    }
  }
  return true;
}

/**
 * Narrows each code unit to its low 8 bits. Lossy for anything above 0xFF.
 */
export function toNarrow(text: string): string {
  let result = "";
  for (let i = 0; i < text.length; i++) {
    result += String.fromCharCode(text.charCodeAt(i) & NARROW.maxUnit);
  }
  return result;
}

/**
 * Widens narrow text. Every narrow unit is already a valid wide unit.
 */
export function toWide(text: string): string {
  return text;
}
