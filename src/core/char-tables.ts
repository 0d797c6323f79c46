/**
 * Replacement tables for file names and XML text
 */

export interface FileCharMap {
  readonly special: string;
  readonly replacement: string;
}

export interface XmlMarkup {
  readonly symbol: string;
  readonly narrow: string;
  readonly wide: string;
}

function freezeAll<T extends object>(entries: T[]): readonly T[] {
  return Object.freeze(entries.map((entry) => Object.freeze(entry)));
}

/** Characters that are invalid in file names, and what to use instead */
export const BAD_FILE_CHARS: readonly FileCharMap[] = freezeAll([
  { special: ":", replacement: "-" },
  { special: '"', replacement: "'" },
  { special: "<", replacement: "(" },
  { special: ">", replacement: ")" },
  { special: "|", replacement: "." },
  { special: "/", replacement: "\\" },
]);

export const WILDCARD_CHARS: readonly FileCharMap[] = freezeAll([
  { special: "*", replacement: "+" },
  { special: "?", replacement: " " },
]);

/**
 * XML metacharacters in escape order. `&` must stay first so entities
 * produced by later entries are not escaped again.
 */
export const XML_MARKUP: readonly XmlMarkup[] = freezeAll([
  { symbol: "&", narrow: "&amp;", wide: "&amp;" },
  { symbol: "<", narrow: "&lt;", wide: "&lt;" },
  { symbol: ">", narrow: "&gt;", wide: "&gt;" },
  { symbol: '"', narrow: "&quot;", wide: "&quot;" },
  { symbol: "'", narrow: "&apos;", wide: "&apos;" },
]);

export function findFileCharMap(
  table: readonly FileCharMap[],
  c: string,
): FileCharMap | undefined {
  return table.find((entry) => entry.special === c);
}
