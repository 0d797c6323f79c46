/**
 * Lazy per-character traversal over text
 */

/**
 * Yields the code units of a string one at a time. Each call starts a fresh
 * traversal, so the result can be consumed any number of times by calling
 * again.
 */
export function* chars(text: string): Generator<string, void, undefined> {
  for (let i = 0; i < text.length; i++) {
    yield text.charAt(i);
  }
}

export function every(
  items: Iterable<string>,
  predicate: (c: string) => boolean,
): boolean {
  for (const item of items) {
    if (!predicate(item)) {
      return false;
    }
  }
  return true;
}

export function some(
  items: Iterable<string>,
  predicate: (c: string) => boolean,
): boolean {
  for (const item of items) {
    if (predicate(item)) {
      return true;
    }
  }
  return false;
}

export function map(
  items: Iterable<string>,
  transform: (c: string) => string,
): string {
  let result = "";
  for (const item of items) {
    result += transform(item);
  }
  return result;
}

export function filter(
  items: Iterable<string>,
  keep: (c: string) => boolean,
): string {
  let result = "";
  for (const item of items) {
    if (keep(item)) {
      result += item;
    }
  }
  return result;
}
