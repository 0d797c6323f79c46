/**
 * Ordered list of strings
 */

export class StrList implements Iterable<string> {
  private list: string[];

  constructor(values: Iterable<string> = []) {
    this.list = Array.from(values);
  }

  static from(values: Iterable<string>): StrList {
    return new StrList(values);
  }

  /**
   * Lists are equal when they hold the same strings in the same order.
   */
  static equal(lhs: StrList, rhs: StrList): boolean {
    if (lhs.size !== rhs.size) {
      return false;
    }
    return lhs.list.every((value, i) => value === rhs.list[i]);
  }

  get size(): number {
    return this.list.length;
  }

  isEmpty(): boolean {
    return this.list.length === 0;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.list[Symbol.iterator]();
  }

  front(): string {
    if (this.list.length === 0) {
      throw new RangeError("front() called on an empty list");
    }
    return this.list[0];
  }

  at(index: number): string | undefined {
    return this.list.at(index);
  }

  toArray(): string[] {
    return [...this.list];
  }

  push(...values: string[]): void {
    this.list.push(...values);
  }

  /**
   * Inserts values before position `index`. An index equal to the size
   * appends.
   */
  insert(index: number, values: Iterable<string>): void {
    if (!Number.isInteger(index) || index < 0 || index > this.list.length) {
      throw new RangeError(
        `Insert position ${index} is outside 0..${this.list.length}`,
      );
    }
    this.list.splice(index, 0, ...values);
  }

  clear(): void {
    this.list = [];
  }

  /**
   * Exact, case-sensitive membership test
   */
  find(value: string): boolean {
    return this.list.includes(value);
  }

  containsEmptyStrings(): boolean {
    return this.list.some((value) => value.length === 0);
  }

  /**
   * Total length of every string in the list, in code units
   */
  getCharCount(): number {
    return this.list.reduce((count, value) => count + value.length, 0);
  }

  equals(other: StrList): boolean {
    return StrList.equal(this, other);
  }
}
