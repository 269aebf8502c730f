/**
 * Landscape positions consumed by finalized matches, keyed by line then column.
 * The set only grows: committed matches are never retracted.
 */

export class ExclusionSet {
  private _consumed: Map<number, Set<number>> = new Map();
  private _size = 0;

  mark(line: number, column: number, footprint: readonly number[]): void {
    let columns = this._consumed.get(line);
    if (!columns) {
      columns = new Set();
      this._consumed.set(line, columns);
    }
    for (const offset of footprint) {
      const col = column + offset;
      if (!columns.has(col)) {
        columns.add(col);
        this._size++;
      }
    }
  }

  isBlocked(line: number, column: number, footprint: readonly number[]): boolean {
    const columns = this._consumed.get(line);
    if (!columns) return false;
    return footprint.some((offset) => columns.has(column + offset));
  }

  isConsumed(line: number, column: number): boolean {
    return this._consumed.get(line)?.has(column) ?? false;
  }

  /** Number of distinct consumed positions. */
  get size(): number {
    return this._size;
  }
}
