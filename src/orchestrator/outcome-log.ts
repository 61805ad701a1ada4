/**
 * Append-only outcome log.
 *
 * Entries are only ever added; readers get frozen snapshots, so a report
 * built from a snapshot cannot be changed by later appends.
 */

export class OutcomeLog<T> {
  private readonly entries: Readonly<T>[] = [];

  append(entry: T): void {
    this.entries.push(Object.freeze(entry));
  }

  get size(): number {
    return this.entries.length;
  }

  snapshot(): ReadonlyArray<Readonly<T>> {
    return Object.freeze([...this.entries]);
  }
}
