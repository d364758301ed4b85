/**
 * Journaled contract storage
 *
 * Every write records an undo closure in the chain's journal. Reverting a
 * call replays the undo log back to the call's mark, so rollback costs the
 * number of writes made, not the size of the state.
 */

export class Journal {
  private entries: Array<() => void> = [];

  record(undo: () => void): void {
    this.entries.push(undo);
  }

  mark(): number {
    return this.entries.length;
  }

  revertTo(mark: number): void {
    while (this.entries.length > mark) {
      const undo = this.entries.pop();
      if (undo) undo();
    }
  }

  /** Forget undo history once a transaction commits */
  commit(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }
}

export class StorageMap<K, V> {
  private readonly journal: Journal;
  private readonly values = new Map<K, V>();

  constructor(journal: Journal) {
    this.journal = journal;
  }

  get(key: K): V | undefined {
    return this.values.get(key);
  }

  has(key: K): boolean {
    return this.values.has(key);
  }

  set(key: K, value: V): void {
    this.remember(key);
    this.values.set(key, value);
  }

  delete(key: K): void {
    if (!this.values.has(key)) return;
    this.remember(key);
    this.values.delete(key);
  }

  get size(): number {
    return this.values.size;
  }

  keys(): IterableIterator<K> {
    return this.values.keys();
  }

  entries(): IterableIterator<[K, V]> {
    return this.values.entries();
  }

  private remember(key: K): void {
    const values = this.values;
    if (values.has(key)) {
      const previous = values.get(key);
      this.journal.record(() => {
        if (previous !== undefined) values.set(key, previous);
      });
    } else {
      this.journal.record(() => {
        values.delete(key);
      });
    }
  }
}

export class StorageSlot<T> {
  private readonly journal: Journal;
  private value: T;

  constructor(journal: Journal, initial: T) {
    this.journal = journal;
    this.value = initial;
  }

  get(): T {
    return this.value;
  }

  set(value: T): void {
    const previous = this.value;
    this.journal.record(() => {
      this.value = previous;
    });
    this.value = value;
  }
}

/**
 * Append-mostly list with O(1) indexed access, used for the item catalogue
 * and token enumeration
 */
export class StorageList<T> {
  private readonly journal: Journal;
  private readonly values: T[] = [];

  constructor(journal: Journal) {
    this.journal = journal;
  }

  get length(): number {
    return this.values.length;
  }

  at(index: number): T | undefined {
    return index >= 0 && index < this.values.length ? this.values[index] : undefined;
  }

  push(value: T): number {
    const values = this.values;
    values.push(value);
    this.journal.record(() => {
      values.pop();
    });
    return values.length - 1;
  }

  set(index: number, value: T): void {
    if (index < 0 || index >= this.values.length) {
      throw new RangeError(`StorageList index out of range: ${index}`);
    }
    const values = this.values;
    const previous = values[index];
    values[index] = value;
    this.journal.record(() => {
      values[index] = previous;
    });
  }

  pop(): T | undefined {
    const values = this.values;
    if (values.length === 0) return undefined;
    const last = values[values.length - 1];
    values.pop();
    this.journal.record(() => {
      values.push(last);
    });
    return last;
  }

  toArray(): T[] {
    return [...this.values];
  }
}
