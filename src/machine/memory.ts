import { type Word } from '../types.js';
import { assertWord } from '../constants.js';

/**
 * Sparse word-addressed store. Addresses never written read as zero, and
 * entries are never removed.
 */
export class Memory {
  private cells: Map<Word, Word>;

  constructor(entries?: Iterable<readonly [Word, Word]>) {
    this.cells = new Map<Word, Word>();
    for (const [address, value] of entries ?? []) {
      this.write(address, value);
    }
  }

  read(address: Word): Word {
    return this.cells.get(address) ?? 0n;
  }

  write(address: Word, value: Word): void {
    assertWord(address, 'address');
    assertWord(value, 'memory value');
    this.cells.set(address, value);
  }

  /** Number of addresses ever written. */
  get size(): number {
    return this.cells.size;
  }

  clone(): Memory {
    return new Memory(this.cells);
  }

  equals(other: Memory): boolean {
    if (this.cells.size !== other.cells.size) return false;
    for (const [address, value] of this.cells) {
      if (!other.cells.has(address) || other.cells.get(address) !== value) return false;
    }
    return true;
  }

  /** Written cells in ascending address order. */
  entries(): [Word, Word][] {
    return [...this.cells.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }
}
