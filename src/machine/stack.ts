import { MAX_STACK_DEPTH, assertWord } from '../constants.js';
import { ExecutionError } from '../errors.js';
import { type Word } from '../types.js';

export class Stack {
  private buffer: Word[];
  readonly capacity: number;

  constructor(values: readonly Word[] = [], capacity: number = MAX_STACK_DEPTH) {
    if (values.length > capacity) {
      throw new ExecutionError('STACK_FULL');
    }
    values.forEach(v => assertWord(v, 'stack value'));
    this.capacity = capacity;
    this.buffer = [...values];
  }

  push(value: Word): number {
    assertWord(value, 'stack value');
    if (this.buffer.length >= this.capacity) {
      throw new ExecutionError('STACK_FULL');
    }
    this.buffer.push(value);
    return this.buffer.length;
  }

  pop(): Word {
    const value = this.buffer.pop();
    if (value === undefined) {
      throw new ExecutionError('STACK_EMPTY');
    }
    return value;
  }

  /** Top of the stack, if any. */
  peek(): Word | undefined {
    return this.buffer[this.buffer.length - 1];
  }

  get depth(): number {
    return this.buffer.length;
  }

  get full(): boolean {
    return this.buffer.length >= this.capacity;
  }

  get empty(): boolean {
    return this.buffer.length === 0;
  }

  clone(): Stack {
    return new Stack(this.buffer, this.capacity);
  }

  equals(other: Stack): boolean {
    return this.buffer.length === other.buffer.length &&
      this.buffer.every((v, i) => v === other.buffer[i]);
  }

  /** Bottom to top. */
  toArray(): Word[] {
    return [...this.buffer];
  }
}
