import { type Word } from '../types.js';
import { assertWord } from '../constants.js';
import { Memory } from './memory.js';
import { Stack } from './stack.js';

export interface StateSnapshot {
  pc: string;
  register: string;
  stack: string[];
  memory: Record<string, string>;
}

export interface StateInit {
  pc?: Word;
  register?: Word;
  stack?: readonly Word[];
  memory?: Iterable<readonly [Word, Word]>;
}

export class State {
  pc: Word;
  register: Word;
  stack: Stack;
  memory: Memory;

  constructor(init: StateInit = {}) {
    this.pc = init.pc ?? 0n;
    this.register = init.register ?? 0n;
    assertWord(this.pc, 'pc');
    assertWord(this.register, 'register');
    this.stack = new Stack(init.stack);
    this.memory = new Memory(init.memory);
  }

  clone(): State {
    const copy = new State({ pc: this.pc, register: this.register });
    copy.stack = this.stack.clone();
    copy.memory = this.memory.clone();
    return copy;
  }

  equals(other: State): boolean {
    return this.pc === other.pc &&
      this.register === other.register &&
      this.stack.equals(other.stack) &&
      this.memory.equals(other.memory);
  }

  /** Words are rendered as decimal strings since JSON has no 64-bit integers. */
  toJSON(): StateSnapshot {
    const memory: Record<string, string> = {};
    for (const [address, value] of this.memory.entries()) {
      memory[address.toString()] = value.toString();
    }
    return {
      pc: this.pc.toString(),
      register: this.register.toString(),
      stack: this.stack.toArray().map(v => v.toString()),
      memory,
    };
  }
}
