import { Opcode, type Word } from './types.js';

export const WORD_BITS = 64;
export const WORD_BYTES = WORD_BITS / 8;
export const WORD_MAX: Word = (1n << 64n) - 1n;

export const MAX_STACK_DEPTH = 65535;

/** The only opcode followed by a payload. */
export const LITERAL_OPCODE = Opcode.SET;
export const LITERAL_INSTRUCTION_LENGTH = 1 + WORD_BYTES;

export const OPCODES: readonly Opcode[] = Object.values(Opcode).filter((v): v is Opcode => typeof v === 'number');

const OPCODE_BYTES: ReadonlySet<number> = new Set(OPCODES);

export function isOpcode(byte: number): byte is Opcode {
  return OPCODE_BYTES.has(byte);
}

export function isWord(value: bigint): boolean {
  return value >= 0n && value <= WORD_MAX;
}

export function assertWord(value: bigint, what: string): void {
  if (!isWord(value)) {
    throw new RangeError(`${what} ${value} is outside the 64-bit unsigned range`);
  }
}
