/** Unsigned 64-bit machine word. Always within `0n..WORD_MAX`. */
export type Word = bigint;

export enum Opcode {
  NOP = 0x00,
  HALT = 0x01,
  LOAD = 0x02,
  STORE = 0x03,
  PUSH = 0x04,
  POP = 0x05,
  SET = 0x06,
  READ = 0x07,
  WRITE = 0x08,
  JUMP = 0x09,
  JUMP_IF = 0x0a,
  ADD = 0x0b,
  SUB = 0x0c,
  MUL = 0x0d,
  DIV = 0x0e,
  MOD = 0x0f,
  CMP = 0x10,
  AND = 0x11,
  OR = 0x12,
  NOT = 0x13,
  XOR = 0x14,
}

export type PlainOpcode = Exclude<Opcode, Opcode.SET>;

export interface LiteralInstruction {
  opcode: Opcode.SET;
  value: Word;
}

export interface PlainInstruction {
  opcode: PlainOpcode;
}

export type Instruction = LiteralInstruction | PlainInstruction;

/** Decoded instruction sequence, addressed by instruction index. */
export type Program = readonly Instruction[];

export const OPCODE_NAMES: Readonly<Record<Opcode, string>> = {
  [Opcode.NOP]: 'NOP',
  [Opcode.HALT]: 'HALT',
  [Opcode.LOAD]: 'LOAD',
  [Opcode.STORE]: 'STORE',
  [Opcode.PUSH]: 'PUSH',
  [Opcode.POP]: 'POP',
  [Opcode.SET]: 'SET',
  [Opcode.READ]: 'READ',
  [Opcode.WRITE]: 'WRITE',
  [Opcode.JUMP]: 'JUMP',
  [Opcode.JUMP_IF]: 'JUMPIF',
  [Opcode.ADD]: 'ADD',
  [Opcode.SUB]: 'SUB',
  [Opcode.MUL]: 'MUL',
  [Opcode.DIV]: 'DIV',
  [Opcode.MOD]: 'MOD',
  [Opcode.CMP]: 'CMP',
  [Opcode.AND]: 'AND',
  [Opcode.OR]: 'OR',
  [Opcode.NOT]: 'NOT',
  [Opcode.XOR]: 'XOR',
};

/** Number of stack operands each opcode consumes before it does anything else. */
export const OPCODE_ARITY: Readonly<Record<Opcode, number>> = {
  [Opcode.NOP]: 0,
  [Opcode.HALT]: 0,
  [Opcode.LOAD]: 1,
  [Opcode.STORE]: 2,
  [Opcode.PUSH]: 0,
  [Opcode.POP]: 0,
  [Opcode.SET]: 0,
  [Opcode.READ]: 0,
  [Opcode.WRITE]: 0,
  [Opcode.JUMP]: 1,
  [Opcode.JUMP_IF]: 0,
  [Opcode.ADD]: 2,
  [Opcode.SUB]: 2,
  [Opcode.MUL]: 2,
  [Opcode.DIV]: 2,
  [Opcode.MOD]: 2,
  [Opcode.CMP]: 2,
  [Opcode.AND]: 2,
  [Opcode.OR]: 2,
  [Opcode.NOT]: 1,
  [Opcode.XOR]: 2,
};
