import { OPCODE_NAMES, type Opcode } from './types.js';

export type DecodeErrorKind =
  | 'NO_DATA'
  | 'INVALID_OPCODE'
  | 'MISSING_LITERAL'
  | 'INCOMPLETE_LITERAL'
  | 'INAPPROPRIATE_LITERAL';

export type ExecutionErrorKind =
  | 'INSUFFICIENT_ARGUMENTS'
  | 'STACK_FULL'
  | 'STACK_EMPTY'
  | 'ARITHMETIC_OVERFLOW'
  | 'ILLEGAL_INSTRUCTION';

const DECODE_MESSAGES: Record<DecodeErrorKind, string> = {
  NO_DATA: 'no data to decode',
  INVALID_OPCODE: 'unrecognized opcode',
  MISSING_LITERAL: 'SET opcode without a literal',
  INCOMPLETE_LITERAL: 'SET literal is shorter than 8 bytes',
  INAPPROPRIATE_LITERAL: 'literal bytes given to an opcode that takes none',
};

const EXECUTION_MESSAGES: Record<ExecutionErrorKind, string> = {
  INSUFFICIENT_ARGUMENTS: 'not enough values on the stack',
  STACK_FULL: 'stack is full',
  STACK_EMPTY: 'stack is empty',
  ARITHMETIC_OVERFLOW: 'arithmetic overflow',
  ILLEGAL_INSTRUCTION: 'instruction cannot be executed',
};

export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;
  /** Byte offset of the opcode that failed to decode. */
  readonly offset: number;
  readonly byte: number | undefined;

  constructor(kind: DecodeErrorKind, offset: number, byte?: number) {
    const detail = byte === undefined ? '' : ` 0x${byte.toString(16).padStart(2, '0')}`;
    super(`${DECODE_MESSAGES[kind]}${detail} at offset ${offset}`);
    this.name = 'DecodeError';
    this.kind = kind;
    this.offset = offset;
    this.byte = byte;
  }

  /** Same error, reported at a different position in the enclosing buffer. */
  at(offset: number): DecodeError {
    return new DecodeError(this.kind, offset, this.byte);
  }
}

export class ExecutionError extends Error {
  readonly kind: ExecutionErrorKind;
  readonly opcode: Opcode | null;

  constructor(kind: ExecutionErrorKind, opcode: Opcode | null = null) {
    const where = opcode === null ? '' : `${OPCODE_NAMES[opcode]}: `;
    super(`${where}${EXECUTION_MESSAGES[kind]}`);
    this.name = 'ExecutionError';
    this.kind = kind;
    this.opcode = opcode;
  }

  withOpcode(opcode: Opcode): ExecutionError {
    return this.opcode === null ? new ExecutionError(this.kind, opcode) : this;
  }
}
