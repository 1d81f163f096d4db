import { describe, it, expect } from 'vitest';
import {
  decode, decodeInstruction, decodeOrThrow, encodeInstruction, encodeProgram, disassemble,
} from '../../src/decoder/index.js';
import { DecodeError, type DecodeErrorKind } from '../../src/errors.js';
import { Opcode, type Instruction, type PlainOpcode } from '../../src/types.js';
import { OPCODES, WORD_MAX } from '../../src/constants.js';

const PLAIN_OPCODES = OPCODES.filter((op): op is PlainOpcode => op !== Opcode.SET);

function decodeFailure(bytes: Uint8Array): DecodeError {
  const result = decode(bytes);
  if (result.success) throw new Error('expected decoding to fail');
  return result.error;
}

function sliceFailure(slice: Uint8Array): DecodeErrorKind {
  try {
    decodeInstruction(slice);
  } catch (err) {
    if (err instanceof DecodeError) return err.kind;
    throw err;
  }
  throw new Error('expected decodeInstruction to throw');
}

describe('decode', () => {
  it('decodes and re-encodes every payload-free opcode', () => {
    expect(PLAIN_OPCODES).toHaveLength(20);
    for (const op of PLAIN_OPCODES) {
      const result = decode(Uint8Array.of(op));
      expect(result).toEqual({ success: true, program: [{ opcode: op }] });
      expect([...encodeInstruction({ opcode: op })]).toEqual([op]);
    }
  });

  it('round-trips SET through its nine-byte encoding', () => {
    for (const value of [0n, 1n, 5n, 0x0102030405060708n, 1n << 63n, WORD_MAX]) {
      const bytes = encodeInstruction({ opcode: Opcode.SET, value });
      expect(bytes).toHaveLength(9);
      expect(bytes[0]).toBe(0x06);
      expect(decodeOrThrow(bytes)).toEqual([{ opcode: Opcode.SET, value }]);
    }
  });

  it('reads SET payloads big-endian', () => {
    const program = decodeOrThrow(Uint8Array.of(0x06, 0, 0, 0, 0, 0, 0, 0x01, 0x02));
    expect(program).toEqual([{ opcode: Opcode.SET, value: 0x0102n }]);
  });

  it('does not interpret payload bytes as opcodes', () => {
    const program = decodeOrThrow(Uint8Array.of(0x06, 0x06, 0x06, 0x06, 0x06, 0x06, 0x06, 0x06, 0x06, 0x01));
    expect(program).toEqual([
      { opcode: Opcode.SET, value: 0x0606060606060606n },
      { opcode: Opcode.HALT },
    ]);
  });

  it('indexes instructions by position, not byte offset', () => {
    const program = decodeOrThrow(Uint8Array.of(0x00, 0x06, 0, 0, 0, 0, 0, 0, 0, 9, 0x04, 0x01));
    expect(program).toHaveLength(4);
    expect(program[2]).toEqual({ opcode: Opcode.PUSH });
    expect(program[3]).toEqual({ opcode: Opcode.HALT });
  });

  it('decodes empty input to an empty program', () => {
    expect(decode(new Uint8Array(0))).toEqual({ success: true, program: [] });
  });

  it('returns a frozen program', () => {
    const program = decodeOrThrow(Uint8Array.of(0x00, 0x01));
    expect(Object.isFrozen(program)).toBe(true);
  });

  it('decodes reserved opcodes', () => {
    expect(decodeOrThrow(Uint8Array.of(0x07, 0x08, 0x0a))).toEqual([
      { opcode: Opcode.READ },
      { opcode: Opcode.WRITE },
      { opcode: Opcode.JUMP_IF },
    ]);
  });

  it('fails on an unknown opcode with its offset', () => {
    const error = decodeFailure(Uint8Array.of(0x00, 0x04, 0x15));
    expect(error.kind).toBe('INVALID_OPCODE');
    expect(error.offset).toBe(2);
    expect(error.byte).toBe(0x15);
    expect(error.message).toBe('unrecognized opcode 0x15 at offset 2');
  });

  it('reports the offset of an opcode following a literal', () => {
    const bytes = Uint8Array.of(0x06, 0, 0, 0, 0, 0, 0, 0, 1, 0xff);
    const error = decodeFailure(bytes);
    expect(error.kind).toBe('INVALID_OPCODE');
    expect(error.offset).toBe(9);
  });

  it('fails on a literal with only four trailing bytes', () => {
    const error = decodeFailure(Uint8Array.of(0x06, 1, 2, 3, 4));
    expect(error.kind).toBe('INCOMPLETE_LITERAL');
    expect(error.offset).toBe(0);
  });

  it('fails on a trailing SET with no payload', () => {
    const error = decodeFailure(Uint8Array.of(0x00, 0x06));
    expect(error.kind).toBe('INCOMPLETE_LITERAL');
    expect(error.offset).toBe(1);
  });

  it('stops at the first bad byte', () => {
    const error = decodeFailure(Uint8Array.of(0x20, 0x06, 1));
    expect(error.kind).toBe('INVALID_OPCODE');
    expect(error.offset).toBe(0);
  });

  it('decodeOrThrow throws the DecodeError', () => {
    expect(() => decodeOrThrow(Uint8Array.of(0xaa))).toThrow(DecodeError);
  });
});

describe('decodeInstruction', () => {
  it('rejects an empty slice', () => {
    expect(sliceFailure(new Uint8Array(0))).toBe('NO_DATA');
  });

  it('rejects an unknown byte', () => {
    expect(sliceFailure(Uint8Array.of(0xff))).toBe('INVALID_OPCODE');
  });

  it('rejects SET without its literal', () => {
    expect(sliceFailure(Uint8Array.of(0x06))).toBe('MISSING_LITERAL');
  });

  it('rejects SET with a short or long literal', () => {
    expect(sliceFailure(Uint8Array.of(0x06, 1, 2))).toBe('INCOMPLETE_LITERAL');
    expect(sliceFailure(new Uint8Array(10).fill(0x06))).toBe('INCOMPLETE_LITERAL');
  });

  it('rejects extra bytes after a payload-free opcode', () => {
    expect(sliceFailure(Uint8Array.of(0x01, 0x02))).toBe('INAPPROPRIATE_LITERAL');
  });
});

describe('encodeProgram', () => {
  it('concatenates instruction encodings', () => {
    const program: Instruction[] = [
      { opcode: Opcode.SET, value: 5n },
      { opcode: Opcode.PUSH },
      { opcode: Opcode.HALT },
    ];
    expect([...encodeProgram(program)]).toEqual([0x06, 0, 0, 0, 0, 0, 0, 0, 5, 0x04, 0x01]);
  });

  it('encodes an empty program to no bytes', () => {
    expect(encodeProgram([])).toHaveLength(0);
  });
});

describe('disassemble', () => {
  it('renders mnemonics', () => {
    expect(disassemble({ opcode: Opcode.SET, value: 5n })).toBe('SET 5');
    expect(disassemble({ opcode: Opcode.ADD })).toBe('ADD');
    expect(disassemble({ opcode: Opcode.JUMP_IF })).toBe('JUMPIF');
  });
});
