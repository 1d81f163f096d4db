import { Opcode, OPCODE_NAMES, type Instruction, type Program } from '../types.js';
import { LITERAL_INSTRUCTION_LENGTH, LITERAL_OPCODE, isOpcode } from '../constants.js';
import { DecodeError } from '../errors.js';
import { wordFromBytes, wordToBytes } from '../utils/word-arithmetic.js';

export type DecodeResult =
  | { success: true; program: Program }
  | { success: false; error: DecodeError };

/**
 * Decode exactly one instruction from `slice`. The slice must hold the whole
 * encoding and nothing else: one byte, or nine for SET. Errors are reported at
 * offset 0 of the slice.
 */
export function decodeInstruction(slice: Uint8Array): Instruction {
  if (slice.length === 0) {
    throw new DecodeError('NO_DATA', 0);
  }
  const byte = slice[0];

  if (slice.length > 1) {
    if (byte !== LITERAL_OPCODE) {
      throw new DecodeError('INAPPROPRIATE_LITERAL', 0, byte);
    }
    if (slice.length !== LITERAL_INSTRUCTION_LENGTH) {
      throw new DecodeError('INCOMPLETE_LITERAL', 0);
    }
    return { opcode: Opcode.SET, value: wordFromBytes(slice, 1) };
  }

  if (!isOpcode(byte)) {
    throw new DecodeError('INVALID_OPCODE', 0, byte);
  }
  if (byte === Opcode.SET) {
    throw new DecodeError('MISSING_LITERAL', 0);
  }
  return { opcode: byte };
}

/**
 * Decode a flat byte stream left to right. SET consumes nine bytes, every other
 * opcode one. Decoding stops at the first bad opcode and no partial program is
 * returned. Empty input is an empty program.
 */
export function decode(bytes: Uint8Array): DecodeResult {
  const program: Instruction[] = [];
  let pos = 0;

  while (pos < bytes.length) {
    const length = bytes[pos] === LITERAL_OPCODE ? LITERAL_INSTRUCTION_LENGTH : 1;
    const end = pos + length;
    if (end > bytes.length) {
      return { success: false, error: new DecodeError('INCOMPLETE_LITERAL', pos) };
    }

    try {
      program.push(decodeInstruction(bytes.subarray(pos, end)));
    } catch (err) {
      if (err instanceof DecodeError) {
        return { success: false, error: err.at(pos) };
      }
      throw err;
    }
    pos = end;
  }

  return { success: true, program: Object.freeze(program) };
}

export function decodeOrThrow(bytes: Uint8Array): Program {
  const result = decode(bytes);
  if (!result.success) throw result.error;
  return result.program;
}

export function encodeInstruction(inst: Instruction): Uint8Array {
  if (inst.opcode === Opcode.SET) {
    const out = new Uint8Array(LITERAL_INSTRUCTION_LENGTH);
    out[0] = inst.opcode;
    out.set(wordToBytes(inst.value), 1);
    return out;
  }
  return Uint8Array.of(inst.opcode);
}

export function encodeProgram(program: Program): Uint8Array {
  const parts = program.map(encodeInstruction);
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let pos = 0;
  for (const part of parts) {
    out.set(part, pos);
    pos += part.length;
  }
  return out;
}

export function disassemble(inst: Instruction): string {
  const name = OPCODE_NAMES[inst.opcode];
  return inst.opcode === Opcode.SET ? `${name} ${inst.value}` : name;
}
