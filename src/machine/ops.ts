import { Opcode, OPCODE_ARITY, type Instruction, type Word } from '../types.js';
import { ExecutionError } from '../errors.js';
import {
  checkedAdd, checkedSub, checkedMul, checkedDiv, checkedMod, complement,
} from '../utils/word-arithmetic.js';
import { type State } from './state.js';

export type StepResult =
  | { success: true; state: State }
  | { success: false; error: ExecutionError };

type BinaryOp = (a: Word, b: Word) => Word | null;

const BINARY_OPS: Partial<Record<Opcode, BinaryOp>> = {
  [Opcode.ADD]: checkedAdd,
  [Opcode.SUB]: checkedSub,
  [Opcode.MUL]: checkedMul,
  [Opcode.DIV]: checkedDiv,
  [Opcode.MOD]: checkedMod,
  [Opcode.CMP]: (a, b) => (a === b ? 1n : 0n),
  [Opcode.AND]: (a, b) => a & b,
  [Opcode.OR]: (a, b) => a | b,
  [Opcode.XOR]: (a, b) => a ^ b,
};

/**
 * Apply one instruction to `state`. The input is never modified: on success a
 * new state is returned, on failure only the error.
 */
export function executeInstruction(state: State, inst: Instruction): StepResult {
  if (state.stack.depth < OPCODE_ARITY[inst.opcode]) {
    return { success: false, error: new ExecutionError('INSUFFICIENT_ARGUMENTS', inst.opcode) };
  }

  const next = state.clone();
  try {
    apply(next, inst);
  } catch (err) {
    if (err instanceof ExecutionError) {
      return { success: false, error: err.withOpcode(inst.opcode) };
    }
    throw err;
  }
  return { success: true, state: next };
}

// Mutates `s`, which is always a private copy. Arity is already checked.
function apply(s: State, inst: Instruction): void {
  switch (inst.opcode) {
    case Opcode.NOP:
      break;
    case Opcode.HALT:
      return;
    case Opcode.LOAD: {
      const address = s.stack.pop();
      s.stack.push(s.memory.read(address));
      break;
    }
    case Opcode.STORE: {
      const address = s.stack.pop();
      const value = s.stack.pop();
      s.memory.write(address, value);
      break;
    }
    case Opcode.PUSH:
      s.stack.push(s.register);
      break;
    case Opcode.POP:
      s.register = s.stack.pop();
      break;
    case Opcode.SET:
      s.register = inst.value;
      break;
    case Opcode.JUMP:
      s.pc = s.stack.pop();
      return;
    case Opcode.NOT:
      s.stack.push(complement(s.stack.pop()));
      break;
    case Opcode.READ:
    case Opcode.WRITE:
    case Opcode.JUMP_IF:
      throw new ExecutionError('ILLEGAL_INSTRUCTION', inst.opcode);
    default: {
      const op = BINARY_OPS[inst.opcode];
      if (!op) {
        throw new ExecutionError('ILLEGAL_INSTRUCTION', inst.opcode);
      }
      const a = s.stack.pop();
      const b = s.stack.pop();
      const result = op(a, b);
      if (result === null) {
        throw new ExecutionError('ARITHMETIC_OVERFLOW', inst.opcode);
      }
      s.stack.push(result);
      break;
    }
  }
  s.pc += 1n;
}
