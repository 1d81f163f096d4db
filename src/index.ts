// Engine
export { Machine } from './machine/index.js';
export type { RunResult, StepObserver, StepEvent, MachineEventListener, MachineOptions } from './machine/index.js';
export { executeInstruction } from './machine/ops.js';
export type { StepResult } from './machine/ops.js';
export { State } from './machine/state.js';
export type { StateInit, StateSnapshot } from './machine/state.js';
export { Stack } from './machine/stack.js';
export { Memory } from './machine/memory.js';

// Bytecode
export { decode, decodeInstruction, decodeOrThrow, encodeInstruction, encodeProgram, disassemble } from './decoder/index.js';
export type { DecodeResult } from './decoder/index.js';
export { assemble, assembleToBytes } from './assembler/index.js';
export type { AssembleResult, AssemblerMessage } from './assembler/index.js';

// Types and constants
export { Opcode, OPCODE_NAMES, OPCODE_ARITY } from './types.js';
export type { Word, Instruction, LiteralInstruction, PlainInstruction, PlainOpcode, Program } from './types.js';
export {
  WORD_BITS, WORD_BYTES, WORD_MAX, MAX_STACK_DEPTH, LITERAL_OPCODE, LITERAL_INSTRUCTION_LENGTH,
  OPCODES, isOpcode, isWord,
} from './constants.js';
export { DecodeError, ExecutionError } from './errors.js';
export type { DecodeErrorKind, ExecutionErrorKind } from './errors.js';

// Utilities
export { checkedAdd, checkedSub, checkedMul, checkedDiv, checkedMod, complement, wordToBytes, wordFromBytes } from './utils/word-arithmetic.js';
export { formatState, formatStep, formatProgram } from './format.js';
export { loadConfig, LOG_LEVELS } from './config.js';
export type { VmConfig } from './config.js';
export { logger, createLogger } from './logger.js';
export type { Logger } from './logger.js';
