import { type Instruction } from './types.js';
import { disassemble } from './decoder/index.js';
import { type State } from './machine/state.js';

export function formatState(state: State): string {
  const stack = state.stack.toArray().join(', ');
  const memory = state.memory.entries().map(([addr, value]) => `${addr}: ${value}`).join(', ');
  return `pc=${state.pc} reg=${state.register} stack=[${stack}] memory={${memory}}`;
}

export function formatStep(state: State, instruction: Instruction): string {
  return `[${disassemble(instruction)}] ${formatState(state)}`;
}

export function formatProgram(program: readonly Instruction[]): string {
  const width = String(Math.max(program.length - 1, 0)).length;
  return program.map((inst, i) => `${String(i).padStart(width, ' ')}  ${disassemble(inst)}`).join('\n');
}
