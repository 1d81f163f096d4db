import { Opcode, OPCODE_NAMES, type Instruction, type Program } from '../types.js';
import { OPCODES, isWord } from '../constants.js';
import { encodeProgram } from '../decoder/index.js';

export interface AssemblerMessage {
  type: 'ERROR' | 'WARNING';
  line: number;
  text: string;
}

export interface AssembleResult {
  success: boolean;
  program: Program | null;
  messages: AssemblerMessage[];
}

const MNEMONICS: ReadonlyMap<string, Opcode> = new Map(
  OPCODES.map((op): [string, Opcode] => [OPCODE_NAMES[op], op]),
);

// Decodable, but the machine refuses to execute them.
const RESERVED: ReadonlySet<Opcode> = new Set([Opcode.READ, Opcode.WRITE, Opcode.JUMP_IF]);

const LITERAL_RE = /^(0x[0-9a-f]+|[0-9]+)$/i;

/**
 * Assemble one-instruction-per-line source text. `;` starts a comment.
 * Only SET takes an operand, a decimal or 0x-prefixed word literal.
 */
export function assemble(source: string): AssembleResult {
  const messages: AssemblerMessage[] = [];
  const program: Instruction[] = [];
  const lines = source.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const lineNum = i + 1;
    const commentPos = lines[i].indexOf(';');
    const text = (commentPos >= 0 ? lines[i].substring(0, commentPos) : lines[i]).trim();
    if (!text) continue;

    const [mnemonic, ...operands] = text.split(/\s+/);
    const opcode = MNEMONICS.get(mnemonic.toUpperCase());
    if (opcode === undefined) {
      messages.push({ type: 'ERROR', line: lineNum, text: `Unknown instruction '${mnemonic}'` });
      continue;
    }

    if (opcode === Opcode.SET) {
      if (operands.length !== 1) {
        messages.push({ type: 'ERROR', line: lineNum, text: 'SET takes exactly one literal' });
        continue;
      }
      const literal = operands[0];
      if (!LITERAL_RE.test(literal)) {
        messages.push({ type: 'ERROR', line: lineNum, text: `Bad literal '${literal}'` });
        continue;
      }
      const value = BigInt(literal);
      if (!isWord(value)) {
        messages.push({ type: 'ERROR', line: lineNum, text: `Literal '${literal}' does not fit in 64 bits` });
        continue;
      }
      program.push({ opcode, value });
      continue;
    }

    if (operands.length > 0) {
      messages.push({ type: 'ERROR', line: lineNum, text: `${OPCODE_NAMES[opcode]} takes no operands` });
      continue;
    }
    if (RESERVED.has(opcode)) {
      messages.push({ type: 'WARNING', line: lineNum, text: `${OPCODE_NAMES[opcode]} is reserved and will not execute` });
    }
    program.push({ opcode });
  }

  const success = !messages.some(m => m.type === 'ERROR');
  return { success, program: success ? Object.freeze(program) : null, messages };
}

export function assembleToBytes(source: string): Uint8Array {
  const result = assemble(source);
  if (!result.success || !result.program) {
    const errors = result.messages.filter(m => m.type === 'ERROR');
    throw new Error(`Assembly failed: ${errors.map(m => `line ${m.line}: ${m.text}`).join(', ')}`);
  }
  return encodeProgram(result.program);
}
