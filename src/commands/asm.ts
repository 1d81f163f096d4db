import { assemble } from '../assembler/index.js';
import { encodeProgram } from '../decoder/index.js';
import { type CommandIO } from './io.js';

/** Assemble `source`; returns the encoded program, or null after reporting errors. */
export function assembleSource(source: string, io: CommandIO): Uint8Array | null {
  const result = assemble(source);
  for (const msg of result.messages) {
    io.error(`line ${msg.line}: ${msg.type.toLowerCase()}: ${msg.text}`);
  }
  if (!result.success || !result.program) {
    return null;
  }
  return encodeProgram(result.program);
}
