import { decode } from '../decoder/index.js';
import { formatProgram } from '../format.js';
import { type CommandIO } from './io.js';

export function disassembleProgram(bytes: Uint8Array, io: CommandIO): number {
  const decoded = decode(bytes);
  if (!decoded.success) {
    io.error(`decode error: ${decoded.error.message}`);
    return 1;
  }
  if (decoded.program.length > 0) {
    io.write(formatProgram(decoded.program));
  }
  return 0;
}
