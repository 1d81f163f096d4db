import { decode } from '../decoder/index.js';
import { Machine, type RunResult } from '../machine/index.js';
import { formatState, formatStep } from '../format.js';
import { logger } from '../logger.js';
import { type CommandIO } from './io.js';

export interface RunCommandOptions {
  trace: boolean;
  json: boolean;
}

const log = logger.child({ module: 'cli' });

/** Decode and execute `bytes`. Returns the process exit code. */
export function runProgram(bytes: Uint8Array, options: RunCommandOptions, io: CommandIO): number {
  const decoded = decode(bytes);
  if (!decoded.success) {
    log.debug({ kind: decoded.error.kind, offset: decoded.error.offset }, 'decode failed');
    io.error(`decode error: ${decoded.error.message}`);
    return 1;
  }

  const machine = new Machine(decoded.program);
  let result: RunResult;
  if (options.trace) {
    io.trace(formatState(machine.getState()));
    result = machine.runWithObserver((state, instruction) => io.trace(formatStep(state, instruction)));
  } else {
    result = machine.run();
  }

  if (result.outcome === 'ERROR') {
    io.error(`execution error: ${result.error.message}`);
    io.error(`last state: ${formatState(result.state)}`);
    return 1;
  }

  io.write(options.json ? JSON.stringify(result.state) : formatState(result.state));
  return 0;
}
