import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

export interface CommandIO {
  /** Primary output: the final state, a listing, ... */
  write(text: string): void;
  /** Step-by-step trace lines. */
  trace(text: string): void;
  error(text: string): void;
}

export function bufferedIO(): CommandIO & { out: string[]; traced: string[]; errors: string[] } {
  const out: string[] = [];
  const traced: string[] = [];
  const errors: string[] = [];
  return {
    out,
    traced,
    errors,
    write: text => { out.push(text); },
    trace: text => { traced.push(text); },
    error: text => { errors.push(text); },
  };
}

/**
 * Write collected output lines to `output`, or to `stdout` when no path is
 * given. Nothing is written when there are no lines.
 */
export async function emitOutput(
  lines: readonly string[],
  output: string | undefined,
  stdout: (text: string) => void = text => { process.stdout.write(text); },
): Promise<void> {
  if (lines.length === 0) return;
  const text = `${lines.join('\n')}\n`;
  if (output) {
    await writeFile(resolve(output), text);
  } else {
    stdout(text);
  }
}
