#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { runProgram } from './commands/run.js';
import { disassembleProgram } from './commands/disasm.js';
import { assembleSource } from './commands/asm.js';
import { emitOutput, type CommandIO } from './commands/io.js';
import { logger } from './logger.js';

function consoleIO(out: string[]): CommandIO {
  return {
    write: text => { out.push(text); },
    trace: text => { process.stdout.write(`${text}\n`); },
    error: text => { process.stderr.write(`${text}\n`); },
  };
}

const program = new Command();
program
  .name('stackvm')
  .description('Run and inspect stack machine bytecode');

program
  .command('run')
  .description('Execute a binary program and print the final machine state')
  .argument('<path>', 'program file')
  .argument('[output]', 'write the final state here instead of stdout')
  .option('-t, --trace', 'print the state after every executed instruction', false)
  .option('--json', 'print the final state as JSON', false)
  .action(async (path: string, output: string | undefined, options: { trace: boolean; json: boolean }) => {
    const bytes = await readFile(resolve(path));
    const out: string[] = [];
    process.exitCode = runProgram(bytes, options, consoleIO(out));
    await emitOutput(out, output);
  });

program
  .command('disasm')
  .description('Print the decoded instructions of a binary program')
  .argument('<path>', 'program file')
  .action(async (path: string) => {
    const bytes = await readFile(resolve(path));
    const out: string[] = [];
    process.exitCode = disassembleProgram(bytes, consoleIO(out));
    await emitOutput(out, undefined);
  });

program
  .command('asm')
  .description('Assemble a text program into bytecode')
  .argument('<source>', 'assembly source file')
  .argument('<output>', 'binary output file')
  .action(async (source: string, output: string) => {
    const text = await readFile(resolve(source), 'utf8');
    const bytes = assembleSource(text, consoleIO([]));
    if (!bytes) {
      process.exitCode = 1;
      return;
    }
    await writeFile(resolve(output), bytes);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error({ err: error }, 'command failed');
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
