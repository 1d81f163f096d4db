import { Opcode, type Instruction, type Program } from '../types.js';
import { type ExecutionError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { executeInstruction } from './ops.js';
import { State } from './state.js';

export type StepObserver = (state: State, instruction: Instruction) => void;

export interface StepEvent {
  index: number;
  instruction: Instruction;
  state: State;
}

export interface MachineEventListener {
  onStep?: (event: StepEvent) => void;
  onRunEnd?: (result: RunResult) => void;
  onError?: (error: ExecutionError, state: State) => void;
}

export type RunResult =
  | { outcome: 'HALTED' | 'END_OF_PROGRAM'; state: State; steps: number }
  | { outcome: 'ERROR'; error: ExecutionError; state: State; steps: number };

/** Finished results are cached; callers each get their own state. */
function copyResult(result: RunResult): RunResult {
  return { ...result, state: result.state.clone() };
}

export interface MachineOptions {
  logger: Logger;
}

export class Machine {
  private readonly program: Program;
  private state: State;
  private listener: MachineEventListener | null = null;
  private logger: Logger;
  private result: RunResult | null = null;
  private steps = 0;

  constructor(program: Program, state: State = new State(), options?: Partial<MachineOptions>) {
    this.program = program;
    this.state = state.clone();
    this.logger = options?.logger ?? rootLogger.child({ module: 'machine' });
  }

  setEventListener(listener: MachineEventListener | null): void {
    this.listener = listener;
  }

  /** Run until HALT, the end of the program, or the first failing instruction. */
  run(): RunResult {
    this.logger.debug({ instructions: this.program.length }, 'run started');
    let result = this.step();
    while (result === null) {
      result = this.step();
    }
    return result;
  }

  /**
   * Run as `run()` does, reporting every executed instruction to `observer`
   * along with a copy of the state it produced.
   */
  runWithObserver(observer: StepObserver): RunResult {
    const previous = this.listener;
    this.listener = {
      ...previous,
      onStep: (event) => {
        previous?.onStep?.(event);
        observer(event.state.clone(), event.instruction);
      },
    };
    try {
      return this.run();
    } finally {
      this.listener = previous;
    }
  }

  /** Execute one instruction. Returns null while the program is still running. */
  step(): RunResult | null {
    if (this.result) return copyResult(this.result);

    const pc = this.state.pc;
    if (pc >= BigInt(this.program.length)) {
      return this.finish({ outcome: 'END_OF_PROGRAM', state: this.state.clone(), steps: this.steps });
    }

    const index = Number(pc);
    const instruction = this.program[index];
    const stepped = executeInstruction(this.state, instruction);

    if (!stepped.success) {
      this.logger.debug({ pc: pc.toString(), kind: stepped.error.kind }, stepped.error.message);
      this.listener?.onError?.(stepped.error, this.state.clone());
      return this.finish({ outcome: 'ERROR', error: stepped.error, state: this.state.clone(), steps: this.steps });
    }

    this.state = stepped.state;
    this.steps++;
    this.listener?.onStep?.({ index, instruction, state: this.state.clone() });

    if (instruction.opcode === Opcode.HALT) {
      return this.finish({ outcome: 'HALTED', state: this.state.clone(), steps: this.steps });
    }
    return null;
  }

  private finish(result: RunResult): RunResult {
    this.result = result;
    this.logger.debug({ outcome: result.outcome, steps: result.steps }, 'run finished');
    this.listener?.onRunEnd?.(copyResult(result));
    return copyResult(result);
  }

  getState(): State {
    return this.state.clone();
  }

  getProgram(): Program {
    return this.program;
  }

  get stepCount(): number {
    return this.steps;
  }

  get finished(): boolean {
    return this.result !== null;
  }
}
