import { assemble, Machine, formatStep } from '../src/index.js';

// An endless loop: JUMP back to index 0 forever. run() would never return,
// so drive it one instruction at a time.
const result = assemble(`
SET 1
PUSH
POP
SET 0
PUSH
JUMP
`);

if (!result.success || !result.program) {
  console.error('Assembly failed:', result.messages);
  process.exit(1);
}

const machine = new Machine(result.program);
machine.setEventListener({
  onStep: ({ index, instruction, state }) => console.log(`${index}: ${formatStep(state, instruction)}`),
});

for (let i = 0; i < 12; i++) {
  if (machine.step() !== null) break;
}
console.log(`Executed ${machine.stepCount} steps; finished: ${machine.finished}`);
