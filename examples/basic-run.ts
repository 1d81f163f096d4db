import { assembleToBytes, decode, Machine, formatState } from '../src/index.js';

// (7 + 5) stored at address 100, then read back
const bytes = assembleToBytes(`
SET 5
PUSH
SET 7
PUSH
ADD      ; 12
SET 100
PUSH
STORE
SET 100
PUSH
LOAD
HALT
`);

const decoded = decode(bytes);
if (!decoded.success) {
  console.error('Decode failed:', decoded.error.message);
  process.exit(1);
}

const result = new Machine(decoded.program).run();
console.log(`Outcome: ${result.outcome} after ${result.steps} steps`);
console.log(formatState(result.state));
