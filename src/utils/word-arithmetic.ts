import { WORD_MAX } from '../constants.js';
import { type Word } from '../types.js';

// Checked operations over the 64-bit word. `null` means the exact result is
// not representable (overflow, underflow or a zero divisor).

export function checkedAdd(a: Word, b: Word): Word | null {
  const sum = a + b;
  return sum > WORD_MAX ? null : sum;
}

export function checkedSub(a: Word, b: Word): Word | null {
  return a < b ? null : a - b;
}

export function checkedMul(a: Word, b: Word): Word | null {
  const product = a * b;
  return product > WORD_MAX ? null : product;
}

export function checkedDiv(a: Word, b: Word): Word | null {
  return b === 0n ? null : a / b;
}

export function checkedMod(a: Word, b: Word): Word | null {
  return b === 0n ? null : a % b;
}

export function complement(a: Word): Word {
  return ~a & WORD_MAX;
}

/** Big-endian byte representation of a word. */
export function wordToBytes(value: Word): Uint8Array {
  const bytes = new Uint8Array(8);
  let v = value;
  for (let i = 7; i >= 0; i--) {
    bytes[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return bytes;
}

export function wordFromBytes(bytes: Uint8Array, offset = 0): Word {
  let v = 0n;
  for (let i = 0; i < 8; i++) {
    v = (v << 8n) | BigInt(bytes[offset + i]);
  }
  return v;
}
