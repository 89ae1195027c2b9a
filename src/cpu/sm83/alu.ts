/**
 * SM83 ALU
 *
 * Result-and-flags functions. Each takes the register file so it can read
 * the incoming carry and write back the new flag byte; none of them
 * touches any other register.
 */

import type { RegisterFile } from './registers';
import { FLAG_C, FLAG_H, FLAG_N, FLAG_Z, type AluOp, type ShiftOp } from './types';

const zero = (value: number): number => (value === 0 ? FLAG_Z : 0);
const carryIn = (regs: RegisterFile): number => (regs.hasFlag(FLAG_C) ? 1 : 0);

// --- Arithmetic ---

export function add8(regs: RegisterFile, a: number, b: number): number {
  const sum = a + b;
  const result = sum & 0xff;
  regs.flags =
    zero(result) |
    ((a & 0x0f) + (b & 0x0f) > 0x0f ? FLAG_H : 0) |
    (sum > 0xff ? FLAG_C : 0);
  return result;
}

export function add16(regs: RegisterFile, a: number, b: number): number {
  const sum = a + b;
  const result = sum & 0xffff;
  regs.flags =
    zero(result) |
    ((a & 0x0fff) + (b & 0x0fff) > 0x0fff ? FLAG_H : 0) |
    (sum > 0xffff ? FLAG_C : 0);
  return result;
}

export function addWithCarry8(regs: RegisterFile, a: number, b: number): number {
  const carry = carryIn(regs);
  const sum = a + b + carry;
  const result = sum & 0xff;
  regs.flags =
    zero(result) |
    ((a & 0x0f) + (b & 0x0f) + carry > 0x0f ? FLAG_H : 0) |
    (sum > 0xff ? FLAG_C : 0);
  return result;
}

/** `C` is set on a borrow out of bit 7, `H` on a borrow out of bit 4. */
export function sub8(regs: RegisterFile, a: number, b: number): number {
  const result = (a - b) & 0xff;
  regs.flags =
    zero(result) |
    FLAG_N |
    ((a & 0x0f) < (b & 0x0f) ? FLAG_H : 0) |
    (a < b ? FLAG_C : 0);
  return result;
}

export function subWithCarry8(regs: RegisterFile, a: number, b: number): number {
  const carry = carryIn(regs);
  const diff = a - b - carry;
  const result = diff & 0xff;
  regs.flags =
    zero(result) |
    FLAG_N |
    ((a & 0x0f) - (b & 0x0f) - carry < 0 ? FLAG_H : 0) |
    (diff < 0 ? FLAG_C : 0);
  return result;
}

export function and8(regs: RegisterFile, a: number, b: number): number {
  const result = a & b;
  regs.flags = zero(result) | FLAG_H;
  return result;
}

export function or8(regs: RegisterFile, a: number, b: number): number {
  const result = (a | b) & 0xff;
  regs.flags = zero(result);
  return result;
}

export function xor8(regs: RegisterFile, a: number, b: number): number {
  const result = (a ^ b) & 0xff;
  regs.flags = zero(result);
  return result;
}

/** Increment and decrement never touch the carry flag. */
export function increment8(regs: RegisterFile, a: number): number {
  const carry = regs.flags & FLAG_C;
  const result = add8(regs, a, 1);
  regs.flags = (regs.flags & ~FLAG_C) | carry;
  return result;
}

export function decrement8(regs: RegisterFile, a: number): number {
  const carry = regs.flags & FLAG_C;
  const result = sub8(regs, a, 1);
  regs.flags = (regs.flags & ~FLAG_C) | carry;
  return result;
}

/**
 * Adds a signed 8-bit offset to a word (ADD SP,e8 and LD HL,SP+e8).
 * `H` and `C` come from the unsigned addition of the low bytes; `Z` and
 * `N` are cleared.
 */
export function addSignedToWord(regs: RegisterFile, word: number, offset: number): number {
  const low = offset & 0xff;
  regs.flags =
    ((word & 0x0f) + (low & 0x0f) > 0x0f ? FLAG_H : 0) |
    ((word & 0xff) + low > 0xff ? FLAG_C : 0);
  return (word + offset) & 0xffff;
}

/** Corrects A to packed BCD after an addition or subtraction. */
export function decimalAdjust8(regs: RegisterFile, a: number): number {
  const flags = regs.flags;
  let adjust = 0;
  let carry = flags & FLAG_C;
  let result: number;

  if (flags & FLAG_N) {
    if (flags & FLAG_C) adjust |= 0x60;
    if (flags & FLAG_H) adjust |= 0x06;
    result = (a - adjust) & 0xff;
  } else {
    if (flags & FLAG_C || a > 0x99) {
      adjust |= 0x60;
      carry = FLAG_C;
    }
    if (flags & FLAG_H || (a & 0x0f) > 0x09) adjust |= 0x06;
    result = (a + adjust) & 0xff;
  }

  regs.flags = zero(result) | (flags & FLAG_N) | carry;
  return result;
}

// --- Rotates and shifts ---

function shifted(regs: RegisterFile, result: number, carryOut: number): number {
  regs.flags = zero(result) | (carryOut ? FLAG_C : 0);
  return result;
}

export function rotateLeftCircular8(regs: RegisterFile, a: number): number {
  const out = a >> 7;
  return shifted(regs, ((a << 1) | out) & 0xff, out);
}

export function rotateRightCircular8(regs: RegisterFile, a: number): number {
  const out = a & 1;
  return shifted(regs, (a >> 1) | (out << 7), out);
}

export function rotateLeft8(regs: RegisterFile, a: number): number {
  return shifted(regs, ((a << 1) | carryIn(regs)) & 0xff, a >> 7);
}

export function rotateRight8(regs: RegisterFile, a: number): number {
  return shifted(regs, (a >> 1) | (carryIn(regs) << 7), a & 1);
}

export function shiftLeftArithmetic8(regs: RegisterFile, a: number): number {
  return shifted(regs, (a << 1) & 0xff, a >> 7);
}

export function shiftRightArithmetic8(regs: RegisterFile, a: number): number {
  return shifted(regs, (a >> 1) | (a & 0x80), a & 1);
}

export function shiftRightLogical8(regs: RegisterFile, a: number): number {
  return shifted(regs, a >> 1, a & 1);
}

export function swapNibbles8(regs: RegisterFile, a: number): number {
  return shifted(regs, ((a & 0x0f) << 4) | (a >> 4), 0);
}

// --- Single-bit operations ---

/** Sets `Z` when the bit is clear and sets `H`; `N` and `C` are kept. */
export function testBit8(regs: RegisterFile, a: number, bit: number): void {
  regs.flags =
    (regs.flags & (FLAG_N | FLAG_C)) |
    FLAG_H |
    (a & (1 << bit) ? 0 : FLAG_Z);
}

export function resetBit8(a: number, bit: number): number {
  return a & ~(1 << bit) & 0xff;
}

export function setBit8(a: number, bit: number): number {
  return (a | (1 << bit)) & 0xff;
}

// --- Dispatch tables ---

type Accumulate = (regs: RegisterFile, a: number, b: number) => number;
type Shift = (regs: RegisterFile, a: number) => number;

/** Compare shares subtraction; the caller discards the result. */
export const ACCUMULATORS: Readonly<Record<AluOp, Accumulate>> = {
  Add: add8,
  Adc: addWithCarry8,
  Sub: sub8,
  Sbc: subWithCarry8,
  And: and8,
  Xor: xor8,
  Or: or8,
  Cp: sub8,
};

export const SHIFTERS: Readonly<Record<ShiftOp, Shift>> = {
  Rlc: rotateLeftCircular8,
  Rrc: rotateRightCircular8,
  Rl: rotateLeft8,
  Rr: rotateRight8,
  Sla: shiftLeftArithmetic8,
  Sra: shiftRightArithmetic8,
  Swap: swapNibbles8,
  Srl: shiftRightLogical8,
};
