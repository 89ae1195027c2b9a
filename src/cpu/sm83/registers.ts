/**
 * SM83 Register File
 *
 * Eight 8-bit slots stored in the order A F B C D E H L, plus an
 * independent 16-bit stack pointer. Register pairs are not stored twice:
 * a wide read assembles two adjacent slots, the pair head supplying the
 * low byte and its neighbour the high byte.
 *
 * The program counter lives on the CPU, not here.
 */

import { ExecutionFault } from './errors';
import { Reg, type WideReg } from './types';

const F_SLOT = Reg.F - 1;

export interface RegisterSnapshot {
  readonly bytes: Uint8Array;
  readonly sp: number;
}

export interface RegisterState {
  a: number;
  f: number;
  b: number;
  c: number;
  d: number;
  e: number;
  h: number;
  l: number;
  sp: number;
}

export function isWideReg(reg: Reg): reg is WideReg {
  return reg === Reg.A || reg === Reg.B || reg === Reg.D || reg === Reg.H || reg === Reg.SP;
}

export class RegisterFile {
  private readonly bytes = new Uint8Array(8);
  private sp = 0;

  // --- Narrow access ---

  read8(reg: Reg): number {
    return this.bytes[this.slotOf(reg)];
  }

  write8(reg: Reg, value: number): void {
    const slot = this.slotOf(reg);
    this.bytes[slot] = slot === F_SLOT ? value & 0xf0 : value & 0xff;
  }

  // --- Wide access ---

  read16(reg: Reg): number {
    if (reg === Reg.SP) return this.sp;
    const slot = this.pairSlotOf(reg);
    return this.bytes[slot] | (this.bytes[slot + 1] << 8);
  }

  write16(reg: Reg, value: number): void {
    if (reg === Reg.SP) {
      this.sp = value & 0xffff;
      return;
    }
    const slot = this.pairSlotOf(reg);
    this.bytes[slot] = value & 0xff;
    const high = (value >> 8) & 0xff;
    this.bytes[slot + 1] = slot + 1 === F_SLOT ? high & 0xf0 : high;
  }

  // --- Flags ---

  get flags(): number {
    return this.bytes[F_SLOT];
  }

  set flags(value: number) {
    this.bytes[F_SLOT] = value & 0xf0;
  }

  hasFlag(flag: number): boolean {
    return (this.bytes[F_SLOT] & flag) !== 0;
  }

  // --- Lifecycle ---

  reset(): void {
    this.bytes.fill(0);
    this.sp = 0;
  }

  snapshot(): RegisterSnapshot {
    return { bytes: this.bytes.slice(), sp: this.sp };
  }

  restore(snapshot: RegisterSnapshot): void {
    this.bytes.set(snapshot.bytes);
    this.sp = snapshot.sp;
  }

  toState(): RegisterState {
    const [a, f, b, c, d, e, h, l] = this.bytes;
    return { a, f, b, c, d, e, h, l, sp: this.sp };
  }

  private slotOf(reg: Reg): number {
    if (reg === Reg.Invalid || reg === Reg.SP || reg < Reg.Invalid || reg > Reg.SP) {
      throw new ExecutionFault(`${Reg[reg] ?? reg} is not an 8-bit register`);
    }
    return reg - 1;
  }

  private pairSlotOf(reg: Reg): number {
    if (!isWideReg(reg)) {
      throw new ExecutionFault(`${Reg[reg] ?? reg} is not a register pair head`);
    }
    return reg - 1;
  }
}
