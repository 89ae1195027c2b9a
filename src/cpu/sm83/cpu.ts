/**
 * SM83 CPU
 *
 * Game Boy class 8-bit core. Each step decodes one instruction from the
 * memory collaborator, applies it to the register file and reports a
 * StepOutcome. A fault rolls registers, PC and interrupt state back to
 * where the step began.
 */

import { logger } from '@/lib/logger';
import type { CycleHook, Memory } from '../types';
import {
  ACCUMULATORS,
  SHIFTERS,
  add16,
  addSignedToWord,
  decimalAdjust8,
  decrement8,
  increment8,
  resetBit8,
  rotateLeft8,
  rotateLeftCircular8,
  rotateRight8,
  rotateRightCircular8,
  setBit8,
  testBit8,
} from './alu';
import { parseCpuConfig, type CpuConfig, type CpuConfigInput } from './config';
import { decodeInstruction, memorySource } from './decoder';
import { formatInstruction } from './disassembler';
import { CpuFault, ExecutionFault, MemoryFault } from './errors';
import { RegisterFile, type RegisterState } from './registers';
import { conditionHolds, resolveConditions } from './tables';
import {
  ALU_OP_OF,
  AddrMode,
  BIT_OP_OF,
  FLAG_C,
  FLAG_H,
  FLAG_N,
  FLAG_Z,
  Reg,
  SHIFT_OP_OF,
  type Address,
  type AluOp,
  type BitOp,
  type Condition,
  type ConditionTable,
  type Instruction,
} from './types';

export type StepOutcome =
  | { status: 'continue'; cycles: number }
  | { status: 'halted'; cycles: number }
  | { status: 'fault'; fault: CpuFault };

export interface RunResult {
  outcome: StepOutcome;
  /** Cycles consumed by the instructions that completed. */
  cycles: number;
}

export interface Sm83State extends RegisterState {
  pc: number;
  halted: boolean;
  ime: boolean;
  cycles: number;
}

export interface Sm83Options extends CpuConfigInput {
  /** Called with the cost of every completed instruction. */
  tick?: CycleHook;
}

export class Sm83 {
  readonly regs = new RegisterFile();
  pc = 0;
  halted = false;
  /** Interrupt master enable. Tracked only; nothing services interrupts. */
  ime = false;
  cycles = 0;

  private readonly config: CpuConfig;
  private readonly conditions: ConditionTable;
  private readonly tick: CycleHook;

  constructor(options: Sm83Options = {}) {
    const { tick, ...config } = options;
    this.config = parseCpuConfig(config);
    this.conditions = resolveConditions(this.config.conditions);
    this.tick = tick ?? (() => undefined);
    this.reset();
  }

  reset(): void {
    this.regs.reset();
    this.pc = this.config.resetVector;
    this.halted = false;
    this.ime = false;
    this.cycles = 0;
  }

  // --- Execute single instruction ---
  step(memory: Memory): StepOutcome {
    if (this.halted) return { status: 'halted', cycles: 0 };

    const start = this.pc;
    const saved = this.regs.snapshot();
    const savedIme = this.ime;

    try {
      const decoded = decodeInstruction(memorySource(memory), start, { conditions: this.conditions });
      if (this.config.trace) {
        logger.debug({ pc: start, op: formatInstruction(decoded.instruction) }, 'exec');
      }
      this.pc = (start + decoded.length) & 0xffff;

      const taken = this.execute(memory, decoded.instruction);
      const cycles = decoded.cost + (taken ? decoded.takenCost : 0);
      this.tick(cycles);
      this.cycles += cycles;

      return this.halted ? { status: 'halted', cycles } : { status: 'continue', cycles };
    } catch (err) {
      if (!(err instanceof CpuFault)) throw err;
      this.regs.restore(saved);
      this.pc = start;
      this.ime = savedIme;
      this.halted = false;
      logger.warn({ kind: err.kind, pc: start }, err.message);
      return { status: 'fault', fault: err };
    }
  }

  /** Steps until something other than `continue` or the budget is spent. */
  run(memory: Memory, maxCycles: number): RunResult {
    let cycles = 0;
    let outcome: StepOutcome = { status: 'continue', cycles: 0 };
    while (cycles < maxCycles) {
      outcome = this.step(memory);
      if (outcome.status === 'fault') break;
      cycles += outcome.cycles;
      if (outcome.status === 'halted') break;
    }
    return { outcome, cycles };
  }

  getState(): Sm83State {
    return {
      ...this.regs.toState(),
      pc: this.pc,
      halted: this.halted,
      ime: this.ime,
      cycles: this.cycles,
    };
  }

  // --- Memory access ---

  private read(memory: Memory, address: number): number {
    return memory.read(address & 0xffff) & 0xff;
  }

  private write(memory: Memory, address: number, value: number): void {
    memory.write(address & 0xffff, value & 0xff);
  }

  private effectiveAddress(address: Address): number {
    switch (address.mode) {
      case AddrMode.HL:
      case AddrMode.HLInc:
      case AddrMode.HLDec:
        return this.regs.read16(Reg.H);
      case AddrMode.BC:
        return this.regs.read16(Reg.B);
      case AddrMode.DE:
        return this.regs.read16(Reg.D);
      case AddrMode.HighC:
        return 0xff00 + this.regs.read8(Reg.C);
      case AddrMode.Imm:
        return address.address;
      case AddrMode.HighImm:
        return 0xff00 + address.offset;
    }
  }

  /** HL+ and HL- adjust HL once the access has completed. */
  private postIndex(address: Address): void {
    if (address.mode === AddrMode.HLInc) {
      this.regs.write16(Reg.H, this.regs.read16(Reg.H) + 1);
    } else if (address.mode === AddrMode.HLDec) {
      this.regs.write16(Reg.H, this.regs.read16(Reg.H) - 1);
    }
  }

  private load(memory: Memory, address: Address): number {
    const value = this.read(memory, this.effectiveAddress(address));
    this.postIndex(address);
    return value;
  }

  private store(memory: Memory, address: Address, value: number): void {
    this.write(memory, this.effectiveAddress(address), value);
    this.postIndex(address);
  }

  private modify(memory: Memory, address: Address, update: (value: number) => number): void {
    const at = this.effectiveAddress(address);
    this.write(memory, at, update(this.read(memory, at)));
    this.postIndex(address);
  }

  // --- Stack operations ---

  private pushWord(memory: Memory, value: number): void {
    let sp = this.regs.read16(Reg.SP);
    sp = (sp - 1) & 0xffff;
    this.stackWrite(memory, sp, (value >> 8) & 0xff);
    sp = (sp - 1) & 0xffff;
    this.stackWrite(memory, sp, value & 0xff);
    this.regs.write16(Reg.SP, sp);
  }

  private popWord(memory: Memory): number {
    const sp = this.regs.read16(Reg.SP);
    const lo = this.stackRead(memory, sp);
    const hi = this.stackRead(memory, sp + 1);
    this.regs.write16(Reg.SP, sp + 2);
    return (hi << 8) | lo;
  }

  private stackRead(memory: Memory, address: number): number {
    try {
      return this.read(memory, address);
    } catch (err) {
      throw this.stackFault(err, address);
    }
  }

  private stackWrite(memory: Memory, address: number, value: number): void {
    try {
      this.write(memory, address, value);
    } catch (err) {
      throw this.stackFault(err, address);
    }
  }

  private stackFault(err: unknown, address: number): unknown {
    if (!(err instanceof MemoryFault)) return err;
    return new ExecutionFault(
      `stack access at 0x${(address & 0xffff).toString(16).padStart(4, '0')} is unmapped`,
      { cause: err },
    );
  }

  // --- Control flow ---

  private holds(cond: Condition): boolean {
    return conditionHolds(cond, this.regs.flags);
  }

  private jumpRelative(offset: number): void {
    const target = this.pc + offset;
    if (target < 0 || target > 0xffff) {
      throw new ExecutionFault(`relative jump by ${offset} from 0x${this.pc.toString(16)} leaves the address space`);
    }
    this.pc = target;
  }

  private call(memory: Memory, target: number): void {
    this.pushWord(memory, this.pc);
    this.pc = target;
  }

  // --- Accumulator ---

  private accumulate(op: AluOp, value: number): void {
    const result = ACCUMULATORS[op](this.regs, this.regs.read8(Reg.A), value);
    if (op !== 'Cp') this.regs.write8(Reg.A, result);
  }

  private bitOp(op: BitOp, value: number, bit: number): number {
    switch (op) {
      case 'Bit':
        testBit8(this.regs, value, bit);
        return value;
      case 'Res':
        return resetBit8(value, bit);
      case 'Set':
        return setBit8(value, bit);
    }
  }

  // --- Dispatch ---

  /** Applies one instruction. Returns true when a conditional branch was taken. */
  private execute(memory: Memory, instr: Instruction): boolean {
    const regs = this.regs;

    switch (instr.kind) {
      case 'Nop':
        return false;
      case 'Halt':
      case 'Stop':
        this.halted = true;
        return false;

      // --- Loads ---
      case 'LdRR':
        regs.write8(instr.dst, regs.read8(instr.src));
        return false;
      case 'LdRImm':
        regs.write8(instr.dst, instr.value);
        return false;
      case 'LdRMem':
        regs.write8(instr.dst, this.load(memory, instr.src));
        return false;
      case 'LdMemR':
        this.store(memory, instr.dst, regs.read8(instr.src));
        return false;
      case 'LdMemImm':
        this.store(memory, instr.dst, instr.value);
        return false;
      case 'LdWImm':
        regs.write16(instr.dst, instr.value);
        return false;
      case 'LdMemSP': {
        const sp = regs.read16(Reg.SP);
        this.write(memory, instr.address, sp & 0xff);
        this.write(memory, instr.address + 1, sp >> 8);
        return false;
      }
      case 'LdSPHL':
        regs.write16(Reg.SP, regs.read16(Reg.H));
        return false;
      case 'LdHLSPOffset':
        regs.write16(Reg.H, addSignedToWord(regs, regs.read16(Reg.SP), instr.offset));
        return false;

      // --- 8-bit arithmetic and logic ---
      case 'AddR': case 'AdcR': case 'SubR': case 'SbcR':
      case 'AndR': case 'XorR': case 'OrR': case 'CpR':
        this.accumulate(ALU_OP_OF[instr.kind], regs.read8(instr.src));
        return false;
      case 'AddImm': case 'AdcImm': case 'SubImm': case 'SbcImm':
      case 'AndImm': case 'XorImm': case 'OrImm': case 'CpImm':
        this.accumulate(ALU_OP_OF[instr.kind], instr.value);
        return false;
      case 'AddMem': case 'AdcMem': case 'SubMem': case 'SbcMem':
      case 'AndMem': case 'XorMem': case 'OrMem': case 'CpMem':
        this.accumulate(ALU_OP_OF[instr.kind], this.load(memory, instr.src));
        return false;
      case 'IncR':
        regs.write8(instr.target, increment8(regs, regs.read8(instr.target)));
        return false;
      case 'DecR':
        regs.write8(instr.target, decrement8(regs, regs.read8(instr.target)));
        return false;
      case 'IncMem':
        this.modify(memory, instr.target, (v) => increment8(regs, v));
        return false;
      case 'DecMem':
        this.modify(memory, instr.target, (v) => decrement8(regs, v));
        return false;

      // --- 16-bit arithmetic ---
      case 'IncW':
        regs.write16(instr.target, regs.read16(instr.target) + 1);
        return false;
      case 'DecW': {
        // Saturates at zero.
        const value = regs.read16(instr.target);
        regs.write16(instr.target, value === 0 ? 0 : value - 1);
        return false;
      }
      case 'AddHLW':
        regs.write16(Reg.H, add16(regs, regs.read16(Reg.H), regs.read16(instr.src)));
        return false;
      case 'AddSPImm':
        regs.write16(Reg.SP, addSignedToWord(regs, regs.read16(Reg.SP), instr.offset));
        return false;

      // --- Stack ---
      case 'Push':
        this.pushWord(memory, regs.read16(instr.src));
        return false;
      case 'Pop':
        regs.write16(instr.dst, this.popWord(memory));
        return false;

      // --- Control flow ---
      case 'Jp':
        this.pc = instr.target;
        return false;
      case 'JpCond':
        if (!this.holds(instr.cond)) return false;
        this.pc = instr.target;
        return true;
      case 'JpHL':
        this.pc = regs.read16(Reg.H);
        return false;
      case 'Jr':
        this.jumpRelative(instr.offset);
        return false;
      case 'JrCond':
        if (!this.holds(instr.cond)) return false;
        this.jumpRelative(instr.offset);
        return true;
      case 'Call':
        this.call(memory, instr.target);
        return false;
      case 'CallCond':
        if (!this.holds(instr.cond)) return false;
        this.call(memory, instr.target);
        return true;
      case 'Ret':
        this.pc = this.popWord(memory);
        return false;
      case 'RetCond':
        if (!this.holds(instr.cond)) return false;
        this.pc = this.popWord(memory);
        return true;
      case 'Reti':
        this.pc = this.popWord(memory);
        this.ime = true;
        return false;
      case 'Rst':
        this.call(memory, instr.vector);
        return false;

      // --- Accumulator and flag operations ---
      case 'Rlca':
        regs.write8(Reg.A, rotateLeftCircular8(regs, regs.read8(Reg.A)));
        regs.flags &= ~FLAG_Z;
        return false;
      case 'Rrca':
        regs.write8(Reg.A, rotateRightCircular8(regs, regs.read8(Reg.A)));
        regs.flags &= ~FLAG_Z;
        return false;
      case 'Rla':
        regs.write8(Reg.A, rotateLeft8(regs, regs.read8(Reg.A)));
        regs.flags &= ~FLAG_Z;
        return false;
      case 'Rra':
        regs.write8(Reg.A, rotateRight8(regs, regs.read8(Reg.A)));
        regs.flags &= ~FLAG_Z;
        return false;
      case 'Daa':
        regs.write8(Reg.A, decimalAdjust8(regs, regs.read8(Reg.A)));
        return false;
      case 'Cpl':
        regs.write8(Reg.A, ~regs.read8(Reg.A));
        regs.flags |= FLAG_N | FLAG_H;
        return false;
      case 'Scf':
        regs.flags = (regs.flags & FLAG_Z) | FLAG_C;
        return false;
      case 'Ccf':
        regs.flags = (regs.flags & FLAG_Z) | ((regs.flags & FLAG_C) ^ FLAG_C);
        return false;
      case 'Di':
        this.ime = false;
        return false;
      case 'Ei':
        this.ime = true;
        return false;

      // --- Extended (0xCB) space ---
      case 'Rlc': case 'Rrc': case 'Rl': case 'Rr':
      case 'Sla': case 'Sra': case 'Swap': case 'Srl':
        regs.write8(instr.target, SHIFTERS[instr.kind](regs, regs.read8(instr.target)));
        return false;
      case 'RlcMem': case 'RrcMem': case 'RlMem': case 'RrMem':
      case 'SlaMem': case 'SraMem': case 'SwapMem': case 'SrlMem': {
        const shift = SHIFTERS[SHIFT_OP_OF[instr.kind]];
        this.modify(memory, instr.target, (v) => shift(regs, v));
        return false;
      }
      case 'Bit':
        testBit8(regs, regs.read8(instr.target), instr.bit);
        return false;
      case 'Res':
      case 'Set':
        regs.write8(instr.target, this.bitOp(instr.kind, regs.read8(instr.target), instr.bit));
        return false;
      case 'BitMem':
        testBit8(regs, this.load(memory, instr.target), instr.bit);
        return false;
      case 'ResMem':
      case 'SetMem': {
        const op = BIT_OP_OF[instr.kind];
        const bit = instr.bit;
        this.modify(memory, instr.target, (v) => this.bitOp(op, v, bit));
        return false;
      }

      default: {
        const unhandled: never = instr;
        throw new ExecutionFault(`unimplemented instruction form ${JSON.stringify(unhandled)}`);
      }
    }
  }
}
