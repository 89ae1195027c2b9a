/**
 * SM83 Instruction Decoder
 *
 * Turns the bytes at a cursor into one resolved Instruction by table
 * lookup. The cursor only moves when the whole instruction decodes.
 */

import type { Memory } from '../types';
import { DecodeFault } from './errors';
import {
  DEFAULT_CONDITIONS,
  OPCODE_TABLES,
  kindOf,
  type BaseTables,
  type ExtendedTables,
  type OpcodeTables,
} from './tables';
import {
  AddrMode,
  BIT_CODE_BASE,
  CONDITION_CODE_BASE,
  CONDITION_NAMES,
  Reg,
  VECTOR_CODE_BASE,
  type Address,
  type Condition,
  type ConditionTable,
  type Instruction,
  type Reg8,
  type RegPair,
  type WideReg,
} from './types';

/** Random-access byte stream the decoder reads from. */
export interface ByteSource {
  readonly length: number;
  byteAt(offset: number): number;
}

export interface Cursor {
  pc: number;
}

export interface DecodeOptions {
  conditions?: ConditionTable;
  /** Defaults to the built-in tables. */
  tables?: OpcodeTables;
}

export interface DecodedInstruction {
  instruction: Instruction;
  /** Opcode byte; for the extended space, the byte after the prefix. */
  opcode: number;
  extended: boolean;
  length: number;
  /** Fixed cost of the instruction, prefix included. */
  cost: number;
  /** Extra cost a conditional branch adds when taken. */
  takenCost: number;
}

export function toByteSource(bytes: Uint8Array | readonly number[] | ByteSource): ByteSource {
  if ('byteAt' in bytes) return bytes;
  const array = bytes;
  return { length: array.length, byteAt: (offset) => array[offset] & 0xff };
}

/** Exposes a 16-bit address space as a byte source. */
export function memorySource(memory: Memory): ByteSource {
  return { length: 0x10000, byteAt: (offset) => memory.read(offset) & 0xff };
}

// --- Byte reader ---

class ByteReader {
  private offset: number;

  constructor(
    private readonly source: ByteSource,
    readonly start: number,
  ) {
    this.offset = start;
  }

  get consumed(): number {
    return this.offset - this.start;
  }

  byte(): number {
    if (this.offset < 0 || this.offset >= this.source.length) {
      throw new DecodeFault(
        `instruction at ${hex(this.start)} runs past the end of the stream`,
        this.start,
      );
    }
    return this.source.byteAt(this.offset++);
  }

  word(): number {
    const low = this.byte();
    const high = this.byte();
    return low | (high << 8);
  }

  signed(): number {
    const d = this.byte();
    return d < 128 ? d : d - 256;
  }
}

function hex(value: number): string {
  return `0x${value.toString(16).padStart(4, '0')}`;
}

// --- Operand resolution ---

class OperandResolver {
  constructor(
    private readonly reader: ByteReader,
    private readonly opcode: number,
    private readonly conditions: ConditionTable,
  ) {}

  fault(message: string): DecodeFault {
    return new DecodeFault(
      `opcode 0x${this.opcode.toString(16).padStart(2, '0')} at ${hex(this.reader.start)}: ${message}`,
      this.reader.start,
      this.opcode,
    );
  }

  reg8(code: number): Reg8 {
    if (
      code === Reg.A || code === Reg.B || code === Reg.C || code === Reg.D ||
      code === Reg.E || code === Reg.H || code === Reg.L
    ) {
      return code;
    }
    throw this.fault(`expected an 8-bit register operand, found code ${code}`);
  }

  pair(code: number): RegPair {
    if (code === Reg.B || code === Reg.D || code === Reg.H || code === Reg.SP) {
      return code;
    }
    throw this.fault(`expected a register pair operand, found code ${code}`);
  }

  /** Push and pop also take AF. */
  stackPair(code: number): WideReg {
    if (code === Reg.A) return code;
    return this.pair(code);
  }

  address(code: number): Address {
    switch (code) {
      case AddrMode.HL:
        return { mode: AddrMode.HL };
      case AddrMode.HLInc:
        return { mode: AddrMode.HLInc };
      case AddrMode.HLDec:
        return { mode: AddrMode.HLDec };
      case AddrMode.BC:
        return { mode: AddrMode.BC };
      case AddrMode.DE:
        return { mode: AddrMode.DE };
      case AddrMode.HighC:
        return { mode: AddrMode.HighC };
      case AddrMode.Imm:
        return { mode: AddrMode.Imm, address: this.reader.word() };
      case AddrMode.HighImm:
        return { mode: AddrMode.HighImm, offset: this.reader.byte() };
      default:
        throw this.fault(`expected an addressing mode operand, found code ${code}`);
    }
  }

  condition(code: number): Condition {
    const index = code - CONDITION_CODE_BASE;
    if (index < 0 || index >= CONDITION_NAMES.length) {
      throw this.fault(`expected a condition operand, found code ${code}`);
    }
    return this.conditions[CONDITION_NAMES[index]];
  }

  vector(code: number): number {
    const index = code - VECTOR_CODE_BASE;
    if (index < 0 || index > 7) {
      throw this.fault(`expected a restart vector operand, found code ${code}`);
    }
    return index * 8;
  }

  bit(code: number): number {
    const index = code - BIT_CODE_BASE;
    if (index < 0 || index > 7) {
      throw this.fault(`expected a bit index operand, found code ${code}`);
    }
    return index;
  }
}

// --- Decode ---

/**
 * Decodes the instruction at `pc` without touching any cursor. Also
 * reports its length and cycle costs.
 */
export function decodeInstruction(
  bytes: Uint8Array | readonly number[] | ByteSource,
  pc: number,
  options: DecodeOptions = {},
): DecodedInstruction {
  const { base, extended } = options.tables ?? OPCODE_TABLES;
  const conditions = options.conditions ?? DEFAULT_CONDITIONS;
  const reader = new ByteReader(toByteSource(bytes), pc);
  const first = reader.byte();
  const firstKind = kindOf(base.kind[first]);

  if (firstKind === 'Prefix') {
    const opcode = reader.byte();
    const instruction = decodeExtended(
      extended,
      new OperandResolver(reader, opcode, conditions),
      opcode,
    );
    return {
      instruction,
      opcode,
      extended: true,
      length: reader.consumed,
      cost: base.cost[first] + extended.cost[opcode],
      takenCost: 0,
    };
  }

  const instruction = decodeBase(base, new OperandResolver(reader, first, conditions), reader, first);
  return {
    instruction,
    opcode: first,
    extended: false,
    length: reader.consumed,
    cost: base.cost[first],
    takenCost: base.taken[first],
  };
}

/**
 * Decodes one instruction at `cursor.pc` and advances the cursor past it.
 * Throws DecodeFault for unassigned opcodes, malformed table entries and
 * truncated streams; the cursor is left where it was.
 */
export function decode(
  bytes: Uint8Array | readonly number[] | ByteSource,
  cursor: Cursor,
  options: DecodeOptions = {},
): Instruction {
  const decoded = decodeInstruction(bytes, cursor.pc, options);
  cursor.pc += decoded.length;
  return decoded.instruction;
}

function decodeBase(
  tables: BaseTables,
  operands: OperandResolver,
  reader: ByteReader,
  opcode: number,
): Instruction {
  const kind = kindOf(tables.kind[opcode]);
  const src = tables.src[opcode];
  const dst = tables.dst[opcode];

  switch (kind) {
    case undefined:
    case 'Prefix':
      throw operands.fault('unassigned opcode');

    case 'Nop':
    case 'Halt':
    case 'JpHL':
    case 'Ret':
    case 'Reti':
    case 'LdSPHL':
    case 'Rlca':
    case 'Rrca':
    case 'Rla':
    case 'Rra':
    case 'Daa':
    case 'Cpl':
    case 'Scf':
    case 'Ccf':
    case 'Di':
    case 'Ei':
      return { kind };

    case 'Stop':
      // STOP carries a padding byte.
      reader.byte();
      return { kind };

    // --- Loads ---
    case 'LdRR':
      return { kind, dst: operands.reg8(dst), src: operands.reg8(src) };
    case 'LdRImm':
      return { kind, dst: operands.reg8(dst), value: reader.byte() };
    case 'LdRMem':
      return { kind, dst: operands.reg8(dst), src: operands.address(src) };
    case 'LdMemR':
      return { kind, dst: operands.address(dst), src: operands.reg8(src) };
    case 'LdMemImm': {
      const target = operands.address(dst);
      return { kind, dst: target, value: reader.byte() };
    }
    case 'LdWImm':
      return { kind, dst: operands.pair(dst), value: reader.word() };
    case 'LdMemSP':
      return { kind, address: reader.word() };
    case 'LdHLSPOffset':
    case 'AddSPImm':
      return { kind, offset: reader.signed() };

    // --- 8-bit arithmetic and logic ---
    case 'AddR': case 'AdcR': case 'SubR': case 'SbcR':
    case 'AndR': case 'XorR': case 'OrR': case 'CpR':
      return { kind, src: operands.reg8(src) };
    case 'AddImm': case 'AdcImm': case 'SubImm': case 'SbcImm':
    case 'AndImm': case 'XorImm': case 'OrImm': case 'CpImm':
      return { kind, value: reader.byte() };
    case 'AddMem': case 'AdcMem': case 'SubMem': case 'SbcMem':
    case 'AndMem': case 'XorMem': case 'OrMem': case 'CpMem':
      return { kind, src: operands.address(src) };
    case 'IncR':
    case 'DecR':
      return { kind, target: operands.reg8(dst) };
    case 'IncMem':
    case 'DecMem':
      return { kind, target: operands.address(dst) };

    // --- 16-bit arithmetic ---
    case 'IncW':
    case 'DecW':
      return { kind, target: operands.pair(dst) };
    case 'AddHLW':
      return { kind, src: operands.pair(src) };

    // --- Stack ---
    case 'Push':
      return { kind, src: operands.stackPair(src) };
    case 'Pop':
      return { kind, dst: operands.stackPair(dst) };

    // --- Control flow ---
    case 'Jp':
    case 'Call':
      return { kind, target: reader.word() };
    case 'JpCond':
    case 'CallCond': {
      const cond = operands.condition(src);
      return { kind, cond, target: reader.word() };
    }
    case 'Jr':
      return { kind, offset: reader.signed() };
    case 'JrCond': {
      const cond = operands.condition(src);
      return { kind, cond, offset: reader.signed() };
    }
    case 'RetCond':
      return { kind, cond: operands.condition(src) };
    case 'Rst':
      return { kind, vector: operands.vector(dst) };

    default:
      // Extended-space kinds never appear in the base table.
      throw operands.fault(`kind ${kind} is not valid in the base opcode space`);
  }
}

function decodeExtended(tables: ExtendedTables, operands: OperandResolver, opcode: number): Instruction {
  const kind = kindOf(tables.kind[opcode]);
  const src = tables.src[opcode];
  const dst = tables.dst[opcode];

  switch (kind) {
    case 'Rlc': case 'Rrc': case 'Rl': case 'Rr':
    case 'Sla': case 'Sra': case 'Swap': case 'Srl':
      return { kind, target: operands.reg8(src) };
    case 'RlcMem': case 'RrcMem': case 'RlMem': case 'RrMem':
    case 'SlaMem': case 'SraMem': case 'SwapMem': case 'SrlMem':
      return { kind, target: operands.address(src) };
    case 'Bit':
    case 'Res':
    case 'Set':
      return { kind, bit: operands.bit(dst), target: operands.reg8(src) };
    case 'BitMem':
    case 'ResMem':
    case 'SetMem':
      return { kind, bit: operands.bit(dst), target: operands.address(src) };
    default:
      throw operands.fault(`extended opcode has no valid kind (${kind ?? 'unassigned'})`);
  }
}
