/**
 * SM83 Types
 *
 * Register names, operand encodings, flag bits and the decoded
 * instruction union shared by the decoder, disassembler and CPU.
 */

// Flag bit positions (F register, low nibble always zero)
export const FLAG_Z = 0x80; // Zero
export const FLAG_N = 0x40; // Subtract
export const FLAG_H = 0x20; // Half carry
export const FLAG_C = 0x10; // Carry

/**
 * Register names. The numeric values double as operand codes in the
 * opcode tables, and `value - 1` is the storage slot of an 8-bit register.
 */
export enum Reg {
  Invalid = 0,
  A,
  F,
  B,
  C,
  D,
  E,
  H,
  L,
  SP,
}

export type Reg8 = Reg.A | Reg.B | Reg.C | Reg.D | Reg.E | Reg.H | Reg.L;

/** Wide registers are named by their pair head: AF=A, BC=B, DE=D, HL=H. */
export type WideReg = Reg.A | Reg.B | Reg.D | Reg.H | Reg.SP;

/** Pairs usable as 16-bit operands. AF only moves through the stack. */
export type RegPair = Reg.B | Reg.D | Reg.H | Reg.SP;

/** Memory addressing modes, encoded after the register codes. */
export enum AddrMode {
  HL = 10,
  HLInc,
  HLDec,
  BC,
  DE,
  Imm,     // (a16)
  HighImm, // (0xFF00 + a8)
  HighC,   // (0xFF00 + C)
}

export type Address =
  | { mode: AddrMode.HL | AddrMode.HLInc | AddrMode.HLDec | AddrMode.BC | AddrMode.DE | AddrMode.HighC }
  | { mode: AddrMode.Imm; address: number }
  | { mode: AddrMode.HighImm; offset: number };

export const CONDITION_NAMES = ['NZ', 'Z', 'NC', 'C'] as const;
export type ConditionName = typeof CONDITION_NAMES[number];

/** Condition codes occupy 18..21 in the source table. */
export const CONDITION_CODE_BASE = 18;
/** Restart vectors occupy 22..29 in the destination table (vector / 8). */
export const VECTOR_CODE_BASE = 22;
/** Bit indices occupy 30..37 in the extended destination table. */
export const BIT_CODE_BASE = 30;

/** A branch is taken when `(F & mask) === expected`. */
export interface Condition {
  name: ConditionName;
  mask: number;
  expected: number;
}

export type ConditionTable = Readonly<Record<ConditionName, Condition>>;

export const ALU_OPS = ['Add', 'Adc', 'Sub', 'Sbc', 'And', 'Xor', 'Or', 'Cp'] as const;
export type AluOp = typeof ALU_OPS[number];

export const SHIFT_OPS = ['Rlc', 'Rrc', 'Rl', 'Rr', 'Sla', 'Sra', 'Swap', 'Srl'] as const;
export type ShiftOp = typeof SHIFT_OPS[number];

export const BIT_OPS = ['Bit', 'Res', 'Set'] as const;
export type BitOp = typeof BIT_OPS[number];

export const SHIFT_MEM_KINDS = [
  'RlcMem', 'RrcMem', 'RlMem', 'RrMem', 'SlaMem', 'SraMem', 'SwapMem', 'SrlMem',
] as const;
export const BIT_MEM_KINDS = ['BitMem', 'ResMem', 'SetMem'] as const;

/**
 * Every instruction kind known to the opcode tables. A kind's table code
 * is its index + 1; code 0 marks an unassigned opcode.
 */
export const INSTR_KINDS = [
  'Nop', 'Halt', 'Stop', 'Prefix',
  'LdRR', 'LdRImm', 'LdRMem', 'LdMemR', 'LdMemImm', 'LdWImm', 'LdMemSP', 'LdSPHL', 'LdHLSPOffset',
  'AddR', 'AddImm', 'AddMem', 'AdcR', 'AdcImm', 'AdcMem',
  'SubR', 'SubImm', 'SubMem', 'SbcR', 'SbcImm', 'SbcMem',
  'AndR', 'AndImm', 'AndMem', 'XorR', 'XorImm', 'XorMem',
  'OrR', 'OrImm', 'OrMem', 'CpR', 'CpImm', 'CpMem',
  'IncR', 'IncW', 'IncMem', 'DecR', 'DecW', 'DecMem', 'AddHLW', 'AddSPImm',
  'Push', 'Pop',
  'Jp', 'JpCond', 'JpHL', 'Jr', 'JrCond', 'Call', 'CallCond', 'Ret', 'RetCond', 'Reti', 'Rst',
  'Rlca', 'Rrca', 'Rla', 'Rra', 'Daa', 'Cpl', 'Scf', 'Ccf', 'Di', 'Ei',
  'Rlc', 'Rrc', 'Rl', 'Rr', 'Sla', 'Sra', 'Swap', 'Srl',
  'RlcMem', 'RrcMem', 'RlMem', 'RrMem', 'SlaMem', 'SraMem', 'SwapMem', 'SrlMem',
  'Bit', 'BitMem', 'Res', 'ResMem', 'Set', 'SetMem',
] as const;

export type InstrKind = typeof INSTR_KINDS[number];

export type AluRegKind = `${AluOp}R`;
export type AluImmKind = `${AluOp}Imm`;
export type AluMemKind = `${AluOp}Mem`;
export type AluKind = AluRegKind | AluImmKind | AluMemKind;
export type ShiftMemKind = typeof SHIFT_MEM_KINDS[number];
export type BitMemKind = typeof BIT_MEM_KINDS[number];

export const ALU_OP_OF: Readonly<Record<AluKind, AluOp>> = {
  AddR: 'Add', AddImm: 'Add', AddMem: 'Add',
  AdcR: 'Adc', AdcImm: 'Adc', AdcMem: 'Adc',
  SubR: 'Sub', SubImm: 'Sub', SubMem: 'Sub',
  SbcR: 'Sbc', SbcImm: 'Sbc', SbcMem: 'Sbc',
  AndR: 'And', AndImm: 'And', AndMem: 'And',
  XorR: 'Xor', XorImm: 'Xor', XorMem: 'Xor',
  OrR: 'Or', OrImm: 'Or', OrMem: 'Or',
  CpR: 'Cp', CpImm: 'Cp', CpMem: 'Cp',
};

export const SHIFT_OP_OF: Readonly<Record<ShiftMemKind, ShiftOp>> = {
  RlcMem: 'Rlc', RrcMem: 'Rrc', RlMem: 'Rl', RrMem: 'Rr',
  SlaMem: 'Sla', SraMem: 'Sra', SwapMem: 'Swap', SrlMem: 'Srl',
};

export const BIT_OP_OF: Readonly<Record<BitMemKind, BitOp>> = {
  BitMem: 'Bit', ResMem: 'Res', SetMem: 'Set',
};

/** A fully resolved instruction. Each variant carries only its own operands. */
export type Instruction =
  | { kind: 'Nop' | 'Halt' | 'Stop' }
  // --- Loads ---
  | { kind: 'LdRR'; dst: Reg8; src: Reg8 }
  | { kind: 'LdRImm'; dst: Reg8; value: number }
  | { kind: 'LdRMem'; dst: Reg8; src: Address }
  | { kind: 'LdMemR'; dst: Address; src: Reg8 }
  | { kind: 'LdMemImm'; dst: Address; value: number }
  | { kind: 'LdWImm'; dst: RegPair; value: number }
  | { kind: 'LdMemSP'; address: number }
  | { kind: 'LdSPHL' }
  | { kind: 'LdHLSPOffset'; offset: number }
  // --- 8-bit arithmetic and logic ---
  | { kind: AluRegKind; src: Reg8 }
  | { kind: AluImmKind; value: number }
  | { kind: AluMemKind; src: Address }
  | { kind: 'IncR' | 'DecR'; target: Reg8 }
  | { kind: 'IncMem' | 'DecMem'; target: Address }
  // --- 16-bit arithmetic ---
  | { kind: 'IncW' | 'DecW'; target: RegPair }
  | { kind: 'AddHLW'; src: RegPair }
  | { kind: 'AddSPImm'; offset: number }
  // --- Stack ---
  | { kind: 'Push'; src: WideReg }
  | { kind: 'Pop'; dst: WideReg }
  // --- Control flow ---
  | { kind: 'Jp' | 'Call'; target: number }
  | { kind: 'JpCond' | 'CallCond'; cond: Condition; target: number }
  | { kind: 'JpHL' | 'Ret' | 'Reti' }
  | { kind: 'Jr'; offset: number }
  | { kind: 'JrCond'; cond: Condition; offset: number }
  | { kind: 'RetCond'; cond: Condition }
  | { kind: 'Rst'; vector: number }
  // --- Accumulator and flag operations ---
  | { kind: 'Rlca' | 'Rrca' | 'Rla' | 'Rra' | 'Daa' | 'Cpl' | 'Scf' | 'Ccf' | 'Di' | 'Ei' }
  // --- Extended (0xCB) space ---
  | { kind: ShiftOp; target: Reg8 }
  | { kind: ShiftMemKind; target: Address }
  | { kind: BitOp; bit: number; target: Reg8 }
  | { kind: BitMemKind; bit: number; target: Address };
