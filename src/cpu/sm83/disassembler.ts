/**
 * Renders decoded instructions as assembler text, e.g. `LD B, $2A`,
 * `JR NZ, -2` or `BIT 7, H`.
 */

import {
  ALU_OP_OF,
  AddrMode,
  BIT_OP_OF,
  Reg,
  SHIFT_OP_OF,
  type Address,
  type Instruction,
  type WideReg,
} from './types';

const WIDE_NAMES: Readonly<Record<WideReg, string>> = {
  [Reg.A]: 'AF',
  [Reg.B]: 'BC',
  [Reg.D]: 'DE',
  [Reg.H]: 'HL',
  [Reg.SP]: 'SP',
};

const hex8 = (v: number): string => `$${v.toString(16).toUpperCase().padStart(2, '0')}`;
const hex16 = (v: number): string => `$${v.toString(16).toUpperCase().padStart(4, '0')}`;
const signed = (v: number): string => (v >= 0 ? `+${v}` : `${v}`);
const reg = (r: Reg): string => Reg[r];

function address(a: Address): string {
  switch (a.mode) {
    case AddrMode.HL: return '(HL)';
    case AddrMode.HLInc: return '(HL+)';
    case AddrMode.HLDec: return '(HL-)';
    case AddrMode.BC: return '(BC)';
    case AddrMode.DE: return '(DE)';
    case AddrMode.HighC: return '($FF00+C)';
    case AddrMode.Imm: return `(${hex16(a.address)})`;
    case AddrMode.HighImm: return `($FF00+${hex8(a.offset)})`;
  }
}

export function formatInstruction(instr: Instruction): string {
  switch (instr.kind) {
    case 'LdRR':
      return `LD ${reg(instr.dst)}, ${reg(instr.src)}`;
    case 'LdRImm':
      return `LD ${reg(instr.dst)}, ${hex8(instr.value)}`;
    case 'LdRMem':
      return `LD ${reg(instr.dst)}, ${address(instr.src)}`;
    case 'LdMemR':
      return `LD ${address(instr.dst)}, ${reg(instr.src)}`;
    case 'LdMemImm':
      return `LD ${address(instr.dst)}, ${hex8(instr.value)}`;
    case 'LdWImm':
      return `LD ${WIDE_NAMES[instr.dst]}, ${hex16(instr.value)}`;
    case 'LdMemSP':
      return `LD (${hex16(instr.address)}), SP`;
    case 'LdSPHL':
      return 'LD SP, HL';
    case 'LdHLSPOffset':
      return `LD HL, SP${signed(instr.offset)}`;

    case 'AddR': case 'AdcR': case 'SubR': case 'SbcR':
    case 'AndR': case 'XorR': case 'OrR': case 'CpR':
      return `${ALU_OP_OF[instr.kind].toUpperCase()} A, ${reg(instr.src)}`;
    case 'AddImm': case 'AdcImm': case 'SubImm': case 'SbcImm':
    case 'AndImm': case 'XorImm': case 'OrImm': case 'CpImm':
      return `${ALU_OP_OF[instr.kind].toUpperCase()} A, ${hex8(instr.value)}`;
    case 'AddMem': case 'AdcMem': case 'SubMem': case 'SbcMem':
    case 'AndMem': case 'XorMem': case 'OrMem': case 'CpMem':
      return `${ALU_OP_OF[instr.kind].toUpperCase()} A, ${address(instr.src)}`;

    case 'IncR':
    case 'DecR':
      return `${instr.kind === 'IncR' ? 'INC' : 'DEC'} ${reg(instr.target)}`;
    case 'IncMem':
    case 'DecMem':
      return `${instr.kind === 'IncMem' ? 'INC' : 'DEC'} ${address(instr.target)}`;
    case 'IncW':
    case 'DecW':
      return `${instr.kind === 'IncW' ? 'INC' : 'DEC'} ${WIDE_NAMES[instr.target]}`;
    case 'AddHLW':
      return `ADD HL, ${WIDE_NAMES[instr.src]}`;
    case 'AddSPImm':
      return `ADD SP, ${instr.offset}`;

    case 'Push':
      return `PUSH ${WIDE_NAMES[instr.src]}`;
    case 'Pop':
      return `POP ${WIDE_NAMES[instr.dst]}`;

    case 'Jp':
      return `JP ${hex16(instr.target)}`;
    case 'Call':
      return `CALL ${hex16(instr.target)}`;
    case 'JpCond':
      return `JP ${instr.cond.name}, ${hex16(instr.target)}`;
    case 'CallCond':
      return `CALL ${instr.cond.name}, ${hex16(instr.target)}`;
    case 'JpHL':
      return 'JP HL';
    case 'Jr':
      return `JR ${instr.offset}`;
    case 'JrCond':
      return `JR ${instr.cond.name}, ${instr.offset}`;
    case 'RetCond':
      return `RET ${instr.cond.name}`;
    case 'Rst':
      return `RST ${hex8(instr.vector)}`;

    case 'Rlc': case 'Rrc': case 'Rl': case 'Rr':
    case 'Sla': case 'Sra': case 'Swap': case 'Srl':
      return `${instr.kind.toUpperCase()} ${reg(instr.target)}`;
    case 'RlcMem': case 'RrcMem': case 'RlMem': case 'RrMem':
    case 'SlaMem': case 'SraMem': case 'SwapMem': case 'SrlMem':
      return `${SHIFT_OP_OF[instr.kind].toUpperCase()} ${address(instr.target)}`;
    case 'Bit':
    case 'Res':
    case 'Set':
      return `${instr.kind.toUpperCase()} ${instr.bit}, ${reg(instr.target)}`;
    case 'BitMem':
    case 'ResMem':
    case 'SetMem':
      return `${BIT_OP_OF[instr.kind].toUpperCase()} ${instr.bit}, ${address(instr.target)}`;

    // Operand-free forms print as their mnemonic.
    default:
      return instr.kind.toUpperCase();
  }
}
