export { Sm83 } from './cpu';
export type { StepOutcome, RunResult, Sm83State, Sm83Options } from './cpu';
export { RegisterFile, isWideReg } from './registers';
export type { RegisterSnapshot, RegisterState } from './registers';
export * from './alu';
export { decode, decodeInstruction, memorySource, toByteSource } from './decoder';
export type { ByteSource, Cursor, DecodeOptions, DecodedInstruction } from './decoder';
export {
  KIND_TABLE, SRC_TABLE, DST_TABLE, COST_TABLE, TAKEN_COST_TABLE,
  EXT_KIND_TABLE, EXT_SRC_TABLE, EXT_DST_TABLE, EXT_COST_TABLE,
  OPCODE_TABLES, PREFIX_OPCODE, DEFAULT_CONDITIONS, kindOf, kindCode, resolveConditions, conditionHolds,
} from './tables';
export type { BaseTables, ConditionOverrides, ExtendedTables, OpcodeTables } from './tables';
export { formatInstruction } from './disassembler';
export { CpuConfigSchema, parseCpuConfig } from './config';
export type { CpuConfig, CpuConfigInput } from './config';
export { CpuFault, DecodeFault, ExecutionFault, MemoryFault } from './errors';
export type { FaultKind } from './errors';
export {
  Reg, AddrMode, FLAG_Z, FLAG_N, FLAG_H, FLAG_C,
  INSTR_KINDS, ALU_OPS, SHIFT_OPS, BIT_OPS, CONDITION_NAMES,
} from './types';
export type {
  Reg8, RegPair, WideReg, Address, Condition, ConditionName, ConditionTable,
  Instruction, InstrKind, AluOp, ShiftOp, BitOp,
} from './types';
