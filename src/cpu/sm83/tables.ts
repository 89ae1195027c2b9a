/**
 * SM83 Opcode Tables
 *
 * Flat 256-entry tables indexed by the raw opcode byte. The base space is
 * described in opcodes.json and validated when this module loads; the
 * extended (0xCB) space is regular enough to be generated from its row and
 * column structure.
 *
 * Operand codes share one byte space (0 = no operand):
 *   1..9    registers (Reg)
 *   10..17  addressing modes (AddrMode)
 *   18..21  conditions NZ, Z, NC, C
 *   22..29  restart vectors 0x00..0x38
 *   30..37  bit indices 0..7
 */

import { z } from 'zod';
import opcodes from './opcodes.json';
import {
  AddrMode,
  BIT_CODE_BASE,
  BIT_MEM_KINDS,
  BIT_OPS,
  CONDITION_CODE_BASE,
  CONDITION_NAMES,
  INSTR_KINDS,
  Reg,
  SHIFT_MEM_KINDS,
  SHIFT_OPS,
  VECTOR_CODE_BASE,
  type Condition,
  type ConditionName,
  type ConditionTable,
  type InstrKind,
} from './types';

export const PREFIX_OPCODE = 0xcb;

const OPERAND_NAMES = [
  'A', 'F', 'B', 'C', 'D', 'E', 'H', 'L', 'SP',
  'AF', 'BC', 'DE', 'HL',
  '(HL)', '(HL+)', '(HL-)', '(BC)', '(DE)', '(a16)', '(a8)', '(C)',
] as const;

type OperandName = typeof OPERAND_NAMES[number];

const OPERAND_CODES: Readonly<Record<OperandName, number>> = {
  A: Reg.A, F: Reg.F, B: Reg.B, C: Reg.C, D: Reg.D, E: Reg.E, H: Reg.H, L: Reg.L, SP: Reg.SP,
  AF: Reg.A, BC: Reg.B, DE: Reg.D, HL: Reg.H,
  '(HL)': AddrMode.HL,
  '(HL+)': AddrMode.HLInc,
  '(HL-)': AddrMode.HLDec,
  '(BC)': AddrMode.BC,
  '(DE)': AddrMode.DE,
  '(a16)': AddrMode.Imm,
  '(a8)': AddrMode.HighImm,
  '(C)': AddrMode.HighC,
};

const OpcodeEntrySchema = z
  .object({
    kind: z.enum(INSTR_KINDS),
    dst: z.enum(OPERAND_NAMES).optional(),
    src: z.enum(OPERAND_NAMES).optional(),
    cond: z.enum(CONDITION_NAMES).optional(),
    vector: z.number().int().min(0).max(0x38).multipleOf(8).optional(),
    cost: z.number().int().positive(),
    taken: z.number().int().nonnegative().optional(),
  })
  .strict()
  .refine((entry) => !(entry.cond && entry.src), 'cond and src share the source table')
  .refine((entry) => !(entry.vector !== undefined && entry.dst), 'vector and dst share the destination table');

export const OpcodeTableSchema = z.record(z.string().regex(/^0x[0-9A-F]{2}$/), OpcodeEntrySchema);

export function kindCode(kind: InstrKind): number {
  return INSTR_KINDS.indexOf(kind) + 1;
}

/** Kind for a table code, or undefined when the code is unassigned. */
export function kindOf(code: number): InstrKind | undefined {
  return code > 0 && code <= INSTR_KINDS.length ? INSTR_KINDS[code - 1] : undefined;
}

export function conditionCode(name: ConditionName): number {
  return CONDITION_CODE_BASE + CONDITION_NAMES.indexOf(name);
}

export interface BaseTables {
  kind: Uint8Array;
  src: Uint8Array;
  dst: Uint8Array;
  cost: Uint8Array;
  taken: Uint8Array;
}

function buildBaseTables(): BaseTables {
  const tables: BaseTables = {
    kind: new Uint8Array(256),
    src: new Uint8Array(256),
    dst: new Uint8Array(256),
    cost: new Uint8Array(256),
    taken: new Uint8Array(256),
  };
  const entries = OpcodeTableSchema.parse(opcodes);
  for (const [key, entry] of Object.entries(entries)) {
    const opcode = Number.parseInt(key.slice(2), 16);
    tables.kind[opcode] = kindCode(entry.kind);
    if (entry.cond) tables.src[opcode] = conditionCode(entry.cond);
    if (entry.src) tables.src[opcode] = OPERAND_CODES[entry.src];
    if (entry.vector !== undefined) tables.dst[opcode] = VECTOR_CODE_BASE + entry.vector / 8;
    if (entry.dst) tables.dst[opcode] = OPERAND_CODES[entry.dst];
    tables.cost[opcode] = entry.cost;
    tables.taken[opcode] = entry.taken ?? 0;
  }
  return tables;
}

const BASE = buildBaseTables();

export const KIND_TABLE: Uint8Array = BASE.kind;
export const SRC_TABLE: Uint8Array = BASE.src;
export const DST_TABLE: Uint8Array = BASE.dst;
export const COST_TABLE: Uint8Array = BASE.cost;
export const TAKEN_COST_TABLE: Uint8Array = BASE.taken;

// --- Extended space ---

/** Column order of every extended row. */
const EXT_OPERANDS = [Reg.B, Reg.C, Reg.D, Reg.E, Reg.H, Reg.L, AddrMode.HL, Reg.A] as const;

export interface ExtendedTables {
  kind: Uint8Array;
  src: Uint8Array;
  dst: Uint8Array;
  cost: Uint8Array;
}

function buildExtendedTables(): ExtendedTables {
  const tables: ExtendedTables = {
    kind: new Uint8Array(256),
    src: new Uint8Array(256),
    dst: new Uint8Array(256),
    cost: new Uint8Array(256),
  };
  for (let op = 0; op < 256; op++) {
    const operand = EXT_OPERANDS[op & 7];
    const onMemory = operand === AddrMode.HL;
    const row = (op >> 3) & 7;

    let kind: InstrKind;
    if (op < 0x40) {
      kind = (onMemory ? SHIFT_MEM_KINDS : SHIFT_OPS)[row];
    } else {
      kind = (onMemory ? BIT_MEM_KINDS : BIT_OPS)[(op >> 6) - 1];
      tables.dst[op] = BIT_CODE_BASE + row;
    }

    tables.kind[op] = kindCode(kind);
    tables.src[op] = operand;
    // Cost on top of the prefix byte.
    tables.cost[op] = !onMemory ? 4 : kind === 'BitMem' ? 8 : 12;
  }
  return tables;
}

const EXTENDED = buildExtendedTables();

export const EXT_KIND_TABLE: Uint8Array = EXTENDED.kind;
export const EXT_SRC_TABLE: Uint8Array = EXTENDED.src;
export const EXT_DST_TABLE: Uint8Array = EXTENDED.dst;
export const EXT_COST_TABLE: Uint8Array = EXTENDED.cost;

/** Every table the decoder reads. */
export interface OpcodeTables {
  base: BaseTables;
  extended: ExtendedTables;
}

export const OPCODE_TABLES: OpcodeTables = { base: BASE, extended: EXTENDED };

// --- Conditions ---

/** ISA condition encoding: each condition tests one flag bit. */
export const DEFAULT_CONDITIONS: ConditionTable = {
  NZ: { name: 'NZ', mask: 0x80, expected: 0x00 },
  Z: { name: 'Z', mask: 0x80, expected: 0x80 },
  NC: { name: 'NC', mask: 0x10, expected: 0x00 },
  C: { name: 'C', mask: 0x10, expected: 0x10 },
};

export type ConditionOverrides = Partial<Record<ConditionName, Omit<Condition, 'name'>>>;

export function resolveConditions(overrides: ConditionOverrides = {}): ConditionTable {
  const table: Record<ConditionName, Condition> = { ...DEFAULT_CONDITIONS };
  for (const name of CONDITION_NAMES) {
    const override = overrides[name];
    if (override) table[name] = { name, ...override };
  }
  return table;
}

export function conditionHolds(condition: Condition, flags: number): boolean {
  return (flags & condition.mask) === condition.expected;
}
