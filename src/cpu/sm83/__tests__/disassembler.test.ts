import { describe, it, expect } from 'vitest';
import { decode } from '../decoder';
import { formatInstruction } from '../disassembler';

function disassemble(bytes: number[]): string[] {
  const cursor = { pc: 0 };
  const lines: string[] = [];
  while (cursor.pc < bytes.length) {
    lines.push(formatInstruction(decode(bytes, cursor)));
  }
  return lines;
}

describe('formatInstruction', () => {
  it('formats loads', () => {
    expect(disassemble([0x06, 0x2a, 0x78, 0x46, 0x22, 0x3a, 0x36, 0x99, 0x0a])).toEqual([
      'LD B, $2A',
      'LD A, B',
      'LD B, (HL)',
      'LD (HL+), A',
      'LD A, (HL-)',
      'LD (HL), $99',
      'LD A, (BC)',
    ]);
  });

  it('formats 16-bit and high-page forms', () => {
    expect(disassemble([0x21, 0x00, 0xc0, 0x08, 0x00, 0xd0, 0xe0, 0x44, 0xf2, 0xea, 0x00, 0xc0])).toEqual([
      'LD HL, $C000',
      'LD ($D000), SP',
      'LD ($FF00+$44), A',
      'LD A, ($FF00+C)',
      'LD ($C000), A',
    ]);
  });

  it('formats signed stack offsets', () => {
    expect(disassemble([0xf8, 0x02, 0xe8, 0xfe, 0xf9])).toEqual(['LD HL, SP+2', 'ADD SP, -2', 'LD SP, HL']);
  });

  it('formats arithmetic', () => {
    expect(disassemble([0x80, 0xce, 0x01, 0xbe, 0x3c, 0x35, 0x03, 0x3b, 0x29])).toEqual([
      'ADD A, B',
      'ADC A, $01',
      'CP A, (HL)',
      'INC A',
      'DEC (HL)',
      'INC BC',
      'DEC SP',
      'ADD HL, HL',
    ]);
  });

  it('formats control flow', () => {
    expect(disassemble([0x20, 0xfe, 0x18, 0x05, 0xc3, 0x50, 0x01, 0xcc, 0x00, 0x40, 0xd0, 0xff, 0xe9])).toEqual([
      'JR NZ, -2',
      'JR 5',
      'JP $0150',
      'CALL Z, $4000',
      'RET NC',
      'RST $38',
      'JP HL',
    ]);
  });

  it('formats the stack pair forms', () => {
    expect(disassemble([0xf5, 0xd1])).toEqual(['PUSH AF', 'POP DE']);
  });

  it('formats extended instructions', () => {
    expect(disassemble([0xcb, 0x7c, 0xcb, 0x36, 0xcb, 0x86, 0xcb, 0x11])).toEqual([
      'BIT 7, H',
      'SWAP (HL)',
      'RES 0, (HL)',
      'RL C',
    ]);
  });

  it('prints operand-free instructions as their mnemonic', () => {
    expect(disassemble([0x00, 0x76, 0xd9, 0x07, 0x27, 0xf3, 0xc9])).toEqual([
      'NOP',
      'HALT',
      'RETI',
      'RLCA',
      'DAA',
      'DI',
      'RET',
    ]);
  });
});
