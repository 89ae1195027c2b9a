import { describe, it, expect, beforeEach } from 'vitest';
import { Sm83 } from '../cpu';
import { FLAG_C, FLAG_H, FLAG_N, FLAG_Z, Reg } from '../types';
import { TestMemory } from './test-memory';

describe('Sm83 extended (0xCB) instructions', () => {
  let mem: TestMemory;
  let cpu: Sm83;

  beforeEach(() => {
    mem = new TestMemory();
    cpu = new Sm83();
    cpu.regs.write16(Reg.H, 0xc000);
  });

  it('BIT 7,H tests the bit and keeps N and C', () => {
    cpu.regs.write8(Reg.H, 0x80);
    cpu.regs.flags = FLAG_N | FLAG_C;
    mem.load(0, [0xcb, 0x7c]);
    expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 8 });
    expect(cpu.regs.read8(Reg.H)).toBe(0x80);
    expect(cpu.regs.flags).toBe(FLAG_N | FLAG_H | FLAG_C);
    expect(cpu.pc).toBe(2);
  });

  it('BIT 0,(HL) sets Z for a clear bit', () => {
    mem.data[0xc000] = 0xfe;
    mem.load(0, [0xcb, 0x46]);
    expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 12 });
    expect(cpu.regs.flags).toBe(FLAG_Z | FLAG_H);
    expect(mem.data[0xc000]).toBe(0xfe);
  });

  it('SWAP A exchanges nibbles', () => {
    cpu.regs.write8(Reg.A, 0xf1);
    mem.load(0, [0xcb, 0x37]);
    cpu.step(mem);
    expect(cpu.regs.read8(Reg.A)).toBe(0x1f);
    expect(cpu.regs.flags).toBe(0);
  });

  it('RES 0,(HL) clears a bit in memory', () => {
    mem.data[0xc000] = 0xff;
    mem.load(0, [0xcb, 0x86]);
    expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 16 });
    expect(mem.data[0xc000]).toBe(0xfe);
  });

  it('SET 7,B sets a bit without touching flags', () => {
    cpu.regs.flags = FLAG_Z;
    mem.load(0, [0xcb, 0xf8]);
    cpu.step(mem);
    expect(cpu.regs.read8(Reg.B)).toBe(0x80);
    expect(cpu.regs.flags).toBe(FLAG_Z);
  });

  it('SRL (HL) shifts memory and reports the bit shifted out', () => {
    mem.data[0xc000] = 0x01;
    mem.load(0, [0xcb, 0x3e]);
    expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 16 });
    expect(mem.data[0xc000]).toBe(0x00);
    expect(cpu.regs.flags).toBe(FLAG_Z | FLAG_C);
  });

  it('RL C rotates through the carry', () => {
    cpu.regs.write8(Reg.C, 0x80);
    mem.load(0, [0xcb, 0x11]);
    cpu.step(mem);
    expect(cpu.regs.read8(Reg.C)).toBe(0x00);
    expect(cpu.regs.flags).toBe(FLAG_Z | FLAG_C);
  });

  it('RLC B sets Z unlike RLCA', () => {
    mem.load(0, [0xcb, 0x00]);
    cpu.step(mem);
    expect(cpu.regs.flags).toBe(FLAG_Z);
  });

  it('SRA D keeps the sign bit', () => {
    cpu.regs.write8(Reg.D, 0x8a);
    mem.load(0, [0xcb, 0x2a]);
    cpu.step(mem);
    expect(cpu.regs.read8(Reg.D)).toBe(0xc5);
  });
});
