import { describe, it, expect, beforeEach } from 'vitest';
import { Sm83 } from '../cpu';
import { ExecutionFault } from '../errors';
import { FLAG_C, FLAG_N, FLAG_Z, Reg } from '../types';
import { TestMemory } from './test-memory';

describe('Sm83 control flow', () => {
  let mem: TestMemory;
  let cpu: Sm83;

  beforeEach(() => {
    mem = new TestMemory();
    cpu = new Sm83();
  });

  describe('absolute jumps', () => {
    it('JP always jumps', () => {
      mem.load(0, [0xc3, 0x00, 0x02]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 16 });
      expect(cpu.pc).toBe(0x0200);
    });

    it('JP NZ falls through when Z is set', () => {
      cpu.regs.flags = FLAG_Z;
      mem.load(0, [0xc2, 0x00, 0x02]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 12 });
      expect(cpu.pc).toBe(3);
    });

    it('JP NZ jumps and pays the taken cost when Z is clear', () => {
      mem.load(0, [0xc2, 0x00, 0x02]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 16 });
      expect(cpu.pc).toBe(0x0200);
    });

    it('JP HL jumps to the address in HL', () => {
      cpu.regs.write16(Reg.H, 0x1234);
      mem.load(0, [0xe9]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 4 });
      expect(cpu.pc).toBe(0x1234);
    });
  });

  describe('relative jumps', () => {
    it('JR adds the offset to the address after the instruction', () => {
      mem.load(0, [0x18, 0x05]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 12 });
      expect(cpu.pc).toBe(7);
    });

    it('JR -2 loops on itself', () => {
      cpu.pc = 0x0150;
      mem.load(0x0150, [0x18, 0xfe]);
      cpu.step(mem);
      expect(cpu.pc).toBe(0x0150);
    });

    it('JR NZ with Z set stops at the next instruction', () => {
      cpu.regs.flags = FLAG_Z;
      mem.load(0, [0x20, 0x10]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 8 });
      expect(cpu.pc).toBe(2);
    });

    it('JR NZ with Z clear jumps', () => {
      mem.load(0, [0x20, 0x10]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 12 });
      expect(cpu.pc).toBe(0x12);
    });

    it('JR C below address zero is an execution fault', () => {
      cpu.regs.flags = FLAG_C;
      mem.load(0, [0x38, 0x80]);
      const outcome = cpu.step(mem);
      expect(outcome.status).toBe('fault');
      if (outcome.status !== 'fault') return;
      expect(outcome.fault).toBeInstanceOf(ExecutionFault);
      expect(cpu.pc).toBe(0);
    });

    it('JR past 0xFFFF is an execution fault', () => {
      cpu.pc = 0xfff0;
      mem.load(0xfff0, [0x18, 0x7f]);
      expect(cpu.step(mem).status).toBe('fault');
      expect(cpu.pc).toBe(0xfff0);
    });
  });

  describe('calls and returns', () => {
    it('CALL pushes the return address and jumps', () => {
      cpu.pc = 0x0100;
      cpu.regs.write16(Reg.SP, 0xfffe);
      mem.load(0x0100, [0xcd, 0x00, 0x40]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 24 });
      expect(cpu.pc).toBe(0x4000);
      expect(cpu.regs.read16(Reg.SP)).toBe(0xfffc);
      expect(mem.data[0xfffd]).toBe(0x01);
      expect(mem.data[0xfffc]).toBe(0x03);
    });

    it('RET pops the return address', () => {
      cpu.pc = 0x4000;
      cpu.regs.write16(Reg.SP, 0xfffc);
      mem.load(0xfffc, [0x03, 0x01]);
      mem.load(0x4000, [0xc9]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 16 });
      expect(cpu.pc).toBe(0x0103);
      expect(cpu.regs.read16(Reg.SP)).toBe(0xfffe);
    });

    it('CALL Z skips the push when Z is clear', () => {
      cpu.regs.write16(Reg.SP, 0xfffe);
      mem.load(0, [0xcc, 0x00, 0x40]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 12 });
      expect(cpu.pc).toBe(3);
      expect(cpu.regs.read16(Reg.SP)).toBe(0xfffe);
    });

    it('CALL Z calls when Z is set', () => {
      cpu.regs.flags = FLAG_Z;
      cpu.regs.write16(Reg.SP, 0xfffe);
      mem.load(0, [0xcc, 0x00, 0x40]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 24 });
      expect(cpu.pc).toBe(0x4000);
    });

    it('RET NC returns only when C is clear', () => {
      cpu.regs.write16(Reg.SP, 0xfffc);
      mem.load(0xfffc, [0x34, 0x12]);
      mem.load(0, [0xd0]);

      cpu.regs.flags = FLAG_C;
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 8 });
      expect(cpu.pc).toBe(1);

      cpu.pc = 0;
      cpu.regs.flags = 0;
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 20 });
      expect(cpu.pc).toBe(0x1234);
    });

    it('RETI returns and enables interrupts', () => {
      cpu.regs.write16(Reg.SP, 0xfffc);
      mem.load(0xfffc, [0x00, 0x02]);
      mem.load(0, [0xd9]);
      cpu.step(mem);
      expect(cpu.pc).toBe(0x0200);
      expect(cpu.ime).toBe(true);
    });

    it('RST pushes the next address and jumps to the vector', () => {
      cpu.pc = 0x0200;
      cpu.regs.write16(Reg.SP, 0xfffe);
      mem.load(0x0200, [0xff]);
      expect(cpu.step(mem)).toEqual({ status: 'continue', cycles: 16 });
      expect(cpu.pc).toBe(0x0038);
      expect(mem.data[0xfffd]).toBe(0x02);
      expect(mem.data[0xfffc]).toBe(0x01);
    });

    it('runs a subroutine and comes back', () => {
      mem.load(0, [
        0x31, 0xfe, 0xff, // LD SP,$FFFE
        0xcd, 0x10, 0x00, // CALL $0010
        0x76,             // HALT
      ]);
      mem.load(0x10, [
        0x3e, 0x07, // LD A,7
        0xc9,       // RET
      ]);
      const result = cpu.run(mem, 1000);
      expect(result.outcome.status).toBe('halted');
      expect(result.cycles).toBe(12 + 24 + 8 + 16 + 4);
      expect(cpu.regs.read8(Reg.A)).toBe(7);
      expect(cpu.regs.read16(Reg.SP)).toBe(0xfffe);
      expect(cpu.pc).toBe(7);
    });

    it('counts down a loop with DEC and JR NZ', () => {
      mem.load(0, [
        0x06, 0x03, // LD B,3
        0x3c,       // INC A
        0x05,       // DEC B
        0x20, 0xfc, // JR NZ,-4
        0x76,       // HALT
      ]);
      cpu.run(mem, 1000);
      expect(cpu.regs.read8(Reg.A)).toBe(3);
      expect(cpu.regs.read8(Reg.B)).toBe(0);
      expect(cpu.pc).toBe(7);
    });
  });

  describe('condition table', () => {
    it('follows an overridden condition', () => {
      cpu = new Sm83({ conditions: { NZ: { mask: FLAG_Z | FLAG_N, expected: FLAG_Z | FLAG_N } } });
      mem.load(0, [0x20, 0x10]);

      cpu.regs.flags = 0;
      cpu.step(mem);
      expect(cpu.pc).toBe(2);

      cpu.pc = 0;
      cpu.regs.flags = FLAG_Z | FLAG_N;
      cpu.step(mem);
      expect(cpu.pc).toBe(0x12);
    });

    it('rejects expected bits outside the mask', () => {
      expect(() => new Sm83({ conditions: { C: { mask: 0x10, expected: 0x80 } } })).toThrow();
    });
  });
});
