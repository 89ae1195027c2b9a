import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseCpuConfig } from '../config';
import { Sm83 } from '../cpu';

describe('parseCpuConfig', () => {
  it('fills in defaults', () => {
    expect(parseCpuConfig()).toEqual({ resetVector: 0, trace: false, conditions: {} });
  });

  it('keeps supplied values', () => {
    const config = parseCpuConfig({ resetVector: 0x100, trace: true, conditions: { Z: { mask: 0x80, expected: 0 } } });
    expect(config.resetVector).toBe(0x100);
    expect(config.trace).toBe(true);
    expect(config.conditions.Z).toEqual({ mask: 0x80, expected: 0 });
  });

  it('rejects an out-of-range reset vector', () => {
    expect(() => parseCpuConfig({ resetVector: 0x10000 })).toThrow(ZodError);
  });

  it('rejects expected bits outside the mask', () => {
    expect(() => parseCpuConfig({ conditions: { NZ: { mask: 0x80, expected: 0x40 } } })).toThrow(
      /expected bits must lie within mask/,
    );
  });

  it('rejects unknown conditions', () => {
    const input = JSON.parse('{"conditions":{"PO":{"mask":4,"expected":0}}}');
    expect(() => parseCpuConfig(input)).toThrow(ZodError);
  });
});

describe('Sm83 configuration', () => {
  it('starts at the reset vector', () => {
    const cpu = new Sm83({ resetVector: 0x100 });
    expect(cpu.pc).toBe(0x100);
    cpu.pc = 0x4000;
    cpu.reset();
    expect(cpu.pc).toBe(0x100);
  });
});
