/**
 * Mapped Memory Bus
 *
 * Flat RAM with optional interception of address regions. A handler can
 * replace the byte the CPU sees, let the stored byte through, or (for
 * writes) block the write. The first registered region covering an
 * address wins.
 *
 * Implements the Memory interface required by the Sm83 class.
 */

import type { Memory } from '@/cpu/types';
import { MemoryFault } from '@/cpu/sm83/errors';

export type MemRead = { type: 'replace'; value: number } | { type: 'passThrough' };

export type MemWrite = MemRead | { type: 'block' };

export interface MemHandler {
  onRead?(memory: MappedMemory, address: number): MemRead;
  onWrite?(memory: MappedMemory, address: number, value: number): MemWrite;
}

/** Inclusive address range. */
export interface MemRegion {
  start: number;
  end: number;
}

interface Mapping extends MemRegion {
  handler: MemHandler;
}

export const PASS_THROUGH: MemRead = { type: 'passThrough' };

export class MappedMemory implements Memory {
  private ram: Uint8Array;
  private mappings: Mapping[] = [];

  constructor(readonly size = 0x10000) {
    this.ram = new Uint8Array(size);
  }

  read(address: number): number {
    this.check(address);
    const handler = this.handlerFor(address);
    const result = handler?.onRead?.(this, address) ?? PASS_THROUGH;
    return result.type === 'replace' ? result.value & 0xff : this.ram[address];
  }

  write(address: number, value: number): void {
    this.check(address);
    const handler = this.handlerFor(address);
    const result = handler?.onWrite?.(this, address, value) ?? PASS_THROUGH;
    switch (result.type) {
      case 'block':
        return;
      case 'replace':
        this.ram[address] = result.value & 0xff;
        return;
      case 'passThrough':
        this.ram[address] = value & 0xff;
        return;
    }
  }

  /** Little-endian 16-bit read through the handlers. */
  readWord(address: number): number {
    return this.read(address) | (this.read(address + 1) << 8);
  }

  writeWord(address: number, value: number): void {
    this.write(address, value & 0xff);
    this.write(address + 1, (value >> 8) & 0xff);
  }

  /** Intercept accesses to `region` (inclusive). */
  mapRegion(region: MemRegion, handler: MemHandler): void {
    if (region.start > region.end || region.start < 0 || region.end >= this.size) {
      throw new RangeError(
        `invalid region 0x${region.start.toString(16)}-0x${region.end.toString(16)} for ${this.size} bytes`,
      );
    }
    this.mappings.push({ ...region, handler });
  }

  unmapAll(): void {
    this.mappings = [];
  }

  /** Load a block of bytes at the given address, bypassing handlers. */
  loadBytes(startAddress: number, data: Uint8Array | readonly number[]): void {
    if (startAddress < 0 || startAddress + data.length > this.size) {
      throw new MemoryFault(
        `${data.length} bytes at 0x${startAddress.toString(16)} do not fit in ${this.size} bytes`,
        startAddress,
      );
    }
    this.ram.set(data, startAddress);
  }

  /** Clear all RAM to zero. */
  clear(): void {
    this.ram.fill(0);
  }

  /** Direct RAM read, no handlers. */
  peek(address: number): number {
    this.check(address);
    return this.ram[address];
  }

  /** Direct RAM write, no handlers. */
  poke(address: number, value: number): void {
    this.check(address);
    this.ram[address] = value & 0xff;
  }

  private check(address: number): void {
    if (!Number.isInteger(address) || address < 0 || address >= this.size) {
      throw new MemoryFault(`address 0x${address.toString(16)} is outside 0x0-0x${(this.size - 1).toString(16)}`, address);
    }
  }

  private handlerFor(address: number): MemHandler | undefined {
    return this.mappings.find((m) => address >= m.start && address <= m.end)?.handler;
  }
}
