/**
 * Collaborator interfaces shared by CPU cores.
 */

/**
 * Byte-addressable bus the core reads and writes through. Implementations
 * may intercept regions (memory-mapped I/O) and throw a MemoryFault for
 * addresses they do not back.
 */
export interface Memory {
  read(address: number): number;
  write(address: number, value: number): void;
}

/**
 * Receives the fixed cost of each completed instruction. A caller may
 * advance a shared tick counter here, or do nothing.
 */
export type CycleHook = (cycles: number) => void;
