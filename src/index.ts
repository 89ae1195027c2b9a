export * from './cpu';
export { MappedMemory } from './emulator/memory';
export type { MemRead, MemWrite, MemHandler, MemRegion } from './emulator/memory';
export { logger } from './lib/logger';
