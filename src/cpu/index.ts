export * from './sm83';
export type { Memory, CycleHook } from './types';
