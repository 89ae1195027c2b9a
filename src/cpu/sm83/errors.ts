/**
 * CPU fault taxonomy. A fault aborts the current step and is reported to
 * the caller as a `fault` outcome; nothing is retried.
 */

export type FaultKind = 'decode' | 'execution' | 'memory';

export abstract class CpuFault extends Error {
  abstract readonly kind: FaultKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unassigned opcode, malformed table entry or truncated instruction stream. */
export class DecodeFault extends CpuFault {
  readonly kind = 'decode';

  constructor(
    message: string,
    readonly address: number,
    readonly opcode?: number,
  ) {
    super(message);
  }
}

/** An instruction that decoded cleanly but cannot be applied. */
export class ExecutionFault extends CpuFault {
  readonly kind = 'execution';
}

/** Raised by a memory collaborator for an address it does not back. */
export class MemoryFault extends CpuFault {
  readonly kind = 'memory';

  constructor(
    message: string,
    readonly address: number,
  ) {
    super(message);
  }
}
