/**
 * SM83 CPU options, validated with zod at construction time.
 */

import { z } from 'zod';

const Byte = z.number().int().min(0).max(0xff);

const ConditionOverrideSchema = z
  .object({ mask: Byte, expected: Byte })
  .strict()
  .refine((c) => (c.expected & ~c.mask) === 0, 'expected bits must lie within mask');

export const CpuConfigSchema = z
  .object({
    /** PC value after reset. */
    resetVector: z.number().int().min(0).max(0xffff).default(0),
    /** Log every executed instruction at debug level. */
    trace: z.boolean().default(false),
    /** Replaces the flag test of individual branch conditions. */
    conditions: z
      .object({
        NZ: ConditionOverrideSchema.optional(),
        Z: ConditionOverrideSchema.optional(),
        NC: ConditionOverrideSchema.optional(),
        C: ConditionOverrideSchema.optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type CpuConfigInput = z.input<typeof CpuConfigSchema>;
export type CpuConfig = z.output<typeof CpuConfigSchema>;

export function parseCpuConfig(input: CpuConfigInput = {}): CpuConfig {
  return CpuConfigSchema.parse(input);
}
