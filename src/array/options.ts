// Construction options for the bounded array, validated with Zod

import { z } from 'zod';
import type pino from 'pino';
import { isAllocator, type Allocator } from '../types/allocator.ts';
import type { ElementTraits } from '../types/element.ts';
import { InvalidOptionsError } from '../types/errors.ts';

export const boundedArrayConfigSchema = z.object({
  maxSize: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER),
  allocator: z
    .custom<Allocator<unknown>>(isAllocator, {
      message: 'allocator must provide allocate() and deallocate()',
    })
    .optional(),
  traits: z
    .object({
      copy: z.unknown().optional(),
      move: z.unknown().optional(),
      destroy: z.unknown().optional(),
      equals: z.unknown().optional(),
      construct: z.unknown().optional(),
    })
    .refine(
      (traits) => Object.values(traits).every((hook) => hook === undefined || typeof hook === 'function'),
      { message: 'every trait hook must be a function' }
    )
    .optional(),
});

export type BoundedArrayConfig = z.infer<typeof boundedArrayConfigSchema>;

/**
 * Options accepted by `createBoundedArray` and the container constructor.
 */
export interface BoundedArrayOptions<T, N extends number> {
  /** Upper bound on size and capacity */
  readonly maxSize: N;
  /** Element lifecycle hooks; trivial when absent */
  readonly traits?: ElementTraits<T>;
  /** Logger for growth and failure diagnostics */
  readonly logger?: pino.Logger;
}

/**
 * Options with the allocator the container will own.
 */
export interface BoundedArrayInit<T, N extends number, A> extends BoundedArrayOptions<T, N> {
  readonly allocator: A;
}

/**
 * Validate raw options, throwing InvalidOptionsError with one entry per
 * failed check.
 */
export function validateOptions(options: unknown): BoundedArrayConfig {
  const result = boundedArrayConfigSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}
