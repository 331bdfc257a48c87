/**
 * Error taxonomy for the bounded array.
 *
 * Only the push family, initializer construction and copying raise these.
 * `reserve` and `shrinkToFit` report allocator failure through their
 * result instead.
 */

import type { ElementCount } from './branded.ts';

/**
 * Discriminant for recoverable container failures.
 */
export type BoundedArrayErrorKind = 'bound-exceeded' | 'allocator-exhausted';

/**
 * Container state at the moment a failure was raised.
 */
export interface BoundedArrayErrorContext {
  readonly size: ElementCount;
  readonly capacity: ElementCount;
  readonly maxSize: number;
  /** Capacity the failed operation needed */
  readonly requested: ElementCount;
}

/**
 * Base class for recoverable container failures.
 * The container is left exactly as it was before the failed call.
 */
export abstract class BoundedArrayError extends Error {
  abstract readonly kind: BoundedArrayErrorKind;
  readonly size: ElementCount;
  readonly capacity: ElementCount;
  readonly maxSize: number;
  readonly requested: ElementCount;

  protected constructor(message: string, context: BoundedArrayErrorContext) {
    super(message);
    this.size = context.size;
    this.capacity = context.capacity;
    this.maxSize = context.maxSize;
    this.requested = context.requested;
  }
}

/**
 * Growth would exceed the container's maximum size.
 */
export class BoundExceededError extends BoundedArrayError {
  readonly kind = 'bound-exceeded';

  constructor(context: BoundedArrayErrorContext) {
    super(
      `Bounded array is full: ${context.requested} elements requested, max size is ${context.maxSize}`,
      context
    );
    this.name = 'BoundExceededError';
  }
}

/**
 * The allocator could not serve the storage the operation needed.
 */
export class AllocatorExhaustedError extends BoundedArrayError {
  readonly kind = 'allocator-exhausted';

  constructor(context: BoundedArrayErrorContext, options?: { cause?: unknown }) {
    super(
      `Allocator could not provide storage for ${context.requested} elements (capacity ${context.capacity})`,
      context
    );
    this.name = 'AllocatorExhaustedError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/**
 * Construction options failed validation.
 */
export class InvalidOptionsError extends Error {
  /** One `path: message` entry per failed check */
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid bounded array options: ${issues.join('; ')}`);
    this.name = 'InvalidOptionsError';
    this.issues = issues;
  }
}

/**
 * Type guard for recoverable container failures.
 */
export function isBoundedArrayError(value: unknown): value is BoundedArrayError {
  return value instanceof BoundedArrayError;
}
