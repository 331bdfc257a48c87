/**
 * Type exports for the bounded array.
 */

// Branded count types
export type { ElementCount, ElementIndex } from './branded.ts';

export {
  elementCount,
  elementIndex,
  isValidCount,
  minCount,
  doubleCount,
  addCount,
  lastIndex,
  ZERO_COUNT,
  MAX_ARRAY_LENGTH,
} from './branded.ts';

// Allocator contract
export type { RawStorage, Allocator } from './allocator.ts';
export { isAllocator } from './allocator.ts';

// Element traits
export type { ElementTraits, ResolvedTraits } from './element.ts';

// Errors
export type { BoundedArrayErrorKind, BoundedArrayErrorContext } from './errors.ts';
export {
  BoundedArrayError,
  BoundExceededError,
  AllocatorExhaustedError,
  InvalidOptionsError,
  isBoundedArrayError,
} from './errors.ts';
