/**
 * bounded-array - growable arrays with a fixed upper bound and a pluggable
 * allocator.
 *
 * Main entry point exporting the container, its allocators and types.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  ElementCount,
  ElementIndex,
  RawStorage,
  Allocator,
  ElementTraits,
  ResolvedTraits,
  BoundedArrayErrorKind,
  BoundedArrayErrorContext,
} from './types/index.ts';

export {
  elementCount,
  elementIndex,
  isValidCount,
  ZERO_COUNT,
  MAX_ARRAY_LENGTH,
  isAllocator,
} from './types/index.ts';

// =============================================================================
// Errors
// =============================================================================

export {
  BoundedArrayError,
  BoundExceededError,
  AllocatorExhaustedError,
  InvalidOptionsError,
  isBoundedArrayError,
} from './types/index.ts';

// =============================================================================
// Container
// =============================================================================

export {
  BoundedArray,
  createBoundedArray,
  boundedArrayConfigSchema,
  validateOptions,
  nextCapacity,
  capacityLimit,
  resolveTraits,
  trivialTraits,
  numericTraits,
  stringTraits,
} from './array/index.ts';
export type {
  BoundedArrayConfig,
  BoundedArrayOptions,
  BoundedArrayInit,
} from './array/index.ts';

// =============================================================================
// Allocators
// =============================================================================

export {
  HeapAllocator,
  BoundedHeapAllocator,
  SingleBufferAllocator,
} from './allocators/index.ts';
export type {
  BoundedHeapDiagnostics,
  SingleBufferMode,
  SingleBufferOptions,
} from './allocators/index.ts';

// =============================================================================
// Logging
// =============================================================================

export { createLogger, createChildLogger, logger, LOG_LEVEL_ENV } from './utils/logger.ts';
