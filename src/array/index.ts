/**
 * Bounded array module exports.
 */

export { BoundedArray, createBoundedArray } from './bounded-array.ts';

export {
  boundedArrayConfigSchema,
  validateOptions,
  type BoundedArrayConfig,
  type BoundedArrayOptions,
  type BoundedArrayInit,
} from './options.ts';

export { nextCapacity, capacityLimit } from './growth.ts';

export { resolveTraits, trivialTraits, numericTraits, stringTraits } from './traits.ts';
