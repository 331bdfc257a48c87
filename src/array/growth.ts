/**
 * Growth policy for the bounded array.
 *
 * Capacity grows by doubling when a push finds the array full, clamped to
 * whatever limit applies. The factor is fixed.
 */

import {
  addCount,
  doubleCount,
  elementCount,
  minCount,
  type ElementCount,
} from '../types/branded.ts';

/**
 * Capacity to request when a push finds `size === capacity`.
 * Zero grows to one; otherwise doubles, or steps to `size + 1` when
 * doubling would make no progress. Never exceeds `limit`.
 */
export function nextCapacity(
  capacity: ElementCount,
  size: ElementCount,
  limit: ElementCount
): ElementCount {
  const grown = elementCount(Math.max(doubleCount(capacity), addCount(size, 1)));
  return minCount(limit, grown);
}

/**
 * Effective upper bound on capacity: the container bound or, when smaller,
 * the largest block the allocator can ever serve.
 */
export function capacityLimit(
  maxSize: ElementCount,
  maxAllocationSize: number | undefined
): ElementCount {
  if (maxAllocationSize === undefined) return maxSize;
  return minCount(maxSize, elementCount(Math.max(0, Math.floor(maxAllocationSize))));
}
