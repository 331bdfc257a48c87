/**
 * Branded types for element counts and indices.
 *
 * Sizes, capacities and bounds are all plain numbers at runtime, but a
 * count of slots should not be confused with an index into them. Branding
 * keeps the two apart in signatures without any runtime overhead.
 *
 * Usage:
 * ```typescript
 * const achieved = array.reserve(8); // ElementCount
 * const last = lastIndex(achieved);  // ElementIndex
 *
 * // Type error: can't pass an ElementIndex where an ElementCount is expected
 * const wrong: ElementCount = last;
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

/**
 * Generic brand interface.
 * The brand is a phantom type that only exists in the type system.
 */
interface Brand<B> {
  readonly [brand]: B;
}

/**
 * Create a branded type from a base type.
 */
type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Count Types
// =============================================================================

/**
 * Number of element slots (a size, a capacity or a bound).
 * Always a non-negative safe integer.
 */
export type ElementCount = Branded<number, 'ElementCount'>;

/**
 * Zero-based position of an element slot.
 */
export type ElementIndex = Branded<number, 'ElementIndex'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create an ElementCount from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function elementCount(value: number): ElementCount {
  return value as ElementCount;
}

/**
 * Create an ElementIndex from a number.
 */
export function elementIndex(value: number): ElementIndex {
  return value as ElementIndex;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a valid count (non-negative safe integer).
 */
export function isValidCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

/**
 * Smallest of the given counts.
 */
export function minCount(first: ElementCount, ...rest: ElementCount[]): ElementCount {
  return Math.min(first, ...rest) as ElementCount;
}

/**
 * Double a count, saturating at Number.MAX_SAFE_INTEGER.
 */
export function doubleCount(count: ElementCount): ElementCount {
  return Math.min(count * 2, Number.MAX_SAFE_INTEGER) as ElementCount;
}

/**
 * Add a delta to a count. Never drops below zero.
 */
export function addCount(count: ElementCount, delta: number): ElementCount {
  return Math.max(0, count + delta) as ElementCount;
}

/**
 * Index of the last slot covered by a count.
 * Only meaningful for counts greater than zero.
 */
export function lastIndex(count: ElementCount): ElementIndex {
  return (count - 1) as ElementIndex;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Zero count - the size and capacity of an empty array.
 */
export const ZERO_COUNT: ElementCount = 0 as ElementCount;

/**
 * Largest length a JavaScript array can have (2^32 - 1).
 */
export const MAX_ARRAY_LENGTH: ElementCount = 4294967295 as ElementCount;
