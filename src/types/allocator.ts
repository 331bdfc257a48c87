/**
 * Allocator contract for the bounded array.
 *
 * An allocator hands out raw storage blocks and takes them back. The
 * container owns its allocator and is the only thing that calls it.
 */

/**
 * Uninitialized element storage handed out by an allocator.
 * Slots are holes until the container constructs an element in place,
 * and become holes again when the element is destroyed.
 */
export type RawStorage<T> = T[];

/**
 * Policy object that acquires and releases raw storage.
 *
 * `Self` is the allocator's own type, so that `clone()` can hand back an
 * allocator the container can keep using under the same static type.
 */
export interface Allocator<T, Self = unknown> {
  /**
   * Request storage for `count` elements.
   * Returning `null` and throwing are both treated as allocation failure.
   * The returned block may be longer than `count`; only the first `count`
   * slots are used.
   */
  allocate(count: number): RawStorage<T> | null;

  /**
   * Release a block previously returned by `allocate` on this allocator,
   * with the same `count` it was requested with.
   */
  deallocate(storage: RawStorage<T>, count: number): void;

  /**
   * Copy the allocator's state. Containers that are copied take a clone
   * when this is defined and share the instance otherwise.
   */
  clone?(): Self;

  /**
   * Largest request this allocator could ever serve, independent of any
   * container bound. Unlimited when absent.
   */
  readonly maxAllocationSize?: number;
}

/**
 * Check that a value has the allocate/deallocate shape of an allocator.
 */
export function isAllocator(value: unknown): value is Allocator<unknown> {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'allocate' in value &&
    typeof value.allocate === 'function' &&
    'deallocate' in value &&
    typeof value.deallocate === 'function'
  );
}
