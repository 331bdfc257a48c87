/**
 * Bounded, constant-time heap allocator.
 *
 * Serves blocks out of a fixed budget of element slots. Every request is
 * rounded up to a power-of-two fragment; fragments come from a free list
 * per fragment size, or are carved from the untouched tail of the budget.
 * Released fragments go back to their free list and are never split or
 * merged, so allocate and deallocate are O(1) and the heap's behaviour
 * depends only on the sequence of requests.
 *
 * Released fragments are reset to holes before they are reused so that no
 * stale element survives into the next block.
 *
 * Not cloneable: containers copied from one another share one budget.
 */

import type { Allocator, RawStorage } from '../types/allocator.ts';
import { isValidCount } from '../types/branded.ts';

/** Largest fragment: 2^31 slots, below the JavaScript array length limit */
const MAX_FRAGMENT = 2 ** 31;

/**
 * Snapshot of heap usage.
 */
export interface BoundedHeapDiagnostics {
  /** Total slot budget */
  readonly capacity: number;
  /** Slots currently handed out, fragment-rounded */
  readonly allocated: number;
  /** Highest value `allocated` has reached */
  readonly peakAllocated: number;
  /** Largest count ever requested, served or not */
  readonly peakRequestSize: number;
  /** Number of requests that could not be served */
  readonly oomCount: number;
}

/**
 * Round a request up to its power-of-two fragment size.
 */
export function fragmentSizeFor(count: number): number {
  if (count <= 1) return 1;
  return 2 ** (32 - Math.clz32(count - 1));
}

/**
 * Largest power of two not above `value` (0 for values below 1).
 */
function floorPowerOfTwo(value: number): number {
  if (value < 1) return 0;
  if (value >= MAX_FRAGMENT) return MAX_FRAGMENT;
  return 2 ** (31 - Math.clz32(value));
}

export class BoundedHeapAllocator<T> implements Allocator<T, BoundedHeapAllocator<T>> {
  /** Total slot budget */
  readonly capacity: number;
  /** Largest fragment that fits in the budget */
  readonly maxAllocationSize: number;

  /** Free fragments keyed by fragment size */
  private readonly freeLists: Map<number, RawStorage<T>[]> = new Map();
  /** Live blocks and their fragment sizes */
  private readonly live: Map<RawStorage<T>, number> = new Map();
  /** Slots carved from the tail of the budget so far */
  private carved = 0;
  private allocated = 0;
  private peakAllocated = 0;
  private peakRequestSize = 0;
  private oomCount = 0;

  /**
   * @param capacity Slot budget; a non-negative integer.
   */
  constructor(capacity: number) {
    if (!isValidCount(capacity)) {
      throw new RangeError(`Heap capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.maxAllocationSize = floorPowerOfTwo(capacity);
  }

  allocate(count: number): RawStorage<T> | null {
    if (count > this.peakRequestSize) this.peakRequestSize = count;
    if (!Number.isInteger(count) || count <= 0) return null;
    if (count > this.maxAllocationSize) {
      this.oomCount++;
      return null;
    }

    const fragment = fragmentSizeFor(count);
    let block = this.freeLists.get(fragment)?.pop();
    if (block === undefined) {
      if (this.carved + fragment > this.capacity) {
        this.oomCount++;
        return null;
      }
      this.carved += fragment;
      block = new Array<T>(fragment);
    }

    this.live.set(block, fragment);
    this.allocated += fragment;
    if (this.allocated > this.peakAllocated) this.peakAllocated = this.allocated;
    return block;
  }

  deallocate(storage: RawStorage<T>, _count: number): void {
    const fragment = this.live.get(storage);
    if (fragment === undefined) {
      throw new RangeError('Block was not allocated by this heap or was already released');
    }
    this.live.delete(storage);
    this.allocated -= fragment;

    // back to holes before reuse
    storage.length = 0;
    storage.length = fragment;

    const bucket = this.freeLists.get(fragment);
    if (bucket) bucket.push(storage);
    else this.freeLists.set(fragment, [storage]);
  }

  /**
   * Current usage counters.
   */
  diagnostics(): BoundedHeapDiagnostics {
    return {
      capacity: this.capacity,
      allocated: this.allocated,
      peakAllocated: this.peakAllocated,
      peakRequestSize: this.peakRequestSize,
      oomCount: this.oomCount,
    };
  }
}
