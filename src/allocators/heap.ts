/**
 * General-purpose heap allocator.
 *
 * Every request gets a fresh sparse array from the JavaScript heap and
 * released blocks are left to the garbage collector. Stateless, so
 * containers that are copied simply share it.
 */

import type { Allocator, RawStorage } from '../types/allocator.ts';
import { MAX_ARRAY_LENGTH } from '../types/branded.ts';

export class HeapAllocator<T> implements Allocator<T, HeapAllocator<T>> {
  /** JavaScript arrays cannot be longer than 2^32 - 1 */
  readonly maxAllocationSize: number = MAX_ARRAY_LENGTH;

  allocate(count: number): RawStorage<T> | null {
    if (!Number.isInteger(count) || count < 0 || count > this.maxAllocationSize) return null;
    return new Array<T>(count);
  }

  deallocate(storage: RawStorage<T>, _count: number): void {
    storage.length = 0;
  }
}
