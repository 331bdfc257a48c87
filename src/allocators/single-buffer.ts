/**
 * Single static buffer allocator.
 *
 * Owns one fixed buffer and hands it out whole; requests larger than the
 * buffer get `null`. Two sharing modes:
 *
 * - `exclusive` (default): only one allocation can be live at a time. A
 *   request made while the buffer is out gets `null`, so a container using
 *   it can never reallocate, only reserve once and release.
 * - `shared`: every request that fits gets the same buffer, even while it
 *   is out. A container then grows and shrinks in place.
 */

import type { Allocator, RawStorage } from '../types/allocator.ts';
import { isValidCount } from '../types/branded.ts';

export type SingleBufferMode = 'exclusive' | 'shared';

export interface SingleBufferOptions {
  readonly mode?: SingleBufferMode;
}

export class SingleBufferAllocator<T> implements Allocator<T, SingleBufferAllocator<T>> {
  readonly maxAllocationSize: number;
  readonly mode: SingleBufferMode;

  private readonly buffer: RawStorage<T>;
  private inUse = false;
  private allocCount = 0;
  private lastAllocSize = 0;
  private lastDeallocSize = 0;

  /**
   * @param bufferSize Slots in the buffer; a non-negative integer.
   */
  constructor(bufferSize: number, options: SingleBufferOptions = {}) {
    if (!isValidCount(bufferSize)) {
      throw new RangeError(`Buffer size must be a non-negative integer, got ${bufferSize}`);
    }
    this.maxAllocationSize = bufferSize;
    this.mode = options.mode ?? 'exclusive';
    this.buffer = new Array<T>(bufferSize);
  }

  allocate(count: number): RawStorage<T> | null {
    if (count > this.maxAllocationSize) return null;
    if (this.inUse && this.mode === 'exclusive') return null;
    this.inUse = true;
    this.allocCount++;
    this.lastAllocSize = count;
    return this.buffer;
  }

  deallocate(storage: RawStorage<T>, count: number): void {
    // anything else is not ours to release
    if (storage !== this.buffer) return;
    this.lastDeallocSize = count;
    this.inUse = false;
    storage.length = 0;
    storage.length = this.maxAllocationSize;
  }

  /**
   * Copy with the same mode and counters and a fresh, unused buffer.
   */
  clone(): SingleBufferAllocator<T> {
    const copy = new SingleBufferAllocator<T>(this.maxAllocationSize, { mode: this.mode });
    copy.allocCount = this.allocCount;
    copy.lastAllocSize = this.lastAllocSize;
    copy.lastDeallocSize = this.lastDeallocSize;
    return copy;
  }

  /** Number of successful allocations */
  getAllocCount(): number {
    return this.allocCount;
  }

  /** Count passed to the last successful allocation */
  getLastAllocSize(): number {
    return this.lastAllocSize;
  }

  /** Count passed to the last release of the buffer */
  getLastDeallocSize(): number {
    return this.lastDeallocSize;
  }

  /** Whether the buffer is currently handed out */
  isInUse(): boolean {
    return this.inUse;
  }
}
