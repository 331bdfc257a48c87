/**
 * Bounded growable array.
 *
 * A growable array with a fixed upper bound on its element count and an
 * injected allocator that supplies its storage. One raw storage block is
 * owned at a time; slots [0, size) hold live elements and the rest of the
 * block is holes.
 *
 * Failure reporting is asymmetric:
 * - `reserve` and `shrinkToFit` absorb allocator failure and report it
 *   through the achieved capacity / unchanged state.
 * - The push family throws `BoundExceededError` or `AllocatorExhaustedError`
 *   and leaves the array exactly as it was.
 *
 * Copy assignment reuses the current block in place only when the allocator
 * is not cloneable. With a cloneable allocator the target always takes a
 * clone of the source's allocator and a fresh block from it, whatever its
 * current capacity.
 *
 * Not safe for concurrent mutation; the container never awaits.
 */

import type pino from 'pino';
import type { Allocator, RawStorage } from '../types/allocator.ts';
import type { ElementTraits, ResolvedTraits } from '../types/element.ts';
import {
  addCount,
  elementCount,
  isValidCount,
  lastIndex,
  minCount,
  ZERO_COUNT,
  type ElementCount,
} from '../types/branded.ts';
import {
  AllocatorExhaustedError,
  BoundExceededError,
  type BoundedArrayErrorContext,
} from '../types/errors.ts';
import { HeapAllocator } from '../allocators/heap.ts';
import { logger } from '../utils/logger.ts';
import { capacityLimit, nextCapacity } from './growth.ts';
import { validateOptions, type BoundedArrayInit, type BoundedArrayOptions } from './options.ts';
import { constructFrom, destroyAt, destroyRange, relocate } from './storage.ts';
import { resolveTraits } from './traits.ts';

/** Read target for unchecked access while no storage is held */
const NO_STORAGE: never[] = [];

/**
 * Result of asking an allocator for a block.
 */
type Allocation<T> =
  | { readonly ok: true; readonly storage: RawStorage<T> }
  | { readonly ok: false; readonly cause?: unknown };

export class BoundedArray<T, N extends number = number, A extends Allocator<T, A> = HeapAllocator<T>>
  implements Iterable<T>
{
  /** Upper bound on size and capacity */
  readonly maxSize: N;

  private storage: RawStorage<T> | null = null;
  private length: ElementCount = ZERO_COUNT;
  private slots: ElementCount = ZERO_COUNT;
  private allocator: A;
  private readonly elementTraits: ElementTraits<T>;
  private readonly traits: ResolvedTraits<T>;
  private readonly log: pino.Logger;

  /**
   * @param init Bound, allocator and element traits
   * @param initial Values to copy in, at most `maxSize` of them
   * @throws {InvalidOptionsError} when `init` fails validation
   * @throws {BoundExceededError} when `initial` holds more than `maxSize` values
   * @throws {AllocatorExhaustedError} when storage for `initial` cannot be obtained
   */
  constructor(init: BoundedArrayInit<T, N, A>, initial?: Iterable<T>) {
    validateOptions(init);
    this.maxSize = init.maxSize;
    this.allocator = init.allocator;
    this.elementTraits = init.traits ?? {};
    this.traits = resolveTraits(init.traits);
    this.log = init.logger ?? logger;
    if (initial !== undefined) this.initialize(Array.from(initial));
  }

  // ===========================================================================
  // Capacity
  // ===========================================================================

  /** Number of live elements */
  get size(): ElementCount {
    return this.length;
  }

  /** Number of slots the current block holds */
  get capacity(): ElementCount {
    return this.slots;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * Make room for at least `min(requested, maxSize)` elements.
   *
   * Never throws on allocator failure: the capacity actually achieved is
   * returned, which is the prior capacity when the allocator could not
   * serve the request.
   *
   * @throws {RangeError} when `requested` is not a non-negative safe integer
   */
  reserve(requested: number): ElementCount {
    if (!isValidCount(requested)) {
      throw new RangeError(`reserve() expects a non-negative integer, got ${requested}`);
    }
    if (requested <= this.slots) return this.slots;

    const target = minCount(elementCount(requested), this.limit);
    if (target <= this.slots) return this.slots;

    const allocation = this.reallocate(target);
    if (!allocation.ok) {
      this.log.debug(
        { requested, capacity: this.slots, maxSize: this.maxSize },
        'reserve kept previous capacity'
      );
    }
    return this.slots;
  }

  /**
   * Release unused capacity. Best effort: when the allocator cannot serve
   * an exactly-sized block the array is left unchanged.
   */
  shrinkToFit(): void {
    if (this.length === this.slots) return;
    if (this.length === 0) {
      this.release();
      return;
    }
    const allocation = this.reallocate(this.length);
    if (!allocation.ok) {
      this.log.debug({ size: this.length, capacity: this.slots }, 'shrink skipped');
    }
  }

  // ===========================================================================
  // Modifiers
  // ===========================================================================

  /**
   * Append a copy of `value` (moved in for move-only element types).
   *
   * @throws {BoundExceededError} when the array already holds `maxSize` elements
   * @throws {AllocatorExhaustedError} when the allocator cannot provide a bigger block
   */
  pushBack(value: T): void {
    this.append(() => this.traits.copy(value));
  }

  /**
   * Append `value` by moving it (copied in for copy-only element types).
   *
   * @throws {BoundExceededError} when the array already holds `maxSize` elements
   * @throws {AllocatorExhaustedError} when the allocator cannot provide a bigger block
   */
  pushBackMove(value: T): void {
    this.append(() => this.traits.move(value));
  }

  /**
   * Append a default-constructed element.
   *
   * @throws {TypeError} when the element traits define no `construct`
   * @throws {BoundExceededError} when the array already holds `maxSize` elements
   * @throws {AllocatorExhaustedError} when the allocator cannot provide a bigger block
   */
  pushBackDefault(): void {
    const construct = this.traits.construct;
    if (construct === null) {
      throw new TypeError('Element traits define no default constructor');
    }
    this.append(construct);
  }

  /**
   * Destroy the last element. Capacity is kept. No-op on an empty array.
   */
  popBack(): void {
    if (this.storage === null || this.length === 0) return;
    const last = lastIndex(this.length);
    destroyAt(this.storage, last, this.traits);
    this.length = addCount(this.length, -1);
  }

  /**
   * Destroy every element, keeping the block.
   */
  clear(): void {
    if (this.storage !== null) destroyRange(this.storage, 0, this.length, this.traits);
    this.length = ZERO_COUNT;
  }

  /**
   * Destroy every element in order and release the block. The array is
   * left empty and stays usable. Safe to call more than once.
   */
  dispose(): void {
    this.clear();
    this.release();
  }

  // ===========================================================================
  // Element Access
  // ===========================================================================

  /**
   * Element at `index`. Unchecked: `index` must be below `size`.
   */
  at(index: number): T {
    return (this.storage ?? NO_STORAGE)[index];
  }

  /**
   * Replace the element at `index` with a copy of `value`.
   * Unchecked: `index` must be below `size`.
   */
  set(index: number, value: T): void {
    const storage = this.storage;
    if (storage === null) return;
    const replacement = this.traits.copy(value);
    if (storage[index] !== replacement) this.traits.destroy(storage[index]);
    storage[index] = replacement;
  }

  /**
   * The raw block, or null when nothing is allocated. Slots at and beyond
   * `size` are holes.
   */
  data(): readonly T[] | null {
    return this.storage;
  }

  getAllocator(): A {
    return this.allocator;
  }

  *values(): IterableIterator<T> {
    for (let i = 0; i < this.length; i++) {
      yield this.at(i);
    }
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }

  /**
   * Copy of the live elements as a plain array.
   */
  toArray(): T[] {
    return Array.from(this.values());
  }

  // ===========================================================================
  // Value Semantics
  // ===========================================================================

  /**
   * Deep, element-wise copy. The copy gets `allocator.clone()` when the
   * allocator defines it and shares the allocator otherwise.
   *
   * @throws {AllocatorExhaustedError} when the copy's storage cannot be obtained
   */
  clone(): BoundedArray<T, N, A> {
    const copy = new BoundedArray<T, N, A>({
      maxSize: this.maxSize,
      allocator: this.allocator.clone ? this.allocator.clone() : this.allocator,
      traits: this.elementTraits,
      logger: this.log,
    });
    copy.assignCopy(this, copy.allocator);
    return copy;
  }

  /**
   * Copy assignment. With a cloneable allocator this array ends up owning a
   * clone of `source`'s allocator; otherwise it keeps its own and reuses its
   * block when the block is large enough.
   *
   * @throws {AllocatorExhaustedError} when new storage is needed and cannot
   * be obtained; this array is then unchanged
   */
  copyFrom(source: BoundedArray<T, N, A>): void {
    if (source === this) return;
    const allocator = source.allocator.clone ? source.allocator.clone() : this.allocator;
    this.assignCopy(source, allocator);
  }

  /**
   * Move construction: a new array takes over this array's block,
   * elements and allocator in constant time. This array is left empty.
   */
  take(): BoundedArray<T, N, A> {
    const moved = new BoundedArray<T, N, A>({
      maxSize: this.maxSize,
      allocator: this.allocator,
      traits: this.elementTraits,
      logger: this.log,
    });
    moved.adopt(this);
    return moved;
  }

  /**
   * Move assignment: dispose of this array's contents, then take over
   * `source`'s block, elements and allocator. `source` is left empty.
   *
   * @throws {BoundExceededError} when `source`'s capacity exceeds this
   * array's `maxSize`; both arrays are then unchanged
   */
  moveFrom(source: BoundedArray<T, N, A>): void {
    if (source === this) return;
    if (source.slots > this.maxSize) {
      this.log.debug(this.errorContext(source.slots), 'move rejected: max size exceeded');
      throw new BoundExceededError(this.errorContext(source.slots));
    }
    this.dispose();
    this.adopt(source);
  }

  /**
   * Same size and pairwise-equal elements under the traits' `equals`.
   */
  equals<B extends Allocator<T, B>>(other: BoundedArray<T, N, B>): boolean {
    if (other.size !== this.length) return false;
    for (let i = 0; i < this.length; i++) {
      if (!this.traits.equals(this.at(i), other.at(i))) return false;
    }
    return true;
  }

  notEquals<B extends Allocator<T, B>>(other: BoundedArray<T, N, B>): boolean {
    return !this.equals(other);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /** Capacity can never exceed this under the current allocator */
  private get limit(): ElementCount {
    return capacityLimit(elementCount(this.maxSize), this.allocator.maxAllocationSize);
  }

  private errorContext(requested: ElementCount): BoundedArrayErrorContext {
    return {
      size: this.length,
      capacity: this.slots,
      maxSize: this.maxSize,
      requested,
    };
  }

  private tryAllocate(allocator: A, count: ElementCount): Allocation<T> {
    try {
      const storage = allocator.allocate(count);
      if (storage === null) return { ok: false };
      return { ok: true, storage };
    } catch (error) {
      this.log.debug({ err: error, requested: count }, 'allocator threw');
      return { ok: false, cause: error };
    }
  }

  /**
   * Move the live elements into a fresh block of `target` slots and
   * release the old block. When the allocator returns the block already
   * held, only the capacity changes. Leaves everything untouched when the
   * allocator fails; if relocating an element throws, the fresh block is
   * released and the error propagates.
   */
  private reallocate(target: ElementCount): Allocation<T> {
    const allocation = this.tryAllocate(this.allocator, target);
    if (!allocation.ok) return allocation;

    const next = allocation.storage;
    const previous = this.storage;
    // an allocator may hand back the block already held; elements stay put
    if (previous !== null && previous !== next) {
      try {
        relocate(previous, next, this.length, this.traits);
      } catch (error) {
        this.allocator.deallocate(next, target);
        throw error;
      }
      this.allocator.deallocate(previous, this.slots);
    }

    this.log.debug(
      { size: this.length, from: this.slots, to: target, maxSize: this.maxSize },
      'storage reallocated'
    );
    this.storage = next;
    this.slots = target;
    return allocation;
  }

  /**
   * Release the block. Elements must already be destroyed.
   */
  private release(): void {
    if (this.storage !== null) {
      this.allocator.deallocate(this.storage, this.slots);
    }
    this.storage = null;
    this.slots = ZERO_COUNT;
  }

  /**
   * Storage with at least one free slot, growing if needed.
   * Throws without touching any state when growth is impossible.
   */
  private roomForOne(): RawStorage<T> {
    if (this.storage !== null && this.length < this.slots) return this.storage;

    const requested = addCount(this.length, 1);
    if (this.slots >= this.maxSize) {
      this.log.debug(this.errorContext(requested), 'push rejected: max size reached');
      throw new BoundExceededError(this.errorContext(requested));
    }

    const limit = this.limit;
    const allocation =
      this.slots < limit ? this.reallocate(nextCapacity(this.slots, this.length, limit)) : null;
    if (allocation === null || !allocation.ok) {
      this.log.debug(this.errorContext(requested), 'push rejected: allocator exhausted');
      throw new AllocatorExhaustedError(this.errorContext(requested), {
        cause: allocation === null ? undefined : allocation.cause,
      });
    }
    return allocation.storage;
  }

  private append(build: () => T): void {
    const storage = this.roomForOne();
    storage[this.length] = build();
    this.length = addCount(this.length, 1);
  }

  private initialize(values: readonly T[]): void {
    const count = elementCount(values.length);
    if (count === 0) return;
    if (count > this.maxSize) throw new BoundExceededError(this.errorContext(count));

    const allocation =
      count <= this.limit ? this.tryAllocate(this.allocator, count) : null;
    if (allocation === null || !allocation.ok) {
      throw new AllocatorExhaustedError(this.errorContext(count), {
        cause: allocation === null ? undefined : allocation.cause,
      });
    }

    try {
      constructFrom(values, allocation.storage, count, this.traits.copy, this.traits);
    } catch (error) {
      this.allocator.deallocate(allocation.storage, count);
      throw error;
    }
    this.storage = allocation.storage;
    this.slots = count;
    this.length = count;
  }

  /**
   * Replace this array's contents with copies of `source`'s elements,
   * ending up owned by `allocator`.
   */
  private assignCopy(source: BoundedArray<T, N, A>, allocator: A): void {
    const count = source.length;
    const sourceStorage = source.storage ?? NO_STORAGE;
    if (count > this.maxSize) throw new BoundExceededError(this.errorContext(count));

    if (allocator === this.allocator && (count === 0 || (this.storage !== null && count <= this.slots))) {
      this.clear();
      if (this.storage !== null) {
        constructFrom(sourceStorage, this.storage, count, this.traits.copy, this.traits);
      }
      this.length = count;
      return;
    }

    let next: RawStorage<T> | null = null;
    if (count > 0) {
      const allocation =
        count <= capacityLimit(elementCount(this.maxSize), allocator.maxAllocationSize)
          ? this.tryAllocate(allocator, count)
          : null;
      if (allocation === null || !allocation.ok) {
        throw new AllocatorExhaustedError(this.errorContext(count), {
          cause: allocation === null ? undefined : allocation.cause,
        });
      }
      next = allocation.storage;
      if (next === this.storage) {
        this.replaceInPlace(sourceStorage, next, count);
        this.allocator = allocator;
        return;
      }
      try {
        constructFrom(sourceStorage, next, count, this.traits.copy, this.traits);
      } catch (error) {
        allocator.deallocate(next, count);
        throw error;
      }
    }

    this.dispose();
    this.allocator = allocator;
    this.storage = next;
    this.slots = count;
    this.length = count;
  }

  /**
   * Copy-assign into the block already held, which the allocator handed
   * back for a bigger request. Copies are staged first so that a throwing
   * copy leaves the current elements intact.
   */
  private replaceInPlace(source: ArrayLike<T>, storage: RawStorage<T>, count: ElementCount): void {
    const staged: T[] = [];
    constructFrom(source, staged, count, this.traits.copy, this.traits);
    this.clear();
    for (let i = 0; i < count; i++) {
      storage[i] = staged[i];
    }
    this.slots = count;
    this.length = count;
  }

  /**
   * Take over `source`'s block, elements and allocator; `source` becomes empty.
   * This array must hold no block.
   */
  private adopt(source: BoundedArray<T, N, A>): void {
    this.storage = source.storage;
    this.length = source.length;
    this.slots = source.slots;
    this.allocator = source.allocator;
    source.storage = null;
    source.length = ZERO_COUNT;
    source.slots = ZERO_COUNT;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a bounded array, optionally filled with copies of `initial`.
 * Without an allocator, storage comes from a `HeapAllocator`.
 *
 * @example
 * ```typescript
 * const ids = createBoundedArray({ maxSize: 10 }, [3, 1, 2]);
 * ids.pushBack(4);
 * ```
 */
export function createBoundedArray<T, N extends number, A extends Allocator<T, A>>(
  options: BoundedArrayOptions<T, N> & { readonly allocator: A },
  initial?: Iterable<T>
): BoundedArray<T, N, A>;
export function createBoundedArray<T, N extends number>(
  options: BoundedArrayOptions<T, N>,
  initial?: Iterable<T>
): BoundedArray<T, N, HeapAllocator<T>>;
export function createBoundedArray<T, N extends number, A extends Allocator<T, A>>(
  options: BoundedArrayOptions<T, N> & { readonly allocator?: A },
  initial?: Iterable<T>
): BoundedArray<T, N, A> | BoundedArray<T, N, HeapAllocator<T>> {
  const allocator = options.allocator;
  if (allocator === undefined) {
    return new BoundedArray<T, N, HeapAllocator<T>>(
      { ...options, allocator: new HeapAllocator<T>() },
      initial
    );
  }
  return new BoundedArray<T, N, A>({ ...options, allocator }, initial);
}
