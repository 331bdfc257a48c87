/**
 * In-place construction and destruction over raw storage.
 *
 * Raw storage is a JavaScript array whose unconstructed slots are holes.
 * These helpers are the only code that turns a hole into a live element or
 * back; they are internal to the container.
 */

import type { RawStorage } from '../types/allocator.ts';
import type { ResolvedTraits } from '../types/element.ts';

/**
 * Destroy the element at `index` and leave a hole behind.
 */
export function destroyAt<T>(
  storage: RawStorage<T>,
  index: number,
  traits: ResolvedTraits<T>
): void {
  traits.destroy(storage[index]);
  delete storage[index];
}

/**
 * Destroy the elements in [start, end), in index order.
 */
export function destroyRange<T>(
  storage: RawStorage<T>,
  start: number,
  end: number,
  traits: ResolvedTraits<T>
): void {
  for (let i = start; i < end; i++) {
    destroyAt(storage, i, traits);
  }
}

/**
 * Construct `count` elements at the front of `target` from `source`,
 * using `construct` (a copy or a move). If a construction throws, the
 * elements already built in `target` are destroyed and the error is
 * rethrown; `source` is left as it was up to the failing element.
 */
export function constructFrom<T>(
  source: ArrayLike<T>,
  target: RawStorage<T>,
  count: number,
  construct: (value: T) => T,
  traits: ResolvedTraits<T>
): void {
  let built = 0;
  try {
    for (; built < count; built++) {
      target[built] = construct(source[built]);
    }
  } catch (error) {
    destroyRange(target, 0, built, traits);
    throw error;
  }
}

/**
 * Move (or copy, for copy-only types) `count` live elements from `source`
 * into `target`, then destroy what remains in `source`.
 *
 * A source element whose move produced the very same value is not
 * destroyed again: its ownership moved without leaving a husk.
 */
export function relocate<T>(
  source: RawStorage<T>,
  target: RawStorage<T>,
  count: number,
  traits: ResolvedTraits<T>
): void {
  constructFrom(source, target, count, traits.move, traits);
  for (let i = 0; i < count; i++) {
    if (source[i] !== target[i]) traits.destroy(source[i]);
    delete source[i];
  }
}
