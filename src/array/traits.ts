/**
 * Element trait resolution and ready-made trait sets.
 */

import type { ElementTraits, ResolvedTraits } from '../types/element.ts';

function identity<T>(value: T): T {
  return value;
}

function noop(): void {}

function strictEquals<T>(a: T, b: T): boolean {
  return a === b;
}

/**
 * Fill in the hooks an element type left out.
 *
 * - missing `copy` falls back to `move` (move-only types)
 * - missing `move` falls back to `copy` (copy-only types)
 * - both missing: identity, the value itself is the element
 * - `equals` defaults to strict `===`
 */
export function resolveTraits<T>(traits: ElementTraits<T> = {}): ResolvedTraits<T> {
  const copy = traits.copy ?? traits.move ?? identity;
  const move = traits.move ?? traits.copy ?? identity;
  return {
    copy,
    move,
    destroy: traits.destroy ?? noop,
    equals: traits.equals ?? strictEquals,
    construct: traits.construct ?? null,
  };
}

/**
 * Traits for plain values: no lifecycle, no default constructor.
 */
export function trivialTraits<T>(): ElementTraits<T> {
  return {};
}

/**
 * Traits for numbers. Default-constructs to 0.
 */
export function numericTraits(): ElementTraits<number> {
  return { construct: () => 0 };
}

/**
 * Traits for strings. Default-constructs to the empty string.
 */
export function stringTraits(): ElementTraits<string> {
  return { construct: () => '' };
}
