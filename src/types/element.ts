/**
 * Element lifecycle traits.
 *
 * JavaScript values have no constructors or destructors the container can
 * call implicitly, so element types that care about their lifecycle
 * describe it here. Every hook is optional; see `resolveTraits` for the
 * fallbacks.
 */

/**
 * Lifecycle hooks for an element type.
 */
export interface ElementTraits<T> {
  /** Copy-construct a new element from `source`. Absent for move-only types. */
  readonly copy?: (source: T) => T;
  /**
   * Move-construct a new element from `source`, leaving `source` in its
   * moved-from state. Absent for copy-only types.
   */
  readonly move?: (source: T) => T;
  /** Destroy an element (including a moved-from one). */
  readonly destroy?: (element: T) => void;
  /** Element equality. */
  readonly equals?: (a: T, b: T) => boolean;
  /** Default-construct an element. */
  readonly construct?: () => T;
}

/**
 * Traits with every fallback applied.
 */
export interface ResolvedTraits<T> {
  readonly copy: (source: T) => T;
  readonly move: (source: T) => T;
  readonly destroy: (element: T) => void;
  readonly equals: (a: T, b: T) => boolean;
  readonly construct: (() => T) | null;
}
