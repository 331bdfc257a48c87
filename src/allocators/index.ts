/**
 * Reference allocators for the bounded array.
 */

export { HeapAllocator } from './heap.ts';
export { BoundedHeapAllocator, fragmentSizeFor } from './bounded-heap.ts';
export type { BoundedHeapDiagnostics } from './bounded-heap.ts';
export { SingleBufferAllocator } from './single-buffer.ts';
export type { SingleBufferMode, SingleBufferOptions } from './single-buffer.ts';
