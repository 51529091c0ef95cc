/**
 * packages/core/src/arena/handle.ts — Generation-checked arena handles.
 *
 * A handle is an (index, generation) pair. Live slots always carry a
 * generation >= 1, so NONE_HANDLE (generation 0) never matches a slot.
 * The type parameter is phantom: it keeps handles of different pools apart
 * at compile time and costs nothing at runtime.
 */

declare const payloadBrand: unique symbol;

export type Handle<T> = Readonly<{
  index: number;
  generation: number;
  readonly [payloadBrand]?: T;
}>;

const NONE: Handle<never> = Object.freeze({ index: -1, generation: 0 });

/** The null handle. Distinguishable from any handle a pool hands out. */
export const NONE_HANDLE: Handle<never> = NONE;

export function makeHandle<T>(index: number, generation: number): Handle<T> {
  return Object.freeze({ index, generation });
}

export function isNoneHandle<T>(h: Handle<T>): boolean {
  return h.generation === 0;
}

export function isSomeHandle<T>(h: Handle<T>): boolean {
  return h.generation !== 0;
}

export function handleEquals<T>(a: Handle<T>, b: Handle<T>): boolean {
  return a.index === b.index && a.generation === b.generation;
}

/** Render a handle for diagnostics: `#3:2` or `none`. */
export function formatHandle<T>(h: Handle<T>): string {
  return isNoneHandle(h) ? "none" : `#${h.index}:${h.generation}`;
}
