/**
 * packages/core/src/arena/pool.ts — Generational object pool backing the widget tree.
 *
 * Slot states:
 *   - live:  payload present, handle with the slot's generation resolves
 *   - taken: payload moved out by takeAt(); generation unchanged, not reusable
 *   - free:  generation bumped by free(), slot sits on the free list
 *
 * takeAt()/putBack() let the event router hand one payload exclusive access
 * to the rest of the pool: while taken, looking the payload up by its own
 * handle fails instead of producing a second live reference.
 */

import { UiCoreError } from "../errors.js";
import { type Handle, formatHandle, makeHandle } from "./handle.js";

type Slot<T> = {
  generation: number;
  payload: T | null;
  free: boolean;
};

function staleHandle(op: string, detail: string): never {
  throw new UiCoreError("UI_STALE_HANDLE", `${op}: ${detail}`);
}

export class Pool<T> {
  private readonly slots: Slot<T>[] = [];
  private readonly freeStack: number[] = [];
  private alive = 0;

  /** Number of slots ever allocated (live, taken or free). */
  get capacity(): number {
    return this.slots.length;
  }

  /** Number of live payloads (taken slots excluded). */
  get aliveCount(): number {
    return this.alive;
  }

  spawn(payload: T): Handle<T> {
    const reused = this.freeStack.pop();
    if (reused !== undefined) {
      const slot = this.slots[reused];
      if (slot !== undefined) {
        slot.payload = payload;
        slot.free = false;
        this.alive++;
        return makeHandle(reused, slot.generation);
      }
    }
    const index = this.slots.length;
    this.slots.push({ generation: 1, payload, free: false });
    this.alive++;
    return makeHandle(index, 1);
  }

  /**
   * Free the slot behind `handle` and return its payload. The slot's
   * generation is bumped so the handle (and every copy of it) goes stale.
   */
  free(handle: Handle<T>): T {
    const slot = this.resolveSlot("free", handle);
    const payload = slot.payload;
    if (payload === null) {
      return staleHandle("free", `slot ${formatHandle(handle)} is vacated`);
    }
    slot.payload = null;
    slot.free = true;
    slot.generation++;
    this.alive--;
    this.freeStack.push(handle.index);
    return payload;
  }

  borrow(handle: Handle<T>): T {
    const slot = this.resolveSlot("borrow", handle);
    if (slot.payload === null) {
      return staleHandle("borrow", `slot ${formatHandle(handle)} is vacated`);
    }
    return slot.payload;
  }

  tryBorrow(handle: Handle<T>): T | null {
    return this.isValid(handle) ? this.slots[handle.index]?.payload ?? null : null;
  }

  isValid(handle: Handle<T>): boolean {
    const slot = this.slots[handle.index];
    if (slot === undefined || handle.index < 0) return false;
    return slot.generation === handle.generation && slot.payload !== null;
  }

  /** Handle for the current occupant generation of `index`. */
  handleFromIndex(index: number): Handle<T> {
    const slot = this.slots[index];
    if (slot === undefined || slot.free) {
      return staleHandle("handleFromIndex", `index ${index} is not allocated`);
    }
    return makeHandle(index, slot.generation);
  }

  /**
   * Move the payload out of a live slot without touching its generation.
   * Returns null for free or already-taken slots.
   */
  takeAt(index: number): T | null {
    const slot = this.slots[index];
    if (slot === undefined || slot.payload === null) return null;
    const payload = slot.payload;
    slot.payload = null;
    this.alive--;
    return payload;
  }

  /** Return a payload to the slot it was taken from. */
  putBack(index: number, payload: T): void {
    const slot = this.slots[index];
    if (slot === undefined || slot.free || slot.payload !== null) {
      throw new UiCoreError(
        "UI_SLOT_OCCUPIED",
        `putBack: slot ${index} was not taken out (${slot === undefined ? "out of range" : slot.free ? "freed" : "occupied"})`,
      );
    }
    slot.payload = payload;
    this.alive++;
  }

  /** Live `[handle, payload]` pairs in index order. */
  *entries(): IterableIterator<[Handle<T>, T]> {
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i];
      if (slot === undefined || slot.payload === null) continue;
      yield [makeHandle(i, slot.generation), slot.payload];
    }
  }

  *values(): IterableIterator<T> {
    for (const slot of this.slots) {
      if (slot.payload !== null) yield slot.payload;
    }
  }

  private resolveSlot(op: string, handle: Handle<T>): Slot<T> {
    if (handle.generation === 0) {
      return staleHandle(op, "none handle");
    }
    const slot = handle.index >= 0 ? this.slots[handle.index] : undefined;
    if (slot === undefined) {
      return staleHandle(op, `index ${handle.index} out of range (capacity ${this.slots.length})`);
    }
    if (slot.generation !== handle.generation) {
      return staleHandle(
        op,
        `generation mismatch for ${formatHandle(handle)} (slot is at ${slot.generation})`,
      );
    }
    return slot;
  }
}
