import { EventEmitter } from "node:events";
import type { SelectionChange } from "@runlog/contracts";

export const NO_SELECTION = -1;

export type SelectionListener<T> = (change: SelectionChange<T>) => void;

/**
 * Single selected index over a fixed-length sequence.
 *
 * The index is always within `[0, length - 1]`, or `NO_SELECTION` when the
 * sequence is empty. Movement past either end is a silent no-op. Every move
 * that lands on a new index emits `change` with the index and the item.
 */
export class SelectionController<T> extends EventEmitter {
  private items: readonly T[] = [];
  private selectedIndex = NO_SELECTION;

  constructor(items: readonly T[] = []) {
    super();
    this.initialize(items);
  }

  initialize(items: readonly T[]): void {
    this.items = items;
    this.selectedIndex = items.length > 0 ? 0 : NO_SELECTION;
  }

  get length(): number {
    return this.items.length;
  }

  current(): number {
    return this.selectedIndex;
  }

  currentItem(): T | null {
    if (this.selectedIndex === NO_SELECTION) return null;
    return this.items[this.selectedIndex] ?? null;
  }

  selectNext(): SelectionChange<T> | null {
    if (this.selectedIndex >= this.items.length - 1) return null;
    return this.moveTo(this.selectedIndex + 1);
  }

  selectPrevious(): SelectionChange<T> | null {
    if (this.selectedIndex <= 0) return null;
    return this.moveTo(this.selectedIndex - 1);
  }

  select(index: number): SelectionChange<T> | null {
    if (this.items.length === 0 || !Number.isFinite(index)) return null;
    const clamped = Math.min(this.items.length - 1, Math.max(0, Math.trunc(index)));
    if (clamped === this.selectedIndex) return null;
    return this.moveTo(clamped);
  }

  selectFirst(): SelectionChange<T> | null {
    return this.select(0);
  }

  selectLast(): SelectionChange<T> | null {
    return this.select(this.items.length - 1);
  }

  onChange(listener: SelectionListener<T>): () => void {
    this.on("change", listener);
    return () => {
      this.off("change", listener);
    };
  }

  private moveTo(index: number): SelectionChange<T> | null {
    const item = this.items[index];
    if (item === undefined) return null;
    this.selectedIndex = index;
    const change: SelectionChange<T> = { index, item };
    this.emit("change", change);
    return change;
  }
}
