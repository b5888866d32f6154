// packages/flagtable/src/extras.ts
//
// Append-only list of positional tokens. Capacity grows in fixed steps and
// never shrinks; tokens are stored by reference, in encounter order.

import { fail } from "./errors";

export const EXTRAS_INIT = 10;

/** Largest length a JS array can hold. */
export const MAX_EXTRAS_CAPACITY = 2 ** 32 - 1;

export class ExtrasList {
  private readonly items: string[];
  private size = 0;
  private capac: number;

  constructor(private readonly maxCapacity: number = MAX_EXTRAS_CAPACITY) {
    this.capac = Math.min(EXTRAS_INIT, maxCapacity);
    this.items = new Array<string>(this.capac);
  }

  get count(): number {
    return this.size;
  }

  get capacity(): number {
    return this.capac;
  }

  push(token: string): void {
    if (this.size === this.capac) this.grow();
    this.items[this.size++] = token;
  }

  toArray(): string[] {
    return this.items.slice(0, this.size);
  }

  private grow(): void {
    const next = this.capac + EXTRAS_INIT;
    if (next > this.maxCapacity) {
      throw fail("OutOfMemory", "could not grow extras list past %d entries", this.capac);
    }
    this.items.length = next;
    this.capac = next;
  }
}
