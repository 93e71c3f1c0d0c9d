/**
 * CHIP-8 return-address stack. Fixed depth, no wrap: overflow and underflow
 * are faults.
 */

import { StackOverflow, StackUnderflow } from './errors';

export const DEFAULT_STACK_DEPTH = 16;

export class Chip8Stack {
  private readonly frames: Uint16Array;
  private sp = 0;

  constructor(readonly depth: number = DEFAULT_STACK_DEPTH) {
    if (!Number.isInteger(depth) || depth < 1) {
      throw new RangeError(`Stack depth must be a positive integer (got ${depth})`);
    }
    this.frames = new Uint16Array(depth);
  }

  get size(): number {
    return this.sp;
  }

  push(address: number): void {
    if (this.sp >= this.depth) {
      throw new StackOverflow(this.depth);
    }
    this.frames[this.sp++] = address;
  }

  pop(): number {
    if (this.sp === 0) {
      throw new StackUnderflow();
    }
    return this.frames[--this.sp];
  }

  /** Return addresses, oldest first. */
  snapshot(): number[] {
    return Array.from(this.frames.subarray(0, this.sp));
  }

  reset(): void {
    this.frames.fill(0);
    this.sp = 0;
  }
}
