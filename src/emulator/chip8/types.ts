/**
 * CHIP-8 system types
 */

/** Result of a successful step(). Faults are thrown, never returned. */
export type StepOutcome =
  | 'executed' // instruction completed, PC moved on
  | 'waiting'; // FX0A re-issued itself; PC still points at it

/** Byte source for CXNN. Must return an integer 0-255. */
export type RandomByteSource = () => number;

export interface Chip8SystemOptions {
  /** Maximum call nesting. Default 16. */
  stackDepth?: number;
  /** Random byte source for CXNN. Default is Math.random based. */
  random?: RandomByteSource;
}

/** Snapshot of all architectural state except memory and the framebuffer. */
export interface Chip8State {
  v: number[];
  i: number;
  pc: number;
  stack: number[];
  delayTimer: number;
  soundTimer: number;
  waitingForKey: boolean;
}
