import { TIMER_HZ } from "@/emulator/chip8/timers";

/** Instruction rate most CHIP-8 programs were written against. */
export const DEFAULT_INSTRUCTIONS_PER_SECOND = 600;

/** Longest stretch of wall time one advance() will account for. */
export const DEFAULT_MAX_ELAPSED_MS = 250;

export interface FrameClockOptions {
  instructionsPerSecond?: number;
  maxElapsedMs?: number;
}

export interface FrameBudget {
  steps: number;
  timerTicks: number;
}

/**
 * Converts wall-clock time into instruction steps and 60 Hz timer ticks.
 *
 * Fractional work carries over between calls, so a 60 fps loop at 600 IPS
 * gets exactly 10 steps per frame on average no matter how the frames jitter.
 */
export class FrameClock {
  readonly instructionsPerSecond: number;
  readonly maxElapsedMs: number;

  private stepCarry = 0;
  private tickCarry = 0;

  constructor(options: FrameClockOptions = {}) {
    this.instructionsPerSecond = options.instructionsPerSecond ?? DEFAULT_INSTRUCTIONS_PER_SECOND;
    this.maxElapsedMs = options.maxElapsedMs ?? DEFAULT_MAX_ELAPSED_MS;
    if (!(this.instructionsPerSecond > 0)) {
      throw new RangeError(`instructionsPerSecond must be positive, got ${this.instructionsPerSecond}`);
    }
    if (!(this.maxElapsedMs > 0)) {
      throw new RangeError(`maxElapsedMs must be positive, got ${this.maxElapsedMs}`);
    }
  }

  /** Work due for `elapsedMs` of wall time since the previous call. */
  advance(elapsedMs: number): FrameBudget {
    const ms = Math.min(Math.max(elapsedMs, 0), this.maxElapsedMs);

    this.stepCarry += (ms * this.instructionsPerSecond) / 1000;
    this.tickCarry += (ms * TIMER_HZ) / 1000;

    const steps = Math.floor(this.stepCarry);
    const timerTicks = Math.floor(this.tickCarry);
    this.stepCarry -= steps;
    this.tickCarry -= timerTicks;

    return { steps, timerTicks };
  }

  reset(): void {
    this.stepCarry = 0;
    this.tickCarry = 0;
  }
}
