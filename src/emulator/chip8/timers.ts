/**
 * Delay and sound timers.
 *
 * Both count down once per tick() and stop at zero. The host calls tick()
 * at 60 Hz regardless of how fast instructions execute.
 */

export const TIMER_HZ = 60;

export class Chip8Timers {
  private delay = 0;
  private sound = 0;

  getDelay(): number {
    return this.delay;
  }

  setDelay(value: number): void {
    this.delay = value & 0xff;
  }

  getSound(): number {
    return this.sound;
  }

  setSound(value: number): void {
    this.sound = value & 0xff;
  }

  tick(): void {
    if (this.delay > 0) this.delay--;
    if (this.sound > 0) this.sound--;
  }

  /** The only signal handed to an audio collaborator. */
  isSounding(): boolean {
    return this.sound > 0;
  }

  reset(): void {
    this.delay = 0;
    this.sound = 0;
  }
}
