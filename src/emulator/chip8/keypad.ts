/**
 * CHIP-8 hexadecimal keypad (keys $0-$F).
 *
 * The host mutates key state; the system only reads it. Besides the current
 * state, each not-pressed → pressed transition is latched so that FX0A can
 * wait for a fresh press rather than a key that is merely held down. Latched
 * edges survive key release until consumed or cleared, so a press and
 * release that both land between two steps is still seen.
 */

export const KEY_COUNT = 16;

export class Chip8Keypad {
  private readonly down = new Array<boolean>(KEY_COUNT).fill(false);
  private readonly edges = new Array<boolean>(KEY_COUNT).fill(false);

  private static check(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= KEY_COUNT) {
      throw new RangeError(`Key index must be 0x0-0xF (got ${index})`);
    }
  }

  setKeyState(index: number, pressed: boolean): void {
    Chip8Keypad.check(index);
    if (pressed && !this.down[index]) {
      this.edges[index] = true;
    }
    this.down[index] = pressed;
  }

  isKeyDown(index: number): boolean {
    Chip8Keypad.check(index);
    return this.down[index];
  }

  /**
   * Consume the latched press edges. Returns the lowest key that was pressed
   * since the last call (or since clearPressEdges), or null.
   */
  takePressEdge(): number | null {
    const key = this.edges.indexOf(true);
    if (key === -1) return null;
    this.clearPressEdges();
    return key;
  }

  clearPressEdges(): void {
    this.edges.fill(false);
  }

  /** Indices of keys currently held. */
  pressedKeys(): number[] {
    const keys: number[] = [];
    this.down.forEach((isDown, key) => {
      if (isDown) keys.push(key);
    });
    return keys;
  }

  reset(): void {
    this.down.fill(false);
    this.edges.fill(false);
  }
}
