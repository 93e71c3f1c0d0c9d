/**
 * CHIP-8 Display — 64 × 32 monochrome framebuffer
 *
 * Sprites are 8 pixels wide and 1-15 rows tall, one byte per row with the
 * most significant bit leftmost. Drawing XORs the sprite onto the grid:
 *   - a set sprite bit flips the pixel underneath
 *   - if any flip turns a lit pixel off, the draw reports a collision
 *   - coordinates wrap, so a sprite at x=60 continues at x=0 and a sprite
 *     at y=30 continues at y=0
 *
 * The framebuffer is row-major, one byte per pixel (0 or 1). The host reads
 * it through getFrameBuffer()/getRowText() and never writes it.
 */

export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;
export const SPRITE_WIDTH = 8;
export const MAX_SPRITE_ROWS = 15;

export const PIXEL_ON = '█';
export const PIXEL_OFF = ' ';

/** Callback invoked whenever the framebuffer changes. */
export type DisplayChangeCallback = () => void;

export class Chip8Display {
  private pixels = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);
  private onChange: DisplayChangeCallback | null = null;

  setOnChange(cb: DisplayChangeCallback | null): void {
    this.onChange = cb;
  }

  /** XOR a sprite onto the grid at (x, y). Returns true on collision. */
  drawSprite(x: number, y: number, sprite: ArrayLike<number>): boolean {
    if (sprite.length > MAX_SPRITE_ROWS) {
      throw new RangeError(`Sprite has ${sprite.length} rows; at most ${MAX_SPRITE_ROWS} allowed`);
    }

    let collision = false;
    for (let row = 0; row < sprite.length; row++) {
      const py = (y + row) % DISPLAY_HEIGHT;
      const bits = sprite[row];
      for (let col = 0; col < SPRITE_WIDTH; col++) {
        if ((bits & (0x80 >> col)) === 0) continue;
        const px = (x + col) % DISPLAY_WIDTH;
        const offset = py * DISPLAY_WIDTH + px;
        if (this.pixels[offset]) collision = true;
        this.pixels[offset] ^= 1;
      }
    }

    this.onChange?.();
    return collision;
  }

  clear(): void {
    this.pixels.fill(0);
    this.onChange?.();
  }

  getPixel(x: number, y: number): boolean {
    if (x < 0 || x >= DISPLAY_WIDTH || y < 0 || y >= DISPLAY_HEIGHT) return false;
    return this.pixels[y * DISPLAY_WIDTH + x] === 1;
  }

  /** Copy of the framebuffer, row-major, one byte (0/1) per pixel. */
  getFrameBuffer(): Uint8Array {
    return this.pixels.slice();
  }

  /** One row rendered as text: PIXEL_ON for lit pixels, PIXEL_OFF otherwise. */
  getRowText(row: number): string {
    if (row < 0 || row >= DISPLAY_HEIGHT) return PIXEL_OFF.repeat(DISPLAY_WIDTH);
    let line = '';
    const offset = row * DISPLAY_WIDTH;
    for (let col = 0; col < DISPLAY_WIDTH; col++) {
      line += this.pixels[offset + col] ? PIXEL_ON : PIXEL_OFF;
    }
    return line;
  }

  /** Number of lit pixels (for tests and diagnostics). */
  litCount(): number {
    let count = 0;
    for (const p of this.pixels) count += p;
    return count;
  }

  /** Clear without notifying; used when the whole system resets. */
  reset(): void {
    this.pixels.fill(0);
  }
}
