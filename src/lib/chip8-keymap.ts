/**
 * Keyboard → CHIP-8 hex keypad.
 *
 * The COSMAC VIP keypad is a 4×4 grid. It maps onto the left-hand block of
 * a QWERTY keyboard so the physical positions line up:
 *
 *   1 2 3 C        1 2 3 4
 *   4 5 6 D   ←    Q W E R
 *   7 8 9 E        A S D F
 *   A 0 B F        Z X C V
 */

const KEY_ROWS: ReadonlyArray<readonly [string, number][]> = [
  [["1", 0x1], ["2", 0x2], ["3", 0x3], ["4", 0xc]],
  [["q", 0x4], ["w", 0x5], ["e", 0x6], ["r", 0xd]],
  [["a", 0x7], ["s", 0x8], ["d", 0x9], ["f", 0xe]],
  [["z", 0xa], ["x", 0x0], ["c", 0xb], ["v", 0xf]],
];

const KEY_MAP = new Map<string, number>(KEY_ROWS.flat());

/** Keypad index (0-15) for a KeyboardEvent.key value, or null if unmapped. */
export function mapKeyToChip8(key: string): number | null {
  return KEY_MAP.get(key.toLowerCase()) ?? null;
}

/** Keyboard label for a keypad index, e.g. 0xC → "4". */
export function keyLabelFor(chip8Key: number): string | null {
  for (const [label, value] of KEY_MAP) {
    if (value === chip8Key) return label.toUpperCase();
  }
  return null;
}
