/**
 * CHIP-8 Memory — 4K flat address space
 *
 *   $000-$04F  Hex font (16 glyphs × 5 bytes)
 *   $050-$1FF  Remainder of the interpreter area (zero)
 *   $200-$FFF  Program area (ROM image loaded here, writable by FX33/FX55)
 *
 * The interpreter area is read-only to executing instructions. Every access
 * is bounds-checked; nothing wraps.
 */

import HEX_FONT from './roms/hex-font.json';
import { LoadTooLarge, MemoryFault, type MemoryAccess } from './errors';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const PROGRAM_CAPACITY = MEMORY_SIZE - PROGRAM_START;

export const FONT_START = 0x000;
export const FONT_GLYPH_BYTES = 5;

export class Chip8Memory {
  private bytes = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.reset();
  }

  static inRange(address: number): boolean {
    return Number.isInteger(address) && address >= 0 && address < MEMORY_SIZE;
  }

  /** Clear all memory and reinstall the font. */
  reset(): void {
    this.bytes.fill(0);
    HEX_FONT.forEach((glyph, digit) => {
      this.bytes.set(glyph, FONT_START + digit * FONT_GLYPH_BYTES);
    });
  }

  /**
   * Copy a ROM image into the program area. Bytes past the image are
   * cleared so a shorter ROM never runs into the tail of a previous one.
   */
  loadProgram(data: Uint8Array): void {
    if (data.length > PROGRAM_CAPACITY) {
      throw new LoadTooLarge(data.length, PROGRAM_CAPACITY);
    }
    this.bytes.fill(0, PROGRAM_START);
    this.bytes.set(data, PROGRAM_START);
  }

  read(address: number): number {
    this.check(address, 'read');
    return this.bytes[address];
  }

  /** Big-endian instruction fetch. PC must be even and both bytes in range. */
  fetchWord(address: number): number {
    if (address % 2 !== 0) {
      throw new MemoryFault(address, 'fetch', 'misaligned program counter');
    }
    this.check(address, 'fetch');
    this.check(address + 1, 'fetch');
    return (this.bytes[address] << 8) | this.bytes[address + 1];
  }

  /** Read `length` consecutive bytes starting at `address`. */
  readBlock(address: number, length: number): Uint8Array {
    if (length > 0) {
      this.check(address, 'read');
      this.check(address + length - 1, 'read');
    }
    return this.bytes.slice(address, address + length);
  }

  write(address: number, value: number): void {
    this.checkWritable(address, 1);
    this.bytes[address] = value & 0xff;
  }

  /** Write a block; the whole range is validated before the first byte lands. */
  writeBlock(address: number, data: ArrayLike<number>): void {
    this.checkWritable(address, data.length);
    for (let i = 0; i < data.length; i++) {
      this.bytes[address + i] = data[i] & 0xff;
    }
  }

  /** Direct read for test inspection and debugging; no checks beyond masking. */
  peek(address: number): number {
    return this.bytes[address & (MEMORY_SIZE - 1)];
  }

  private check(address: number, access: MemoryAccess): void {
    if (!Chip8Memory.inRange(address)) {
      throw new MemoryFault(address, access, 'address out of range');
    }
  }

  private checkWritable(address: number, length: number): void {
    if (length === 0) return;
    this.check(address, 'write');
    this.check(address + length - 1, 'write');
    if (address < PROGRAM_START) {
      throw new MemoryFault(address, 'write', 'interpreter area is read-only');
    }
  }
}
