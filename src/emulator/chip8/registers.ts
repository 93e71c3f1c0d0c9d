/**
 * CHIP-8 register file: V0-VF (8-bit), I (16-bit), PC (16-bit).
 *
 * VF doubles as the carry/borrow/collision flag. Handlers that set a flag
 * call setFlag() after writing their result so the flag always wins when
 * the destination register is VF itself.
 */

import { PROGRAM_START } from './memory';

export const REGISTER_COUNT = 16;
export const VF = 0xf;

export class Chip8Registers {
  private readonly v = new Uint8Array(REGISTER_COUNT);
  private _i = 0;
  private _pc = PROGRAM_START;

  get i(): number { return this._i; }
  set i(value: number) { this._i = value & 0xffff; }

  get pc(): number { return this._pc; }
  set pc(value: number) { this._pc = value & 0xffff; }

  getV(index: number): number {
    return this.v[index & 0xf];
  }

  setV(index: number, value: number): void {
    this.v[index & 0xf] = value & 0xff;
  }

  setFlag(set: boolean): void {
    this.v[VF] = set ? 1 : 0;
  }

  /** Copy of V0-VF. */
  snapshot(): number[] {
    return Array.from(this.v);
  }

  reset(): void {
    this.v.fill(0);
    this._i = 0;
    this._pc = PROGRAM_START;
  }
}
