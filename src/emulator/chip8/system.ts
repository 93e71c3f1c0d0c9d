/**
 * CHIP-8 System Integration
 *
 * Owns memory, registers, stack, timers, keypad and display, and runs the
 * fetch-decode-execute cycle over them.
 *
 * Host contract:
 *   - call step() at whatever instruction rate the program expects
 *     (commonly ~600 Hz)
 *   - call tickTimers() at exactly 60 Hz, independent of step()
 *   - feed key state in with setKeyState() and read the framebuffer out
 *
 * step() is atomic. Each handler validates everything it touches before it
 * mutates anything, and a fault restores PC to the faulting instruction,
 * so the host never sees half an instruction.
 *
 * FX0A (wait for key) never blocks. The first execution arms the wait and
 * discards earlier key presses; each later step() re-evaluates the same
 * instruction until a fresh press edge arrives.
 */

import { Chip8Memory, FONT_GLYPH_BYTES, FONT_START } from './memory';
import { Chip8Registers } from './registers';
import { Chip8Stack, DEFAULT_STACK_DEPTH } from './stack';
import { Chip8Timers } from './timers';
import { Chip8Keypad } from './keypad';
import { Chip8Display, DISPLAY_HEIGHT, DISPLAY_WIDTH, type DisplayChangeCallback } from './display';
import { decode, type Instruction } from './opcodes';
import { DecodeFault } from './errors';
import type { Chip8State, Chip8SystemOptions, RandomByteSource, StepOutcome } from './types';

const INSTRUCTION_BYTES = 2;

const defaultRandom: RandomByteSource = () => Math.floor(Math.random() * 256);

export class Chip8System {
  private readonly memory = new Chip8Memory();
  private readonly registers = new Chip8Registers();
  private readonly stack: Chip8Stack;
  private readonly timers = new Chip8Timers();
  private readonly keypad = new Chip8Keypad();
  private readonly display = new Chip8Display();
  private readonly random: RandomByteSource;

  /** Set while an FX0A is pending. */
  private waitingForKey = false;

  /** Instructions completed since construction or reset. */
  private executed = 0;

  constructor(options: Chip8SystemOptions = {}) {
    this.stack = new Chip8Stack(options.stackDepth ?? DEFAULT_STACK_DEPTH);
    this.random = options.random ?? defaultRandom;
  }

  /** Copy a ROM image into memory at $200. Throws LoadTooLarge. */
  load(rom: Uint8Array): void {
    this.memory.loadProgram(rom);
  }

  /** Return to power-on state: memory cleared (font reinstalled), PC=$200. */
  reset(): void {
    this.memory.reset();
    this.registers.reset();
    this.stack.reset();
    this.timers.reset();
    this.keypad.reset();
    this.display.clear();
    this.waitingForKey = false;
    this.executed = 0;
  }

  /**
   * Execute one instruction. Returns 'waiting' when FX0A is still waiting
   * for a key, 'executed' otherwise. Faults are thrown as Chip8Fault.
   */
  step(): StepOutcome {
    const address = this.registers.pc;
    try {
      const word = this.memory.fetchWord(address);
      const ins = decode(word);
      if (ins === null) {
        throw new DecodeFault(word, address);
      }
      this.registers.pc = address + INSTRUCTION_BYTES;
      const outcome = this.execute(ins, address);
      if (outcome === 'executed') this.executed++;
      return outcome;
    } catch (err) {
      this.registers.pc = address;
      throw err;
    }
  }

  /** Decrement delay and sound timers. Call at 60 Hz. */
  tickTimers(): void {
    this.timers.tick();
  }

  isSounding(): boolean {
    return this.timers.isSounding();
  }

  isWaitingForKey(): boolean {
    return this.waitingForKey;
  }

  setKeyState(key: number, pressed: boolean): void {
    this.keypad.setKeyState(key, pressed);
  }

  isKeyDown(key: number): boolean {
    return this.keypad.isKeyDown(key);
  }

  /** Register a callback for framebuffer changes (CLS, DRW, reset). */
  setDisplayChangeCallback(cb: DisplayChangeCallback | null): void {
    this.display.setOnChange(cb);
  }

  getPixel(x: number, y: number): boolean {
    return this.display.getPixel(x, y);
  }

  getFrameBuffer(): Uint8Array {
    return this.display.getFrameBuffer();
  }

  /** Framebuffer as DISPLAY_HEIGHT lines of text. */
  getScreenLines(): string[] {
    const lines: string[] = [];
    for (let row = 0; row < DISPLAY_HEIGHT; row++) {
      lines.push(this.display.getRowText(row));
    }
    return lines;
  }

  getPC(): number {
    return this.registers.pc;
  }

  getInstructionCount(): number {
    return this.executed;
  }

  /** Direct memory read for debugging and tests. */
  peekMemory(address: number): number {
    return this.memory.peek(address);
  }

  getState(): Chip8State {
    return {
      v: this.registers.snapshot(),
      i: this.registers.i,
      pc: this.registers.pc,
      stack: this.stack.snapshot(),
      delayTimer: this.timers.getDelay(),
      soundTimer: this.timers.getSound(),
      waitingForKey: this.waitingForKey,
    };
  }

  private skipIf(condition: boolean): void {
    if (condition) {
      this.registers.pc += INSTRUCTION_BYTES;
    }
  }

  private execute(ins: Instruction, address: number): StepOutcome {
    const r = this.registers;

    switch (ins.kind) {
      case 'clearDisplay':
        this.display.clear();
        break;

      case 'return':
        r.pc = this.stack.pop();
        break;

      case 'sys':
        // RCA 1802 machine-code call; modern interpreters ignore it.
        break;

      case 'jump':
        r.pc = ins.nnn;
        break;

      case 'call':
        this.stack.push(r.pc);
        r.pc = ins.nnn;
        break;

      case 'skipIfEqualImm':
        this.skipIf(r.getV(ins.x) === ins.nn);
        break;

      case 'skipIfNotEqualImm':
        this.skipIf(r.getV(ins.x) !== ins.nn);
        break;

      case 'skipIfEqualReg':
        this.skipIf(r.getV(ins.x) === r.getV(ins.y));
        break;

      case 'skipIfNotEqualReg':
        this.skipIf(r.getV(ins.x) !== r.getV(ins.y));
        break;

      case 'loadImm':
        r.setV(ins.x, ins.nn);
        break;

      case 'addImm':
        r.setV(ins.x, r.getV(ins.x) + ins.nn);
        break;

      case 'loadReg':
        r.setV(ins.x, r.getV(ins.y));
        break;

      case 'or':
        r.setV(ins.x, r.getV(ins.x) | r.getV(ins.y));
        break;

      case 'and':
        r.setV(ins.x, r.getV(ins.x) & r.getV(ins.y));
        break;

      case 'xor':
        r.setV(ins.x, r.getV(ins.x) ^ r.getV(ins.y));
        break;

      // Arithmetic: operands are read first, the result is written, then VF.
      case 'addReg': {
        const sum = r.getV(ins.x) + r.getV(ins.y);
        r.setV(ins.x, sum);
        r.setFlag(sum > 0xff);
        break;
      }

      case 'sub': {
        const vx = r.getV(ins.x);
        const vy = r.getV(ins.y);
        r.setV(ins.x, vx - vy);
        r.setFlag(vx >= vy);
        break;
      }

      case 'subReversed': {
        const vx = r.getV(ins.x);
        const vy = r.getV(ins.y);
        r.setV(ins.x, vy - vx);
        r.setFlag(vy >= vx);
        break;
      }

      // Shifts operate on Vx in place; Vy is ignored.
      case 'shiftRight': {
        const vx = r.getV(ins.x);
        r.setV(ins.x, vx >> 1);
        r.setFlag((vx & 0x01) !== 0);
        break;
      }

      case 'shiftLeft': {
        const vx = r.getV(ins.x);
        r.setV(ins.x, vx << 1);
        r.setFlag((vx & 0x80) !== 0);
        break;
      }

      case 'loadIndex':
        r.i = ins.nnn;
        break;

      case 'jumpOffset':
        r.pc = ins.nnn + r.getV(0);
        break;

      case 'random':
        r.setV(ins.x, this.random() & ins.nn);
        break;

      case 'draw': {
        const sprite = this.memory.readBlock(r.i, ins.n);
        const collision = this.display.drawSprite(
          r.getV(ins.x) % DISPLAY_WIDTH,
          r.getV(ins.y) % DISPLAY_HEIGHT,
          sprite,
        );
        r.setFlag(collision);
        break;
      }

      case 'skipIfKeyDown':
        this.skipIf(this.keypad.isKeyDown(r.getV(ins.x) & 0xf));
        break;

      case 'skipIfKeyUp':
        this.skipIf(!this.keypad.isKeyDown(r.getV(ins.x) & 0xf));
        break;

      case 'loadDelay':
        r.setV(ins.x, this.timers.getDelay());
        break;

      case 'waitForKey': {
        if (!this.waitingForKey) {
          this.waitingForKey = true;
          this.keypad.clearPressEdges();
        }
        const key = this.keypad.takePressEdge();
        if (key === null) {
          r.pc = address;
          return 'waiting';
        }
        this.waitingForKey = false;
        r.setV(ins.x, key);
        break;
      }

      case 'setDelay':
        this.timers.setDelay(r.getV(ins.x));
        break;

      case 'setSound':
        this.timers.setSound(r.getV(ins.x));
        break;

      case 'addIndex':
        r.i = r.i + r.getV(ins.x);
        break;

      case 'loadFontAddress':
        r.i = FONT_START + (r.getV(ins.x) & 0xf) * FONT_GLYPH_BYTES;
        break;

      case 'storeBcd': {
        const value = r.getV(ins.x);
        this.memory.writeBlock(r.i, [
          Math.floor(value / 100),
          Math.floor(value / 10) % 10,
          value % 10,
        ]);
        break;
      }

      // Block transfers leave I unchanged (CHIP-48 / SUPER-CHIP convention).
      case 'storeRegisters': {
        const values: number[] = [];
        for (let reg = 0; reg <= ins.x; reg++) values.push(r.getV(reg));
        this.memory.writeBlock(r.i, values);
        break;
      }

      case 'loadRegisters': {
        const block = this.memory.readBlock(r.i, ins.x + 1);
        block.forEach((value, reg) => r.setV(reg, value));
        break;
      }

      default: {
        const unreachable: never = ins;
        return unreachable;
      }
    }

    return 'executed';
  }
}
