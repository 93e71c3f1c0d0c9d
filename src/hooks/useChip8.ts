"use client";

import { useRef, useEffect, useCallback, useState } from "react";
import {
  Chip8System,
  Chip8Fault,
  DISPLAY_HEIGHT,
  DISPLAY_WIDTH,
  PIXEL_OFF,
} from "@/emulator/chip8";
import { FrameClock, DEFAULT_INSTRUCTIONS_PER_SECOND } from "@/lib/frame-clock";
import { mapKeyToChip8 } from "@/lib/chip8-keymap";

export type Chip8RunStatus = "idle" | "running" | "waiting" | "halted";

export interface Chip8ViewState {
  lines: string[];
  sounding: boolean;
  status: Chip8RunStatus;
  fault: string | null;
  romName: string | null;
}

const BLANK_LINES: string[] = Array(DISPLAY_HEIGHT).fill(PIXEL_OFF.repeat(DISPLAY_WIDTH));

/**
 * React hook that manages a CHIP-8 emulator instance.
 *
 * - Creates the machine on mount; it sits idle until a ROM is loaded
 * - Each animation frame, a FrameClock turns elapsed time into instruction
 *   steps and 60 Hz timer ticks
 * - Stepping stops for the rest of a frame once FX0A is waiting on a key
 * - A Chip8Fault halts the machine and is reported in state; anything else
 *   is a bug and is rethrown
 */
export function useChip8(instructionsPerSecond: number = DEFAULT_INSTRUCTIONS_PER_SECOND) {
  const emulatorRef = useRef<Chip8System | null>(null);
  const clockRef = useRef<FrameClock | null>(null);
  const rafRef = useRef<number>(0);
  const romRef = useRef<Uint8Array | null>(null);
  const haltedRef = useRef(false);
  const faultRef = useRef<string | null>(null);
  const [state, setState] = useState<Chip8ViewState>({
    lines: BLANK_LINES,
    sounding: false,
    status: "idle",
    fault: null,
    romName: null,
  });

  useEffect(() => {
    const emu = new Chip8System();
    const clock = new FrameClock({ instructionsPerSecond });
    emulatorRef.current = emu;
    clockRef.current = clock;
    // A remount (new instruction rate) starts the current ROM from scratch
    if (romRef.current) emu.load(romRef.current);
    haltedRef.current = false;

    let dirty = true;
    emu.setDisplayChangeCallback(() => {
      dirty = true;
    });

    let running = true;
    let lastTime: number | null = null;

    const tick = (now: number) => {
      if (!running) return;
      const elapsed = lastTime === null ? 0 : now - lastTime;
      lastTime = now;

      if (romRef.current !== null && !haltedRef.current) {
        const { steps, timerTicks } = clock.advance(elapsed);
        try {
          for (let n = 0; n < steps; n++) {
            if (emu.step() === "waiting") break;
          }
        } catch (err) {
          if (!(err instanceof Chip8Fault)) throw err;
          haltedRef.current = true;
          faultRef.current = err.message;
        }
        for (let n = 0; n < timerTicks; n++) emu.tickTimers();
      }

      const lines = dirty ? emu.getScreenLines() : null;
      dirty = false;
      const sounding = emu.isSounding();
      const fault = faultRef.current;
      const status: Chip8RunStatus =
        romRef.current === null ? "idle"
          : haltedRef.current ? "halted"
          : emu.isWaitingForKey() ? "waiting"
          : "running";

      setState((prev) => {
        if (lines === null && prev.sounding === sounding
          && prev.status === status && prev.fault === fault) {
          return prev;
        }
        return { ...prev, lines: lines ?? prev.lines, sounding, status, fault };
      });

      rafRef.current = requestAnimationFrame(tick);
    };
    rafRef.current = requestAnimationFrame(tick);

    return () => {
      running = false;
      cancelAnimationFrame(rafRef.current);
      emu.setDisplayChangeCallback(null);
      emulatorRef.current = null;
      clockRef.current = null;
    };
  }, [instructionsPerSecond]);

  /** Power-cycle the machine and load a ROM image at $200. */
  const loadRom = useCallback((rom: Uint8Array, name: string) => {
    const emu = emulatorRef.current;
    if (!emu) return;

    emu.reset();
    clockRef.current?.reset();
    haltedRef.current = false;
    try {
      emu.load(rom);
    } catch (err) {
      if (!(err instanceof Chip8Fault)) throw err;
      romRef.current = null;
      faultRef.current = err.message;
      setState((prev) => ({ ...prev, status: "idle", fault: err.message, romName: null }));
      return;
    }
    romRef.current = rom;
    faultRef.current = null;
    setState((prev) => ({ ...prev, status: "running", fault: null, romName: name }));
  }, []);

  /** Reset the machine and reload the current ROM, if any. */
  const reset = useCallback(() => {
    const emu = emulatorRef.current;
    if (!emu) return;

    emu.reset();
    clockRef.current?.reset();
    const rom = romRef.current;
    if (rom) emu.load(rom);
    haltedRef.current = false;
    faultRef.current = null;
    setState((prev) => ({ ...prev, status: rom ? "running" : "idle", fault: null }));
  }, []);

  /** Handle keydown — press the mapped keypad key. */
  const onKeyDown = useCallback((e: KeyboardEvent) => {
    const emu = emulatorRef.current;
    if (!emu) return;
    if (e.ctrlKey || e.metaKey || e.altKey) return;

    const key = mapKeyToChip8(e.key);
    if (key === null) return;
    e.preventDefault();
    emu.setKeyState(key, true);
  }, []);

  /** Handle keyup — release the mapped keypad key. */
  const onKeyUp = useCallback((e: KeyboardEvent) => {
    const emu = emulatorRef.current;
    if (!emu) return;

    const key = mapKeyToChip8(e.key);
    if (key === null) return;
    emu.setKeyState(key, false);
  }, []);

  return { state, loadRom, reset, onKeyDown, onKeyUp, emulator: emulatorRef };
}
