import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { renderHook, act } from "@testing-library/react";
import { useChip8 } from "../useChip8";

const BLANK = " ".repeat(64);

let frames: FrameRequestCallback[] = [];
const cancelFrame = vi.fn();

beforeEach(() => {
  frames = [];
  cancelFrame.mockClear();
  vi.stubGlobal("requestAnimationFrame", (cb: FrameRequestCallback) => {
    frames.push(cb);
    return frames.length;
  });
  vi.stubGlobal("cancelAnimationFrame", cancelFrame);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

/** Run the pending animation frame at timestamp `now` (ms). */
function nextFrame(now: number) {
  const cb = frames.shift();
  if (!cb) throw new Error("no animation frame scheduled");
  act(() => cb(now));
}

function rom(...words: number[]): Uint8Array {
  return new Uint8Array(words.flatMap((w) => [w >> 8, w & 0xff]));
}

function keyEvent(type: "keydown" | "keyup", key: string, init: KeyboardEventInit = {}) {
  return new KeyboardEvent(type, { key, cancelable: true, ...init });
}

describe("useChip8", () => {
  it("starts idle with a blank screen", () => {
    const { result } = renderHook(() => useChip8());
    expect(result.current.state.status).toBe("idle");
    expect(result.current.state.romName).toBeNull();
    expect(result.current.state.fault).toBeNull();
    expect(result.current.state.lines).toHaveLength(32);
    expect(result.current.state.lines[0]).toBe(BLANK);
  });

  it("does not step while no ROM is loaded", () => {
    const { result } = renderHook(() => useChip8());
    nextFrame(0);
    nextFrame(100);
    expect(result.current.emulator.current?.getInstructionCount()).toBe(0);
    expect(result.current.state.status).toBe("idle");
  });

  it("runs a loaded ROM and publishes the framebuffer", () => {
    const { result } = renderHook(() => useChip8());
    // LD V0, 0 / LD F, V0 / DRW V0, V0, 5 / JP $206
    act(() => result.current.loadRom(rom(0x6000, 0xf029, 0xd005, 0x1206), "zero.ch8"));
    expect(result.current.state.status).toBe("running");
    expect(result.current.state.romName).toBe("zero.ch8");

    nextFrame(0);
    nextFrame(50);

    const { lines } = result.current.state;
    expect(lines[0]).toBe("████" + " ".repeat(60));
    expect(lines[1]).toBe("█  █" + " ".repeat(60));
    expect(lines[4]).toBe("████" + " ".repeat(60));
    expect(lines[5]).toBe(BLANK);
    expect(result.current.emulator.current?.getInstructionCount()).toBe(30);
  });

  it("halts on a fault and reports its message", () => {
    const { result } = renderHook(() => useChip8());
    act(() => result.current.loadRom(rom(0x5121), "bad.ch8"));
    nextFrame(0);
    nextFrame(50);

    expect(result.current.state.status).toBe("halted");
    expect(result.current.state.fault).toBe("Unknown opcode $5121 at $200");

    nextFrame(100);
    expect(result.current.emulator.current?.getPC()).toBe(0x200);
  });

  it("reset clears a fault and reloads the ROM", () => {
    const { result } = renderHook(() => useChip8());
    act(() => result.current.loadRom(rom(0x1200), "loop.ch8"));
    nextFrame(0);
    nextFrame(50);
    expect(result.current.emulator.current?.getInstructionCount()).toBe(30);

    act(() => result.current.reset());
    expect(result.current.state.status).toBe("running");
    expect(result.current.state.romName).toBe("loop.ch8");
    expect(result.current.emulator.current?.getInstructionCount()).toBe(0);
    expect(result.current.emulator.current?.peekMemory(0x200)).toBe(0x12);
  });

  it("reports a ROM that does not fit and stays idle", () => {
    const { result } = renderHook(() => useChip8());
    act(() => result.current.loadRom(new Uint8Array(3585), "huge.ch8"));
    expect(result.current.state.status).toBe("idle");
    expect(result.current.state.romName).toBeNull();
    expect(result.current.state.fault).toBe("ROM is 3585 bytes; program memory holds 3584");
  });

  it("waits on FX0A until a mapped key is pressed", () => {
    const { result } = renderHook(() => useChip8());
    // LD V0, K / JP $202
    act(() => result.current.loadRom(rom(0xf00a, 0x1202), "wait.ch8"));
    nextFrame(0);
    nextFrame(50);
    expect(result.current.state.status).toBe("waiting");
    expect(result.current.emulator.current?.getPC()).toBe(0x200);

    const down = keyEvent("keydown", "w");
    act(() => result.current.onKeyDown(down));
    expect(down.defaultPrevented).toBe(true);
    nextFrame(100);

    expect(result.current.state.status).toBe("running");
    expect(result.current.emulator.current?.getState().v[0]).toBe(0x5);
  });

  it("releases keys on keyup", () => {
    const { result } = renderHook(() => useChip8());
    act(() => result.current.onKeyDown(keyEvent("keydown", "v")));
    expect(result.current.emulator.current?.isKeyDown(0xf)).toBe(true);
    act(() => result.current.onKeyUp(keyEvent("keyup", "v")));
    expect(result.current.emulator.current?.isKeyDown(0xf)).toBe(false);
  });

  it("ignores keys pressed with a modifier", () => {
    const { result } = renderHook(() => useChip8());
    const down = keyEvent("keydown", "w", { ctrlKey: true });
    act(() => result.current.onKeyDown(down));
    expect(result.current.emulator.current?.isKeyDown(0x5)).toBe(false);
    expect(down.defaultPrevented).toBe(false);
  });

  it("ignores unmapped keys", () => {
    const { result } = renderHook(() => useChip8());
    const down = keyEvent("keydown", "Enter");
    act(() => result.current.onKeyDown(down));
    expect(down.defaultPrevented).toBe(false);
  });

  it("follows the sound timer", () => {
    const { result } = renderHook(() => useChip8());
    // LD V0, $0A / LD ST, V0 / JP $204
    act(() => result.current.loadRom(rom(0x600a, 0xf018, 0x1204), "beep.ch8"));
    nextFrame(0);
    nextFrame(50);
    expect(result.current.emulator.current?.getState().soundTimer).toBe(7);
    expect(result.current.state.sounding).toBe(true);

    nextFrame(300);
    expect(result.current.state.sounding).toBe(false);
  });

  it("cancels the animation frame on unmount", () => {
    const { unmount } = renderHook(() => useChip8());
    unmount();
    expect(cancelFrame).toHaveBeenCalledWith(1);
  });
});
