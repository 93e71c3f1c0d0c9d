"use client";

import { useState, useRef, useEffect } from "react";
import { RotateCcw, Upload, Volume2, VolumeX } from "lucide-react";
import { useChip8, type Chip8ViewState } from "@/hooks/useChip8";
import { keyLabelFor } from "@/lib/chip8-keymap";
import { Chip8Screen } from "@/components/Chip8Screen";

/** Hex keypad in COSMAC VIP order, row by row. */
const KEYPAD_LAYOUT = [0x1, 0x2, 0x3, 0xc, 0x4, 0x5, 0x6, 0xd, 0x7, 0x8, 0x9, 0xe, 0xa, 0x0, 0xb, 0xf];

function statusText({ status, fault, romName }: Chip8ViewState): string {
  switch (status) {
    case "idle":
      return fault ?? "No ROM loaded";
    case "running":
      return `Running ${romName ?? ""}`.trimEnd();
    case "waiting":
      return "Waiting for key";
    case "halted":
      return `Halted: ${fault ?? "unknown fault"}`;
  }
}

export function EmulatorPage() {
  const { state, loadRom, reset, onKeyDown, onKeyUp } = useChip8();
  const fileInputRef = useRef<HTMLInputElement>(null);
  const [readError, setReadError] = useState<string | null>(null);

  useEffect(() => {
    window.addEventListener("keydown", onKeyDown);
    window.addEventListener("keyup", onKeyUp);
    return () => {
      window.removeEventListener("keydown", onKeyDown);
      window.removeEventListener("keyup", onKeyUp);
    };
  }, [onKeyDown, onKeyUp]);

  function processFile(file: File) {
    setReadError(null);
    const reader = new FileReader();
    reader.onload = () => {
      const result = reader.result;
      if (result === null || typeof result === "string") {
        setReadError("Failed to read file");
        return;
      }
      loadRom(new Uint8Array(result), file.name);
    };
    reader.onerror = () => setReadError("Failed to read file");
    reader.readAsArrayBuffer(file);
  }

  function handleFileSelect(e: React.ChangeEvent<HTMLInputElement>) {
    const file = e.target.files?.[0];
    if (file) processFile(file);
    // Allow re-selecting the same file
    e.target.value = "";
  }

  return (
    <div className="page">
      <main className="page-main">
        <div className="toolbar">
          <h1 className="title">CHIP-8 Emulator</h1>
          <span className="badge">64&times;32 &middot; 600 IPS</span>
        </div>

        <div className="toolbar">
          <button
            type="button"
            className="button"
            onClick={() => fileInputRef.current?.click()}
            title="Load a ROM image"
          >
            <Upload size={14} aria-hidden /> LOAD
          </button>
          <input
            ref={fileInputRef}
            data-testid="rom-input"
            type="file"
            accept=".ch8,.c8,.rom,application/octet-stream"
            className="hidden"
            onChange={handleFileSelect}
          />
          <button type="button" className="button" onClick={reset} title="Reset and reload ROM">
            <RotateCcw size={14} aria-hidden /> RESET
          </button>
          <span
            className={state.sounding ? "sound sound-on" : "sound"}
            role="img"
            aria-label={state.sounding ? "Sound on" : "Sound off"}
          >
            {state.sounding ? <Volume2 size={16} /> : <VolumeX size={16} />}
          </span>
        </div>

        <Chip8Screen lines={state.lines} />

        <div className="status" data-testid="status" data-status={state.status}>
          {readError ?? statusText(state)}
        </div>

        <div className="keypad" aria-label="Keypad mapping">
          {KEYPAD_LAYOUT.map((key) => (
            <div key={key} className="keypad-key">
              <span>{key.toString(16).toUpperCase()}</span>
              <kbd>{keyLabelFor(key)}</kbd>
            </div>
          ))}
        </div>
      </main>
    </div>
  );
}
