"use client";

import { DISPLAY_HEIGHT, DISPLAY_WIDTH } from "@/emulator/chip8";

interface Chip8ScreenProps {
  lines: string[];
  /** Integer pixel scale; each CHIP-8 pixel is drawn as one character cell. */
  scale?: number;
}

/** 64×32 framebuffer rendered as text, one character per pixel. */
export function Chip8Screen({ lines, scale = 10 }: Chip8ScreenProps) {
  return (
    <div className="chip8-frame" title={`${DISPLAY_WIDTH}×${DISPLAY_HEIGHT}`}>
      <pre
        data-testid="chip8-screen"
        className="chip8-screen"
        style={{ fontSize: `${scale}px`, lineHeight: `${scale}px` }}
      >
        {lines.map((line, i) => (
          <div key={i}>{line}</div>
        ))}
      </pre>
    </div>
  );
}
