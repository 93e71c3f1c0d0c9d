/**
 * CHIP-8 instruction decoder
 *
 * A 16-bit word splits into nibbles:
 *
 *   15-12  11-8  7-4  3-0
 *   family  x     y    n
 *
 * with nn = low byte and nnn = low 12 bits. The family nibble selects the
 * instruction group; within groups 0, 5, 8, 9, E and F the low bits select
 * the instruction. Every one of the 35 COSMAC VIP opcodes decodes to its own
 * variant of the Instruction union below; anything else is undefined.
 */

type Reg = { x: number };
type RegPair = { x: number; y: number };
type RegImm = { x: number; nn: number };
type Addr = { nnn: number };

export type Instruction =
  | { kind: 'clearDisplay' }                       // 00E0
  | { kind: 'return' }                             // 00EE
  | ({ kind: 'sys' } & Addr)                       // 0NNN
  | ({ kind: 'jump' } & Addr)                      // 1NNN
  | ({ kind: 'call' } & Addr)                      // 2NNN
  | ({ kind: 'skipIfEqualImm' } & RegImm)          // 3XNN
  | ({ kind: 'skipIfNotEqualImm' } & RegImm)       // 4XNN
  | ({ kind: 'skipIfEqualReg' } & RegPair)         // 5XY0
  | ({ kind: 'loadImm' } & RegImm)                 // 6XNN
  | ({ kind: 'addImm' } & RegImm)                  // 7XNN
  | ({ kind: 'loadReg' } & RegPair)                // 8XY0
  | ({ kind: 'or' } & RegPair)                     // 8XY1
  | ({ kind: 'and' } & RegPair)                    // 8XY2
  | ({ kind: 'xor' } & RegPair)                    // 8XY3
  | ({ kind: 'addReg' } & RegPair)                 // 8XY4
  | ({ kind: 'sub' } & RegPair)                    // 8XY5
  | ({ kind: 'shiftRight' } & RegPair)             // 8XY6
  | ({ kind: 'subReversed' } & RegPair)            // 8XY7
  | ({ kind: 'shiftLeft' } & RegPair)              // 8XYE
  | ({ kind: 'skipIfNotEqualReg' } & RegPair)      // 9XY0
  | ({ kind: 'loadIndex' } & Addr)                 // ANNN
  | ({ kind: 'jumpOffset' } & Addr)                // BNNN
  | ({ kind: 'random' } & RegImm)                  // CXNN
  | ({ kind: 'draw' } & RegPair & { n: number })   // DXYN
  | ({ kind: 'skipIfKeyDown' } & Reg)              // EX9E
  | ({ kind: 'skipIfKeyUp' } & Reg)                // EXA1
  | ({ kind: 'loadDelay' } & Reg)                  // FX07
  | ({ kind: 'waitForKey' } & Reg)                 // FX0A
  | ({ kind: 'setDelay' } & Reg)                   // FX15
  | ({ kind: 'setSound' } & Reg)                   // FX18
  | ({ kind: 'addIndex' } & Reg)                   // FX1E
  | ({ kind: 'loadFontAddress' } & Reg)            // FX29
  | ({ kind: 'storeBcd' } & Reg)                   // FX33
  | ({ kind: 'storeRegisters' } & Reg)             // FX55
  | ({ kind: 'loadRegisters' } & Reg);             // FX65

export type InstructionKind = Instruction['kind'];

/**
 * Decode a 16-bit word. Returns null for an undefined opcode; the caller
 * turns that into a DecodeFault with the fetch address attached.
 */
export function decode(word: number): Instruction | null {
  const family = (word >> 12) & 0xf;
  const x = (word >> 8) & 0xf;
  const y = (word >> 4) & 0xf;
  const n = word & 0xf;
  const nn = word & 0xff;
  const nnn = word & 0xfff;

  switch (family) {
    case 0x0:
      if (word === 0x00e0) return { kind: 'clearDisplay' };
      if (word === 0x00ee) return { kind: 'return' };
      return { kind: 'sys', nnn };
    case 0x1: return { kind: 'jump', nnn };
    case 0x2: return { kind: 'call', nnn };
    case 0x3: return { kind: 'skipIfEqualImm', x, nn };
    case 0x4: return { kind: 'skipIfNotEqualImm', x, nn };
    case 0x5:
      return n === 0 ? { kind: 'skipIfEqualReg', x, y } : null;
    case 0x6: return { kind: 'loadImm', x, nn };
    case 0x7: return { kind: 'addImm', x, nn };
    case 0x8:
      switch (n) {
        case 0x0: return { kind: 'loadReg', x, y };
        case 0x1: return { kind: 'or', x, y };
        case 0x2: return { kind: 'and', x, y };
        case 0x3: return { kind: 'xor', x, y };
        case 0x4: return { kind: 'addReg', x, y };
        case 0x5: return { kind: 'sub', x, y };
        case 0x6: return { kind: 'shiftRight', x, y };
        case 0x7: return { kind: 'subReversed', x, y };
        case 0xe: return { kind: 'shiftLeft', x, y };
      }
      return null;
    case 0x9:
      return n === 0 ? { kind: 'skipIfNotEqualReg', x, y } : null;
    case 0xa: return { kind: 'loadIndex', nnn };
    case 0xb: return { kind: 'jumpOffset', nnn };
    case 0xc: return { kind: 'random', x, nn };
    case 0xd: return { kind: 'draw', x, y, n };
    case 0xe:
      if (nn === 0x9e) return { kind: 'skipIfKeyDown', x };
      if (nn === 0xa1) return { kind: 'skipIfKeyUp', x };
      return null;
    case 0xf:
      switch (nn) {
        case 0x07: return { kind: 'loadDelay', x };
        case 0x0a: return { kind: 'waitForKey', x };
        case 0x15: return { kind: 'setDelay', x };
        case 0x18: return { kind: 'setSound', x };
        case 0x1e: return { kind: 'addIndex', x };
        case 0x29: return { kind: 'loadFontAddress', x };
        case 0x33: return { kind: 'storeBcd', x };
        case 0x55: return { kind: 'storeRegisters', x };
        case 0x65: return { kind: 'loadRegisters', x };
      }
      return null;
  }
  return null;
}

function h(value: number, width: number): string {
  return value.toString(16).toUpperCase().padStart(width, '0');
}

/** Conventional assembler mnemonic, e.g. `LD V0, $0A`. */
export function formatInstruction(ins: Instruction): string {
  switch (ins.kind) {
    case 'clearDisplay': return 'CLS';
    case 'return': return 'RET';
    case 'sys': return `SYS $${h(ins.nnn, 3)}`;
    case 'jump': return `JP $${h(ins.nnn, 3)}`;
    case 'call': return `CALL $${h(ins.nnn, 3)}`;
    case 'skipIfEqualImm': return `SE V${h(ins.x, 1)}, $${h(ins.nn, 2)}`;
    case 'skipIfNotEqualImm': return `SNE V${h(ins.x, 1)}, $${h(ins.nn, 2)}`;
    case 'skipIfEqualReg': return `SE V${h(ins.x, 1)}, V${h(ins.y, 1)}`;
    case 'loadImm': return `LD V${h(ins.x, 1)}, $${h(ins.nn, 2)}`;
    case 'addImm': return `ADD V${h(ins.x, 1)}, $${h(ins.nn, 2)}`;
    case 'loadReg': return `LD V${h(ins.x, 1)}, V${h(ins.y, 1)}`;
    case 'or': return `OR V${h(ins.x, 1)}, V${h(ins.y, 1)}`;
    case 'and': return `AND V${h(ins.x, 1)}, V${h(ins.y, 1)}`;
    case 'xor': return `XOR V${h(ins.x, 1)}, V${h(ins.y, 1)}`;
    case 'addReg': return `ADD V${h(ins.x, 1)}, V${h(ins.y, 1)}`;
    case 'sub': return `SUB V${h(ins.x, 1)}, V${h(ins.y, 1)}`;
    case 'shiftRight': return `SHR V${h(ins.x, 1)}`;
    case 'subReversed': return `SUBN V${h(ins.x, 1)}, V${h(ins.y, 1)}`;
    case 'shiftLeft': return `SHL V${h(ins.x, 1)}`;
    case 'skipIfNotEqualReg': return `SNE V${h(ins.x, 1)}, V${h(ins.y, 1)}`;
    case 'loadIndex': return `LD I, $${h(ins.nnn, 3)}`;
    case 'jumpOffset': return `JP V0, $${h(ins.nnn, 3)}`;
    case 'random': return `RND V${h(ins.x, 1)}, $${h(ins.nn, 2)}`;
    case 'draw': return `DRW V${h(ins.x, 1)}, V${h(ins.y, 1)}, ${ins.n}`;
    case 'skipIfKeyDown': return `SKP V${h(ins.x, 1)}`;
    case 'skipIfKeyUp': return `SKNP V${h(ins.x, 1)}`;
    case 'loadDelay': return `LD V${h(ins.x, 1)}, DT`;
    case 'waitForKey': return `LD V${h(ins.x, 1)}, K`;
    case 'setDelay': return `LD DT, V${h(ins.x, 1)}`;
    case 'setSound': return `LD ST, V${h(ins.x, 1)}`;
    case 'addIndex': return `ADD I, V${h(ins.x, 1)}`;
    case 'loadFontAddress': return `LD F, V${h(ins.x, 1)}`;
    case 'storeBcd': return `LD B, V${h(ins.x, 1)}`;
    case 'storeRegisters': return `LD [I], V${h(ins.x, 1)}`;
    case 'loadRegisters': return `LD V${h(ins.x, 1)}, [I]`;
  }
}
