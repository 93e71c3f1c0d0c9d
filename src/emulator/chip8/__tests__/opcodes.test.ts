import { describe, it, expect } from 'vitest';
import { decode, formatInstruction, type Instruction } from '../opcodes';

describe('decode', () => {
  const cases: [number, Instruction][] = [
    [0x00e0, { kind: 'clearDisplay' }],
    [0x00ee, { kind: 'return' }],
    [0x0123, { kind: 'sys', nnn: 0x123 }],
    [0x1234, { kind: 'jump', nnn: 0x234 }],
    [0x2345, { kind: 'call', nnn: 0x345 }],
    [0x3012, { kind: 'skipIfEqualImm', x: 0x0, nn: 0x12 }],
    [0x4a34, { kind: 'skipIfNotEqualImm', x: 0xa, nn: 0x34 }],
    [0x5120, { kind: 'skipIfEqualReg', x: 0x1, y: 0x2 }],
    [0x6023, { kind: 'loadImm', x: 0x0, nn: 0x23 }],
    [0x7f45, { kind: 'addImm', x: 0xf, nn: 0x45 }],
    [0x8010, { kind: 'loadReg', x: 0x0, y: 0x1 }],
    [0x8021, { kind: 'or', x: 0x0, y: 0x2 }],
    [0x8132, { kind: 'and', x: 0x1, y: 0x3 }],
    [0x8023, { kind: 'xor', x: 0x0, y: 0x2 }],
    [0x8034, { kind: 'addReg', x: 0x0, y: 0x3 }],
    [0x8455, { kind: 'sub', x: 0x4, y: 0x5 }],
    [0x8566, { kind: 'shiftRight', x: 0x5, y: 0x6 }],
    [0x8677, { kind: 'subReversed', x: 0x6, y: 0x7 }],
    [0x878e, { kind: 'shiftLeft', x: 0x7, y: 0x8 }],
    [0x9ab0, { kind: 'skipIfNotEqualReg', x: 0xa, y: 0xb }],
    [0xa123, { kind: 'loadIndex', nnn: 0x123 }],
    [0xbfff, { kind: 'jumpOffset', nnn: 0xfff }],
    [0xc30f, { kind: 'random', x: 0x3, nn: 0x0f }],
    [0xd125, { kind: 'draw', x: 0x1, y: 0x2, n: 0x5 }],
    [0xe19e, { kind: 'skipIfKeyDown', x: 0x1 }],
    [0xe2a1, { kind: 'skipIfKeyUp', x: 0x2 }],
    [0xf307, { kind: 'loadDelay', x: 0x3 }],
    [0xf40a, { kind: 'waitForKey', x: 0x4 }],
    [0xf515, { kind: 'setDelay', x: 0x5 }],
    [0xf618, { kind: 'setSound', x: 0x6 }],
    [0xf71e, { kind: 'addIndex', x: 0x7 }],
    [0xf829, { kind: 'loadFontAddress', x: 0x8 }],
    [0xf933, { kind: 'storeBcd', x: 0x9 }],
    [0xfa55, { kind: 'storeRegisters', x: 0xa }],
    [0xfb65, { kind: 'loadRegisters', x: 0xb }],
  ];

  it('should cover all 35 opcodes', () => {
    expect(new Set(cases.map(([, ins]) => ins.kind)).size).toBe(35);
  });

  it.each(cases)('should decode word %i', (word, expected) => {
    expect(decode(word)).toEqual(expected);
  });

  it.each([
    0x5121, // 5XY? with nonzero low nibble
    0x912f,
    0x8008, 0x800d, 0x800f,
    0xe000, 0xe19f,
    0xf000, 0xf0ff, 0xf075,
  ])('should reject undefined opcode %i', (word) => {
    expect(decode(word)).toBeNull();
  });
});

describe('formatInstruction', () => {
  it('should format register and immediate operands in hex', () => {
    expect(formatInstruction({ kind: 'loadImm', x: 0xa, nn: 0x0a })).toBe('LD VA, $0A');
  });

  it('should format addresses with three digits', () => {
    expect(formatInstruction({ kind: 'call', nnn: 0x30 })).toBe('CALL $030');
  });

  it('should format draw with a decimal row count', () => {
    expect(formatInstruction({ kind: 'draw', x: 0, y: 1, n: 15 })).toBe('DRW V0, V1, 15');
  });

  it('should format the block transfers', () => {
    expect(formatInstruction({ kind: 'storeRegisters', x: 3 })).toBe('LD [I], V3');
    expect(formatInstruction({ kind: 'loadRegisters', x: 3 })).toBe('LD V3, [I]');
  });
});
