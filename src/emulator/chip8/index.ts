export { Chip8System } from './system';
export type { Chip8State, Chip8SystemOptions, RandomByteSource, StepOutcome } from './types';
export { decode, formatInstruction } from './opcodes';
export type { Instruction, InstructionKind } from './opcodes';
export {
  Chip8Fault, DecodeFault, MemoryFault, StackOverflow, StackUnderflow, LoadTooLarge,
} from './errors';
export type { Chip8FaultKind, MemoryAccess } from './errors';
export { DISPLAY_WIDTH, DISPLAY_HEIGHT, PIXEL_ON, PIXEL_OFF } from './display';
export { MEMORY_SIZE, PROGRAM_START, PROGRAM_CAPACITY } from './memory';
export { TIMER_HZ } from './timers';
export { KEY_COUNT } from './keypad';
