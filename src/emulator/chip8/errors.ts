/**
 * CHIP-8 fault taxonomy.
 *
 * Every fault is fatal to the instruction that raised it. The system never
 * retries or skips a faulting instruction; the host decides whether to halt,
 * reset or report.
 */

export type Chip8FaultKind =
  | 'decode'
  | 'memory'
  | 'stack-overflow'
  | 'stack-underflow'
  | 'load-too-large';

export abstract class Chip8Fault extends Error {
  abstract readonly kind: Chip8FaultKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

function hex(value: number, width: number): string {
  return '$' + value.toString(16).toUpperCase().padStart(width, '0');
}

/** The fetched word matches no instruction. */
export class DecodeFault extends Chip8Fault {
  readonly kind = 'decode';

  constructor(readonly opcode: number, readonly address: number) {
    super(`Unknown opcode ${hex(opcode, 4)} at ${hex(address, 3)}`);
  }
}

export type MemoryAccess = 'fetch' | 'read' | 'write';

/** Address outside $000-$FFF, a write into the reserved region, or a misaligned fetch. */
export class MemoryFault extends Chip8Fault {
  readonly kind = 'memory';

  constructor(
    readonly address: number,
    readonly access: MemoryAccess,
    reason: string,
  ) {
    super(`Memory ${access} fault at ${hex(address, 3)}: ${reason}`);
  }
}

export class StackOverflow extends Chip8Fault {
  readonly kind = 'stack-overflow';

  constructor(readonly depth: number) {
    super(`Stack overflow: call nesting exceeds ${depth} levels`);
  }
}

export class StackUnderflow extends Chip8Fault {
  readonly kind = 'stack-underflow';

  constructor() {
    super('Stack underflow: return with an empty stack');
  }
}

export class LoadTooLarge extends Chip8Fault {
  readonly kind = 'load-too-large';

  constructor(readonly size: number, readonly capacity: number) {
    super(`ROM is ${size} bytes; program memory holds ${capacity}`);
  }
}
