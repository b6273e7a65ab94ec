const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

// Word matched no known opcode pattern. Execution must not continue.
export class InvalidInstructionError extends Error {
  constructor(readonly pc: number, readonly word: number) {
    super(`Invalid instruction: 0x${hex(pc, 3)}:0x${hex(word, 4)}`);
    this.name = 'InvalidInstructionError';
  }
}

// RET with nothing on the call stack.
export class StackUnderflowError extends Error {
  constructor(readonly pc: number) {
    super(`Return with empty call stack at 0x${hex(pc, 3)}`);
    this.name = 'StackUnderflowError';
  }
}

export class MemoryAccessError extends Error {
  constructor(readonly address: number) {
    super(`Memory access out of range: 0x${hex(address, 4)}`);
    this.name = 'MemoryAccessError';
  }
}
