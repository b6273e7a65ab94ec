export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface IMemory {
  read(address: number): Byte;
  write(address: number, value: Byte): void;
}

// What the CPU needs from the rest of the machine for one step.
export interface MachineBus {
  memory: IMemory;
  timer: IDelayTimer;
  framebuffer: IFramebuffer;
  keypad: IKeyLatch;
}

export interface IDelayTimer {
  get(): Byte;
  set(value: Byte): void;
}

export interface IFramebuffer {
  clear(): void;
  drawRow(byte: Byte, x: number, y: number): boolean;
}

export interface IKeyLatch {
  readonly pressedKey: number | null;
  isPressed(code: number): boolean;
}
