import type { IKeyLatch } from '../emulator/types';
import { systemClock, type Clock } from '../timing/clock';
import { TIMING } from '../timing/constants';

// Single-slot key latch. A press sticks for at least keyHoldMs so that a short
// host key tap is still visible to programs polling at the instruction rate.
export class KeyLatch implements IKeyLatch {
  private code: number | null = null;
  private pressedAt: number;

  constructor(private readonly clock: Clock = systemClock, private readonly holdMs = TIMING.keyHoldMs) {
    this.pressedAt = clock.now();
  }

  get pressedKey(): number | null {
    return this.code;
  }

  press(code: number): void {
    this.code = code;
    this.pressedAt = this.clock.now();
  }

  isPressed(code: number): boolean {
    return this.code !== null && this.code === code;
  }

  canClear(): boolean {
    return this.code !== null && this.clock.now() - this.pressedAt >= this.holdMs;
  }

  clear(): void {
    if (!this.canClear()) {
      throw new Error(`Key latch cleared before ${this.holdMs}ms hold elapsed`);
    }
    this.code = null;
  }
}
