import type { Byte, IDelayTimer } from '../emulator/types';
import { systemClock, type Clock } from './clock';
import { TIMING } from './constants';

/**
 * Remaining delay after `now - setAt` milliseconds, in whole ticks.
 * Floors at zero however long ago the value was set.
 */
export function remainingDelay(value: Byte, setAt: number, now: number, tickMs = TIMING.timerTickMs): Byte {
  const ticks = Math.floor(Math.max(0, now - setAt) / tickMs);
  return ticks >= value ? 0 : value - ticks;
}

// Delay timer with no tick task: the value is derived from when it was last set.
export class DelayTimer implements IDelayTimer {
  private value = 0;
  private setAt: number;

  constructor(private readonly clock: Clock = systemClock) {
    this.setAt = clock.now();
  }

  get(): Byte {
    return remainingDelay(this.value, this.setAt, this.clock.now());
  }

  set(value: Byte): void {
    this.value = value & 0xff;
    this.setAt = this.clock.now();
  }
}
