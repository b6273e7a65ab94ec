import type { KeyPress } from '../config/options';
import type { InputSource } from '../emulator/scheduler';
import type { Clock } from '../timing/clock';

// Scripted input for headless runs: each press is reported on the first poll at or after its time.
export class ScheduledInput implements InputSource {
  private next = 0;
  private readonly presses: KeyPress[];

  constructor(presses: KeyPress[], private readonly clock: Clock) {
    this.presses = [...presses].sort((a, b) => a.atMs - b.atMs);
  }

  poll(): number | null {
    const p = this.presses[this.next];
    if (p === undefined || this.clock.now() < p.atMs) return null;
    this.next++;
    return p.code;
  }
}
