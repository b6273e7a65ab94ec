import { formatInstruction } from '../cpu/disasm';
import type { DisplaySink } from '../display/framebuffer';
import { systemClock, type ManualClock } from '../timing/clock';
import { createLogger, type Logger } from '../utils/log';
import { Emulator } from './core';

// 'record' keeps the error in lastCpuError and halts; nothing runs past a fatal error either way.
export type CpuErrorMode = 'throw' | 'record';

// Input collaborator: the key code (0..15) seen on this poll, or null.
export interface InputSource {
  poll(): number | null;
}

export interface SchedulerOptions {
  display?: DisplaySink;
  input?: InputSource;
  onCpuError?: CpuErrorMode;
  traceEveryInstr?: number; // if >0, log CPU state every N instructions
  logger?: Logger;
}

const noDisplay: DisplaySink = { present: () => {} };
const noInput: InputSource = { poll: () => null };

const hx = (v: number, w: number) => v.toString(16).padStart(w, '0');

// Host loop: each gate is checked here and the matching action is skipped while closed.
export class Scheduler {
  private readonly display: DisplaySink;
  private readonly input: InputSource;
  private readonly onCpuError: CpuErrorMode;
  private readonly traceEveryInstr: number;
  private readonly log: Logger;
  public lastCpuError: unknown | undefined;
  private execCount = 0;
  private flushCount = 0;

  constructor(private readonly emu: Emulator, opts: SchedulerOptions = {}) {
    this.display = opts.display ?? noDisplay;
    this.input = opts.input ?? noInput;
    this.onCpuError = opts.onCpuError ?? 'throw';
    this.traceEveryInstr = Math.max(0, opts.traceEveryInstr ?? 0) | 0;
    this.log = opts.logger ?? createLogger('sched');
  }

  get halted(): boolean {
    return this.lastCpuError !== undefined;
  }

  get instructionsExecuted(): number {
    return this.execCount;
  }

  get framesFlushed(): number {
    return this.flushCount;
  }

  poll(): void {
    const key = this.input.poll();
    if (key !== null) this.emu.pressKey(key);
    if (key === null && this.emu.canReleaseKey()) this.emu.releaseKey();

    if (!this.halted && this.emu.canStep()) this.step();

    if (this.emu.canFlush()) {
      this.emu.flush(this.display);
      this.flushCount++;
    }
  }

  // Deterministic run: one poll per simulated millisecond.
  runFor(ms: number, clock: ManualClock): void {
    const end = clock.now() + ms;
    while (clock.now() < end && !this.halted) {
      clock.advance(1);
      this.poll();
    }
  }

  // Wall-clock run; yields to the event loop every `yieldEvery` polls.
  async runRealtime(ms: number, yieldEvery = 1000): Promise<void> {
    const end = systemClock.now() + ms;
    let n = 0;
    while (systemClock.now() < end && !this.halted) {
      this.poll();
      if (++n % yieldEvery === 0) await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }

  private step(): void {
    const pc = this.emu.cpu.state.PC;
    try {
      const ins = this.emu.stepInstruction();
      this.execCount++;
      if (this.traceEveryInstr > 0 && this.execCount % this.traceEveryInstr === 0) this.trace(pc, formatInstruction(ins));
    } catch (e) {
      this.lastCpuError = e;
      if (this.onCpuError === 'throw') throw e;
      this.log.error(`halted at 0x${hx(pc, 3)} after ${this.execCount} instructions:`, e instanceof Error ? e.message : e);
    }
  }

  private trace(pc: number, text: string): void {
    if (!this.log.enabled('trace')) return;
    const s = this.emu.cpu.state;
    const regs = Array.from(s.V, (v) => hx(v, 2)).join(' ');
    this.log.trace(`${hx(pc, 3)} ${text.padEnd(18)} I=${hx(s.I, 4)} SP=${s.stack.length} V=${regs}`);
  }
}
