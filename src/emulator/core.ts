import { CPU, type RandomByte } from '../cpu/cpu';
import type { Instruction } from '../cpu/decode';
import { Framebuffer, type DisplaySink } from '../display/framebuffer';
import { KeyLatch } from '../input/keypad';
import { Memory } from '../memory/memory';
import { systemClock, type Clock } from '../timing/clock';
import { DelayTimer } from '../timing/delayTimer';
import { createLogger, type Logger } from '../utils/log';
import type { MachineBus } from './types';

export interface EmulatorOptions {
  clock?: Clock;
  random?: RandomByte;
  logger?: Logger;
}

export class Emulator {
  readonly bus: MachineBus;
  private readonly log: Logger;

  constructor(
    public readonly memory: Memory,
    public readonly cpu: CPU,
    public readonly timer: DelayTimer,
    public readonly framebuffer: Framebuffer,
    public readonly keypad: KeyLatch,
    logger?: Logger,
  ) {
    this.bus = { memory, timer, framebuffer, keypad };
    this.log = logger ?? createLogger('emu');
  }

  // Fresh machine sharing one clock; glyphs are in memory before anything else.
  static create(opts: EmulatorOptions = {}): Emulator {
    const clock = opts.clock ?? systemClock;
    const memory = new Memory();
    memory.loadBuiltInSprites();
    return new Emulator(
      memory,
      new CPU({ clock, random: opts.random }),
      new DelayTimer(clock),
      new Framebuffer(clock),
      new KeyLatch(clock),
      opts.logger,
    );
  }

  static fromRom(rom: ArrayLike<number>, opts: EmulatorOptions = {}): Emulator {
    const emu = Emulator.create(opts);
    emu.loadRom(rom);
    return emu;
  }

  loadRom(rom: ArrayLike<number>): void {
    this.memory.loadProgram(rom);
    this.log.debug(`loaded ${rom.length} bytes at 0x200`);
  }

  pressKey(code: number): void {
    this.keypad.press(code);
  }

  canReleaseKey(): boolean {
    return this.keypad.canClear();
  }

  releaseKey(): void {
    this.keypad.clear();
  }

  canStep(): boolean {
    return this.cpu.canStep();
  }

  stepInstruction(): Instruction {
    return this.cpu.step(this.bus);
  }

  canFlush(): boolean {
    return this.framebuffer.canFlush();
  }

  flush(sink: DisplaySink): void {
    this.framebuffer.flush(sink);
  }
}
