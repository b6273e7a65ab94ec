import { parseArgs, resolveRunOptions } from '../src/config/options';
import { readRomFile } from '../src/cart/loader';
import { writeFramePng, LastFrameSink } from '../src/display/png';
import { Emulator } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { ScheduledInput } from '../src/input/scheduled';
import { ManualClock } from '../src/timing/clock';
import { createLogger, levelFromEnv } from '../src/utils/log';

async function main() {
  const opts = resolveRunOptions(parseArgs(process.argv.slice(2)));
  const level = opts.logLevel ?? levelFromEnv();
  const log = createLogger('headless', level);

  if (!opts.romPath) {
    console.error('Usage: tsx scripts/headless_run.ts --rom=path/to/game.ch8 [--out=screen.png] [--ms=2000] [--scale=10] [--press=KEY@MS,...] [--trace=N] [--onCpuError=throw|record]');
    process.exit(1);
  }

  const rom = readRomFile(opts.romPath);
  log.info(`ROM: ${opts.romPath} (${rom.length} bytes)  out: ${opts.outPath}  ms: ${opts.ms}  scale: ${opts.scale}  presses: ${opts.presses.length}`);

  const clock = new ManualClock();
  const emu = Emulator.fromRom(rom, { clock, logger: createLogger('emu', level) });
  const sink = new LastFrameSink();
  const sched = new Scheduler(emu, {
    display: sink,
    input: new ScheduledInput(opts.presses, clock),
    onCpuError: opts.onCpuError,
    traceEveryInstr: opts.traceEveryInstr,
    logger: createLogger('sched', level),
  });

  sched.runFor(opts.ms, clock);

  writeFramePng(opts.outPath, emu.framebuffer.snapshot(), opts.scale);
  log.info(`Wrote ${opts.outPath} after ${sched.instructionsExecuted} instructions, ${sink.presented} flushes; frame=${emu.framebuffer.hash()}`);
  if (sched.halted) process.exitCode = 2;
}

main().catch((e) => {
  console.error('[headless] Unhandled error:', e);
  process.exit(1);
});
