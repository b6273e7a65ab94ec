import type { Byte, MachineBus, Word } from '../emulator/types';
import { InvalidInstructionError, StackUnderflowError } from '../emulator/errors';
import { PROGRAM_START } from '../memory/memory';
import { systemClock, type Clock } from '../timing/clock';
import { TIMING } from '../timing/constants';
import { decode, type Instruction } from './decode';

export type RandomByte = () => Byte;

export const mathRandomByte: RandomByte = () => Math.floor(Math.random() * 256) & 0xff;

export interface CPUOptions {
  clock?: Clock;
  random?: RandomByte;
}

export interface CPUState {
  V: Uint8Array; // V0..VF; VF doubles as the carry/borrow/collision flag
  I: Word;
  PC: Word;
  stack: Word[];
}

const VF = 0xf;

export class CPU {
  readonly state: CPUState = {
    V: new Uint8Array(16),
    I: 0,
    PC: PROGRAM_START,
    stack: [],
  };
  private readonly clock: Clock;
  private readonly random: RandomByte;
  private lastStepAt: number;

  constructor(opts: CPUOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.random = opts.random ?? mathRandomByte;
    this.lastStepAt = this.clock.now();
  }

  /** Gate for the next step: strictly more than the instruction interval since the last one. */
  canStep(): boolean {
    return this.clock.now() - this.lastStepAt > TIMING.instructionIntervalMs;
  }

  fetch(bus: MachineBus): Word {
    const pc = this.state.PC;
    return ((bus.memory.read(pc) << 8) | bus.memory.read(pc + 1)) & 0xffff;
  }

  // Executes exactly one instruction. Callers check canStep() first.
  step(bus: MachineBus): Instruction {
    this.lastStepAt = this.clock.now();
    const word = this.fetch(bus);
    const ins = decode(word);
    if (!ins) throw new InvalidInstructionError(this.state.PC, word);
    this.execute(ins, bus);
    return ins;
  }

  private execute(ins: Instruction, bus: MachineBus): void {
    const s = this.state;
    const V = s.V;
    let next = s.PC + 2;

    switch (ins.op) {
      case 'cls':
        bus.framebuffer.clear();
        break;
      case 'ret': {
        const ret = s.stack.pop();
        if (ret === undefined) throw new StackUnderflowError(s.PC);
        next = ret;
        break;
      }
      case 'jp':
        next = ins.addr;
        break;
      case 'call':
        s.stack.push(next);
        next = ins.addr;
        break;
      case 'seImm':
        if (V[ins.x] === ins.kk) next += 2;
        break;
      case 'sneImm':
        if (V[ins.x] !== ins.kk) next += 2;
        break;
      case 'seReg':
        if (V[ins.x] === V[ins.y]) next += 2;
        break;
      case 'ldImm':
        V[ins.x] = ins.kk;
        break;
      case 'addImm':
        V[ins.x] = V[ins.x] + ins.kk; // Uint8Array wraps, no flag
        break;
      case 'ldReg':
        V[ins.x] = V[ins.y];
        break;
      case 'or':
        V[ins.x] |= V[ins.y];
        break;
      case 'and':
        V[ins.x] &= V[ins.y];
        break;
      case 'xor':
        V[ins.x] ^= V[ins.y];
        break;
      case 'addReg': {
        const sum = V[ins.x] + V[ins.y];
        V[ins.x] = sum;
        V[VF] = sum > 0xff ? 1 : 0;
        break;
      }
      case 'sub': {
        const noBorrow = V[ins.x] >= V[ins.y];
        V[ins.x] = V[ins.x] - V[ins.y];
        V[VF] = noBorrow ? 1 : 0;
        break;
      }
      case 'subn': {
        const noBorrow = V[ins.y] >= V[ins.x];
        V[ins.x] = V[ins.y] - V[ins.x];
        V[VF] = noBorrow ? 1 : 0;
        break;
      }
      case 'shr':
        V[VF] = V[ins.x] & 0x01;
        V[ins.x] = V[ins.x] >>> 1;
        break;
      case 'shl':
        V[VF] = (V[ins.x] & 0x80) >>> 7;
        V[ins.x] = V[ins.x] << 1;
        break;
      case 'sneReg':
        if (V[ins.x] !== V[ins.y]) next += 2;
        break;
      case 'ldI':
        s.I = ins.addr;
        break;
      case 'jpV0':
        // Not masked to 12 bits.
        next = ins.addr + V[0];
        break;
      case 'rnd':
        V[ins.x] = this.random() & ins.kk;
        break;
      case 'drw':
        V[VF] = this.drawSprite(bus, V[ins.x], V[ins.y], ins.n) ? 1 : 0;
        break;
      case 'skp':
        if (bus.keypad.isPressed(V[ins.x])) next += 2;
        break;
      case 'sknp':
        if (!bus.keypad.isPressed(V[ins.x])) next += 2;
        break;
      case 'ldVxDt':
        V[ins.x] = bus.timer.get();
        break;
      case 'waitKey': {
        const key = bus.keypad.pressedKey;
        if (key === null) next = s.PC; // spin on this instruction
        else V[ins.x] = key;
        break;
      }
      case 'ldDtVx':
        bus.timer.set(V[ins.x]);
        break;
      case 'ldStVx':
        // Sound timer: accepted, no audio.
        break;
      case 'addI':
        s.I = (s.I + V[ins.x]) & 0xffff;
        break;
      case 'ldF':
        s.I = V[ins.x] * 5;
        break;
      case 'bcd': {
        const v = V[ins.x];
        bus.memory.write(s.I, Math.floor(v / 100));
        bus.memory.write(s.I + 1, Math.floor((v % 100) / 10));
        bus.memory.write(s.I + 2, v % 10);
        break;
      }
      case 'store':
        for (let r = 0; r <= ins.x; r++) bus.memory.write(s.I + r, V[r]);
        break;
      case 'load':
        for (let r = 0; r <= ins.x; r++) V[r] = bus.memory.read(s.I + r);
        break;
    }

    s.PC = next & 0xffff;
  }

  // Rows wrap individually: y is passed unwrapped and the framebuffer wraps it.
  private drawSprite(bus: MachineBus, x: number, y: number, height: number): boolean {
    let erased = false;
    for (let row = 0; row < height; row++) {
      const byte = bus.memory.read(this.state.I + row);
      if (bus.framebuffer.drawRow(byte, x, y + row)) erased = true;
    }
    return erased;
  }
}
