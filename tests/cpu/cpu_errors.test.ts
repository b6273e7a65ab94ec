import { describe, it, expect } from 'vitest';
import { mkEmu, run } from '../helpers/vm';
import { InvalidInstructionError, StackUnderflowError } from '../../src/emulator/errors';

describe('CPU fatal errors', () => {
  it('RET on an empty stack throws StackUnderflowError', () => {
    const { emu } = mkEmu([0x00ee]);
    expect(() => run(emu, 1)).toThrow(StackUnderflowError);
    expect(() => run(emu, 1)).toThrow('Return with empty call stack at 0x200');
  });

  it('unknown words throw InvalidInstructionError with pc and word', () => {
    const { emu } = mkEmu([0x6001, 0xffff]);
    run(emu, 1);
    try {
      emu.stepInstruction();
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidInstructionError);
      if (e instanceof InvalidInstructionError) {
        expect(e.pc).toBe(0x202);
        expect(e.word).toBe(0xffff);
        expect(e.message).toBe('Invalid instruction: 0x202:0xFFFF');
      }
    }
    // PC is left on the bad word
    expect(emu.cpu.state.PC).toBe(0x202);
  });

  it('0nnn machine calls are not part of the set', () => {
    const { emu } = mkEmu([0x0123]);
    expect(() => run(emu, 1)).toThrow(InvalidInstructionError);
  });

  it('an empty program hits 0000 and stops', () => {
    const { emu } = mkEmu([]);
    expect(() => run(emu, 1)).toThrow('Invalid instruction: 0x200:0x0000');
  });
});
