// Host-side cadences (milliseconds)
export interface VmTiming {
  readonly instructionIntervalMs: number; // step allowed once strictly more than this has passed
  readonly flushIntervalMs: number;       // same, for display flushes
  readonly keyHoldMs: number;             // latch may clear once at least this has passed
  readonly timerTickMs: number;           // one delay-timer decrement
}

export const TIMING: VmTiming = {
  instructionIntervalMs: 2,
  flushIntervalMs: 10,
  keyHoldMs: 200,
  timerTickMs: 16,
};
