// Host key (KeyboardEvent.code naming) -> 4-bit keypad code.
// The left 4x4 block of a QWERTY keyboard mirrors the hex keypad:
//   1 2 3 C      1 2 3 4
//   4 5 6 D  <=  Q W E R
//   7 8 9 E      A S D F
//   A 0 B F      Z X C V
export const KEYMAP: Readonly<Record<string, number>> = {
  Digit1: 0x1, Digit2: 0x2, Digit3: 0x3, Digit4: 0xc,
  KeyQ: 0x4, KeyW: 0x5, KeyE: 0x6, KeyR: 0xd,
  KeyA: 0x7, KeyS: 0x8, KeyD: 0x9, KeyF: 0xe,
  KeyZ: 0xa, KeyX: 0x0, KeyC: 0xb, KeyV: 0xf,
};

export function keyCodeFor(hostKey: string): number | null {
  return Object.prototype.hasOwnProperty.call(KEYMAP, hostKey) ? KEYMAP[hostKey] : null;
}

// Accepts a single hex digit ("a", "F") or a host key name ("KeyQ").
export function parseKey(token: string): number | null {
  const t = token.trim();
  if (/^[0-9a-fA-F]$/.test(t)) return parseInt(t, 16);
  return keyCodeFor(t);
}
