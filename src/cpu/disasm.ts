import { decode, type Instruction } from './decode';

const h = (v: number, w: number) => '0x' + v.toString(16).toUpperCase().padStart(w, '0');
const V = (r: number) => 'V' + r.toString(16).toUpperCase();

export function formatInstruction(ins: Instruction): string {
  switch (ins.op) {
    case 'cls': return 'CLS';
    case 'ret': return 'RET';
    case 'jp': return `JP ${h(ins.addr, 3)}`;
    case 'call': return `CALL ${h(ins.addr, 3)}`;
    case 'seImm': return `SE ${V(ins.x)}, ${h(ins.kk, 2)}`;
    case 'sneImm': return `SNE ${V(ins.x)}, ${h(ins.kk, 2)}`;
    case 'seReg': return `SE ${V(ins.x)}, ${V(ins.y)}`;
    case 'ldImm': return `LD ${V(ins.x)}, ${h(ins.kk, 2)}`;
    case 'addImm': return `ADD ${V(ins.x)}, ${h(ins.kk, 2)}`;
    case 'ldReg': return `LD ${V(ins.x)}, ${V(ins.y)}`;
    case 'or': return `OR ${V(ins.x)}, ${V(ins.y)}`;
    case 'and': return `AND ${V(ins.x)}, ${V(ins.y)}`;
    case 'xor': return `XOR ${V(ins.x)}, ${V(ins.y)}`;
    case 'addReg': return `ADD ${V(ins.x)}, ${V(ins.y)}`;
    case 'sub': return `SUB ${V(ins.x)}, ${V(ins.y)}`;
    case 'shr': return `SHR ${V(ins.x)}`;
    case 'subn': return `SUBN ${V(ins.x)}, ${V(ins.y)}`;
    case 'shl': return `SHL ${V(ins.x)}`;
    case 'sneReg': return `SNE ${V(ins.x)}, ${V(ins.y)}`;
    case 'ldI': return `LD I, ${h(ins.addr, 3)}`;
    case 'jpV0': return `JP V0, ${h(ins.addr, 3)}`;
    case 'rnd': return `RND ${V(ins.x)}, ${h(ins.kk, 2)}`;
    case 'drw': return `DRW ${V(ins.x)}, ${V(ins.y)}, ${ins.n}`;
    case 'skp': return `SKP ${V(ins.x)}`;
    case 'sknp': return `SKNP ${V(ins.x)}`;
    case 'ldVxDt': return `LD ${V(ins.x)}, DT`;
    case 'waitKey': return `LD ${V(ins.x)}, K`;
    case 'ldDtVx': return `LD DT, ${V(ins.x)}`;
    case 'ldStVx': return `LD ST, ${V(ins.x)}`;
    case 'addI': return `ADD I, ${V(ins.x)}`;
    case 'ldF': return `LD F, ${V(ins.x)}`;
    case 'bcd': return `LD B, ${V(ins.x)}`;
    case 'store': return `LD [I], ${V(ins.x)}`;
    case 'load': return `LD ${V(ins.x)}, [I]`;
  }
}

// Raw words that decode to nothing come out as a data directive.
export function disassembleWord(word: number): string {
  const ins = decode(word);
  return ins ? formatInstruction(ins) : `DW ${h(word, 4)}`;
}

export interface DisasmLine {
  address: number;
  word: number;
  text: string;
}

export function disassemble(bytes: ArrayLike<number>, origin = 0x200): DisasmLine[] {
  const out: DisasmLine[] = [];
  for (let i = 0; i + 1 < bytes.length; i += 2) {
    const word = ((bytes[i] & 0xff) << 8) | (bytes[i + 1] & 0xff);
    out.push({ address: origin + i, word, text: disassembleWord(word) });
  }
  return out;
}
