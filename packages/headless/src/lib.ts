import { Memory, Processor, hex32 } from '@rv32/core';

export function crc32(data: Uint8Array): string {
  let crc = 0xFFFFFFFF >>> 0;
  for (let i = 0; i < data.length; i++) {
    let c = (crc ^ (data[i] ?? 0)) & 0xFF;
    for (let k = 0; k < 8; k++) {
      const mask = -(c & 1);
      c = (c >>> 1) ^ (0xEDB88320 & mask);
    }
    crc = (crc >>> 8) ^ c;
  }
  crc = (~crc) >>> 0;
  return (crc >>> 0).toString(16).padStart(8, '0');
}

// Accepts decimal or 0x-prefixed hex; anything unparsable yields `def`
export function parseNum(val: string | undefined, def: number): number {
  if (val === undefined) return def;
  const s = val.trim();
  if (s.startsWith('0x') || s.startsWith('0X')) {
    const n = parseInt(s.slice(2), 16);
    return Number.isFinite(n) ? (n >>> 0) : def;
  }
  const n = Number(s);
  return Number.isFinite(n) && s.length > 0 ? (n >>> 0) : def;
}

// Flags that never take a value, so `--trace prog.bin` keeps prog.bin positional
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['trace']);

// --key value pairs; a flag with no value is recorded as '1'
export function parseFlags(args: string[], booleanFlags: ReadonlySet<string> = BOOLEAN_FLAGS): { opts: Record<string, string>; positional: string[] } {
  const opts: Record<string, string> = {};
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? '';
    if (a.startsWith('--')) {
      const key = a.slice(2);
      const next = (i + 1 < args.length) ? args[i + 1] : undefined;
      if (!booleanFlags.has(key) && next !== undefined && !next.startsWith('--')) {
        opts[key] = next;
        i++;
      } else {
        opts[key] = '1';
      }
    } else {
      positional.push(a);
    }
  }
  return { opts, positional };
}

export type DumpRange = { addr: number; length: number };

export const MAX_DUMP_LENGTH = 1024 * 1024;

// "0xADDR:LEN" with 0 < LEN <= MAX_DUMP_LENGTH and the range inside the 32-bit space
export function parseDumpRange(spec: string): DumpRange | null {
  const parts = spec.split(':');
  if (parts.length !== 2) return null;
  const lenText = (parts[1] ?? '').trim();
  if (lenText.startsWith('-')) return null;
  const addr = parseNum(parts[0], NaN);
  const length = parseNum(lenText, NaN);
  if (Number.isNaN(addr) || Number.isNaN(length)) return null;
  if (length === 0 || length > MAX_DUMP_LENGTH) return null;
  if (addr + length > 0x1_0000_0000) return null;
  return { addr, length };
}

export function readBytes(mem: Memory, range: DumpRange): Uint8Array {
  const out = new Uint8Array(range.length);
  for (let i = 0; i < range.length; i++) out[i] = mem.loadU8((range.addr + i) >>> 0);
  return out;
}

// 16 bytes per line: "0x00000100: ef be ad de ..."
export function hexDump(bytes: Uint8Array, baseAddr: number): string[] {
  const lines: string[] = [];
  for (let off = 0; off < bytes.length; off += 16) {
    const row = Array.from(bytes.subarray(off, off + 16), (b) => b.toString(16).padStart(2, '0'));
    lines.push(`${hex32(baseAddr + off)}: ${row.join(' ')}`);
  }
  return lines;
}

// Non-zero registers only, keyed x1..x31, plus pc
export function registerReport(cpu: Processor): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 1; i < 32; i++) {
    const v = cpu.get(i);
    if (v !== 0) out[`x${i}`] = hex32(v);
  }
  out['pc'] = hex32(cpu.pc);
  return out;
}
