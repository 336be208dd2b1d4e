export function toUint32(x: number): number {
  return x >>> 0;
}

export function toInt32(x: number): number {
  return x | 0;
}

// Sign-extend the low `bits` bits of x to a 32-bit pattern (returned unsigned)
export function signExtend(x: number, bits: number): number {
  if (bits >= 32) return x >>> 0;
  const shift = 32 - bits;
  return ((x << shift) >> shift) >>> 0;
}

export function signExtend16(x: number): number {
  x = x & 0xffff;
  return ((x & 0x8000) ? (x | 0xffff0000) : x) >>> 0;
}

export function signExtend8(x: number): number {
  x = x & 0xff;
  return ((x & 0x80) ? (x | 0xffffff00) : x) >>> 0;
}

// Add a signed 32-bit offset to an unsigned 32-bit base, wrapping modulo 2^32.
// A negative offset subtracts its magnitude; the magnitude of -2^31 is 2^31,
// which still fits a double exactly.
export function unsignedSignedAdd(base: number, offset: number): number {
  const off = offset | 0;
  if (off < 0) {
    const magnitude = -off;
    return ((base >>> 0) - magnitude) >>> 0;
  }
  return ((base >>> 0) + (off >>> 0)) >>> 0;
}

export function hex32(x: number): string {
  return `0x${(x >>> 0).toString(16).padStart(8, '0')}`;
}
