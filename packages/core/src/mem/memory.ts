// 1 KiB slabs == 256 32-bit words
export const SLAB_SIZE = 1024;

function slabBase(index: number): number {
  const i = index >>> 0;
  return (i - (i % SLAB_SIZE)) >>> 0;
}

// Sparse little-endian byte store over the full 32-bit address space.
// Slabs are allocated zero-filled on first write; unallocated bytes read back
// as undefined from the get* accessors and as 0 from the load* accessors.
export class Memory {
  private readonly slabs = new Map<number, Uint8Array>();

  get slabCount(): number {
    return this.slabs.size;
  }

  slabBases(): number[] {
    return [...this.slabs.keys()].sort((a, b) => a - b);
  }

  getByte(index: number): number | undefined {
    const i = index >>> 0;
    const slab = this.slabs.get(slabBase(i));
    if (!slab) return undefined;
    return slab[i % SLAB_SIZE];
  }

  getHalf(index: number): number | undefined {
    return this.compose(index, 2);
  }

  getWord(index: number): number | undefined {
    return this.compose(index, 4);
  }

  setByte(index: number, value: number): void {
    const i = index >>> 0;
    const base = slabBase(i);
    let slab = this.slabs.get(base);
    if (!slab) {
      slab = new Uint8Array(SLAB_SIZE);
      this.slabs.set(base, slab);
    }
    slab[i % SLAB_SIZE] = value & 0xff;
  }

  setHalf(index: number, value: number): void {
    this.decompose(index, value, 2);
  }

  setWord(index: number, value: number): void {
    this.decompose(index, value, 4);
  }

  loadU8(addr: number): number {
    return this.getByte(addr) ?? 0;
  }

  loadU16(addr: number): number {
    return this.loadLE(addr, 2);
  }

  loadU32(addr: number): number {
    return this.loadLE(addr, 4);
  }

  storeU8(addr: number, value: number): void {
    this.setByte(addr, value);
  }

  storeU16(addr: number, value: number): void {
    this.setHalf(addr, value);
  }

  storeU32(addr: number, value: number): void {
    this.setWord(addr, value);
  }

  // value = OR of byte[index+i] << 8i; any missing byte makes the whole read a miss
  private compose(index: number, width: number): number | undefined {
    let val = 0;
    for (let i = 0; i < width; i++) {
      const b = this.getByte((index + i) >>> 0);
      if (b === undefined) return undefined;
      val = (val | (b << (8 * i))) >>> 0;
    }
    return val;
  }

  private loadLE(addr: number, width: number): number {
    let val = 0;
    for (let i = 0; i < width; i++) {
      val = (val | (this.loadU8((addr + i) >>> 0) << (8 * i))) >>> 0;
    }
    return val;
  }

  private decompose(index: number, value: number, width: number): void {
    for (let i = 0; i < width; i++) {
      this.setByte((index + i) >>> 0, (value >>> (8 * i)) & 0xff);
    }
  }
}
