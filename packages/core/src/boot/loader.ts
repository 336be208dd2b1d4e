import { Memory } from '../mem/memory.js';

// Copy a raw binary image into memory starting at `base`.
// Returns the address one past the last byte written.
export function loadImage(mem: Memory, bytes: Uint8Array, base = 0): number {
  const start = base >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    mem.setByte((start + i) >>> 0, bytes[i] ?? 0);
  }
  return (start + bytes.length) >>> 0;
}

export function loadWords(mem: Memory, words: readonly number[], base = 0): number {
  const start = base >>> 0;
  for (let i = 0; i < words.length; i++) {
    mem.setWord((start + i * 4) >>> 0, (words[i] ?? 0) >>> 0);
  }
  return (start + words.length * 4) >>> 0;
}
