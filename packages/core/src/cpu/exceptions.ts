import { hex32 } from '../utils/bit.js';

export class IllegalInstructionError extends Error {
  constructor(public readonly word: number, public readonly pc: number | null = null) {
    super(pc === null ? `Illegal instruction ${hex32(word)}` : `Illegal instruction ${hex32(word)} at ${hex32(pc)}`);
    this.name = 'IllegalInstructionError';
  }
}
