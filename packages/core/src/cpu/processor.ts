import { toInt32, toUint32, unsignedSignedAdd } from '../utils/bit.js';

// General register index, 0..31. x0 is hard-wired to zero.
export type Register = number;

// RV32I base integer hart state and per-mnemonic state transitions.
// Register contents are raw 32-bit patterns; each operation picks the signed
// or unsigned view it needs. Immediates arrive already sign-extended by the
// decoder where the format is signed.
export class Processor {
  readonly regs = new Uint32Array(32);
  pc = 0 >>> 0;

  reset(): void {
    this.regs.fill(0);
    this.pc = 0;
  }

  get(reg: Register): number {
    if (reg === 0) return 0;
    return (this.regs[reg] ?? 0) >>> 0;
  }

  set(reg: Register, value: number): void {
    if (reg === 0) return; // x0 is immutable
    this.regs[reg] = toUint32(value);
  }

  // --- Register-immediate ---

  // Overflow is ignored. `ADDI rd, rs1, 0` == `MV rd, rs1`
  addi(rd: Register, rs1: Register, imm: number): void {
    this.set(rd, (toInt32(this.get(rs1)) + toInt32(imm)) >>> 0);
  }

  slti(rd: Register, rs1: Register, imm: number): void {
    this.set(rd, toInt32(this.get(rs1)) < toInt32(imm) ? 1 : 0);
  }

  // `SLTIU rd, rs1, 1` == `SEQZ rd, rs1`
  sltiu(rd: Register, rs1: Register, imm: number): void {
    this.set(rd, this.get(rs1) < toUint32(imm) ? 1 : 0);
  }

  andi(rd: Register, rs1: Register, imm: number): void {
    this.set(rd, this.get(rs1) & imm);
  }

  ori(rd: Register, rs1: Register, imm: number): void {
    this.set(rd, this.get(rs1) | imm);
  }

  // `XORI rd, rs1, -1` == `NOT rd, rs1`
  xori(rd: Register, rs1: Register, imm: number): void {
    this.set(rd, this.get(rs1) ^ imm);
  }

  slli(rd: Register, rs1: Register, imm: number): void {
    this.set(rd, this.get(rs1) << (imm & 0x1f));
  }

  srli(rd: Register, rs1: Register, imm: number): void {
    this.set(rd, this.get(rs1) >>> (imm & 0x1f));
  }

  srai(rd: Register, rs1: Register, imm: number): void {
    this.set(rd, toInt32(this.get(rs1)) >> (imm & 0x1f));
  }

  // imm holds the 20-bit upper immediate in its low bits
  lui(rd: Register, imm: number): void {
    this.set(rd, imm << 12);
  }

  auipc(rd: Register, imm: number): void {
    this.set(rd, ((imm << 12) + this.pc) >>> 0);
  }

  // --- Register-register ---

  add(rd: Register, rs1: Register, rs2: Register): void {
    this.set(rd, (this.get(rs1) + this.get(rs2)) >>> 0);
  }

  sub(rd: Register, rs1: Register, rs2: Register): void {
    this.set(rd, (this.get(rs1) - this.get(rs2)) >>> 0);
  }

  slt(rd: Register, rs1: Register, rs2: Register): void {
    this.set(rd, toInt32(this.get(rs1)) < toInt32(this.get(rs2)) ? 1 : 0);
  }

  // `SLTU rd, x0, rs2` == `SNEZ rd, rs2`
  sltu(rd: Register, rs1: Register, rs2: Register): void {
    this.set(rd, this.get(rs1) < this.get(rs2) ? 1 : 0);
  }

  and(rd: Register, rs1: Register, rs2: Register): void {
    this.set(rd, this.get(rs1) & this.get(rs2));
  }

  or(rd: Register, rs1: Register, rs2: Register): void {
    this.set(rd, this.get(rs1) | this.get(rs2));
  }

  xor(rd: Register, rs1: Register, rs2: Register): void {
    this.set(rd, this.get(rs1) ^ this.get(rs2));
  }

  sll(rd: Register, rs1: Register, rs2: Register): void {
    this.set(rd, this.get(rs1) << (this.get(rs2) & 0b11111));
  }

  srl(rd: Register, rs1: Register, rs2: Register): void {
    this.set(rd, this.get(rs1) >>> (this.get(rs2) & 0b11111));
  }

  sra(rd: Register, rs1: Register, rs2: Register): void {
    this.set(rd, toInt32(this.get(rs1)) >> (this.get(rs2) & 0b11111));
  }

  // --- Control transfer ---

  // `JAL x0, imm` == `J imm`
  jal(rd: Register, imm: number): void {
    const current = this.pc;
    this.set(rd, (current + 4) >>> 0);
    this.pc = unsignedSignedAdd(current, imm);
  }

  // Target is read from rs1 before rd is written, so `jalr x1, x1, 0` works.
  // Bit 0 of the target is cleared.
  jalr(rd: Register, rs1: Register, imm: number): void {
    const target = (unsignedSignedAdd(this.get(rs1), imm) & ~1) >>> 0;
    this.set(rd, (this.pc + 4) >>> 0);
    this.pc = target;
  }

  beq(rs1: Register, rs2: Register, imm: number): boolean {
    return this.branchIf(this.get(rs1) === this.get(rs2), imm);
  }

  bne(rs1: Register, rs2: Register, imm: number): boolean {
    return this.branchIf(this.get(rs1) !== this.get(rs2), imm);
  }

  blt(rs1: Register, rs2: Register, imm: number): boolean {
    return this.branchIf(toInt32(this.get(rs1)) < toInt32(this.get(rs2)), imm);
  }

  bltu(rs1: Register, rs2: Register, imm: number): boolean {
    return this.branchIf(this.get(rs1) < this.get(rs2), imm);
  }

  bge(rs1: Register, rs2: Register, imm: number): boolean {
    return this.branchIf(toInt32(this.get(rs1)) >= toInt32(this.get(rs2)), imm);
  }

  bgeu(rs1: Register, rs2: Register, imm: number): boolean {
    return this.branchIf(this.get(rs1) >= this.get(rs2), imm);
  }

  // Not-taken branches leave pc alone; the fetch loop advances it.
  private branchIf(cond: boolean, imm: number): boolean {
    if (cond) this.pc = unsignedSignedAdd(this.pc, imm);
    return cond;
  }
}
