import { OPC_BRANCH, OPC_JAL, OPC_JALR, OPC_LOAD, OPC_LUI, OPC_AUIPC, OPC_OP, OPC_OP_IMM, OPC_STORE, WORD_EBREAK, WORD_ECALL } from '../cpu/decode.js';

// Instruction word builders. Immediates may be given signed or as raw bit
// patterns; only the bits the format carries are kept.

export function encodeR(opcode: number, rd: number, funct3: number, rs1: number, rs2: number, funct7: number): number {
  return (((funct7 & 0x7f) << 25) | ((rs2 & 0x1f) << 20) | ((rs1 & 0x1f) << 15) | ((funct3 & 0x7) << 12) | ((rd & 0x1f) << 7) | (opcode & 0x7f)) >>> 0;
}

export function encodeI(opcode: number, rd: number, funct3: number, rs1: number, imm: number): number {
  return (((imm & 0xfff) << 20) | ((rs1 & 0x1f) << 15) | ((funct3 & 0x7) << 12) | ((rd & 0x1f) << 7) | (opcode & 0x7f)) >>> 0;
}

export function encodeS(opcode: number, funct3: number, rs1: number, rs2: number, imm: number): number {
  const hi = (imm >> 5) & 0x7f;
  const lo = imm & 0x1f;
  return ((hi << 25) | ((rs2 & 0x1f) << 20) | ((rs1 & 0x1f) << 15) | ((funct3 & 0x7) << 12) | (lo << 7) | (opcode & 0x7f)) >>> 0;
}

// imm is a byte offset; bit 0 is dropped
export function encodeB(opcode: number, funct3: number, rs1: number, rs2: number, imm: number): number {
  const b12 = (imm >> 12) & 0x1;
  const b11 = (imm >> 11) & 0x1;
  const b10_5 = (imm >> 5) & 0x3f;
  const b4_1 = (imm >> 1) & 0xf;
  return ((b12 << 31) | (b10_5 << 25) | ((rs2 & 0x1f) << 20) | ((rs1 & 0x1f) << 15) | ((funct3 & 0x7) << 12) | (b4_1 << 8) | (b11 << 7) | (opcode & 0x7f)) >>> 0;
}

// imm is the 20-bit upper immediate (not pre-shifted)
export function encodeU(opcode: number, rd: number, imm: number): number {
  return (((imm & 0xfffff) << 12) | ((rd & 0x1f) << 7) | (opcode & 0x7f)) >>> 0;
}

export function encodeJ(opcode: number, rd: number, imm: number): number {
  const b20 = (imm >> 20) & 0x1;
  const b19_12 = (imm >> 12) & 0xff;
  const b11 = (imm >> 11) & 0x1;
  const b10_1 = (imm >> 1) & 0x3ff;
  return ((b20 << 31) | (b10_1 << 21) | (b11 << 20) | (b19_12 << 12) | ((rd & 0x1f) << 7) | (opcode & 0x7f)) >>> 0;
}

export function LUI(rd: number, imm20: number) { return encodeU(OPC_LUI, rd, imm20); }
export function AUIPC(rd: number, imm20: number) { return encodeU(OPC_AUIPC, rd, imm20); }
export function JAL(rd: number, offset: number) { return encodeJ(OPC_JAL, rd, offset); }
export function JALR(rd: number, rs1: number, imm: number) { return encodeI(OPC_JALR, rd, 0, rs1, imm); }

export function BEQ(rs1: number, rs2: number, offset: number) { return encodeB(OPC_BRANCH, 0, rs1, rs2, offset); }
export function BNE(rs1: number, rs2: number, offset: number) { return encodeB(OPC_BRANCH, 1, rs1, rs2, offset); }
export function BLT(rs1: number, rs2: number, offset: number) { return encodeB(OPC_BRANCH, 4, rs1, rs2, offset); }
export function BGE(rs1: number, rs2: number, offset: number) { return encodeB(OPC_BRANCH, 5, rs1, rs2, offset); }
export function BLTU(rs1: number, rs2: number, offset: number) { return encodeB(OPC_BRANCH, 6, rs1, rs2, offset); }
export function BGEU(rs1: number, rs2: number, offset: number) { return encodeB(OPC_BRANCH, 7, rs1, rs2, offset); }

export function LB(rd: number, rs1: number, imm: number) { return encodeI(OPC_LOAD, rd, 0, rs1, imm); }
export function LH(rd: number, rs1: number, imm: number) { return encodeI(OPC_LOAD, rd, 1, rs1, imm); }
export function LW(rd: number, rs1: number, imm: number) { return encodeI(OPC_LOAD, rd, 2, rs1, imm); }
export function LBU(rd: number, rs1: number, imm: number) { return encodeI(OPC_LOAD, rd, 4, rs1, imm); }
export function LHU(rd: number, rs1: number, imm: number) { return encodeI(OPC_LOAD, rd, 5, rs1, imm); }
export function SB(rs2: number, rs1: number, imm: number) { return encodeS(OPC_STORE, 0, rs1, rs2, imm); }
export function SH(rs2: number, rs1: number, imm: number) { return encodeS(OPC_STORE, 1, rs1, rs2, imm); }
export function SW(rs2: number, rs1: number, imm: number) { return encodeS(OPC_STORE, 2, rs1, rs2, imm); }

export function ADDI(rd: number, rs1: number, imm: number) { return encodeI(OPC_OP_IMM, rd, 0, rs1, imm); }
export function SLTI(rd: number, rs1: number, imm: number) { return encodeI(OPC_OP_IMM, rd, 2, rs1, imm); }
export function SLTIU(rd: number, rs1: number, imm: number) { return encodeI(OPC_OP_IMM, rd, 3, rs1, imm); }
export function XORI(rd: number, rs1: number, imm: number) { return encodeI(OPC_OP_IMM, rd, 4, rs1, imm); }
export function ORI(rd: number, rs1: number, imm: number) { return encodeI(OPC_OP_IMM, rd, 6, rs1, imm); }
export function ANDI(rd: number, rs1: number, imm: number) { return encodeI(OPC_OP_IMM, rd, 7, rs1, imm); }
export function SLLI(rd: number, rs1: number, shamt: number) { return encodeR(OPC_OP_IMM, rd, 1, rs1, shamt, 0x00); }
export function SRLI(rd: number, rs1: number, shamt: number) { return encodeR(OPC_OP_IMM, rd, 5, rs1, shamt, 0x00); }
export function SRAI(rd: number, rs1: number, shamt: number) { return encodeR(OPC_OP_IMM, rd, 5, rs1, shamt, 0x20); }

export function ADD(rd: number, rs1: number, rs2: number) { return encodeR(OPC_OP, rd, 0, rs1, rs2, 0x00); }
export function SUB(rd: number, rs1: number, rs2: number) { return encodeR(OPC_OP, rd, 0, rs1, rs2, 0x20); }
export function SLL(rd: number, rs1: number, rs2: number) { return encodeR(OPC_OP, rd, 1, rs1, rs2, 0x00); }
export function SLT(rd: number, rs1: number, rs2: number) { return encodeR(OPC_OP, rd, 2, rs1, rs2, 0x00); }
export function SLTU(rd: number, rs1: number, rs2: number) { return encodeR(OPC_OP, rd, 3, rs1, rs2, 0x00); }
export function XOR(rd: number, rs1: number, rs2: number) { return encodeR(OPC_OP, rd, 4, rs1, rs2, 0x00); }
export function SRL(rd: number, rs1: number, rs2: number) { return encodeR(OPC_OP, rd, 5, rs1, rs2, 0x00); }
export function SRA(rd: number, rs1: number, rs2: number) { return encodeR(OPC_OP, rd, 5, rs1, rs2, 0x20); }
export function OR(rd: number, rs1: number, rs2: number) { return encodeR(OPC_OP, rd, 6, rs1, rs2, 0x00); }
export function AND(rd: number, rs1: number, rs2: number) { return encodeR(OPC_OP, rd, 7, rs1, rs2, 0x00); }

export function FENCE() { return 0x0ff0000f; }
export function ECALL() { return WORD_ECALL; }
export function EBREAK() { return WORD_EBREAK; }
