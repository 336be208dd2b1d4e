import { signExtend } from '../utils/bit.js';
import { IllegalInstructionError } from './exceptions.js';

export type RegImmOp = 'ADDI' | 'SLTI' | 'SLTIU' | 'XORI' | 'ORI' | 'ANDI' | 'SLLI' | 'SRLI' | 'SRAI';
export type RegRegOp = 'ADD' | 'SUB' | 'SLL' | 'SLT' | 'SLTU' | 'XOR' | 'SRL' | 'SRA' | 'OR' | 'AND';
export type BranchOp = 'BEQ' | 'BNE' | 'BLT' | 'BGE' | 'BLTU' | 'BGEU';
export type LoadOp = 'LB' | 'LH' | 'LW' | 'LBU' | 'LHU';
export type StoreOp = 'SB' | 'SH' | 'SW';
export type UpperOp = 'LUI' | 'AUIPC';
export type SystemOp = 'FENCE' | 'ECALL' | 'EBREAK';

// `imm` is always a 32-bit pattern: sign-extended for I/S/B/J formats, the
// raw 20-bit field for U format, the 5-bit shamt for immediate shifts.
export type Instruction =
  | { op: RegImmOp; rd: number; rs1: number; imm: number }
  | { op: RegRegOp; rd: number; rs1: number; rs2: number }
  | { op: BranchOp; rs1: number; rs2: number; imm: number }
  | { op: LoadOp; rd: number; rs1: number; imm: number }
  | { op: StoreOp; rs1: number; rs2: number; imm: number }
  | { op: UpperOp; rd: number; imm: number }
  | { op: 'JAL'; rd: number; imm: number }
  | { op: 'JALR'; rd: number; rs1: number; imm: number }
  | { op: SystemOp };

// Major opcodes (instr[6:0])
export const OPC_LOAD = 0x03;
export const OPC_MISC_MEM = 0x0f;
export const OPC_OP_IMM = 0x13;
export const OPC_AUIPC = 0x17;
export const OPC_STORE = 0x23;
export const OPC_OP = 0x33;
export const OPC_LUI = 0x37;
export const OPC_BRANCH = 0x63;
export const OPC_JALR = 0x67;
export const OPC_JAL = 0x6f;
export const OPC_SYSTEM = 0x73;

export const WORD_ECALL = 0x00000073;
export const WORD_EBREAK = 0x00100073;

const BRANCH_BY_FUNCT3: ReadonlyArray<BranchOp | undefined> = ['BEQ', 'BNE', undefined, undefined, 'BLT', 'BGE', 'BLTU', 'BGEU'];
const LOAD_BY_FUNCT3: ReadonlyArray<LoadOp | undefined> = ['LB', 'LH', 'LW', undefined, 'LBU', 'LHU'];
const STORE_BY_FUNCT3: ReadonlyArray<StoreOp | undefined> = ['SB', 'SH', 'SW'];
const OP_IMM_BY_FUNCT3: ReadonlyArray<RegImmOp | undefined> = ['ADDI', undefined, 'SLTI', 'SLTIU', 'XORI', undefined, 'ORI', 'ANDI'];
const OP_BY_FUNCT3: ReadonlyArray<RegRegOp> = ['ADD', 'SLL', 'SLT', 'SLTU', 'XOR', 'SRL', 'OR', 'AND'];

export function immI(w: number): number {
  return signExtend(w >>> 20, 12);
}

export function immS(w: number): number {
  return signExtend(((w >>> 25) << 5) | ((w >>> 7) & 0x1f), 12);
}

export function immB(w: number): number {
  const v =
    (((w >>> 31) & 0x1) << 12) |
    (((w >>> 7) & 0x1) << 11) |
    (((w >>> 25) & 0x3f) << 5) |
    (((w >>> 8) & 0xf) << 1);
  return signExtend(v, 13);
}

export function immU(w: number): number {
  return (w >>> 12) & 0xfffff;
}

export function immJ(w: number): number {
  const v =
    (((w >>> 31) & 0x1) << 20) |
    (((w >>> 12) & 0xff) << 12) |
    (((w >>> 20) & 0x1) << 11) |
    (((w >>> 21) & 0x3ff) << 1);
  return signExtend(v, 21);
}

export function decode(word: number, pc: number | null = null): Instruction {
  const w = word >>> 0;
  const opcode = w & 0x7f;
  const rd = (w >>> 7) & 0x1f;
  const funct3 = (w >>> 12) & 0x7;
  const rs1 = (w >>> 15) & 0x1f;
  const rs2 = (w >>> 20) & 0x1f;
  const funct7 = (w >>> 25) & 0x7f;

  switch (opcode) {
    case OPC_LUI: return { op: 'LUI', rd, imm: immU(w) };
    case OPC_AUIPC: return { op: 'AUIPC', rd, imm: immU(w) };
    case OPC_JAL: return { op: 'JAL', rd, imm: immJ(w) };
    case OPC_JALR: {
      if (funct3 !== 0) break;
      return { op: 'JALR', rd, rs1, imm: immI(w) };
    }
    case OPC_BRANCH: {
      const op = BRANCH_BY_FUNCT3[funct3];
      if (!op) break;
      return { op, rs1, rs2, imm: immB(w) };
    }
    case OPC_LOAD: {
      const op = LOAD_BY_FUNCT3[funct3];
      if (!op) break;
      return { op, rd, rs1, imm: immI(w) };
    }
    case OPC_STORE: {
      const op = STORE_BY_FUNCT3[funct3];
      if (!op) break;
      return { op, rs1, rs2, imm: immS(w) };
    }
    case OPC_OP_IMM: {
      if (funct3 === 1) { // SLLI
        if (funct7 !== 0) break;
        return { op: 'SLLI', rd, rs1, imm: rs2 };
      }
      if (funct3 === 5) { // SRLI / SRAI
        if (funct7 === 0x00) return { op: 'SRLI', rd, rs1, imm: rs2 };
        if (funct7 === 0x20) return { op: 'SRAI', rd, rs1, imm: rs2 };
        break;
      }
      const op = OP_IMM_BY_FUNCT3[funct3];
      if (!op) break;
      return { op, rd, rs1, imm: immI(w) };
    }
    case OPC_OP: {
      if (funct7 === 0x20) {
        if (funct3 === 0) return { op: 'SUB', rd, rs1, rs2 };
        if (funct3 === 5) return { op: 'SRA', rd, rs1, rs2 };
        break;
      }
      if (funct7 !== 0) break; // M extension and others are not modelled
      const op = OP_BY_FUNCT3[funct3];
      if (!op) break;
      return { op, rd, rs1, rs2 };
    }
    case OPC_MISC_MEM: {
      if (funct3 !== 0) break;
      return { op: 'FENCE' };
    }
    case OPC_SYSTEM: {
      if (w === WORD_ECALL) return { op: 'ECALL' };
      if (w === WORD_EBREAK) return { op: 'EBREAK' };
      break; // CSR access is not modelled
    }
    default:
      break;
  }
  throw new IllegalInstructionError(w, pc);
}
