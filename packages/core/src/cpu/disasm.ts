import { toInt32 } from '../utils/bit.js';
import type { Instruction } from './decode.js';

function x(r: number): string {
  return `x${r}`;
}

export function disassemble(instr: Instruction): string {
  const m = instr.op.toLowerCase();
  switch (instr.op) {
    case 'SLLI': case 'SRLI': case 'SRAI':
      return `${m} ${x(instr.rd)}, ${x(instr.rs1)}, ${instr.imm}`;
    case 'ADDI': case 'SLTI': case 'SLTIU': case 'XORI': case 'ORI': case 'ANDI': case 'JALR':
      return `${m} ${x(instr.rd)}, ${x(instr.rs1)}, ${toInt32(instr.imm)}`;
    case 'LB': case 'LH': case 'LW': case 'LBU': case 'LHU':
      return `${m} ${x(instr.rd)}, ${toInt32(instr.imm)}(${x(instr.rs1)})`;
    case 'SB': case 'SH': case 'SW':
      return `${m} ${x(instr.rs2)}, ${toInt32(instr.imm)}(${x(instr.rs1)})`;
    case 'ADD': case 'SUB': case 'SLL': case 'SLT': case 'SLTU': case 'XOR': case 'SRL': case 'SRA': case 'OR': case 'AND':
      return `${m} ${x(instr.rd)}, ${x(instr.rs1)}, ${x(instr.rs2)}`;
    case 'BEQ': case 'BNE': case 'BLT': case 'BGE': case 'BLTU': case 'BGEU':
      return `${m} ${x(instr.rs1)}, ${x(instr.rs2)}, ${toInt32(instr.imm)}`;
    case 'LUI': case 'AUIPC':
      return `${m} ${x(instr.rd)}, 0x${instr.imm.toString(16)}`;
    case 'JAL':
      return `${m} ${x(instr.rd)}, ${toInt32(instr.imm)}`;
    case 'FENCE': case 'ECALL': case 'EBREAK':
      return m;
  }
}
