import { Memory } from '../mem/memory.js';
import { signExtend16, signExtend8, unsignedSignedAdd } from '../utils/bit.js';
import type { Instruction } from './decode.js';
import { Processor } from './processor.js';

// 'next': fall through to pc + 4
// 'jump': the instruction set pc itself (jump or taken branch)
// 'halt': ECALL/EBREAK, left to the caller
export type ExecuteResult = 'next' | 'jump' | 'halt';

export function execute(cpu: Processor, mem: Memory, instr: Instruction): ExecuteResult {
  switch (instr.op) {
    case 'ADDI': cpu.addi(instr.rd, instr.rs1, instr.imm); return 'next';
    case 'SLTI': cpu.slti(instr.rd, instr.rs1, instr.imm); return 'next';
    case 'SLTIU': cpu.sltiu(instr.rd, instr.rs1, instr.imm); return 'next';
    case 'XORI': cpu.xori(instr.rd, instr.rs1, instr.imm); return 'next';
    case 'ORI': cpu.ori(instr.rd, instr.rs1, instr.imm); return 'next';
    case 'ANDI': cpu.andi(instr.rd, instr.rs1, instr.imm); return 'next';
    case 'SLLI': cpu.slli(instr.rd, instr.rs1, instr.imm); return 'next';
    case 'SRLI': cpu.srli(instr.rd, instr.rs1, instr.imm); return 'next';
    case 'SRAI': cpu.srai(instr.rd, instr.rs1, instr.imm); return 'next';

    case 'LUI': cpu.lui(instr.rd, instr.imm); return 'next';
    case 'AUIPC': cpu.auipc(instr.rd, instr.imm); return 'next';

    case 'ADD': cpu.add(instr.rd, instr.rs1, instr.rs2); return 'next';
    case 'SUB': cpu.sub(instr.rd, instr.rs1, instr.rs2); return 'next';
    case 'SLL': cpu.sll(instr.rd, instr.rs1, instr.rs2); return 'next';
    case 'SLT': cpu.slt(instr.rd, instr.rs1, instr.rs2); return 'next';
    case 'SLTU': cpu.sltu(instr.rd, instr.rs1, instr.rs2); return 'next';
    case 'XOR': cpu.xor(instr.rd, instr.rs1, instr.rs2); return 'next';
    case 'SRL': cpu.srl(instr.rd, instr.rs1, instr.rs2); return 'next';
    case 'SRA': cpu.sra(instr.rd, instr.rs1, instr.rs2); return 'next';
    case 'OR': cpu.or(instr.rd, instr.rs1, instr.rs2); return 'next';
    case 'AND': cpu.and(instr.rd, instr.rs1, instr.rs2); return 'next';

    case 'JAL': cpu.jal(instr.rd, instr.imm); return 'jump';
    case 'JALR': cpu.jalr(instr.rd, instr.rs1, instr.imm); return 'jump';

    case 'BEQ': return cpu.beq(instr.rs1, instr.rs2, instr.imm) ? 'jump' : 'next';
    case 'BNE': return cpu.bne(instr.rs1, instr.rs2, instr.imm) ? 'jump' : 'next';
    case 'BLT': return cpu.blt(instr.rs1, instr.rs2, instr.imm) ? 'jump' : 'next';
    case 'BGE': return cpu.bge(instr.rs1, instr.rs2, instr.imm) ? 'jump' : 'next';
    case 'BLTU': return cpu.bltu(instr.rs1, instr.rs2, instr.imm) ? 'jump' : 'next';
    case 'BGEU': return cpu.bgeu(instr.rs1, instr.rs2, instr.imm) ? 'jump' : 'next';

    case 'LB': cpu.set(instr.rd, signExtend8(mem.loadU8(effectiveAddress(cpu, instr.rs1, instr.imm)))); return 'next';
    case 'LH': cpu.set(instr.rd, signExtend16(mem.loadU16(effectiveAddress(cpu, instr.rs1, instr.imm)))); return 'next';
    case 'LW': cpu.set(instr.rd, mem.loadU32(effectiveAddress(cpu, instr.rs1, instr.imm))); return 'next';
    case 'LBU': cpu.set(instr.rd, mem.loadU8(effectiveAddress(cpu, instr.rs1, instr.imm))); return 'next';
    case 'LHU': cpu.set(instr.rd, mem.loadU16(effectiveAddress(cpu, instr.rs1, instr.imm))); return 'next';

    case 'SB': mem.storeU8(effectiveAddress(cpu, instr.rs1, instr.imm), cpu.get(instr.rs2)); return 'next';
    case 'SH': mem.storeU16(effectiveAddress(cpu, instr.rs1, instr.imm), cpu.get(instr.rs2)); return 'next';
    case 'SW': mem.storeU32(effectiveAddress(cpu, instr.rs1, instr.imm), cpu.get(instr.rs2)); return 'next';

    case 'FENCE': return 'next'; // single hart, no reordering to order
    case 'ECALL':
    case 'EBREAK':
      return 'halt';
  }
}

function effectiveAddress(cpu: Processor, base: number, imm: number): number {
  return unsignedSignedAdd(cpu.get(base), imm);
}
