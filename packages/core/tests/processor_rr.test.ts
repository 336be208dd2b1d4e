import { describe, it, expect } from 'vitest';
import { Processor } from '../src/cpu/processor.js';

type RROp = 'add' | 'sub' | 'slt' | 'sltu' | 'and' | 'or' | 'xor' | 'sll' | 'srl' | 'sra';

function rrOp(op: RROp, a: number, b: number): number {
  const cpu = new Processor();
  cpu.set(1, a);
  cpu.set(2, b);
  cpu[op](3, 1, 2);
  return cpu.get(3);
}

describe('register file', () => {
  it('x0 reads zero and ignores writes', () => {
    const cpu = new Processor();
    cpu.set(0, 123);
    expect(cpu.get(0)).toBe(0);
    // Even a raw poke into slot 0 is never observed through get()
    cpu.regs[0] = 99;
    expect(cpu.get(0)).toBe(0);
    cpu.add(1, 0, 0);
    expect(cpu.get(1)).toBe(0);
  });

  it('stores values as 32-bit patterns', () => {
    const cpu = new Processor();
    cpu.set(5, -1);
    expect(cpu.get(5)).toBe(0xffffffff);
    cpu.set(6, 0x1_0000_0001);
    expect(cpu.get(6)).toBe(1);
  });

  it('keeps pc separate from the general registers', () => {
    const cpu = new Processor();
    cpu.pc = 0x400;
    for (let i = 0; i < 32; i++) expect(cpu.get(i)).toBe(0);
    cpu.reset();
    expect(cpu.pc).toBe(0);
  });

  it('never writes x0 for any destination-writing instruction', () => {
    const cpu = new Processor();
    cpu.set(1, 0x1234);
    cpu.set(2, 7);
    cpu.pc = 0x100;
    cpu.addi(0, 1, 5);
    cpu.slti(0, 0, 1);
    cpu.sltiu(0, 0, 1);
    cpu.andi(0, 1, 0xfff);
    cpu.ori(0, 1, 0xfff);
    cpu.xori(0, 1, 0xfff);
    cpu.slli(0, 1, 3);
    cpu.srli(0, 1, 3);
    cpu.srai(0, 1, 3);
    cpu.lui(0, 0xfffff);
    cpu.auipc(0, 0x1);
    cpu.add(0, 1, 2);
    cpu.sub(0, 1, 2);
    cpu.slt(0, 0, 2);
    cpu.sltu(0, 0, 2);
    cpu.and(0, 1, 2);
    cpu.or(0, 1, 2);
    cpu.xor(0, 1, 2);
    cpu.sll(0, 1, 2);
    cpu.srl(0, 1, 2);
    cpu.sra(0, 1, 2);
    cpu.jal(0, 8);
    cpu.jalr(0, 1, 0);
    expect(cpu.get(0)).toBe(0);
  });
});

describe('arithmetic', () => {
  it('ADD/SUB wrap modulo 2^32', () => {
    expect(rrOp('add', 0x7fffffff, 1)).toBe(0x80000000);
    expect(rrOp('add', 0xffffffff, 0xffffffff)).toBe(0xfffffffe);
    expect(rrOp('sub', 0, 1)).toBe(0xffffffff);
    expect(rrOp('sub', 0x80000000, 1)).toBe(0x7fffffff);
  });

  it('SLT is signed and SLTU unsigned', () => {
    expect(rrOp('slt', 0xffffffff, 1)).toBe(1);
    expect(rrOp('sltu', 0xffffffff, 1)).toBe(0);
    expect(rrOp('slt', 1, 0xffffffff)).toBe(0);
    expect(rrOp('sltu', 1, 0xffffffff)).toBe(1);
  });

  it('SLTU x0 acts as SNEZ', () => {
    const cpu = new Processor();
    cpu.set(2, 5);
    cpu.sltu(3, 0, 2);
    expect(cpu.get(3)).toBe(1);
    cpu.sltu(4, 0, 0);
    expect(cpu.get(4)).toBe(0);
  });

  it('AND/OR/XOR combine bit patterns', () => {
    expect(rrOp('and', 0xff00ff00, 0x0ff00ff0)).toBe(0x0f000f00);
    expect(rrOp('or', 0xff00ff00, 0x0ff00ff0)).toBe(0xfff0fff0);
    expect(rrOp('xor', 0xff00ff00, 0x0ff00ff0)).toBe(0xf0f0f0f0);
  });
});

describe('register shifts use the low 5 bits of rs2', () => {
  it('shifting by 32 is a shift by 0', () => {
    expect(rrOp('sll', 0x80000001, 32)).toBe(0x80000001);
    expect(rrOp('srl', 0x80000001, 32)).toBe(0x80000001);
    expect(rrOp('sra', 0x80000001, 32)).toBe(0x80000001);
  });

  it('shifting by 33 or 0xffffffe1 is a shift by 1', () => {
    for (const amt of [1, 33, 0xffffffe1]) {
      expect(rrOp('sll', 0x80000001, amt)).toBe(0x00000002);
      expect(rrOp('srl', 0x80000001, amt)).toBe(0x40000000);
      expect(rrOp('sra', 0x80000001, amt)).toBe(0xc0000000);
    }
  });
});

describe('end to end', () => {
  it('addi, addi, add', () => {
    const cpu = new Processor();
    cpu.addi(1, 0, 5);
    cpu.addi(2, 0, 3);
    cpu.add(3, 1, 2);
    expect(cpu.get(3)).toBe(8);
  });
});
