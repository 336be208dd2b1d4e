import { describe, it, expect } from 'vitest';
import { Processor } from '../src/cpu/processor.js';
import { signExtend, unsignedSignedAdd } from '../src/utils/bit.js';

describe('unsignedSignedAdd', () => {
  it('adds non-negative offsets and subtracts negative ones, wrapping', () => {
    expect(unsignedSignedAdd(0, 0x7ff)).toBe(0x7ff);
    expect(unsignedSignedAdd(0, 0xffffffff)).toBe(0xffffffff);
    expect(unsignedSignedAdd(0x10, -0x20)).toBe(0xfffffff0);
    expect(unsignedSignedAdd(0xffffffff, 1)).toBe(0);
    expect(unsignedSignedAdd(0, 0x80000000)).toBe(0x80000000);
    expect(unsignedSignedAdd(0x80000000, 0x80000000)).toBe(0);
  });
});

describe('JAL', () => {
  it('links pc+4 and jumps by the signed offset', () => {
    const cpu = new Processor();
    cpu.jal(1, signExtend(0x7ff, 12));
    expect(cpu.get(1)).toBe(4);
    expect(cpu.pc).toBe(unsignedSignedAdd(0, signExtend(0x7ff, 12)));
    expect(cpu.pc).toBe(0x7ff);
  });

  it('jumps backwards', () => {
    const cpu = new Processor();
    cpu.pc = 0x100;
    cpu.jal(1, -8 >>> 0);
    expect(cpu.pc).toBe(0xf8);
    expect(cpu.get(1)).toBe(0x104);
  });

  it('J (rd = x0) discards the link and wraps below zero', () => {
    const cpu = new Processor();
    cpu.jal(0, -4 >>> 0);
    expect(cpu.pc).toBe(0xfffffffc);
    expect(cpu.get(0)).toBe(0);
  });
});

describe('JALR', () => {
  it('jumps to rs1 + offset and links pc+4', () => {
    const cpu = new Processor();
    cpu.set(5, 0x1000);
    cpu.pc = 0x40;
    cpu.jalr(1, 5, -4 >>> 0);
    expect(cpu.pc).toBe(0xffc);
    expect(cpu.get(1)).toBe(0x44);
  });

  it('clears bit 0 of the target', () => {
    const cpu = new Processor();
    cpu.set(5, 0x1001);
    cpu.jalr(0, 5, 0);
    expect(cpu.pc).toBe(0x1000);
  });

  it('reads rs1 before writing rd when they are the same register', () => {
    const cpu = new Processor();
    cpu.set(1, 0x200);
    cpu.pc = 0x10;
    cpu.jalr(1, 1, 0);
    expect(cpu.pc).toBe(0x200);
    expect(cpu.get(1)).toBe(0x14);
  });
});

describe('conditional branches', () => {
  function setup(a: number, b: number): Processor {
    const cpu = new Processor();
    cpu.set(1, a);
    cpu.set(2, b);
    cpu.pc = 0x100;
    return cpu;
  }

  it('BEQ/BNE', () => {
    let cpu = setup(5, 5);
    expect(cpu.beq(1, 2, 16)).toBe(true);
    expect(cpu.pc).toBe(0x110);
    cpu = setup(5, 5);
    expect(cpu.bne(1, 2, 16)).toBe(false);
    expect(cpu.pc).toBe(0x100);
  });

  it('BLT/BGE compare signed, BLTU/BGEU unsigned', () => {
    let cpu = setup(0xffffffff, 1);
    expect(cpu.blt(1, 2, 8)).toBe(true);
    expect(cpu.pc).toBe(0x108);

    cpu = setup(0xffffffff, 1);
    expect(cpu.bltu(1, 2, 8)).toBe(false);
    expect(cpu.pc).toBe(0x100);

    cpu = setup(1, 0xffffffff);
    expect(cpu.bltu(1, 2, 8)).toBe(true);
    expect(cpu.pc).toBe(0x108);

    cpu = setup(0xffffffff, 1);
    expect(cpu.bge(2, 1, 8)).toBe(true);
    expect(cpu.pc).toBe(0x108);

    cpu = setup(0xffffffff, 1);
    expect(cpu.bgeu(1, 2, 8)).toBe(true);
    expect(cpu.pc).toBe(0x108);

    cpu = setup(0xffffffff, 1);
    expect(cpu.bge(1, 2, 8)).toBe(false);
    expect(cpu.bgeu(2, 1, 8)).toBe(false);
    expect(cpu.pc).toBe(0x100);
  });

  it('BEQ falls through on unequal values', () => {
    const cpu = setup(5, 6);
    expect(cpu.beq(1, 2, 16)).toBe(false);
    expect(cpu.pc).toBe(0x100);
  });

  it('BGE/BGEU are taken on equality', () => {
    const cpu = setup(7, 7);
    expect(cpu.bge(1, 2, 4)).toBe(true);
    expect(cpu.bgeu(1, 2, 4)).toBe(true);
    expect(cpu.pc).toBe(0x108);
  });

  it('branches backwards with a negative offset', () => {
    const cpu = setup(0, 0);
    expect(cpu.beq(0, 0, 0xffffff00)).toBe(true);
    expect(cpu.pc).toBe(0);
  });
});
