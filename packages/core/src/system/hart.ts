import { Processor } from '../cpu/processor.js';
import { Memory } from '../mem/memory.js';
import { decode, type Instruction } from '../cpu/decode.js';
import { execute } from '../cpu/execute.js';
import { IllegalInstructionError } from '../cpu/exceptions.js';
import { hex32 } from '../utils/bit.js';

export type HartOptions = {
  entry?: number;
  // Called with the address, raw word and decoded form of each instruction before it executes
  onTrace?: (pc: number, word: number, instr: Instruction) => void;
};

export type StopReason = 'ecall' | 'ebreak' | 'illegal' | 'step-limit';

export type StepResult =
  | { kind: 'ok' }
  | { kind: 'halt'; reason: 'ecall' | 'ebreak' }
  | { kind: 'illegal'; error: IllegalInstructionError };

export type RunResult = {
  steps: number;
  stopReason: StopReason;
  pc: number;
  error?: IllegalInstructionError;
};

// A single hart: one Processor driven by fetch/decode/execute against Memory.
export class Hart {
  onTrace?: (pc: number, word: number, instr: Instruction) => void;
  retired = 0;

  constructor(public readonly cpu: Processor, public readonly mem: Memory, opts?: HartOptions) {
    this.onTrace = opts?.onTrace;
    this.cpu.pc = (opts?.entry ?? 0) >>> 0;
  }

  step(): StepResult {
    const instrPC = this.cpu.pc >>> 0;
    const word = this.mem.loadU32(instrPC);
    let instr: Instruction;
    try {
      instr = decode(word, instrPC);
    } catch (e) {
      if (e instanceof IllegalInstructionError) {
        if (process.env.RV32_DEBUG) {
          // eslint-disable-next-line no-console
          console.log(`[hart] ${e.message}`);
        }
        return { kind: 'illegal', error: e };
      }
      throw e;
    }
    if (this.onTrace) this.onTrace(instrPC, word, instr);

    const res = execute(this.cpu, this.mem, instr);
    this.retired++;
    if (res === 'halt') {
      // pc stays on the ECALL/EBREAK so the caller can inspect it
      return { kind: 'halt', reason: instr.op === 'ECALL' ? 'ecall' : 'ebreak' };
    }
    if (res === 'next') this.cpu.pc = (instrPC + 4) >>> 0;
    return { kind: 'ok' };
  }

  run(maxSteps: number): RunResult {
    let steps = 0;
    while (steps < maxSteps) {
      const r = this.step();
      if (r.kind === 'illegal') {
        return { steps, stopReason: 'illegal', pc: this.cpu.pc >>> 0, error: r.error };
      }
      steps++;
      if (r.kind === 'halt') {
        return { steps, stopReason: r.reason, pc: this.cpu.pc >>> 0 };
      }
    }
    if (process.env.RV32_DEBUG) {
      // eslint-disable-next-line no-console
      console.log(`[hart] step limit ${maxSteps} reached at pc=${hex32(this.cpu.pc)}`);
    }
    return { steps, stopReason: 'step-limit', pc: this.cpu.pc >>> 0 };
  }
}
