#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { Hart, Memory, Processor, decode, disassemble, hex32, loadImage, IllegalInstructionError } from '@rv32/core';
import { type DumpRange, MAX_DUMP_LENGTH, crc32, hexDump, parseDumpRange, parseFlags, parseNum, readBytes, registerReport } from './lib.js';

const DEFAULT_STEPS = 1_000_000;

function printUsage() {
  console.log(`Usage:
  npm run headless -- run <image.bin> [--base 0xADDR] [--entry 0xADDR] [--steps N] [--trace] [--dump 0xADDR:LEN]
  npm run headless -- disasm <image.bin> [--base 0xADDR]

Runs a raw RV32I binary image loaded at --base (default 0). Execution starts at
--entry (default: --base) and stops on ecall, ebreak, an illegal instruction,
or after --steps instructions.

Examples:
  npm run headless -- run prog.bin --steps 1000
  npm run headless -- run --trace prog.bin --base 0x1000 --dump 0x2000:64
  npm run headless -- disasm prog.bin --base 0x1000
`);
}

async function runImage(args: string[]) {
  const { opts, positional } = parseFlags(args);
  const file = positional[0];
  if (!file) {
    console.error('run requires a binary image path');
    process.exitCode = 1;
    return;
  }
  const base = parseNum(opts['base'], 0);
  const entry = parseNum(opts['entry'], base);
  const maxSteps = parseNum(opts['steps'], DEFAULT_STEPS);
  const trace = opts['trace'] !== undefined;
  const dumpSpec = opts['dump'];
  let dump: DumpRange | null = null;
  if (dumpSpec !== undefined) {
    dump = parseDumpRange(dumpSpec);
    if (!dump) {
      console.error(`Bad --dump value ${dumpSpec} (expected 0xADDR:LEN, LEN 1..${MAX_DUMP_LENGTH})`);
      process.exitCode = 1;
      return;
    }
  }

  const image = new Uint8Array(await readFile(file));
  const mem = new Memory();
  const end = loadImage(mem, image, base);
  console.log(`[load] ${file}: ${image.length} bytes at ${hex32(base)}..${hex32(end)}`);

  const cpu = new Processor();
  const hart = new Hart(cpu, mem, {
    entry,
    onTrace: trace
      ? (pc, word, instr) => console.log(`[trace] ${hex32(pc)}: ${hex32(word)}  ${disassemble(instr)}`)
      : undefined,
  });
  const res = hart.run(maxSteps);

  let dumpOut: { addr: string; length: number; crc32: string; lines: string[] } | undefined;
  if (dump) {
    const bytes = readBytes(mem, dump);
    dumpOut = { addr: hex32(dump.addr), length: dump.length, crc32: crc32(bytes), lines: hexDump(bytes, dump.addr) };
  }

  console.log(JSON.stringify({
    command: 'run',
    image: file,
    base: hex32(base),
    entry: hex32(entry),
    steps: res.steps,
    stopReason: res.stopReason,
    endPC: hex32(res.pc),
    error: res.error ? res.error.message : undefined,
    registers: registerReport(cpu),
    slabs: mem.slabCount,
    dump: dumpOut,
  }, null, 2));
}

async function disasmImage(args: string[]) {
  const { opts, positional } = parseFlags(args);
  const file = positional[0];
  if (!file) {
    console.error('disasm requires a binary image path');
    process.exitCode = 1;
    return;
  }
  const base = parseNum(opts['base'], 0);
  const image = new Uint8Array(await readFile(file));
  const mem = new Memory();
  loadImage(mem, image, base);
  for (let off = 0; off + 4 <= image.length; off += 4) {
    const pc = (base + off) >>> 0;
    const word = mem.loadU32(pc);
    let text: string;
    try {
      text = disassemble(decode(word, pc));
    } catch (e) {
      if (!(e instanceof IllegalInstructionError)) throw e;
      text = '.word';
    }
    console.log(`${hex32(pc)}: ${hex32(word)}  ${text}`);
  }
}

async function main() {
  const argv = process.argv.slice(2);
  const cmd = argv[0];
  if (!cmd || cmd === 'help' || cmd === '-h' || cmd === '--help') {
    printUsage();
    return;
  }
  if (cmd === 'run') {
    await runImage(argv.slice(1));
    return;
  }
  if (cmd === 'disasm') {
    await disasmImage(argv.slice(1));
    return;
  }
  printUsage();
  process.exitCode = 1;
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
