export * from './utils/bit.js';
export * from './mem/memory.js';
export * from './cpu/processor.js';
export * from './cpu/exceptions.js';
export * from './cpu/decode.js';
export * from './cpu/execute.js';
export * from './cpu/disasm.js';
export * from './system/hart.js';
export * from './boot/loader.js';
export * as asm from './asm/encode.js';
