// src/output_writer/index.ts

export {
    atomicWriteFileSync,
    atomicCreateFileSync,
    atomicWriteJsonSync,
    errnoCode,
} from "./atomic_write";
export type { AtomicWriteParams } from "./atomic_write";
export { stableStringify } from "./stable_stringify";
