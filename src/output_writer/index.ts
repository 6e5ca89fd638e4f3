// src/output_writer/index.ts

export { writeTextFileSync } from "./atomic_write";
export type { WriteTextResult } from "./atomic_write";
