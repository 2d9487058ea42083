export * from "./is-zero";
export * from "./opcode-table";
export * from "./parity-table";
