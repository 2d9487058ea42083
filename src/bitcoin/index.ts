export * from "./op-codes";
export * from "./private-key";
