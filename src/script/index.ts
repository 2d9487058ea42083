export * from "./interpreter";
export * from "./build/script-builder";
export * from "./read/script-reader";
export * from "./read/script-read-token";
