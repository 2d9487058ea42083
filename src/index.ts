export * from "./bitcoin";
export * from "./bytes";
export * from "./binary";
export * from "./errors";
export * from "./logger";
export * from "./config/circuit-params";
export * as fr from "./field/fr";
export * from "./field/rlc";
export * from "./circuit";
export * from "./gadgets";
export * from "./script";
export * from "./execution/execution-chip";
export * from "./checksig";
