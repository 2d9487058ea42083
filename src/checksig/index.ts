export * from "./sign-data";
export * from "./pk-collector";
export * from "./range-chip";
export * from "./ecdsa-chip";
export * from "./checksig-chip";
