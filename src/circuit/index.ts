export * from "./columns";
export * from "./expression";
export * from "./constraint-system";
export * from "./layouter";
export * from "./mock-prover";
export * from "./script-ownership-circuit";
