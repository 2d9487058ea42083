import createDebugLogger from "debug";

const NAMESPACE = "script-circuit";

export const createLogger = (scope: string) =>
  createDebugLogger(`${NAMESPACE}:${scope}`);
