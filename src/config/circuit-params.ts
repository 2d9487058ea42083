import { ShapeError } from "../errors";

export type CircuitParams = {
  /** Longest scriptPubKey accepted; also the number of execution rows. */
  maxScriptPubkeySize: number;
  maxStackDepth: number;
  /** Signature slots; the ECDSA gadget runs exactly this many times. */
  maxChecksigCount: number;
};

const defaultCircuitParams: CircuitParams = {
  maxScriptPubkeySize: 520,
  maxStackDepth: 33,
  maxChecksigCount: 4,
};

let circuitParams: CircuitParams = { ...defaultCircuitParams };

const ensurePositiveInt = (name: string, value: number, min = 1) => {
  if (!Number.isInteger(value) || value < min)
    throw new ShapeError(`${name} must be an integer >= ${min}: ${value}`);
};

export const validateCircuitParams = (params: CircuitParams): CircuitParams => {
  ensurePositiveInt("maxScriptPubkeySize", params.maxScriptPubkeySize);
  ensurePositiveInt("maxStackDepth", params.maxStackDepth, 2);
  ensurePositiveInt("maxChecksigCount", params.maxChecksigCount);

  return params;
};

export const getCircuitParams = (): CircuitParams => circuitParams;

export const configureCircuitParams = (
  patch: Partial<CircuitParams>,
): CircuitParams => {
  circuitParams = validateCircuitParams({ ...circuitParams, ...patch });

  return circuitParams;
};

export const resetCircuitParams = (): CircuitParams => {
  circuitParams = { ...defaultCircuitParams };

  return circuitParams;
};
