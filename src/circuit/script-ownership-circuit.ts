import { Bytes } from "../bytes";
import { CircuitParams, getCircuitParams } from "../config/circuit-params";
import { CheckSigChip, CheckSigConfig } from "../checksig/checksig-chip";
import {
  CollectedPublicKey,
  collectPublicKeys,
  StackElement,
  toSignatureFlags,
} from "../checksig/pk-collector";
import { SignData } from "../checksig/sign-data";
import { ShapeError } from "../errors";
import { ExecutionChip, ExecutionConfig } from "../execution/execution-chip";
import { fromNumber } from "../field/fr";
import { interpretScript, ScriptTrace } from "../script/interpreter";
import { Circuit, ConstraintSystem } from "./constraint-system";
import { Layouter } from "./layouter";
import { MockProver, VerifyFailure } from "./mock-prover";

export type OwnershipInput = {
  script: Bytes;
  randomness: bigint;
  /** Top first. */
  initialStack: StackElement[];
  signatures: SignData[];
};

export type OwnershipWitness = OwnershipInput & {
  collectedKeys: CollectedPublicKey[];
};

export type ScriptOwnershipConfig = {
  execution: ExecutionConfig;
  checksig: CheckSigConfig;
};

/**
 * Execution region and checksig bridge, joined at the execution terminal
 * row: key accumulator, checksig count and randomness must agree.
 */
export class ScriptOwnershipCircuit implements Circuit<ScriptOwnershipConfig> {
  readonly params: CircuitParams;
  readonly trace: ScriptTrace;
  readonly signatures: SignData[];
  readonly collectedKeys: CollectedPublicKey[];

  private constructor(
    params: CircuitParams,
    trace: ScriptTrace,
    signatures: SignData[],
    collectedKeys: CollectedPublicKey[],
  ) {
    this.params = params;
    this.trace = trace;
    this.signatures = signatures;
    this.collectedKeys = collectedKeys;
  }

  static fromWitness = (
    witness: OwnershipWitness,
    params: CircuitParams = getCircuitParams(),
  ) => {
    if (witness.signatures.length > params.maxChecksigCount)
      throw new ShapeError(
        `${witness.signatures.length} signatures exceed the ${params.maxChecksigCount} checksig slots`,
      );

    const trace = interpretScript(
      witness.script,
      witness.randomness,
      toSignatureFlags(witness.initialStack),
      params,
    );

    return new ScriptOwnershipCircuit(
      params,
      trace,
      witness.signatures,
      witness.collectedKeys,
    );
  };

  /** The single instance column: script length, initial RLC, randomness. */
  publicInputs = (): bigint[][] => [
    [
      fromNumber(this.trace.scriptLength),
      this.trace.initialScriptRlc,
      this.trace.randomness,
    ],
  ];

  configure = (cs: ConstraintSystem): ScriptOwnershipConfig => ({
    execution: ExecutionChip.configure(cs, this.params),
    checksig: CheckSigChip.configure(cs, this.params),
  });

  synthesize = (config: ScriptOwnershipConfig, layouter: Layouter) => {
    const execution = ExecutionChip.construct(config.execution);
    const cells = execution.assign(layouter, this.trace);
    execution.exposePublic(layouter, cells);

    const boundary = CheckSigChip.construct(config.checksig).assign(
      layouter,
      this.trace.randomness,
      this.signatures,
      this.collectedKeys,
    );

    layouter.constrainEqual(cells.finalPkRlcAcc, boundary.pkRlcAcc);
    layouter.constrainEqual(
      cells.finalNumChecksigOpcodes,
      boundary.numChecksigOpcodes,
    );
    layouter.constrainEqual(cells.finalRandomness, boundary.randomness);
  };
}

export type OwnershipProof = {
  circuit: ScriptOwnershipCircuit;
  publicInputs: bigint[][];
  failures: VerifyFailure[];
};

/** Collects the keys, builds the circuit and checks it with the mock prover. */
export const proveOwnership = (
  input: OwnershipInput,
  params: CircuitParams = getCircuitParams(),
): OwnershipProof => {
  const collectedKeys = collectPublicKeys(
    input.script,
    input.initialStack,
    params,
  );
  const circuit = ScriptOwnershipCircuit.fromWitness(
    { ...input, collectedKeys },
    params,
  );
  const publicInputs = circuit.publicInputs();
  const failures = MockProver.run(circuit, publicInputs).verify();

  return { circuit, publicInputs, failures };
};
