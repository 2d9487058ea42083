import { CircuitParams } from "../../src/config/circuit-params";
import { Circuit, ConstraintSystem } from "../../src/circuit/constraint-system";
import { Layouter } from "../../src/circuit/layouter";
import {
  CheckSigBoundary,
  CheckSigChip,
  CheckSigConfig,
} from "../../src/checksig/checksig-chip";
import {
  EcdsaConfig,
  EcdsaVerifyInstructions,
} from "../../src/checksig/ecdsa-chip";
import { CollectedPublicKey } from "../../src/checksig/pk-collector";
import { RangeConfig, RangeInstructions } from "../../src/checksig/range-chip";
import { SignData } from "../../src/checksig/sign-data";

export type Collaborators = {
  ecdsa?: (config: EcdsaConfig) => EcdsaVerifyInstructions;
  range?: (config: RangeConfig) => RangeInstructions;
};

/** The checksig bridge on its own; keeps the boundary cells it returns. */
export class CheckSigCircuit implements Circuit<CheckSigConfig> {
  params: CircuitParams;
  randomness: bigint;
  signatures: SignData[];
  collectedKeys: CollectedPublicKey[];
  collaborators: Collaborators;
  boundary?: CheckSigBoundary;

  constructor(
    params: CircuitParams,
    randomness: bigint,
    signatures: SignData[],
    collectedKeys: CollectedPublicKey[],
    collaborators: Collaborators = {},
  ) {
    this.params = params;
    this.randomness = randomness;
    this.signatures = signatures;
    this.collectedKeys = collectedKeys;
    this.collaborators = collaborators;
  }

  configure = (cs: ConstraintSystem) => CheckSigChip.configure(cs, this.params);

  synthesize = (config: CheckSigConfig, layouter: Layouter) => {
    const { ecdsa, range } = this.collaborators;

    this.boundary = CheckSigChip.construct(
      config,
      ecdsa?.(config.ecdsa),
      range?.(config.range),
    ).assign(layouter, this.randomness, this.signatures, this.collectedKeys);
  };
}
