import { Point, Signature, verify } from "@noble/secp256k1";
import { Bytes } from "../bytes";
import { Column, Rotation, Selector } from "../circuit/columns";
import { ConstraintSystem } from "../circuit/constraint-system";
import { AssignedCell, RegionCtx } from "../circuit/layouter";
import { createLogger } from "../logger";

const log = createLogger("checksig");

export const NUMBER_OF_LIMBS = 4;
export const BIT_LEN_LIMB = 64;

/** Coordinates of a verified key as little-endian 64-bit limbs. */
export type AssignedPublicKey = {
  x: AssignedCell[];
  y: AssignedCell[];
  ok: AssignedCell;
};

export interface EcdsaVerifyInstructions {
  verify(
    ctx: RegionCtx,
    signature: Signature,
    publicKey: Point,
    messageHash: Bytes,
  ): AssignedPublicKey;
}

export type EcdsaConfig = {
  qVerified: Selector;
  limb: Column;
  ok: Column;
};

export const toLimbs = (value: bigint): bigint[] => {
  const mask = (BigInt(1) << BigInt(BIT_LEN_LIMB)) - BigInt(1);

  return Array.from(
    { length: NUMBER_OF_LIMBS },
    (_, i) => (value >> BigInt(BIT_LEN_LIMB * i)) & mask,
  );
};

/**
 * Signature check behind the ECDSA interface: the verdict is computed
 * natively and written to an `ok` cell the gate pins to 1, so a bad
 * signature leaves the circuit unsatisfiable. Key coordinates are exposed
 * as limbs for byte decomposition.
 */
export class EcdsaChip implements EcdsaVerifyInstructions {
  readonly config: EcdsaConfig;

  constructor(config: EcdsaConfig) {
    this.config = config;
  }

  static configure = (cs: ConstraintSystem): EcdsaConfig => {
    const config: EcdsaConfig = {
      qVerified: cs.selector("ecdsa verified"),
      limb: cs.adviceColumn("ecdsa pk limb"),
      ok: cs.adviceColumn("ecdsa ok"),
    };

    cs.enableEquality(config.limb);

    cs.createGate("ecdsa signature verifies", (meta) => [
      meta
        .querySelector(config.qVerified)
        .mul(meta.queryAdvice(config.ok, Rotation.cur).sub(1)),
    ]);

    return config;
  };

  static construct = (config: EcdsaConfig) => new EcdsaChip(config);

  verify = (
    ctx: RegionCtx,
    signature: Signature,
    publicKey: Point,
    messageHash: Bytes,
  ): AssignedPublicKey => {
    const verified = verify(signature, messageHash, publicKey, {
      strict: false,
    });
    if (!verified) log("signature for key %s does not verify", publicKey.toHex(true));

    const { region } = ctx;
    const ok = region.assignAdvice(
      "ecdsa ok",
      this.config.ok,
      ctx.offset,
      verified ? BigInt(1) : BigInt(0),
    );
    region.enableSelector(this.config.qVerified, ctx.offset);

    const assignLimbs = (name: string, value: bigint) =>
      toLimbs(value).map((limb, i) => {
        const cell = region.assignAdvice(
          `${name} limb ${i}`,
          this.config.limb,
          ctx.offset,
          limb,
        );
        ctx.next();
        return cell;
      });

    const x = assignLimbs("pk x", publicKey.x);
    const y = assignLimbs("pk y", publicKey.y);

    return { x, y, ok };
  };
}
