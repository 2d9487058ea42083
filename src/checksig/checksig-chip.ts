import {
  PREFIX_PK_COMPRESSED_EVEN_Y,
  PREFIX_PK_COMPRESSED_ODD_Y,
  PREFIX_PK_UNCOMPRESSED,
} from "../bitcoin/op-codes";
import { Bytes } from "../bytes";
import { CircuitParams, getCircuitParams } from "../config/circuit-params";
import { Column, Rotation, Selector } from "../circuit/columns";
import { ConstraintSystem, VirtualCells } from "../circuit/constraint-system";
import { Expression, expr } from "../circuit/expression";
import { AssignedCell, Layouter, RegionCtx } from "../circuit/layouter";
import { ShapeError, SynthesisError } from "../errors";
import { add, fromNumber, mul, ZERO } from "../field/fr";
import { powersOfRandomness, rlc } from "../field/rlc";
import { IsZeroChip, IsZeroConfig } from "../gadgets/is-zero";
import { ParityTableChip, ParityTableConfig } from "../gadgets/parity-table";
import { createLogger } from "../logger";
import {
  BIT_LEN_LIMB,
  EcdsaChip,
  EcdsaConfig,
  EcdsaVerifyInstructions,
} from "./ecdsa-chip";
import { CollectedPublicKey } from "./pk-collector";
import { RangeChip, RangeConfig, RangeInstructions } from "./range-chip";
import { ECDSA_MESSAGE_HASH, paddingSignData, SignData } from "./sign-data";

const log = createLogger("checksig");

/** Enough powers for an uncompressed key: prefix, x and y. */
export const PK_POW_RAND_SIZE = 64;
const COORDINATE_BYTES = 32;

export type CheckSigConfig = {
  params: CircuitParams;
  qEnable: Selector;
  qTrailing: Selector;

  /** OP_CHECKSIG keys still to be matched from this row on. */
  numChecksigOpcodes: Column;
  numChecksigOpcodesIsZero: IsZeroConfig;
  pkRlcAcc: Column;
  /** RLC of the key bytes as they appear in the script. */
  pkRlc: Column;
  pkPrefix: Column;
  /** `[x, y]`, each 32 little-endian byte columns. */
  pk: [Column[], Column[]];
  powersOfRandomness: Column[];

  parityTable: ParityTableConfig;
  ecdsa: EcdsaConfig;
  range: RangeConfig;
};

/** Row 0 cells tied to the execution region's terminal row. */
export type CheckSigBoundary = {
  pkRlcAcc: AssignedCell;
  numChecksigOpcodes: AssignedCell;
  randomness: AssignedCell;
};

type Slot = {
  signData: SignData;
  bytes: Bytes;
};

/** `b[n-1] + sum(b[i] * r^(n-1-i))`, the expression twin of `rlc`. */
const rlcExpr = (bytes: Expression[], powers: Expression[]) =>
  bytes
    .slice(0, -1)
    .reduce(
      (acc, byte, i) => acc.add(byte.mul(powers[bytes.length - 2 - i])),
      bytes[bytes.length - 1],
    );

export class CheckSigChip {
  readonly config: CheckSigConfig;
  readonly ecdsa: EcdsaVerifyInstructions;
  readonly range: RangeInstructions;

  constructor(
    config: CheckSigConfig,
    ecdsa: EcdsaVerifyInstructions = EcdsaChip.construct(config.ecdsa),
    range: RangeInstructions = RangeChip.construct(config.range),
  ) {
    this.config = config;
    this.ecdsa = ecdsa;
    this.range = range;
  }

  static construct = (
    config: CheckSigConfig,
    ecdsa?: EcdsaVerifyInstructions,
    range?: RangeInstructions,
  ) => new CheckSigChip(config, ecdsa, range);

  static configure = (
    cs: ConstraintSystem,
    params: CircuitParams = getCircuitParams(),
  ): CheckSigConfig => {
    const qEnable = cs.selector("checksig slot");
    const qTrailing = cs.selector("checksig trailing row");

    const numChecksigOpcodes = cs.adviceColumn("checksig num_checksig_opcodes");
    const pkRlcAcc = cs.adviceColumn("checksig pk_rlc_acc");
    const pkRlc = cs.adviceColumn("checksig pk_rlc");
    const pkPrefix = cs.adviceColumn("checksig pk_prefix");
    const coordinate = (name: string) =>
      Array.from({ length: COORDINATE_BYTES }, (_, i) =>
        cs.adviceColumn(`checksig pk_${name}_le_${i}`),
      );
    const pk: [Column[], Column[]] = [coordinate("x"), coordinate("y")];
    const powers = Array.from({ length: PK_POW_RAND_SIZE }, (_, i) =>
      cs.adviceColumn(`checksig randomness_pow_${i + 1}`),
    );

    for (const column of [
      numChecksigOpcodes,
      pkRlcAcc,
      powers[0],
      ...pk[0],
      ...pk[1],
    ]) {
      cs.enableEquality(column);
    }

    const q = (meta: VirtualCells) => meta.querySelector(qEnable);
    const cur = (meta: VirtualCells, column: Column) =>
      meta.queryAdvice(column, Rotation.cur);
    const next = (meta: VirtualCells, column: Column) =>
      meta.queryAdvice(column, Rotation.next);

    const numChecksigOpcodesIsZero = IsZeroChip.configure(
      cs,
      "checksig count",
      q,
      (meta) => cur(meta, numChecksigOpcodes),
      cs.adviceColumn("checksig num_checksig_opcodes_inv"),
    );
    const noKey = numChecksigOpcodesIsZero.expr();
    const liveSlot = expr(1).sub(noKey);

    // The lowest byte of y sits in the first y column.
    const parityTable = ParityTableChip.configure(
      cs,
      q,
      (meta) => cur(meta, pkPrefix),
      (meta) => cur(meta, pk[1][0]),
    );

    cs.createGate("powers of randomness", (meta) => {
      const r = cur(meta, powers[0]);

      return [
        q(meta).mul(r.sub(next(meta, powers[0]))),
        ...powers
          .slice(1)
          .map((column, i) =>
            q(meta).mul(cur(meta, column).sub(cur(meta, powers[i]).mul(r))),
          ),
      ];
    });

    cs.createGate("pk_rlc_acc is zero without keys", (meta) => [
      q(meta).mul(noKey).mul(cur(meta, pkRlcAcc)),
      q(meta).mul(noKey).mul(next(meta, numChecksigOpcodes)),
    ]);

    cs.createGate("pk_rlc folds into pk_rlc_acc", (meta) => {
      const r = cur(meta, powers[0]);

      return [
        q(meta)
          .mul(liveSlot)
          .mul(
            cur(meta, pkRlc)
              .add(r.mul(next(meta, pkRlcAcc)))
              .sub(cur(meta, pkRlcAcc)),
          ),
        q(meta)
          .mul(liveSlot)
          .mul(
            next(meta, numChecksigOpcodes)
              .sub(cur(meta, numChecksigOpcodes))
              .add(1),
          ),
      ];
    });

    cs.createGate("trailing row", (meta) => {
      const qt = meta.querySelector(qTrailing);
      return [
        qt.mul(cur(meta, numChecksigOpcodes)),
        qt.mul(cur(meta, pkRlcAcc)),
      ];
    });

    cs.createGate("pk prefix is a SEC1 prefix", (meta) => {
      const prefix = cur(meta, pkPrefix);
      return [
        q(meta)
          .mul(liveSlot)
          .mul(
            prefix
              .sub(PREFIX_PK_COMPRESSED_EVEN_Y)
              .mul(prefix.sub(PREFIX_PK_COMPRESSED_ODD_Y))
              .mul(prefix.sub(PREFIX_PK_UNCOMPRESSED)),
          ),
      ];
    });

    cs.createGate("pk_rlc matches the verified key", (meta) => {
      const prefix = cur(meta, pkPrefix);
      const rlcValue = cur(meta, pkRlc);
      const powerExprs = powers.map((column) => cur(meta, column));
      const bigEndian = (columns: Column[]) =>
        [...columns].reverse().map((column) => cur(meta, column));

      const prefixed = [prefix, ...bigEndian(pk[0]), ...bigEndian(pk[1])];
      const uncompressed = rlcExpr(prefixed, powerExprs);
      const compressed = rlcExpr(
        prefixed.slice(0, 1 + COORDINATE_BYTES),
        powerExprs,
      );

      return [
        q(meta)
          .mul(prefix.sub(PREFIX_PK_COMPRESSED_EVEN_Y))
          .mul(prefix.sub(PREFIX_PK_COMPRESSED_ODD_Y))
          .mul(rlcValue.sub(uncompressed)),
        q(meta)
          .mul(prefix.sub(PREFIX_PK_UNCOMPRESSED))
          .mul(rlcValue.sub(compressed)),
      ];
    });

    return {
      params,
      qEnable,
      qTrailing,
      numChecksigOpcodes,
      numChecksigOpcodesIsZero,
      pkRlcAcc,
      pkRlc,
      pkPrefix,
      pk,
      powersOfRandomness: powers,
      parityTable,
      ecdsa: EcdsaChip.configure(cs),
      range: RangeChip.configure(cs),
    };
  };

  /**
   * Checks the pairs against the collected keys and lays out the slots, last
   * key first, so that row 0's accumulator equals the execution fold.
   */
  assign = (
    layouter: Layouter,
    randomness: bigint,
    signatures: SignData[],
    collectedKeys: CollectedPublicKey[],
  ): CheckSigBoundary => {
    const slots = this.slots(signatures, collectedKeys);
    const keyCount = signatures.length;

    ParityTableChip.construct(this.config.parityTable).load(layouter);
    const { ecdsa, range } = this;
    range.loadTable(layouter);

    const verifiedBytes = layouter.assignRegion("checksig ecdsa", (region) => {
      const ctx = new RegionCtx(region);

      return slots.map(({ signData }) => {
        const key = ecdsa.verify(
          ctx,
          signData.signature,
          signData.publicKey,
          ECDSA_MESSAGE_HASH,
        );
        const toBytes = (limbs: AssignedCell[]) =>
          limbs.flatMap((limb) => range.decompose(ctx, limb, 1, BIT_LEN_LIMB));

        return { x: toBytes(key.x), y: toBytes(key.y) };
      });
    });

    const pkRlcs = slots.map(({ bytes }) => rlc(bytes, randomness));
    const accs = new Array<bigint>(slots.length + 1).fill(ZERO);
    for (let j = slots.length - 1; j >= 0; j--) {
      accs[j] = j < keyCount ? add(pkRlcs[j], mul(randomness, accs[j + 1])) : ZERO;
    }
    const powers = powersOfRandomness(randomness, PK_POW_RAND_SIZE);

    const boundary = layouter.assignRegion("checksig", (region) => {
      const c = this.config;
      const countIsZero = IsZeroChip.construct(c.numChecksigOpcodesIsZero);

      const assignCommon = (offset: number, count: number, acc: bigint) => {
        const countCell = region.assignAdvice(
          "num checksig opcodes",
          c.numChecksigOpcodes,
          offset,
          fromNumber(count),
        );
        const accCell = region.assignAdvice(
          "pk rlc acc",
          c.pkRlcAcc,
          offset,
          acc,
        );
        const powerCells = powers.map((power, i) =>
          region.assignAdvice(
            `randomness^${i + 1}`,
            c.powersOfRandomness[i],
            offset,
            power,
          ),
        );
        return { countCell, accCell, randomnessCell: powerCells[0] };
      };

      const rows = slots.map((slot, j) => {
        const cells = assignCommon(j, Math.max(keyCount - j, 0), accs[j]);
        region.enableSelector(c.qEnable, j);
        countIsZero.assign(region, j, fromNumber(Math.max(keyCount - j, 0)));

        region.assignAdvice("pk rlc", c.pkRlc, j, pkRlcs[j]);
        region.assignAdvice("pk prefix", c.pkPrefix, j, BigInt(slot.bytes[0]));
        verifiedBytes[j].x.forEach((cell, i) =>
          region.copyAdvice(`pk x byte ${i}`, cell, c.pk[0][i], j),
        );
        verifiedBytes[j].y.forEach((cell, i) =>
          region.copyAdvice(`pk y byte ${i}`, cell, c.pk[1][i], j),
        );

        return cells;
      });

      assignCommon(slots.length, 0, ZERO);
      region.enableSelector(c.qTrailing, slots.length);

      return {
        pkRlcAcc: rows[0].accCell,
        numChecksigOpcodes: rows[0].countCell,
        randomness: rows[0].randomnessCell,
      };
    });

    log(
      "assigned %d checksig slots, %d with real keys",
      slots.length,
      keyCount,
    );

    return boundary;
  };

  private slots = (
    signatures: SignData[],
    collectedKeys: CollectedPublicKey[],
  ): Slot[] => {
    const { maxChecksigCount } = this.config.params;

    if (signatures.length > maxChecksigCount)
      throw new ShapeError(
        `${signatures.length} signatures exceed the ${maxChecksigCount} checksig slots`,
      );
    if (collectedKeys.length !== signatures.length)
      throw new SynthesisError(
        `${collectedKeys.length} collected keys for ${signatures.length} signatures`,
      );

    signatures.forEach((signData, i) => {
      if (!signData.publicKey.equals(collectedKeys[i].point))
        throw new SynthesisError(
          `Signature ${i} is for a different key than collected key ${i}`,
        );
    });

    const padding = paddingSignData();
    const paddingBytes = padding.publicKey.toRawBytes(true);

    return Array.from({ length: maxChecksigCount }, (_, j): Slot => {
      const index = signatures.length - 1 - j;
      return j < signatures.length
        ? { signData: signatures[index], bytes: collectedKeys[index].bytes }
        : { signData: padding, bytes: paddingBytes };
    });
  };
}

