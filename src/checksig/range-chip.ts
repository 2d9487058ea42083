import { Column, Rotation, Selector, TableColumn } from "../circuit/columns";
import { ConstraintSystem } from "../circuit/constraint-system";
import { AssignedCell, Layouter, RegionCtx } from "../circuit/layouter";
import { SynthesisError } from "../errors";

/** Splits a field element into little-endian chunks that are range checked. */
export interface RangeInstructions {
  decompose(
    ctx: RegionCtx,
    cell: AssignedCell,
    byteWidth: number,
    totalBits: number,
  ): AssignedCell[];
  /** Fills the chunk table the decomposition looks up. */
  loadTable(layouter: Layouter): void;
}

export type RangeConfig = {
  /** Chunk width the lookup table covers, in bytes. */
  lookupBytes: number;
  qRunningSum: Selector;
  qLastChunk: Selector;
  qLookup: Selector;
  chunk: Column;
  acc: Column;
  table: TableColumn;
};

/**
 * Running-sum decomposition: `acc_i = chunk_i + 2^(8w) * acc_(i+1)` with the
 * first `acc` copied from the input and the last one equal to its chunk.
 */
export class RangeChip implements RangeInstructions {
  readonly config: RangeConfig;

  constructor(config: RangeConfig) {
    this.config = config;
  }

  static configure = (cs: ConstraintSystem, lookupBytes = 1): RangeConfig => {
    if (!Number.isInteger(lookupBytes) || lookupBytes < 1 || lookupBytes > 2)
      throw new SynthesisError(`Unsupported lookup width: ${lookupBytes} bytes`);

    const config: RangeConfig = {
      lookupBytes,
      qRunningSum: cs.selector("range running sum"),
      qLastChunk: cs.selector("range last chunk"),
      qLookup: cs.selector("range lookup"),
      chunk: cs.adviceColumn("range chunk"),
      acc: cs.adviceColumn("range acc"),
      table: cs.lookupTableColumn("range table"),
    };

    cs.enableEquality(config.chunk);
    cs.enableEquality(config.acc);

    const base = BigInt(1) << BigInt(8 * lookupBytes);

    cs.createGate("range running sum", (meta) => {
      const q = meta.querySelector(config.qRunningSum);
      const acc = meta.queryAdvice(config.acc, Rotation.cur);
      const accNext = meta.queryAdvice(config.acc, Rotation.next);
      const chunk = meta.queryAdvice(config.chunk, Rotation.cur);

      return [q.mul(acc.sub(chunk).sub(accNext.mul(base)))];
    });

    cs.createGate("range last chunk", (meta) => {
      const q = meta.querySelector(config.qLastChunk);
      const acc = meta.queryAdvice(config.acc, Rotation.cur);
      const chunk = meta.queryAdvice(config.chunk, Rotation.cur);

      return [q.mul(acc.sub(chunk))];
    });

    cs.lookup("range chunk", (meta) => [
      [
        meta
          .querySelector(config.qLookup)
          .mul(meta.queryAdvice(config.chunk, Rotation.cur)),
        config.table,
      ],
    ]);

    return config;
  };

  static construct = (config: RangeConfig) => new RangeChip(config);

  loadTable = (layouter: Layouter) => {
    const size = 1 << (8 * this.config.lookupBytes);

    layouter.assignTable("range table", (table) => {
      for (let value = 0; value < size; value++) {
        table.assignCell("range value", this.config.table, value, BigInt(value));
      }
    });
  };

  decompose = (
    ctx: RegionCtx,
    cell: AssignedCell,
    byteWidth: number,
    totalBits: number,
  ): AssignedCell[] => {
    const { lookupBytes } = this.config;
    if (byteWidth !== lookupBytes)
      throw new SynthesisError(
        `Range table checks ${lookupBytes}-byte chunks, got ${byteWidth}`,
      );

    const chunkBits = 8 * byteWidth;
    if (totalBits <= 0 || totalBits % chunkBits !== 0)
      throw new SynthesisError(
        `${totalBits} bits cannot be split into ${chunkBits}-bit chunks`,
      );
    if (cell.value >> BigInt(totalBits) !== BigInt(0))
      throw new SynthesisError(`Value does not fit ${totalBits} bits`);

    const count = totalBits / chunkBits;
    const mask = (BigInt(1) << BigInt(chunkBits)) - BigInt(1);
    const { region } = ctx;
    const chunks: AssignedCell[] = [];

    for (let i = 0; i < count; i++) {
      const acc = cell.value >> BigInt(chunkBits * i);

      if (i === 0) {
        region.copyAdvice("range acc", cell, this.config.acc, ctx.offset);
      } else {
        region.assignAdvice("range acc", this.config.acc, ctx.offset, acc);
      }
      chunks.push(
        region.assignAdvice("range chunk", this.config.chunk, ctx.offset, acc & mask),
      );

      region.enableSelector(
        i === count - 1 ? this.config.qLastChunk : this.config.qRunningSum,
        ctx.offset,
      );
      region.enableSelector(this.config.qLookup, ctx.offset);

      ctx.next();
    }

    return chunks;
  };
}
