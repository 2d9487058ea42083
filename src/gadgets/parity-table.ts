import {
  PREFIX_PK_COMPRESSED_EVEN_Y,
  PREFIX_PK_COMPRESSED_ODD_Y,
  PREFIX_PK_UNCOMPRESSED,
} from "../bitcoin/op-codes";
import { TableColumn } from "../circuit/columns";
import { ConstraintSystem, VirtualCells } from "../circuit/constraint-system";
import { Expression } from "../circuit/expression";
import { Layouter } from "../circuit/layouter";

/**
 * `(prefix, lowest y byte)` pairs a SEC1 key may carry: any byte after 0x04,
 * even bytes after 0x02, odd bytes after 0x03, and `(0, 0)` for unused rows.
 */
export const parityTableRows = (): [number, number][] => {
  const rows: [number, number][] = [];

  for (let byte = 0; byte < 256; byte++) {
    rows.push([PREFIX_PK_UNCOMPRESSED, byte]);
  }
  for (let byte = 0; byte < 256; byte++) {
    rows.push([
      byte % 2 === 0 ? PREFIX_PK_COMPRESSED_EVEN_Y : PREFIX_PK_COMPRESSED_ODD_Y,
      byte,
    ]);
  }
  rows.push([0, 0]);

  return rows;
};

export type ParityTableConfig = {
  prefix: TableColumn;
  parity: TableColumn;
};

export class ParityTableChip {
  readonly config: ParityTableConfig;

  constructor(config: ParityTableConfig) {
    this.config = config;
  }

  static configure = (
    cs: ConstraintSystem,
    qEnable: (meta: VirtualCells) => Expression,
    prefix: (meta: VirtualCells) => Expression,
    parityByte: (meta: VirtualCells) => Expression,
  ): ParityTableConfig => {
    const config: ParityTableConfig = {
      prefix: cs.lookupTableColumn("pk prefix"),
      parity: cs.lookupTableColumn("pk y parity byte"),
    };

    cs.lookup("pk prefix parity", (meta) => {
      const q = qEnable(meta);
      return [
        [q.mul(prefix(meta)), config.prefix],
        [q.mul(parityByte(meta)), config.parity],
      ];
    });

    return config;
  };

  static construct = (config: ParityTableConfig) => new ParityTableChip(config);

  load = (layouter: Layouter) => {
    layouter.assignTable("pk prefix parity", (table) => {
      parityTableRows().forEach(([prefix, parity], offset) => {
        table.assignCell("prefix", this.config.prefix, offset, BigInt(prefix));
        table.assignCell("parity", this.config.parity, offset, BigInt(parity));
      });
    });
  };
}
