import { OpCode } from "../bitcoin/op-codes";
import { TableColumn } from "../circuit/columns";
import { ConstraintSystem, VirtualCells } from "../circuit/constraint-system";
import { Expression } from "../circuit/expression";
import { Layouter } from "../circuit/layouter";

export type OpcodeClassification = {
  enabled: boolean;
  op0: boolean;
  op1ToOp16: boolean;
  pushBytes: boolean;
  pushData1: boolean;
  pushData2: boolean;
  pushData4: boolean;
  checksig: boolean;
};

export const OPCODE_INDICATORS = [
  "enabled",
  "op0",
  "op1ToOp16",
  "pushBytes",
  "pushData1",
  "pushData2",
  "pushData4",
  "checksig",
] as const;

export type OpcodeIndicator = (typeof OPCODE_INDICATORS)[number];

export const isEnabledOpcode = (byte: number) =>
  (byte <= OpCode.OP_NOP &&
    byte !== OpCode.OP_1NEGATE &&
    byte !== OpCode.OP_RESERVED) ||
  byte === OpCode.OP_CHECKSIG;

export const classifyOpcode = (byte: number): OpcodeClassification => {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff)
    throw new RangeError(`Not a byte: ${byte}`);

  return {
    enabled: isEnabledOpcode(byte),
    op0: byte === OpCode.OP_0,
    op1ToOp16: byte >= OpCode.OP_1 && byte <= OpCode.OP_16,
    pushBytes: byte >= OpCode.OP_PUSHBYTES_1 && byte <= OpCode.OP_PUSHBYTES_75,
    pushData1: byte === OpCode.OP_PUSHDATA1,
    pushData2: byte === OpCode.OP_PUSHDATA2,
    pushData4: byte === OpCode.OP_PUSHDATA4,
    checksig: byte === OpCode.OP_CHECKSIG,
  };
};

export const indicatorValues = (classification: OpcodeClassification) =>
  OPCODE_INDICATORS.map((name) => (classification[name] ? 1 : 0));

/**
 * `[selector, opcode, ...indicators]` for every byte, then one all-zero row
 * matched by rows where the execution selector is off.
 */
export const opcodeClassificationRows = (): number[][] => {
  const rows: number[][] = [];

  for (let byte = 0; byte < 256; byte++) {
    rows.push([1, byte, ...indicatorValues(classifyOpcode(byte))]);
  }
  rows.push(new Array<number>(2 + OPCODE_INDICATORS.length).fill(0));

  return rows;
};

export type OpcodeTableConfig = {
  selector: TableColumn;
  opcode: TableColumn;
  indicators: TableColumn[];
};

export class OpcodeTableChip {
  readonly config: OpcodeTableConfig;

  constructor(config: OpcodeTableConfig) {
    this.config = config;
  }

  /** `indicators` follow the order of `OPCODE_INDICATORS`. */
  static configure = (
    cs: ConstraintSystem,
    qEnable: (meta: VirtualCells) => Expression,
    opcode: (meta: VirtualCells) => Expression,
    indicators: (meta: VirtualCells) => Expression[],
  ): OpcodeTableConfig => {
    const config: OpcodeTableConfig = {
      selector: cs.lookupTableColumn("opcode table selector"),
      opcode: cs.lookupTableColumn("opcode table byte"),
      indicators: OPCODE_INDICATORS.map((name) =>
        cs.lookupTableColumn(`opcode table ${name}`),
      ),
    };

    cs.lookup("opcode classification", (meta) => {
      const q = qEnable(meta);
      const inputs = indicators(meta);
      if (inputs.length !== OPCODE_INDICATORS.length)
        throw new RangeError(
          `Expected ${OPCODE_INDICATORS.length} indicators, got ${inputs.length}`,
        );

      return [
        [q, config.selector],
        [q.mul(opcode(meta)), config.opcode],
        ...inputs.map((input, i): [Expression, TableColumn] => [
          q.mul(input),
          config.indicators[i],
        ]),
      ];
    });

    return config;
  };

  static construct = (config: OpcodeTableConfig) => new OpcodeTableChip(config);

  load = (layouter: Layouter) => {
    const columns = [
      this.config.selector,
      this.config.opcode,
      ...this.config.indicators,
    ];

    layouter.assignTable("opcode classification", (table) => {
      opcodeClassificationRows().forEach((row, offset) => {
        row.forEach((value, i) =>
          table.assignCell("opcode table", columns[i], offset, BigInt(value)),
        );
      });
    });
  };
}
