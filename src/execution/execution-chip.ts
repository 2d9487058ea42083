import { NEGATIVE_ZERO, OP_INT_BASE, OpCode } from "../bitcoin/op-codes";
import { CircuitParams, getCircuitParams } from "../config/circuit-params";
import { Column, Rotation, Selector } from "../circuit/columns";
import { ConstraintSystem, VirtualCells } from "../circuit/constraint-system";
import { Expression, expr } from "../circuit/expression";
import { AssignedCell, Layouter, Region } from "../circuit/layouter";
import { ShapeError } from "../errors";
import { fromNumber, mul, sub } from "../field/fr";
import { IsZeroChip, IsZeroConfig } from "../gadgets/is-zero";
import {
  classifyOpcode,
  indicatorValues,
  OPCODE_INDICATORS,
  OpcodeIndicator,
  OpcodeTableChip,
  OpcodeTableConfig,
} from "../gadgets/opcode-table";
import { createLogger } from "../logger";
import { ScriptTrace, TraceRow } from "../script/interpreter";

const log = createLogger("execution");

/** Rows of the instance column the execution region binds. */
export const PublicInputRow = {
  scriptLength: 0,
  initialScriptRlc: 1,
  randomness: 2,
} as const;

export type ExecutionConfig = {
  params: CircuitParams;

  qFirst: Selector;
  qExecution: Selector;
  qTerminal: Selector;

  opcode: Column;
  scriptRlcAcc: Column;
  numScriptBytesRemaining: Column;
  stack: Column[];
  numDataBytesRemaining: Column;
  numDataLengthBytesRemaining: Column;
  numDataLengthAccConstant: Column;
  pkRlcAcc: Column;
  numChecksigOpcodes: Column;
  randomness: Column;
  indicators: Record<OpcodeIndicator, Column>;

  scriptBytesRemainingIsZero: IsZeroConfig;
  dataBytesRemainingIsZero: IsZeroConfig;
  lengthBytesRemainingIsZero: IsZeroConfig;
  lengthBytesRemainingIsOne: IsZeroConfig;
  stackTopIsFalse: IsZeroConfig;

  opcodeTable: OpcodeTableConfig;
  instance: Column;
};

/** Cells other regions and the public inputs are tied to. */
export type ExecutionCells = {
  scriptLength: AssignedCell;
  initialScriptRlc: AssignedCell;
  randomness: AssignedCell;
  finalPkRlcAcc: AssignedCell;
  finalNumChecksigOpcodes: AssignedCell;
  finalRandomness: AssignedCell;
};

export class ExecutionChip {
  readonly config: ExecutionConfig;

  constructor(config: ExecutionConfig) {
    this.config = config;
  }

  static construct = (config: ExecutionConfig) => new ExecutionChip(config);

  static configure = (
    cs: ConstraintSystem,
    params: CircuitParams = getCircuitParams(),
  ): ExecutionConfig => {
    const depth = params.maxStackDepth;

    const qFirst = cs.selector("q_first");
    const qExecution = cs.selector("q_execution");
    const qTerminal = cs.selector("q_terminal");

    const opcode = cs.adviceColumn("opcode");
    const scriptRlcAcc = cs.adviceColumn("script_rlc_acc");
    const numScriptBytesRemaining = cs.adviceColumn("num_script_bytes_remaining");
    const stack = Array.from({ length: depth }, (_, i) =>
      cs.adviceColumn(`stack_${i}`),
    );
    const numDataBytesRemaining = cs.adviceColumn("num_data_bytes_remaining");
    const numDataLengthBytesRemaining = cs.adviceColumn(
      "num_data_length_bytes_remaining",
    );
    const numDataLengthAccConstant = cs.adviceColumn(
      "num_data_length_acc_constant",
    );
    const pkRlcAcc = cs.adviceColumn("pk_rlc_acc");
    const numChecksigOpcodes = cs.adviceColumn("num_checksig_opcodes");
    const randomness = cs.adviceColumn("randomness");

    const indicators: Record<OpcodeIndicator, Column> = {
      enabled: cs.adviceColumn("is_enabled"),
      op0: cs.adviceColumn("is_op_0"),
      op1ToOp16: cs.adviceColumn("is_op_1_to_op_16"),
      pushBytes: cs.adviceColumn("is_push_bytes"),
      pushData1: cs.adviceColumn("is_push_data_1"),
      pushData2: cs.adviceColumn("is_push_data_2"),
      pushData4: cs.adviceColumn("is_push_data_4"),
      checksig: cs.adviceColumn("is_checksig"),
    };
    const indicatorColumns = OPCODE_INDICATORS.map((name) => indicators[name]);

    const instance = cs.instanceColumn("public inputs");

    for (const column of [
      numScriptBytesRemaining,
      scriptRlcAcc,
      randomness,
      pkRlcAcc,
      numChecksigOpcodes,
      instance,
    ]) {
      cs.enableEquality(column);
    }

    const q = (meta: VirtualCells) => meta.querySelector(qExecution);
    const at = (meta: VirtualCells, column: Column, rotation: number) =>
      meta.queryAdvice(column, rotation);

    const scriptBytesRemainingIsZero = IsZeroChip.configure(
      cs,
      "script bytes remaining",
      q,
      (meta) => at(meta, numScriptBytesRemaining, Rotation.cur),
      cs.adviceColumn("num_script_bytes_remaining_inv"),
    );
    const dataBytesRemainingIsZero = IsZeroChip.configure(
      cs,
      "data bytes remaining",
      q,
      (meta) => at(meta, numDataBytesRemaining, Rotation.cur),
      cs.adviceColumn("num_data_bytes_remaining_inv"),
    );
    const lengthBytesRemainingIsZero = IsZeroChip.configure(
      cs,
      "length bytes remaining",
      q,
      (meta) => at(meta, numDataLengthBytesRemaining, Rotation.cur),
      cs.adviceColumn("num_data_length_bytes_remaining_inv"),
    );
    const lengthBytesRemainingIsOne = IsZeroChip.configure(
      cs,
      "length bytes remaining is one",
      q,
      (meta) => at(meta, numDataLengthBytesRemaining, Rotation.cur).sub(1),
      cs.adviceColumn("num_data_length_bytes_remaining_minus_one_inv"),
    );
    const stackTopIsFalse = IsZeroChip.configure(
      cs,
      "stack top is false",
      (meta) => meta.querySelector(qTerminal),
      (meta) => {
        const top = at(meta, stack[0], Rotation.cur);
        return top.mul(top.sub(NEGATIVE_ZERO));
      },
      cs.adviceColumn("stack_top_falsity_inv"),
    );

    const opcodeTable = OpcodeTableChip.configure(
      cs,
      q,
      (meta) => at(meta, opcode, Rotation.cur),
      (meta) => indicatorColumns.map((column) => at(meta, column, Rotation.cur)),
    );

    const config: ExecutionConfig = {
      params,
      qFirst,
      qExecution,
      qTerminal,
      opcode,
      scriptRlcAcc,
      numScriptBytesRemaining,
      stack,
      numDataBytesRemaining,
      numDataLengthBytesRemaining,
      numDataLengthAccConstant,
      pkRlcAcc,
      numChecksigOpcodes,
      randomness,
      indicators,
      scriptBytesRemainingIsZero,
      dataBytesRemainingIsZero,
      lengthBytesRemainingIsZero,
      lengthBytesRemainingIsOne,
      stackTopIsFalse,
      opcodeTable,
      instance,
    };

    configureGates(cs, config);

    return config;
  };

  /** Loads the opcode table and writes the trace as one region. */
  assign = (layouter: Layouter, trace: ScriptTrace): ExecutionCells => {
    const { params } = this.config;
    const expectedRows = params.maxScriptPubkeySize + 2;

    if (trace.rows.length !== expectedRows)
      throw new ShapeError(
        `Trace has ${trace.rows.length} rows, the circuit takes ${expectedRows}`,
      );

    OpcodeTableChip.construct(this.config.opcodeTable).load(layouter);

    const cells = layouter.assignRegion("script execution", (region) => {
      const first = this.assignRow(region, 0, trace.rows[0], trace.randomness);
      region.enableSelector(this.config.qFirst, 0);

      for (let offset = 1; offset <= params.maxScriptPubkeySize; offset++) {
        this.assignExecutionRow(region, offset, trace.rows[offset], trace.randomness);
      }

      const terminalOffset = expectedRows - 1;
      const terminalRow = trace.rows[terminalOffset];
      const terminal = this.assignRow(
        region,
        terminalOffset,
        terminalRow,
        trace.randomness,
      );
      region.enableSelector(this.config.qTerminal, terminalOffset);

      const top = terminalRow.stack[0];
      IsZeroChip.construct(this.config.stackTopIsFalse).assign(
        region,
        terminalOffset,
        mul(top, sub(top, fromNumber(NEGATIVE_ZERO))),
      );

      return {
        scriptLength: first.numScriptBytesRemaining,
        initialScriptRlc: first.scriptRlcAcc,
        randomness: first.randomness,
        finalPkRlcAcc: terminal.pkRlcAcc,
        finalNumChecksigOpcodes: terminal.numChecksigOpcodes,
        finalRandomness: terminal.randomness,
      };
    });

    log(
      "assigned %d execution rows for a %d byte script",
      expectedRows,
      trace.scriptLength,
    );

    return cells;
  };

  /** Binds length, initial script RLC and randomness to the instance column. */
  exposePublic = (layouter: Layouter, cells: ExecutionCells) => {
    const { instance } = this.config;

    layouter.constrainInstance(
      cells.scriptLength,
      instance,
      PublicInputRow.scriptLength,
    );
    layouter.constrainInstance(
      cells.initialScriptRlc,
      instance,
      PublicInputRow.initialScriptRlc,
    );
    layouter.constrainInstance(
      cells.randomness,
      instance,
      PublicInputRow.randomness,
    );
  };

  private assignRow = (
    region: Region,
    offset: number,
    row: TraceRow,
    randomness: bigint,
  ) => {
    const c = this.config;

    if (row.stack.length !== c.params.maxStackDepth)
      throw new ShapeError(
        `Trace row ${offset} has ${row.stack.length} stack items, expected ${c.params.maxStackDepth}`,
      );

    region.assignAdvice("opcode", c.opcode, offset, fromNumber(row.opcode));
    row.stack.forEach((value, i) =>
      region.assignAdvice(`stack ${i}`, c.stack[i], offset, value),
    );
    region.assignAdvice(
      "data bytes remaining",
      c.numDataBytesRemaining,
      offset,
      fromNumber(row.numDataBytesRemaining),
    );
    region.assignAdvice(
      "length bytes remaining",
      c.numDataLengthBytesRemaining,
      offset,
      fromNumber(row.numDataLengthBytesRemaining),
    );
    region.assignAdvice(
      "length acc constant",
      c.numDataLengthAccConstant,
      offset,
      fromNumber(row.numDataLengthAccConstant),
    );

    return {
      scriptRlcAcc: region.assignAdvice(
        "script rlc acc",
        c.scriptRlcAcc,
        offset,
        row.scriptRlcAcc,
      ),
      numScriptBytesRemaining: region.assignAdvice(
        "script bytes remaining",
        c.numScriptBytesRemaining,
        offset,
        fromNumber(row.numScriptBytesRemaining),
      ),
      pkRlcAcc: region.assignAdvice("pk rlc acc", c.pkRlcAcc, offset, row.pkRlcAcc),
      numChecksigOpcodes: region.assignAdvice(
        "checksig count",
        c.numChecksigOpcodes,
        offset,
        fromNumber(row.numChecksigOpcodes),
      ),
      randomness: region.assignAdvice(
        "randomness",
        c.randomness,
        offset,
        randomness,
      ),
    };
  };

  private assignExecutionRow = (
    region: Region,
    offset: number,
    row: TraceRow,
    randomness: bigint,
  ) => {
    const c = this.config;

    this.assignRow(region, offset, row, randomness);
    region.enableSelector(c.qExecution, offset);

    const values = indicatorValues(classifyOpcode(row.opcode));
    OPCODE_INDICATORS.forEach((name, i) =>
      region.assignAdvice(
        `is ${name}`,
        c.indicators[name],
        offset,
        BigInt(values[i]),
      ),
    );

    IsZeroChip.construct(c.scriptBytesRemainingIsZero).assign(
      region,
      offset,
      fromNumber(row.numScriptBytesRemaining),
    );
    IsZeroChip.construct(c.dataBytesRemainingIsZero).assign(
      region,
      offset,
      fromNumber(row.numDataBytesRemaining),
    );
    IsZeroChip.construct(c.lengthBytesRemainingIsZero).assign(
      region,
      offset,
      fromNumber(row.numDataLengthBytesRemaining),
    );
    IsZeroChip.construct(c.lengthBytesRemainingIsOne).assign(
      region,
      offset,
      fromNumber(row.numDataLengthBytesRemaining - 1),
    );
  };
}

/** Every gate of the execution region; rows are told apart by selectors. */
const configureGates = (cs: ConstraintSystem, c: ExecutionConfig) => {
  const depth = c.params.maxStackDepth;
  const one = expr(1);

  const cur = (meta: VirtualCells, column: Column) =>
    meta.queryAdvice(column, Rotation.cur);
  const prev = (meta: VirtualCells, column: Column) =>
    meta.queryAdvice(column, Rotation.prev);
  const next = (meta: VirtualCells, column: Column) =>
    meta.queryAdvice(column, Rotation.next);

  const scriptDone = c.scriptBytesRemainingIsZero.expr();
  const scriptLive = one.sub(scriptDone);
  const noData = c.dataBytesRemainingIsZero.expr();
  const noLength = c.lengthBytesRemainingIsZero.expr();
  const lastLength = c.lengthBytesRemainingIsOne.expr();

  const isOpcodeRow = scriptLive.mul(noData).mul(noLength);
  const isDataRow = scriptLive.mul(one.sub(noData)).mul(noLength);
  const isLengthRow = scriptLive.mul(one.sub(noLength));

  const indicator = (meta: VirtualCells, name: OpcodeIndicator) =>
    cur(meta, c.indicators[name]);
  const isPushData = (meta: VirtualCells) =>
    indicator(meta, "pushData1")
      .add(indicator(meta, "pushData2"))
      .add(indicator(meta, "pushData4"));

  const stackUnchanged = (meta: VirtualCells, from = 0) =>
    c.stack.slice(from).map((column) => cur(meta, column).sub(prev(meta, column)));

  /** Everything moves one slot down; the old bottom item falls off. */
  const shiftRight = (meta: VirtualCells) =>
    c.stack
      .slice(1)
      .map((column, i) => cur(meta, column).sub(prev(meta, c.stack[i])));

  const gated = (gate: Expression, polys: Expression[]) =>
    polys.map((poly) => gate.mul(poly));

  cs.createGate("first row", (meta) => {
    const q = meta.querySelector(c.qFirst);

    return gated(q, [
      cur(meta, c.numDataBytesRemaining),
      cur(meta, c.numDataLengthBytesRemaining),
      next(meta, c.numDataBytesRemaining),
      next(meta, c.numDataLengthBytesRemaining),
      cur(meta, c.pkRlcAcc),
      cur(meta, c.numChecksigOpcodes),
      next(meta, c.numScriptBytesRemaining).sub(
        cur(meta, c.numScriptBytesRemaining),
      ),
      ...c.stack.map((column) => {
        const item = cur(meta, column);
        return item.mul(one.sub(item));
      }),
    ]);
  });

  cs.createGate("randomness is constant", (meta) => [
    meta
      .querySelector(c.qExecution)
      .mul(cur(meta, c.randomness).sub(prev(meta, c.randomness))),
  ]);

  cs.createGate("script rlc consumption", (meta) => {
    const q = meta.querySelector(c.qExecution);
    const r = cur(meta, c.randomness);
    const acc = cur(meta, c.scriptRlcAcc);
    const accPrev = prev(meta, c.scriptRlcAcc);
    const remaining = cur(meta, c.numScriptBytesRemaining);
    const remainingNext = next(meta, c.numScriptBytesRemaining);

    return [
      ...gated(q.mul(scriptLive), [
        accPrev.sub(cur(meta, c.opcode)).sub(r.mul(acc)),
        remainingNext.sub(remaining).add(1),
      ]),
      ...gated(q.mul(scriptDone), [acc, accPrev, remainingNext]),
    ];
  });

  cs.createGate("padding rows", (meta) => {
    const q = meta.querySelector(c.qExecution).mul(scriptDone);

    return gated(q, [
      ...stackUnchanged(meta),
      cur(meta, c.opcode).sub(OpCode.OP_NOP),
      cur(meta, c.numDataBytesRemaining),
      cur(meta, c.numDataLengthBytesRemaining),
    ]);
  });

  cs.createGate("opcode is enabled", (meta) => [
    meta
      .querySelector(c.qExecution)
      .mul(isOpcodeRow)
      .mul(one.sub(indicator(meta, "enabled"))),
  ]);

  cs.createGate("OP_0", (meta) => {
    const q = meta
      .querySelector(c.qExecution)
      .mul(isOpcodeRow)
      .mul(indicator(meta, "op0"));

    return gated(q, [
      cur(meta, c.stack[0]).sub(NEGATIVE_ZERO),
      ...shiftRight(meta),
    ]);
  });

  cs.createGate("OP_1 to OP_16", (meta) => {
    const q = meta
      .querySelector(c.qExecution)
      .mul(isOpcodeRow)
      .mul(indicator(meta, "op1ToOp16"));

    return gated(q, [
      cur(meta, c.stack[0]).sub(cur(meta, c.opcode).sub(OP_INT_BASE)),
      ...shiftRight(meta),
    ]);
  });

  cs.createGate("OP_PUSHBYTES", (meta) => {
    const q = meta
      .querySelector(c.qExecution)
      .mul(isOpcodeRow)
      .mul(indicator(meta, "pushBytes"));

    return gated(q, [cur(meta, c.stack[0]), ...shiftRight(meta)]);
  });

  cs.createGate("OP_PUSHDATA", (meta) => {
    const q = meta
      .querySelector(c.qExecution)
      .mul(isOpcodeRow)
      .mul(isPushData(meta));

    return gated(q, [cur(meta, c.stack[0]), ...shiftRight(meta)]);
  });

  cs.createGate("OP_NOP", (meta) => {
    const noClass = one.sub(
      Expression.sum(
        OPCODE_INDICATORS.filter((name) => name !== "enabled").map((name) =>
          indicator(meta, name),
        ),
      ),
    );
    const q = meta.querySelector(c.qExecution).mul(isOpcodeRow).mul(noClass);

    return gated(q, stackUnchanged(meta));
  });

  cs.createGate("opcode row counters", (meta) => {
    const q = meta.querySelector(c.qExecution).mul(isOpcodeRow);
    const pushData = isPushData(meta);

    return gated(q, [
      one
        .sub(pushData)
        .mul(
          next(meta, c.numDataBytesRemaining).sub(
            indicator(meta, "pushBytes").mul(cur(meta, c.opcode)),
          ),
        ),
      next(meta, c.numDataLengthBytesRemaining)
        .sub(indicator(meta, "pushData1"))
        .sub(indicator(meta, "pushData2").mul(2))
        .sub(indicator(meta, "pushData4").mul(4)),
      pushData.mul(next(meta, c.numDataLengthAccConstant).sub(1)),
    ]);
  });

  cs.createGate("OP_CHECKSIG", (meta) => {
    const q = meta
      .querySelector(c.qExecution)
      .mul(isOpcodeRow)
      .mul(indicator(meta, "checksig"));
    const r = cur(meta, c.randomness);
    const publicKey = prev(meta, c.stack[0]);
    const flag = prev(meta, c.stack[1]);
    const pkRlcAccPrev = prev(meta, c.pkRlcAcc);

    return gated(q, [
      flag.mul(one.sub(flag)),
      cur(meta, c.stack[0]).sub(flag),
      ...c.stack
        .slice(2)
        .map((column, i) => cur(meta, c.stack[i + 1]).sub(prev(meta, column))),
      cur(meta, c.stack[depth - 1]),
      cur(meta, c.pkRlcAcc)
        .sub(flag.mul(r.mul(pkRlcAccPrev).add(publicKey)))
        .sub(one.sub(flag).mul(pkRlcAccPrev)),
      cur(meta, c.numChecksigOpcodes)
        .sub(prev(meta, c.numChecksigOpcodes))
        .sub(flag),
    ]);
  });

  cs.createGate("pk accumulator outside OP_CHECKSIG", (meta) => {
    const q = meta
      .querySelector(c.qExecution)
      .mul(one.sub(isOpcodeRow.mul(indicator(meta, "checksig"))));

    return gated(q, [
      cur(meta, c.pkRlcAcc).sub(prev(meta, c.pkRlcAcc)),
      cur(meta, c.numChecksigOpcodes).sub(prev(meta, c.numChecksigOpcodes)),
    ]);
  });

  cs.createGate("data byte", (meta) => {
    const q = meta.querySelector(c.qExecution).mul(isDataRow);
    const r = cur(meta, c.randomness);

    return gated(q, [
      cur(meta, c.stack[0])
        .sub(cur(meta, c.opcode))
        .sub(r.mul(prev(meta, c.stack[0]))),
      ...stackUnchanged(meta, 1),
      next(meta, c.numDataBytesRemaining)
        .sub(cur(meta, c.numDataBytesRemaining))
        .add(1),
      next(meta, c.numDataLengthBytesRemaining),
    ]);
  });

  cs.createGate("length byte", (meta) => {
    const q = meta.querySelector(c.qExecution).mul(isLengthRow);
    const total = cur(meta, c.numDataBytesRemaining);
    const multiplier = cur(meta, c.numDataLengthAccConstant);

    return gated(q, [
      ...stackUnchanged(meta),
      total
        .sub(cur(meta, c.opcode).mul(multiplier))
        .sub(prev(meta, c.numDataBytesRemaining)),
      next(meta, c.numDataLengthBytesRemaining)
        .sub(cur(meta, c.numDataLengthBytesRemaining))
        .add(1),
      one
        .sub(lastLength)
        .mul(next(meta, c.numDataLengthAccConstant).sub(multiplier.mul(256))),
      lastLength.mul(next(meta, c.numDataBytesRemaining).sub(total)),
      lastLength.mul(noData),
    ]);
  });

  cs.createGate("terminal row", (meta) => {
    const q = meta.querySelector(c.qTerminal);

    return [
      ...gated(q, [
        cur(meta, c.numScriptBytesRemaining),
        cur(meta, c.numDataBytesRemaining),
        cur(meta, c.numDataLengthBytesRemaining),
        cur(meta, c.scriptRlcAcc),
        prev(meta, c.scriptRlcAcc),
        ...stackUnchanged(meta),
        cur(meta, c.pkRlcAcc).sub(prev(meta, c.pkRlcAcc)),
        cur(meta, c.numChecksigOpcodes).sub(prev(meta, c.numChecksigOpcodes)),
        cur(meta, c.randomness).sub(prev(meta, c.randomness)),
      ]),
    ];
  });

  cs.createGate("stack top is truthy", (meta) => [
    meta.querySelector(c.qTerminal).mul(c.stackTopIsFalse.expr()),
  ]);
};
