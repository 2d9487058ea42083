import {
  EMPTY_ARRAY_REPRESENTATION,
  OP_INT_BASE,
  OpCode,
} from "../bitcoin/op-codes";
import { Bytes } from "../bytes";
import { CircuitParams, getCircuitParams } from "../config/circuit-params";
import { ScriptParseError, ShapeError } from "../errors";
import { add, fromNumber, mod, mul, ONE, ZERO } from "../field/fr";
import { scriptRlcSuffixes } from "../field/rlc";
import { classifyOpcode } from "../gadgets/opcode-table";
import { createLogger } from "../logger";

const log = createLogger("interpreter");

/** Where the byte reader stands between two bytes. */
export type ParserState =
  | { kind: "idle" }
  | { kind: "pendingPush"; remaining: number }
  | {
      kind: "pendingLength";
      remaining: number;
      total: number;
      multiplier: number;
    };

/**
 * One row of the execution trace. `stack`, `pkRlcAcc` and
 * `numChecksigOpcodes` hold the state after the row's byte; the data and
 * length counters hold the state the byte is read in, except that a length
 * byte's `numDataBytesRemaining` already includes that byte.
 */
export type TraceRow = {
  opcode: number;
  /** RLC of the script bytes after this row's byte. */
  scriptRlcAcc: bigint;
  /** Script bytes left, this row's byte included. */
  numScriptBytesRemaining: number;
  /** Top first, always `maxStackDepth` entries. */
  stack: bigint[];
  numDataBytesRemaining: number;
  numDataLengthBytesRemaining: number;
  numDataLengthAccConstant: number;
  pkRlcAcc: bigint;
  numChecksigOpcodes: number;
};

export type ScriptTrace = {
  /** First row, `maxScriptPubkeySize` execution rows, terminal row. */
  rows: TraceRow[];
  scriptLength: number;
  initialScriptRlc: bigint;
  randomness: bigint;
  /** Items really on the stack once the script has run. */
  stackDepth: number;
  finalState: ParserState;
};

const IDLE: ParserState = { kind: "idle" };

const LENGTH_FIELD_WIDTH: Partial<Record<number, number>> = {
  [OpCode.OP_PUSHDATA1]: 1,
  [OpCode.OP_PUSHDATA2]: 2,
  [OpCode.OP_PUSHDATA4]: 4,
};

/** Stack top is false when it is zero or the empty-array marker. */
export const isTruthyStackTop = (top: bigint) =>
  mod(top) !== ZERO && mod(top) !== fromNumber(EMPTY_ARRAY_REPRESENTATION);

const shiftRight = (stack: bigint[], top: bigint) => [
  top,
  ...stack.slice(0, stack.length - 1),
];

type MachineState = {
  parser: ParserState;
  stack: bigint[];
  depth: number;
  pkRlcAcc: bigint;
  numChecksigOpcodes: number;
};

const push = (
  state: MachineState,
  value: bigint,
  maxStackDepth: number,
  offset: number,
) => {
  if (state.depth + 1 > maxStackDepth)
    throw new ScriptParseError(
      `Stack overflow past ${maxStackDepth} items`,
      offset,
    );

  state.stack = shiftRight(state.stack, value);
  state.depth += 1;
};

const checksig = (state: MachineState, randomness: bigint, offset: number) => {
  if (state.depth < 2)
    throw new ScriptParseError(
      "OP_CHECKSIG needs a public key and a signature flag",
      offset,
    );

  const [publicKey, flag, ...rest] = state.stack;
  if (flag !== ZERO && flag !== ONE)
    throw new ScriptParseError("Signature flag must be 0 or 1", offset);

  if (flag === ONE) {
    state.pkRlcAcc = add(mul(state.pkRlcAcc, randomness), publicKey);
    state.numChecksigOpcodes += 1;
  }

  state.stack = [flag, ...rest, ZERO];
  state.depth -= 1;
};

const executeOpcode = (
  state: MachineState,
  script: Bytes,
  offset: number,
  randomness: bigint,
  maxStackDepth: number,
) => {
  const opcode = script[offset];
  const bytesLeft = script.length - offset - 1;
  const classification = classifyOpcode(opcode);

  if (!classification.enabled)
    throw new ScriptParseError(
      `Disabled opcode 0x${opcode.toString(16).padStart(2, "0")}`,
      offset,
    );

  if (classification.op0) {
    push(state, fromNumber(EMPTY_ARRAY_REPRESENTATION), maxStackDepth, offset);
  } else if (classification.op1ToOp16) {
    push(state, fromNumber(opcode - OP_INT_BASE), maxStackDepth, offset);
  } else if (classification.pushBytes) {
    if (opcode > bytesLeft)
      throw new ScriptParseError(
        `Push of ${opcode} bytes overruns the script`,
        offset,
      );
    push(state, ZERO, maxStackDepth, offset);
    state.parser = { kind: "pendingPush", remaining: opcode };
  } else if (classification.checksig) {
    checksig(state, randomness, offset);
  } else {
    const width = LENGTH_FIELD_WIDTH[opcode];
    if (width === undefined) return;

    if (width > bytesLeft)
      throw new ScriptParseError(
        `Length field of ${width} bytes overruns the script`,
        offset,
      );
    push(state, ZERO, maxStackDepth, offset);
    state.parser = {
      kind: "pendingLength",
      remaining: width,
      total: 0,
      multiplier: 1,
    };
  }
};

const validateInputs = (
  script: Bytes,
  initialStack: bigint[],
  params: CircuitParams,
) => {
  if (script.length > params.maxScriptPubkeySize)
    throw new ShapeError(
      `Script of ${script.length} bytes exceeds ${params.maxScriptPubkeySize}`,
    );
  if (initialStack.length > params.maxStackDepth)
    throw new ShapeError(
      `Initial stack of ${initialStack.length} items exceeds ${params.maxStackDepth}`,
    );

  initialStack.forEach((value, i) => {
    if (value !== ZERO && value !== ONE)
      throw new ScriptParseError(
        `Initial stack item ${i} is not a signature flag`,
      );
  });
};

/**
 * Replays `script` once and records the row-by-row state the execution
 * gates check. `initialStack` holds signature flags, top first.
 */
export const interpretScript = (
  script: Bytes,
  randomness: bigint,
  initialStack: bigint[] = [],
  params: CircuitParams = getCircuitParams(),
): ScriptTrace => {
  validateInputs(script, initialStack, params);

  const maxRows = params.maxScriptPubkeySize;
  const suffixes = scriptRlcSuffixes(script, randomness);

  const state: MachineState = {
    parser: IDLE,
    stack: [
      ...initialStack,
      ...new Array<bigint>(params.maxStackDepth - initialStack.length).fill(
        ZERO,
      ),
    ],
    depth: initialStack.length,
    pkRlcAcc: ZERO,
    numChecksigOpcodes: 0,
  };

  const snapshot = (
    opcode: number,
    scriptRlcAcc: bigint,
    numScriptBytesRemaining: number,
    counters: [number, number, number],
  ): TraceRow => ({
    opcode,
    scriptRlcAcc,
    numScriptBytesRemaining,
    stack: [...state.stack],
    numDataBytesRemaining: counters[0],
    numDataLengthBytesRemaining: counters[1],
    numDataLengthAccConstant: counters[2],
    pkRlcAcc: state.pkRlcAcc,
    numChecksigOpcodes: state.numChecksigOpcodes,
  });

  const rows: TraceRow[] = [
    snapshot(OpCode.OP_0, suffixes[0], script.length, [0, 0, 0]),
  ];

  for (let offset = 0; offset < maxRows; offset++) {
    if (offset >= script.length) {
      rows.push(snapshot(OpCode.OP_NOP, ZERO, 0, [0, 0, 0]));
      continue;
    }

    const byte = script[offset];
    const parser = state.parser;
    let counters: [number, number, number] = [0, 0, 0];

    switch (parser.kind) {
      case "idle":
        executeOpcode(state, script, offset, randomness, params.maxStackDepth);
        break;

      case "pendingPush":
        counters = [parser.remaining, 0, 0];
        state.stack[0] = add(fromNumber(byte), mul(randomness, state.stack[0]));
        state.parser =
          parser.remaining === 1
            ? IDLE
            : { kind: "pendingPush", remaining: parser.remaining - 1 };
        break;

      case "pendingLength": {
        const total = parser.total + byte * parser.multiplier;
        counters = [total, parser.remaining, parser.multiplier];

        if (parser.remaining > 1) {
          state.parser = {
            kind: "pendingLength",
            remaining: parser.remaining - 1,
            total,
            multiplier: parser.multiplier * 256,
          };
          break;
        }

        if (total === 0)
          throw new ScriptParseError("Zero-length data push", offset);
        if (total > script.length - offset - 1)
          throw new ScriptParseError(
            `Push of ${total} bytes overruns the script`,
            offset,
          );
        state.parser = { kind: "pendingPush", remaining: total };
        break;
      }
    }

    rows.push(
      snapshot(byte, suffixes[offset + 1], script.length - offset, counters),
    );
  }

  // Unreachable for well-formed scripts: every push is checked against the
  // bytes left when it starts.
  if (state.parser.kind !== "idle")
    throw new ScriptParseError("Script ends inside a data push");

  rows.push(snapshot(OpCode.OP_0, ZERO, 0, [0, 0, 0]));

  log(
    "interpreted %d bytes: depth %d, %d checksig",
    script.length,
    state.depth,
    state.numChecksigOpcodes,
  );

  return {
    rows,
    scriptLength: script.length,
    initialScriptRlc: suffixes[0],
    randomness: mod(randomness),
    stackDepth: state.depth,
    finalState: state.parser,
  };
};

/** Stack after the last script byte, top first. */
export const finalStack = (trace: ScriptTrace) =>
  trace.rows[trace.rows.length - 1].stack;
