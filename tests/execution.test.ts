import { fromHex } from "../src/bytes";
import { CircuitParams, getCircuitParams } from "../src/config/circuit-params";
import { MockProver } from "../src/circuit/mock-prover";
import { ShapeError } from "../src/errors";
import { mul } from "../src/field/fr";
import { rlc } from "../src/field/rlc";
import { ScriptBuilder } from "../src/script/build/script-builder";
import {
  ExecutionCircuit,
  traceOf,
  verifyExecution,
} from "./helpers/execution-circuit";

const params: CircuitParams = {
  maxScriptPubkeySize: 12,
  maxStackDepth: 4,
  maxChecksigCount: 1,
};
const terminalRow = params.maxScriptPubkeySize + 1;

const accepted: [string, bigint[]][] = [
  ["51", []],
  ["0051", []],
  ["6151", []],
  ["4c03010203", []],
  ["4d0200aabb", []],
  ["4e01000000ff", []],
  ["02ff4f", []],
  ["03010203ac", [BigInt(1)]],
  ["616161616161616161616151", []],
];

describe("execution constraints", () => {
  test.each(accepted)("script %s is accepted", (hex, initialStack) => {
    const trace = traceOf(fromHex(hex), params, initialStack);

    expect(verifyExecution(trace, params)).toEqual([]);
  });

  test("script of the maximum size", () => {
    const defaults = getCircuitParams();
    const data = Uint8Array.from({ length: 517 }, (_, i) => (i * 7 + 3) % 256);
    const script = new ScriptBuilder().addPushData(2, data).toBytes();

    expect(script.length).toBe(defaults.maxScriptPubkeySize);
    expect(verifyExecution(traceOf(script, defaults), defaults)).toEqual([]);
  });

  test("empty script leaves a false stack top", () => {
    const trace = traceOf(new Uint8Array(0), params);

    expect(verifyExecution(trace, params)).toEqual([
      {
        kind: "constraint",
        gate: "stack top is truthy",
        index: 0,
        row: terminalRow,
      },
    ]);
  });

  test("OP_0 on top is false", () => {
    const trace = traceOf(fromHex("00"), params);

    expect(verifyExecution(trace, params)).toEqual([
      {
        kind: "constraint",
        gate: "stack top is truthy",
        index: 0,
        row: terminalRow,
      },
    ]);
  });

  test("signed and unsigned OP_CHECKSIG in one script", () => {
    const trace = traceOf(fromHex("02aabbac010002ccddac51"), params, [BigInt(1)]);

    expect(trace.rows[terminalRow]).toMatchObject({
      pkRlcAcc: rlc([0xaa, 0xbb], trace.randomness),
      numChecksigOpcodes: 1,
    });
    expect(verifyExecution(trace, params)).toEqual([]);
  });

  test("OP_CHECKSIG with an invalid signature leaves false on top", () => {
    const trace = traceOf(fromHex("03010203ac"), params, [BigInt(0)]);

    expect(verifyExecution(trace, params)).toEqual([
      {
        kind: "constraint",
        gate: "stack top is truthy",
        index: 0,
        row: terminalRow,
      },
    ]);
  });
});

describe("execution constraints catch tampering", () => {
  test("wrong small integer", () => {
    const trace = traceOf(fromHex("51"), params);
    const failures = verifyExecution(trace, params, (t) => {
      t.rows[1].stack[0] = BigInt(2);
    });

    expect(failures).toContainEqual({
      kind: "constraint",
      gate: "OP_1 to OP_16",
      index: 0,
      row: 1,
    });
  });

  test("opcode that is not the script byte", () => {
    const trace = traceOf(fromHex("51"), params);
    const failures = verifyExecution(trace, params, (t) => {
      t.rows[1].opcode = 0x52;
    });

    expect(failures).toContainEqual({
      kind: "constraint",
      gate: "script rlc consumption",
      index: 0,
      row: 1,
    });
    expect(failures).toContainEqual({
      kind: "constraint",
      gate: "OP_1 to OP_16",
      index: 0,
      row: 1,
    });
  });

  test("disabled opcode", () => {
    const trace = traceOf(fromHex("5161"), params);
    const failures = verifyExecution(trace, params, (t) => {
      t.rows[2].opcode = 0x50;
    });

    expect(failures).toContainEqual({
      kind: "constraint",
      gate: "opcode is enabled",
      index: 0,
      row: 2,
    });
  });

  test("non-boolean initial stack item", () => {
    const trace = traceOf(fromHex("51"), params);
    const failures = verifyExecution(trace, params, (t) => {
      t.rows[0].stack[1] = BigInt(2);
    });

    expect(failures).toContainEqual({
      kind: "constraint",
      gate: "first row",
      index: 8,
      row: 0,
    });
  });

  test("length byte that does not match the push", () => {
    const trace = traceOf(fromHex("4c03010203"), params);
    const failures = verifyExecution(trace, params, (t) => {
      t.rows[2].numDataBytesRemaining = 2;
    });

    expect(failures).toContainEqual({
      kind: "constraint",
      gate: "length byte",
      index: 4,
      row: 2,
    });
  });

  test("checksig count dropped at the end", () => {
    const trace = traceOf(fromHex("03010203ac"), params, [BigInt(1)]);
    const failures = verifyExecution(trace, params, (t) => {
      t.rows[terminalRow].numChecksigOpcodes = 0;
    });

    expect(failures).toContainEqual({
      kind: "constraint",
      gate: "terminal row",
      index: 10,
      row: terminalRow,
    });
  });

  test("unsigned OP_CHECKSIG that moves the accumulator", () => {
    const trace = traceOf(fromHex("02aabbac010002ccddac51"), params, [BigInt(1)]);
    const failures = verifyExecution(trace, params, (t) => {
      const moved = mul(t.rows[9].pkRlcAcc, t.randomness);
      for (let row = 10; row <= terminalRow; row++) {
        t.rows[row].pkRlcAcc = moved;
      }
    });

    expect(failures).toEqual([
      { kind: "constraint", gate: "OP_CHECKSIG", index: 5, row: 10 },
    ]);
  });

  test("public inputs are bound", () => {
    const circuit = new ExecutionCircuit(params, traceOf(fromHex("51"), params));
    const [[length, scriptRlc, randomness]] = circuit.publicInputs();

    expect(length).toBe(BigInt(1));
    expect(scriptRlc).toBe(BigInt(0x51));

    const failures = MockProver.run(circuit, [
      [length, scriptRlc + BigInt(1), randomness],
    ]).verify();

    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({ kind: "instance", row: 1 });
  });

  test("trace built for another shape", () => {
    const trace = traceOf(fromHex("51"), params);
    const wider = { ...params, maxScriptPubkeySize: 16 };

    expect(() => verifyExecution(trace, wider)).toThrow(ShapeError);
    expect(() => verifyExecution(trace, wider)).toThrow(
      "Trace has 14 rows, the circuit takes 18",
    );
  });
});
