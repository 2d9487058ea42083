import { OpCode } from "../src/bitcoin/op-codes";
import { PrivateKey } from "../src/bitcoin/private-key";
import { bigIntToBytes } from "../src/bytes";
import {
  CircuitParams,
  getCircuitParams,
  resetCircuitParams,
} from "../src/config/circuit-params";
import { MockProver } from "../src/circuit/mock-prover";
import {
  proveOwnership,
  ScriptOwnershipCircuit,
} from "../src/circuit/script-ownership-circuit";
import { StackElement } from "../src/checksig/pk-collector";
import { ShapeError, SynthesisError } from "../src/errors";
import { scriptRlcSuffixes } from "../src/field/rlc";
import { ScriptBuilder } from "../src/script/build/script-builder";

const params: CircuitParams = {
  maxScriptPubkeySize: 120,
  maxStackDepth: 4,
  maxChecksigCount: 2,
};
const randomness = BigInt("0x2b1e5a77");

const keyA = new PrivateKey(new Uint8Array(32).fill(0x11));
const keyB = new PrivateKey(new Uint8Array(32).fill(0x22));

const payToKey = (...keys: Uint8Array[]) => {
  const builder = new ScriptBuilder();
  for (const key of keys) {
    builder.addData(key).addOpCode(OpCode.OP_CHECKSIG);
  }
  return builder.toBytes();
};

describe("script ownership circuit", () => {
  afterEach(() => {
    resetCircuitParams();
  });

  test("pay to compressed public key", () => {
    const script = payToKey(keyA.PublicKey);

    const { publicInputs, failures } = proveOwnership(
      {
        script,
        randomness,
        initialStack: [StackElement.validSignature()],
        signatures: [keyA.signData()],
      },
      params,
    );

    expect(failures).toEqual([]);
    expect(publicInputs).toEqual([
      [BigInt(35), scriptRlcSuffixes(script, randomness)[0], randomness],
    ]);
  });

  test("two checksigs with mixed key encodings", () => {
    const { failures } = proveOwnership(
      {
        script: payToKey(keyA.PublicKey, keyB.UncompressedPublicKey),
        randomness,
        initialStack: [StackElement.validSignature()],
        signatures: [keyA.signData(), keyB.signData()],
      },
      params,
    );

    expect(failures).toEqual([]);
  });

  test("default circuit shape", () => {
    const { circuit, failures } = proveOwnership({
      script: payToKey(keyB.PublicKey),
      randomness,
      initialStack: [StackElement.validSignature()],
      signatures: [keyB.signData()],
    });

    expect(failures).toEqual([]);
    expect(circuit.params).toEqual(getCircuitParams());
    expect(circuit.trace.rows).toHaveLength(522);
  });

  test("invalid signature flag cannot prove ownership", () => {
    const { failures } = proveOwnership(
      {
        script: payToKey(keyA.PublicKey),
        randomness,
        initialStack: [StackElement.invalidSignature()],
        signatures: [],
      },
      params,
    );

    expect(failures).toEqual([
      {
        kind: "constraint",
        gate: "stack top is truthy",
        index: 0,
        row: params.maxScriptPubkeySize + 1,
      },
    ]);
  });

  test("forged signature cannot prove ownership", () => {
    const { failures } = proveOwnership(
      {
        script: payToKey(keyA.PublicKey),
        randomness,
        initialStack: [StackElement.validSignature()],
        signatures: [
          {
            signature: keyA.sign(bigIntToBytes(BigInt(7), 32)),
            publicKey: keyA.point,
          },
        ],
      },
      params,
    );

    expect(failures).toEqual([
      {
        kind: "constraint",
        gate: "ecdsa signature verifies",
        index: 0,
        row: params.maxScriptPubkeySize + 2,
      },
    ]);
  });

  test("keys other than the script's break the boundary", () => {
    const circuit = ScriptOwnershipCircuit.fromWitness(
      {
        script: payToKey(keyA.PublicKey),
        randomness,
        initialStack: [StackElement.validSignature()],
        signatures: [keyB.signData()],
        collectedKeys: [{ bytes: keyB.PublicKey, point: keyB.point }],
      },
      params,
    );

    const failures = MockProver.run(circuit, circuit.publicInputs()).verify();

    expect(failures).toHaveLength(1);
    expect(failures[0].kind).toBe("permutation");
  });

  test("witness errors", () => {
    const script = payToKey(keyA.PublicKey);

    expect(() =>
      proveOwnership(
        {
          script,
          randomness,
          initialStack: [StackElement.validSignature()],
          signatures: [keyB.signData()],
        },
        params,
      ),
    ).toThrow("Signature 0 is for a different key than collected key 0");

    expect(() =>
      proveOwnership(
        {
          script,
          randomness,
          initialStack: [StackElement.validSignature()],
          signatures: [],
        },
        params,
      ),
    ).toThrow(SynthesisError);

    expect(() =>
      proveOwnership(
        {
          script,
          randomness,
          initialStack: [StackElement.validSignature()],
          signatures: [keyA.signData(), keyA.signData(), keyA.signData()],
        },
        params,
      ),
    ).toThrow(ShapeError);
  });
});
