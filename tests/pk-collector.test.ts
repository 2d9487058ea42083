import { OpCode } from "../src/bitcoin/op-codes";
import { PrivateKey } from "../src/bitcoin/private-key";
import { concat, toHex } from "../src/bytes";
import { CircuitParams } from "../src/config/circuit-params";
import {
  collectPublicKeys,
  parsePublicKey,
  StackElement,
  toSignatureFlags,
} from "../src/checksig/pk-collector";
import { PublicKeyError, ScriptParseError, ShapeError } from "../src/errors";
import { ScriptBuilder } from "../src/script/build/script-builder";

const params: CircuitParams = {
  maxScriptPubkeySize: 520,
  maxStackDepth: 8,
  maxChecksigCount: 4,
};

const keyA = new PrivateKey(new Uint8Array(32).fill(0xcd));
const keyB = new PrivateKey(new Uint8Array(32).fill(0xef));
const keyC = new PrivateKey(new Uint8Array(32).fill(0xab));

const payToKey = (...keys: Uint8Array[]) => {
  const builder = new ScriptBuilder();
  for (const key of keys) {
    builder.addData(key).addOpCode(OpCode.OP_CHECKSIG);
  }
  return builder.toBytes();
};

describe("public key collector", () => {
  test("compressed key", () => {
    const script = payToKey(keyA.PublicKey);
    expect(script[0]).toBe(OpCode.OP_PUSHBYTES_33);

    const keys = collectPublicKeys(
      script,
      [StackElement.validSignature()],
      params,
    );

    expect(keys).toHaveLength(1);
    expect(toHex(keys[0].bytes)).toBe(toHex(keyA.PublicKey));
    expect(keys[0].point.equals(keyA.point)).toBe(true);
  });

  test("uncompressed key", () => {
    const script = payToKey(keyA.UncompressedPublicKey);
    expect(script[0]).toBe(OpCode.OP_PUSHBYTES_65);

    const keys = collectPublicKeys(
      script,
      [StackElement.validSignature()],
      params,
    );

    expect(keys).toHaveLength(1);
    expect(toHex(keys[0].bytes)).toBe(toHex(keyA.UncompressedPublicKey));
    expect(keys[0].point.equals(keyA.point)).toBe(true);
  });

  test("keys come back in script order", () => {
    const script = payToKey(
      keyA.PublicKey,
      keyB.PublicKey,
      keyC.UncompressedPublicKey,
    );

    const keys = collectPublicKeys(
      script,
      [StackElement.validSignature()],
      params,
    );

    expect(keys.map((key) => toHex(key.bytes))).toEqual([
      toHex(keyA.PublicKey),
      toHex(keyB.PublicKey),
      toHex(keyC.UncompressedPublicKey),
    ]);
  });

  test("a failed check leaves its result for the next one", () => {
    const script = payToKey(keyA.PublicKey, keyB.PublicKey);

    expect(
      collectPublicKeys(script, [StackElement.invalidSignature()], params),
    ).toEqual([]);
  });

  test("keys under invalid signatures are not parsed", () => {
    const garbage = concat([Uint8Array.of(0x05), new Uint8Array(32)]);

    expect(
      collectPublicKeys(
        payToKey(garbage),
        [StackElement.invalidSignature()],
        params,
      ),
    ).toEqual([]);
    expect(() =>
      collectPublicKeys(
        payToKey(garbage),
        [StackElement.validSignature()],
        params,
      ),
    ).toThrow("Unsupported public key prefix 0x05");
  });

  test("script and stack errors", () => {
    expect(() =>
      collectPublicKeys(
        Uint8Array.of(OpCode.OP_CHECKSIG),
        [StackElement.validSignature()],
        params,
      ),
    ).toThrow("OP_CHECKSIG needs a public key and a signature at byte 0");

    expect(() =>
      collectPublicKeys(Uint8Array.of(0x50), [], params),
    ).toThrow("Disabled opcode 0x50 at byte 0");

    const flagFromScript = new ScriptBuilder()
      .addOpCode(OpCode.OP_1)
      .addData(keyA.PublicKey)
      .addOpCode(OpCode.OP_CHECKSIG)
      .toBytes();
    expect(() => collectPublicKeys(flagFromScript, [], params)).toThrow(
      "OP_CHECKSIG second item is not a signature at byte 35",
    );

    const keyIsSignature = Uint8Array.of(OpCode.OP_CHECKSIG);
    expect(() =>
      collectPublicKeys(
        keyIsSignature,
        [StackElement.validSignature(), StackElement.validSignature()],
        params,
      ),
    ).toThrow(ScriptParseError);
    expect(() =>
      collectPublicKeys(
        keyIsSignature,
        [StackElement.validSignature(), StackElement.validSignature()],
        params,
      ),
    ).toThrow("OP_CHECKSIG top item is not a public key at byte 0");

    expect(() =>
      collectPublicKeys(
        payToKey(keyA.PublicKey),
        [StackElement.validSignature()],
        { ...params, maxScriptPubkeySize: 34 },
      ),
    ).toThrow(ShapeError);

    expect(() =>
      collectPublicKeys(
        new Uint8Array(3).fill(OpCode.OP_1),
        [],
        { ...params, maxStackDepth: 2 },
      ),
    ).toThrow("Stack overflow past 2 items at byte 2");
  });
});

describe("public key parsing", () => {
  test("length must match the prefix", () => {
    expect(() => parsePublicKey(Uint8Array.of(2, 1, 2))).toThrow(
      "Public key with prefix 0x02 must be 33 bytes, got 3",
    );
    expect(() => parsePublicKey(keyA.PublicKey.subarray(0, 32))).toThrow(
      PublicKeyError,
    );
  });

  test("points off the curve", () => {
    const offCurve = new Uint8Array(65);
    offCurve[0] = 0x04;
    offCurve[32] = 1;
    offCurve[64] = 1;

    expect(() => parsePublicKey(offCurve)).toThrow(PublicKeyError);
    expect(() => parsePublicKey(offCurve)).toThrow(/is not on the curve/);
  });

  test("empty input", () => {
    expect(() => parsePublicKey(new Uint8Array(0))).toThrow(
      "Unsupported public key prefix 0x00",
    );
  });
});

describe("signature flags", () => {
  test("map stack elements to flags", () => {
    expect(
      toSignatureFlags([
        StackElement.validSignature(),
        StackElement.invalidSignature(),
      ]),
    ).toEqual([BigInt(1), BigInt(0)]);

    expect(() =>
      toSignatureFlags([StackElement.data(Uint8Array.of(1))]),
    ).toThrow("Initial stack item 0 is data, not a signature");
  });
});
