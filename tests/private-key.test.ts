import { Point, verify } from "@noble/secp256k1";
import { PrivateKey } from "../src/bitcoin/private-key";
import { bigIntToBytes, toHex } from "../src/bytes";
import {
  ECDSA_MESSAGE_HASH,
  paddingSignData,
  signWithNonce,
} from "../src/checksig/sign-data";

describe("private key", () => {
  test("public key encodings", () => {
    const key = new PrivateKey(bigIntToBytes(BigInt(1), 32));

    expect(toHex(key.PublicKey)).toBe(
      "0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798",
    );
    expect(key.UncompressedPublicKey.length).toBe(65);
    expect(key.UncompressedPublicKey[0]).toBe(0x04);
    expect(key.point.equals(Point.BASE)).toBe(true);
  });

  test("rejects keys outside the group order", () => {
    expect(() => new PrivateKey(new Uint8Array(32))).toThrow(
      "Invalid private key",
    );
  });

  test("signs the ownership message", () => {
    const key = new PrivateKey(new Uint8Array(32).fill(0x11));
    const signature = key.sign();

    expect(key.verify(signature)).toBe(true);
    expect(key.verify(signature, bigIntToBytes(BigInt(2), 32))).toBe(false);

    const signData = key.signData();
    expect(signData.publicKey.equals(key.point)).toBe(true);
    expect(key.verify(signData.signature)).toBe(true);
  });
});

describe("sign data", () => {
  test("message hash is the integer one", () => {
    expect(toHex(ECDSA_MESSAGE_HASH)).toBe(`${"00".repeat(31)}01`);
  });

  test("signing with a chosen nonce", () => {
    const secret = BigInt(0x5eed);
    const signature = signWithNonce(secret, BigInt(12345), ECDSA_MESSAGE_HASH);
    const publicKey = Point.BASE.multiply(secret);

    expect(signature.r).toBe(Point.BASE.multiply(BigInt(12345)).x);
    expect(verify(signature, ECDSA_MESSAGE_HASH, publicKey, { strict: false })).toBe(
      true,
    );
  });

  test("padding signature uses key and nonce one", () => {
    const { signature, publicKey } = paddingSignData();

    expect(publicKey.equals(Point.BASE)).toBe(true);
    expect(signature.r).toBe(Point.BASE.x);
    expect(signature.s).toBe(Point.BASE.x + BigInt(1));
    expect(verify(signature, ECDSA_MESSAGE_HASH, publicKey, { strict: false })).toBe(
      true,
    );
  });

  test("scalars out of range", () => {
    expect(() =>
      signWithNonce(BigInt(0), BigInt(1), ECDSA_MESSAGE_HASH),
    ).toThrow("Secret key out of range");
    expect(() =>
      signWithNonce(BigInt(1), BigInt(0), ECDSA_MESSAGE_HASH),
    ).toThrow("Nonce out of range");
  });
});
