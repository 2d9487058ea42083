import { CURVE, Point, Signature, utils } from "@noble/secp256k1";
import { bigIntToBytes, Bytes, bytesToBigInt } from "../bytes";

/**
 * Every signature in the circuit signs the hash `1`: the prover shows it
 * holds the keys, not that it may spend the output.
 */
export const ECDSA_MESSAGE_HASH: Bytes = bigIntToBytes(BigInt(1), 32);

export type SignData = {
  signature: Signature;
  publicKey: Point;
};

/** `(r, s)` for a caller-chosen nonce `k`: `r = x(kG)`, `s = k⁻¹(z + r·d)`. */
export const signWithNonce = (
  secret: bigint,
  nonce: bigint,
  messageHash: Bytes,
): Signature => {
  const n = CURVE.n;
  if (secret <= BigInt(0) || secret >= n)
    throw new RangeError("Secret key out of range");
  if (nonce <= BigInt(0) || nonce >= n)
    throw new RangeError("Nonce out of range");

  const z = utils.mod(bytesToBigInt(messageHash), n);
  const r = utils.mod(Point.BASE.multiply(nonce).x, n);
  const s = utils.mod(utils.invert(nonce, n) * (z + r * secret), n);

  return new Signature(r, s);
};

/**
 * Filler for unused signature slots: secret key 1 and nonce 1 over the fixed
 * hash, so `r = x(G)`, `s = 1 + r` and the key is `G`.
 */
export const paddingSignData = (): SignData => ({
  signature: signWithNonce(BigInt(1), BigInt(1), ECDSA_MESSAGE_HASH),
  publicKey: Point.BASE,
});
