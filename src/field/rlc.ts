import { Bytes } from "../bytes";
import { add, fromNumber, mul, ZERO } from "./fr";

/**
 * Random linear combination of bytes in push order: the first byte ends up
 * with the highest power of `randomness`, matching `acc' = byte + r * acc`.
 */
export const rlc = (bytes: Bytes | number[], randomness: bigint): bigint => {
  let acc = ZERO;
  for (const byte of bytes) {
    acc = add(fromNumber(byte), mul(randomness, acc));
  }
  return acc;
};

/** Horner fold of field elements in order: `acc' = acc * r + value`. */
export const rlcFold = (values: bigint[], randomness: bigint): bigint =>
  values.reduce((acc, value) => add(mul(acc, randomness), value), ZERO);

/**
 * RLC of every suffix of `script`; entry `i` binds `script[i..]` with the
 * first remaining byte as the constant term. Entry `script.length` is zero.
 */
export const scriptRlcSuffixes = (
  script: Bytes,
  randomness: bigint,
): bigint[] => {
  const result = new Array<bigint>(script.length + 1);
  result[script.length] = ZERO;

  for (let i = script.length - 1; i >= 0; i--) {
    result[i] = add(fromNumber(script[i]), mul(randomness, result[i + 1]));
  }

  return result;
};

/** `[r, r^2, ..., r^count]` */
export const powersOfRandomness = (
  randomness: bigint,
  count: number,
): bigint[] => {
  const powers: bigint[] = [];
  let current = randomness;
  for (let i = 0; i < count; i++) {
    powers.push(current);
    current = mul(current, randomness);
  }
  return powers;
};
