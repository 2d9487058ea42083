import { utils } from "@noble/secp256k1";

/** Order of the BN254 scalar field the constraint system is defined over. */
export const MODULUS = BigInt(
  "21888242871839275222246405745257275088548364400416034343698204186575808495617",
);

export const ZERO = BigInt(0);
export const ONE = BigInt(1);

export const mod = (a: bigint): bigint => utils.mod(a, MODULUS);

export const fromNumber = (value: number): bigint => mod(BigInt(value));

export const add = (a: bigint, b: bigint): bigint => mod(a + b);

export const sub = (a: bigint, b: bigint): bigint => mod(a - b);

export const mul = (a: bigint, b: bigint): bigint => mod(a * b);

export const neg = (a: bigint): bigint => mod(-a);

export const isZero = (a: bigint): boolean => mod(a) === ZERO;

/** Multiplicative inverse, with 0 mapped to 0. */
export const inv0 = (a: bigint): bigint => {
  const value = mod(a);
  if (value === ZERO) return ZERO;
  return utils.invert(value, MODULUS);
};

export const pow = (base: bigint, exponent: number): bigint => {
  let result = ONE;
  let b = mod(base);
  let e = exponent;
  while (e > 0) {
    if (e & 1) result = mul(result, b);
    b = mul(b, b);
    e >>= 1;
  }
  return result;
};
