export type Bytes = Uint8Array;

export const concat = (chunks: Bytes[]): Bytes => {
  const out = new Uint8Array(chunks.reduce((a, c) => a + c.length, 0));

  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }

  return out;
};

export const equal = (a: Bytes, b: Bytes): boolean =>
  a.length === b.length && a.every((byte, i) => byte === b[i]);

/** Accepts an optional `0x` prefix and an odd digit count. */
export const fromHex = (value: string): Bytes => {
  const digits = value.startsWith("0x") ? value.slice(2) : value;
  if (!/^[0-9a-fA-F]*$/.test(digits))
    throw new Error(`Invalid hex string: ${value}`);

  const padded = digits.length % 2 === 0 ? digits : `0${digits}`;
  const out = new Uint8Array(padded.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(padded.slice(i * 2, i * 2 + 2), 16);
  }

  return out;
};

export const toHex = (value: Bytes): string =>
  Array.from(value, (byte) => byte.toString(16).padStart(2, "0")).join("");

/** Big-endian bytes of a non-negative integer, left-padded to `length`. */
export const bigIntToBytes = (value: bigint, length: number): Bytes => {
  if (value < BigInt(0)) throw new Error("Negative value");

  const out = new Uint8Array(length);
  let rest = value;
  for (let i = length - 1; i >= 0; i--) {
    out[i] = Number(rest & BigInt(0xff));
    rest >>= BigInt(8);
  }
  if (rest !== BigInt(0)) throw new Error(`Value does not fit ${length} bytes`);

  return out;
};

export const bytesToBigInt = (value: Bytes): bigint =>
  value.reduce(
    (acc, byte) => (acc << BigInt(8)) | BigInt(byte),
    BigInt(0),
  );
