import { Bytes } from "./bytes";

export type LengthFieldWidth = 1 | 2 | 4;

const LENGTH_FIELD_MAX: Record<LengthFieldWidth, number> = {
  1: 0xff,
  2: 0xffff,
  4: 0xffffffff,
};

export const lengthFieldMax = (width: LengthFieldWidth) =>
  LENGTH_FIELD_MAX[width];

/** Smallest length field that holds `length`. */
export const lengthFieldWidth = (length: number): LengthFieldWidth =>
  length <= LENGTH_FIELD_MAX[1] ? 1 : length <= LENGTH_FIELD_MAX[2] ? 2 : 4;

/** Growable writer; multi-byte integers go out little-endian. */
export class ByteWriter {
  _bytes: number[] = [];

  get length() {
    return this._bytes.length;
  }

  writeUInt8 = (value: number) => {
    this.writeUInt(value, 1);
    return this;
  };

  writeUInt = (value: number, width: LengthFieldWidth) => {
    if (!Number.isInteger(value) || value < 0 || value > LENGTH_FIELD_MAX[width])
      throw new RangeError(`${value} does not fit ${width} bytes`);

    let rest = value;
    for (let i = 0; i < width; i++) {
      this._bytes.push(rest & 0xff);
      rest = Math.floor(rest / 0x100);
    }

    return this;
  };

  writeChunk = (chunk: Bytes) => {
    for (const byte of chunk) this._bytes.push(byte);
    return this;
  };

  toBytes = (): Bytes => Uint8Array.from(this._bytes);
}
