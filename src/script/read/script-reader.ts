import { LengthFieldWidth } from "../../binary";
import { OpCode } from "../../bitcoin/op-codes";
import { Bytes } from "../../bytes";
import { ScriptParseError } from "../../errors";
import { ScriptReadToken } from "./script-read-token";

export type PushHeader = {
  /** Bytes pushed. */
  length: number;
  /** Opcode plus length field. */
  size: number;
};

const LENGTH_FIELD_WIDTHS: Partial<Record<number, LengthFieldWidth>> = {
  [OpCode.OP_PUSHDATA1]: 1,
  [OpCode.OP_PUSHDATA2]: 2,
  [OpCode.OP_PUSHDATA4]: 4,
};

const isPushOpcode = (byte: number) =>
  byte > OpCode.OP_0 && byte <= OpCode.OP_PUSHDATA4;

/** Splits a script into opcodes and pushes; malformed pushes throw. */
export class ScriptReader {
  static read = (source: Bytes): ScriptReadToken[] => {
    const result: ScriptReadToken[] = [];

    let i = 0;
    while (i < source.length) {
      const byte = source[i];

      if (!isPushOpcode(byte)) {
        result.push(new ScriptReadToken(byte, i));
        i += 1;
        continue;
      }

      const { length, size } = ScriptReader.pushHeader(source, i);
      if (length === 0) throw new ScriptParseError("Zero-length data push", i);
      if (i + size + length > source.length)
        throw new ScriptParseError(
          `Push of ${length} bytes overruns the script`,
          i,
        );

      result.push(
        new ScriptReadToken(byte, i, source.subarray(i + size, i + size + length)),
      );
      i += size + length;
    }

    return result;
  };

  /** Decodes the push at `offset`; the length field is little-endian. */
  static pushHeader = (source: Bytes, offset: number): PushHeader => {
    const width = LENGTH_FIELD_WIDTHS[source[offset]];
    if (width === undefined) return { length: source[offset], size: 1 };

    if (offset + 1 + width > source.length)
      throw new ScriptParseError("Length field overruns the script", offset);

    let length = 0;
    for (let k = width; k >= 1; k--) {
      length = length * 0x100 + source[offset + k];
    }

    return { length, size: 1 + width };
  };
}
