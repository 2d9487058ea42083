import {
  ByteWriter,
  LengthFieldWidth,
  lengthFieldMax,
  lengthFieldWidth,
} from "../../binary";
import { OpCode } from "../../bitcoin/op-codes";
import { Bytes } from "../../bytes";

const PUSH_DATA_OPCODES: Record<LengthFieldWidth, OpCode> = {
  1: OpCode.OP_PUSHDATA1,
  2: OpCode.OP_PUSHDATA2,
  4: OpCode.OP_PUSHDATA4,
};

/** Assembles scriptPubKey bytes from opcodes and pushes. */
export class ScriptBuilder {
  _writer = new ByteWriter();

  addOpCode = (opCodeNum: number) => {
    if (!Number.isInteger(opCodeNum) || opCodeNum < 0 || opCodeNum > 0xff)
      throw new RangeError(`Not an opcode: ${opCodeNum}`);

    this._writer.writeUInt8(opCodeNum);

    return this;
  };

  /** Push with the shortest encoding: a direct push up to 75 bytes. */
  addData = (data: Bytes) => {
    if (data.length === 0) throw new Error("No data provided: 0");

    if (data.length <= OpCode.OP_PUSHBYTES_75) {
      this._writer.writeUInt8(data.length).writeChunk(data);
      return this;
    }

    return this.addPushData(lengthFieldWidth(data.length), data);
  };

  /** `OP_PUSHDATA1/2/4` push, whatever the data length. */
  addPushData = (width: LengthFieldWidth, data: Bytes) => {
    if (data.length > lengthFieldMax(width))
      throw new RangeError(
        `${data.length} bytes do not fit a ${width}-byte length field`,
      );

    this._writer
      .writeUInt8(PUSH_DATA_OPCODES[width])
      .writeUInt(data.length, width)
      .writeChunk(data);

    return this;
  };

  size = () => this._writer.length;

  toBytes = (): Bytes => this._writer.toBytes();
}
