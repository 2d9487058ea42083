import { Bytes } from "../../bytes";

export class ScriptReadToken {
  readonly opCodeNum: number;
  /** Pushed bytes; absent for plain opcodes. */
  readonly data?: Bytes;
  /** Position of the opcode byte in the script. */
  readonly offset: number;

  constructor(opCodeNum: number, offset: number, data?: Bytes) {
    this.opCodeNum = opCodeNum;
    this.offset = offset;
    this.data = data;
  }

  get isPush() {
    return this.data !== undefined;
  }
}
