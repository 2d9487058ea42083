/** Opcodes modelled by the execution circuit. */
export enum OpCode {
  OP_0 = 0x00,
  OP_PUSHBYTES_1 = 0x01,
  OP_PUSHBYTES_33 = 0x21,
  OP_PUSHBYTES_65 = 0x41,
  OP_PUSHBYTES_75 = 0x4b,
  OP_PUSHDATA1 = 0x4c,
  OP_PUSHDATA2 = 0x4d,
  OP_PUSHDATA4 = 0x4e,
  OP_1NEGATE = 0x4f,
  OP_RESERVED = 0x50,
  OP_1 = 0x51,
  OP_16 = 0x60,
  OP_NOP = 0x61,
  OP_CHECKSIG = 0xac,
}

/** OP_n pushes `n = opcode - OP_INT_BASE`. */
export const OP_INT_BASE = OpCode.OP_RESERVED;

// A stack element is truthy unless all its bytes are zero, where a final 0x80
// (negative zero) also counts as zero.
export const NEGATIVE_ZERO = 0x80;

// OP_0 pushes the empty byte array, which is falsy; it is stored as negative zero.
export const EMPTY_ARRAY_REPRESENTATION = NEGATIVE_ZERO;

export const PREFIX_PK_COMPRESSED_EVEN_Y = 0x02;
export const PREFIX_PK_COMPRESSED_ODD_Y = 0x03;
export const PREFIX_PK_UNCOMPRESSED = 0x04;

export const COMPRESSED_PUBLIC_KEY_SIZE = 33;
export const UNCOMPRESSED_PUBLIC_KEY_SIZE = 65;
