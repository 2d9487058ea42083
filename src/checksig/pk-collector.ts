import { Point } from "@noble/secp256k1";
import {
  COMPRESSED_PUBLIC_KEY_SIZE,
  OP_INT_BASE,
  OpCode,
  PREFIX_PK_COMPRESSED_EVEN_Y,
  PREFIX_PK_COMPRESSED_ODD_Y,
  PREFIX_PK_UNCOMPRESSED,
  UNCOMPRESSED_PUBLIC_KEY_SIZE,
} from "../bitcoin/op-codes";
import { Bytes, toHex } from "../bytes";
import { CircuitParams, getCircuitParams } from "../config/circuit-params";
import { PublicKeyError, ScriptParseError, ShapeError } from "../errors";
import { classifyOpcode } from "../gadgets/opcode-table";
import { createLogger } from "../logger";
import { ScriptReader } from "../script/read/script-reader";

const log = createLogger("collector");

/** What the prover knows about a stack item before the script runs. */
export type StackElement =
  | { kind: "invalidSignature" }
  | { kind: "validSignature" }
  | { kind: "data"; bytes: Bytes };

export const StackElement = {
  invalidSignature: (): StackElement => ({ kind: "invalidSignature" }),
  validSignature: (): StackElement => ({ kind: "validSignature" }),
  data: (bytes: Bytes): StackElement => ({ kind: "data", bytes }),
};

export type CollectedPublicKey = {
  /** SEC1 bytes exactly as pushed by the script. */
  bytes: Bytes;
  point: Point;
};

/** Parses a SEC1 key; the point must lie on secp256k1. */
export const parsePublicKey = (bytes: Bytes): Point => {
  const prefix = bytes[0];
  const expectedLength =
    prefix === PREFIX_PK_UNCOMPRESSED
      ? UNCOMPRESSED_PUBLIC_KEY_SIZE
      : prefix === PREFIX_PK_COMPRESSED_EVEN_Y ||
          prefix === PREFIX_PK_COMPRESSED_ODD_Y
        ? COMPRESSED_PUBLIC_KEY_SIZE
        : undefined;

  if (expectedLength === undefined)
    throw new PublicKeyError(
      `Unsupported public key prefix 0x${(prefix ?? 0).toString(16).padStart(2, "0")}`,
    );
  if (bytes.length !== expectedLength)
    throw new PublicKeyError(
      `Public key with prefix 0x0${prefix} must be ${expectedLength} bytes, got ${bytes.length}`,
    );

  try {
    return Point.fromHex(bytes);
  } catch (error) {
    throw new PublicKeyError(
      `Public key ${toHex(bytes)} is not on the curve: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
  }
};

/** Stack item signature flags the execution trace starts from. */
export const toSignatureFlags = (elements: StackElement[]): bigint[] =>
  elements.map((element, i) => {
    switch (element.kind) {
      case "validSignature":
        return BigInt(1);
      case "invalidSignature":
        return BigInt(0);
      case "data":
        throw new ScriptParseError(
          `Initial stack item ${i} is data, not a signature`,
        );
    }
  });

/**
 * Replays `script` over `initialStack` (top first) and returns, in script
 * order, the key of every OP_CHECKSIG whose signature is valid.
 */
export const collectPublicKeys = (
  script: Bytes,
  initialStack: StackElement[],
  params: CircuitParams = getCircuitParams(),
): CollectedPublicKey[] => {
  if (script.length > params.maxScriptPubkeySize)
    throw new ShapeError(
      `Script of ${script.length} bytes exceeds ${params.maxScriptPubkeySize}`,
    );

  const collected: CollectedPublicKey[] = [];
  let stack = [...initialStack];

  const push = (element: StackElement, offset: number) => {
    if (stack.length + 1 > params.maxStackDepth)
      throw new ScriptParseError(
        `Stack overflow past ${params.maxStackDepth} items`,
        offset,
      );
    stack = [element, ...stack];
  };

  for (const token of ScriptReader.read(script)) {
    const opcode = token.opCodeNum;

    if (token.data !== undefined) {
      push(StackElement.data(token.data), token.offset);
      continue;
    }

    const classification = classifyOpcode(opcode);
    if (!classification.enabled)
      throw new ScriptParseError(
        `Disabled opcode 0x${opcode.toString(16).padStart(2, "0")}`,
        token.offset,
      );

    if (classification.op0) {
      push(StackElement.data(new Uint8Array(0)), token.offset);
    } else if (classification.op1ToOp16) {
      push(
        StackElement.data(Uint8Array.of(opcode - OP_INT_BASE)),
        token.offset,
      );
    } else if (opcode === OpCode.OP_CHECKSIG) {
      if (stack.length < 2)
        throw new ScriptParseError(
          "OP_CHECKSIG needs a public key and a signature",
          token.offset,
        );

      const [publicKey, signature, ...rest] = stack;

      if (signature.kind === "data")
        throw new ScriptParseError(
          "OP_CHECKSIG second item is not a signature",
          token.offset,
        );

      if (signature.kind === "validSignature") {
        if (publicKey.kind !== "data")
          throw new ScriptParseError(
            "OP_CHECKSIG top item is not a public key",
            token.offset,
          );
        collected.push({
          bytes: publicKey.bytes,
          point: parsePublicKey(publicKey.bytes),
        });
      }

      stack = [signature, ...rest];
    }
  }

  log("collected %d public keys from %d bytes", collected.length, script.length);

  return collected;
};
