/** An input exceeds one of the fixed maxima of the circuit shape. */
export class ShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ShapeError";
  }
}

/** The script cannot be replayed: bad push, disabled opcode, bad stack use. */
export class ScriptParseError extends Error {
  readonly offset?: number;

  constructor(message: string, offset?: number) {
    super(offset === undefined ? message : `${message} at byte ${offset}`);
    this.name = "ScriptParseError";
    this.offset = offset;
  }
}

export class PublicKeyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PublicKeyError";
  }
}

/** Witness and constraint system cannot be put together. */
export class SynthesisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SynthesisError";
  }
}
