/**
 * Base error class for all HF2 codec errors
 */
export class Hf2Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = "Hf2Error";
    Object.setPrototypeOf(this, Hf2Error.prototype);
  }
}

/**
 * Frame length outside [1, 64], or a declared payload that does not fit.
 */
export class MalformedLengthError extends Hf2Error {
  constructor(
    message: string,
    readonly actual: number,
    readonly limit: number,
  ) {
    super(message);
    this.name = "MalformedLengthError";
    Object.setPrototypeOf(this, MalformedLengthError.prototype);
  }
}

/**
 * Command buffer shorter than its fixed header.
 */
export class UndersizedHeaderError extends Hf2Error {
  constructor(
    readonly actual: number,
    readonly expected: number,
  ) {
    super(`Buffer of ${actual} bytes is shorter than the ${expected}-byte header`);
    this.name = "UndersizedHeaderError";
    Object.setPrototypeOf(this, UndersizedHeaderError.prototype);
  }
}

/**
 * Encode destination does not have the size the encoded value needs.
 */
export class SizeMismatchError extends Hf2Error {
  constructor(
    readonly actual: number,
    readonly expected: number,
  ) {
    super(`Destination buffer is ${actual} bytes, expected ${expected}`);
    this.name = "SizeMismatchError";
    Object.setPrototypeOf(this, SizeMismatchError.prototype);
  }
}

/**
 * A header field value does not fit its wire width.
 */
export class FieldRangeError extends Hf2Error {
  constructor(
    readonly field: string,
    readonly value: number,
    readonly limit: number,
  ) {
    super(`${field} must be an integer in 0..${limit}, got ${value}`);
    this.name = "FieldRangeError";
    Object.setPrototypeOf(this, FieldRangeError.prototype);
  }
}
