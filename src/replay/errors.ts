/**
 * Failures raised while decoding attributes or reading derived identity views.
 *
 * Only the AttributeDecodeError family is expected from replay input; the rest
 * mean a collaborator read something before it was populated.
 */
export abstract class ReplayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export abstract class AttributeDecodeError extends ReplayError {
  constructor(
    message: string,
    public readonly code: number,
    public readonly ownerIndex: number,
  ) {
    super(message);
  }
}

/** Secondary code table has no entry for the stripped value. */
export class UnknownCodeError extends AttributeDecodeError {
  constructor(
    code: number,
    ownerIndex: number,
    public readonly table: string,
    public readonly key: string,
  ) {
    super(`No "${table}" entry for "${key}" (attribute 0x${formatCode(code)}, owner ${ownerIndex})`, code, ownerIndex);
  }
}

/** A computed transform could not read the value, e.g. a non-digit team slot. */
export class MalformedValueError extends AttributeDecodeError {
  constructor(code: number, ownerIndex: number, public readonly value: string) {
    super(`Cannot decode "${value}" for attribute 0x${formatCode(code)} (owner ${ownerIndex})`, code, ownerIndex);
  }
}

export class IllegalStateError extends ReplayError {}

export class IncompleteIdentityError extends ReplayError {
  constructor(public readonly missing: string[]) {
    super(`Player identity is missing: ${missing.join(', ')}`);
  }
}

export class MissingFieldError extends ReplayError {
  constructor(public readonly field: string) {
    super(`Unknown placeholder "{${field}}"`);
  }
}

export class LengthMismatchError extends ReplayError {
  constructor(timesLength: number, valuesLength: number) {
    super(`Graph needs as many times as values (got ${timesLength} and ${valuesLength})`);
  }
}

export class UnknownStatCodeError extends ReplayError {
  constructor(public readonly statCode: string) {
    super(`No label for stat code "${statCode}"`);
  }
}

export function formatCode(code: number): string {
  return code.toString(16).toUpperCase().padStart(4, '0');
}
