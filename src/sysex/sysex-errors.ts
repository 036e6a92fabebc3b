export type JdxiProtocolErrorCode =
  | 'BYTE_RANGE'
  | 'OUT_OF_RANGE'
  | 'INVALID_RAW'
  | 'INVALID_PARTIAL'
  | 'UNKNOWN_PARAMETER'
  | 'UNKNOWN_BANK'
  | 'SLOT_OUT_OF_RANGE'
  | 'NOT_SENT';

/**
 * Base class for every error raised while encoding an edit for the JD-Xi or
 * handing it to the MIDI output. The edit is not recorded once one of these
 * has been thrown.
 */
export abstract class JdxiProtocolError extends Error {
  abstract readonly code: JdxiProtocolErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ByteRangeError extends JdxiProtocolError {
  readonly code = 'BYTE_RANGE';

  constructor(
    readonly field: string,
    readonly value: number,
    max = 0x7f,
    detail?: string,
  ) {
    super(
      detail ?? `${field} must be an integer between 0 and ${max}, got ${value}`,
    );
  }
}

export class OutOfRangeError extends JdxiProtocolError {
  readonly code = 'OUT_OF_RANGE';

  constructor(
    readonly parameterId: string,
    readonly displayValue: number | string,
    detail: string,
  ) {
    super(`${parameterId}: display value ${displayValue} rejected (${detail})`);
  }
}

export class InvalidRawError extends JdxiProtocolError {
  readonly code = 'INVALID_RAW';

  constructor(
    readonly parameterId: string,
    readonly raw: number | ReadonlyArray<number>,
    detail: string,
  ) {
    super(`${parameterId}: raw value ${String(raw)} rejected (${detail})`);
  }
}

export class InvalidPartialError extends JdxiProtocolError {
  readonly code = 'INVALID_PARTIAL';

  constructor(
    readonly synthType: string,
    readonly partial: number | string | undefined,
    detail: string,
  ) {
    super(`${synthType}: partial ${String(partial)} rejected (${detail})`);
  }
}

export class UnknownParameterError extends JdxiProtocolError {
  readonly code = 'UNKNOWN_PARAMETER';

  constructor(
    readonly synthType: string,
    readonly parameterId: string,
  ) {
    super(`${synthType} has no parameter named ${parameterId}`);
  }
}

export class UnknownBankError extends JdxiProtocolError {
  readonly code = 'UNKNOWN_BANK';

  constructor(detail: string) {
    super(`Unknown program bank: ${detail}`);
  }
}

export class SlotOutOfRangeError extends JdxiProtocolError {
  readonly code = 'SLOT_OUT_OF_RANGE';

  constructor(detail: string) {
    super(`Program slot out of range: ${detail}`);
  }
}

export class MessageNotSentError extends JdxiProtocolError {
  readonly code = 'NOT_SENT';

  constructor(readonly bytes: ReadonlyArray<number>) {
    super(`MIDI output refused the ${bytes.length} byte message`);
  }
}
