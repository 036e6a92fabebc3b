import { Inject, Injectable } from '@nestjs/common';
import { AddressTriple } from '../address/synth-type';
import { DEVICE_IDENTITY, DeviceIdentity } from '../config/device-identity';
import { DeviceInfo, decodeIdentityReply } from './device-info';
import { rolandChecksum } from './roland-checksum';
import {
  END_OF_SYSEX,
  MINIMUM_MESSAGE_LENGTH,
  RQ1_SIZE_BYTES,
  RolandCommand,
  START_OF_SYSEX,
  SYSEX_HEADER_LENGTH,
} from './sysex-constants';
import { fromSevenBitSize } from './sysex-message-builder';

export type ParseErrorKind =
  | 'TruncatedMessage'
  | 'InvalidFraming'
  | 'InvalidDataByte'
  | 'DeviceMismatch'
  | 'UnsupportedCommand'
  | 'ChecksumMismatch'
  | 'EmptyPayload'
  | 'InvalidLength';

export interface ParseError {
  readonly kind: ParseErrorKind;
  readonly message: string;
}

export interface Dt1Message {
  readonly command: 'DT1';
  readonly address: AddressTriple;
  readonly offset: number;
  /** A single data byte comes back as a number, even when it was sent as `[n]`. */
  readonly value: number | ReadonlyArray<number>;
  readonly deviceId: number;
}

export interface Rq1Message {
  readonly command: 'RQ1';
  readonly address: AddressTriple;
  readonly offset: number;
  readonly length: number;
  readonly deviceId: number;
}

export type ParsedMessage = Dt1Message | Rq1Message;

export type ParseResult =
  | { readonly ok: true; readonly message: ParsedMessage }
  | { readonly ok: false; readonly error: ParseError };

const COMMAND_INDEX = SYSEX_HEADER_LENGTH;
const ADDRESS_INDEX = COMMAND_INDEX + 1;
const DATA_INDEX = ADDRESS_INDEX + 4;

function failure(kind: ParseErrorKind, message: string): ParseResult {
  return { ok: false, error: { kind, message } };
}

/** The data bytes of a DT1 value, whether it carried one byte or several. */
export function valueBytes(message: Dt1Message): ReadonlyArray<number> {
  return typeof message.value === 'number' ? [message.value] : message.value;
}

/**
 * Validates and decodes inbound Roland DT1/RQ1 messages addressed to the
 * configured device. Malformed input is reported as a {@link ParseError}.
 */
@Injectable()
export class SysExParser {
  constructor(@Inject(DEVICE_IDENTITY) private readonly identity: DeviceIdentity) {}

  parse(bytes: ReadonlyArray<number>): ParseResult {
    if (bytes.length < MINIMUM_MESSAGE_LENGTH) {
      return failure(
        'TruncatedMessage',
        `expected at least ${MINIMUM_MESSAGE_LENGTH} bytes, got ${bytes.length}`,
      );
    }
    const last = bytes.length - 1;
    if (bytes[0] !== START_OF_SYSEX || bytes[last] !== END_OF_SYSEX) {
      return failure('InvalidFraming', 'message is not framed by F0 and F7');
    }
    for (let index = 1; index < last; index++) {
      const value = bytes[index];
      if (!Number.isInteger(value) || value < 0 || value > 0x7f) {
        return failure('InvalidDataByte', `byte ${index} is ${value}`);
      }
    }

    const expectedHeader = [
      this.identity.manufacturerId,
      this.identity.deviceId,
      ...this.identity.modelId,
    ];
    if (expectedHeader.some((value, index) => bytes[index + 1] !== value)) {
      return failure(
        'DeviceMismatch',
        'manufacturer, device or model does not match this JD-Xi',
      );
    }

    const command = bytes[COMMAND_INDEX];
    if (command !== RolandCommand.DT1 && command !== RolandCommand.RQ1) {
      return failure('UnsupportedCommand', `command ${command} is not DT1 or RQ1`);
    }

    const covered = bytes.slice(ADDRESS_INDEX, last - 1);
    const checksum = bytes[last - 1];
    const expected = rolandChecksum(covered);
    if (checksum !== expected) {
      return failure(
        'ChecksumMismatch',
        `checksum is ${checksum}, expected ${expected}`,
      );
    }

    const address: AddressTriple = {
      area: bytes[ADDRESS_INDEX],
      part: bytes[ADDRESS_INDEX + 1],
      group: bytes[ADDRESS_INDEX + 2],
    };
    const offset = bytes[ADDRESS_INDEX + 3];
    const data = bytes.slice(DATA_INDEX, last - 1);
    const deviceId = bytes[2];

    if (command === RolandCommand.DT1) {
      if (data.length === 0) {
        return failure('EmptyPayload', 'DT1 message carries no value');
      }
      return {
        ok: true,
        message: {
          command: 'DT1',
          address,
          offset,
          value: data.length === 1 ? data[0] : data,
          deviceId,
        },
      };
    }

    if (data.length !== RQ1_SIZE_BYTES) {
      return failure(
        'InvalidLength',
        `RQ1 size field has ${data.length} bytes, expected ${RQ1_SIZE_BYTES}`,
      );
    }
    return {
      ok: true,
      message: {
        command: 'RQ1',
        address,
        offset,
        length: fromSevenBitSize(data),
        deviceId,
      },
    };
  }

  parseIdentityReply(bytes: ReadonlyArray<number>): DeviceInfo | undefined {
    return decodeIdentityReply(bytes);
  }
}
