import { Inject, Injectable } from '@nestjs/common';
import { AddressTriple } from '../address/synth-type';
import { DEVICE_IDENTITY, DeviceIdentity } from '../config/device-identity';
import { rolandChecksum } from './roland-checksum';
import {
  END_OF_SYSEX,
  GENERAL_INFORMATION,
  IDENTITY_REQUEST,
  MAX_RQ1_LENGTH,
  RQ1_SIZE_BYTES,
  RolandCommand,
  START_OF_SYSEX,
  UNIVERSAL_NON_REALTIME,
} from './sysex-constants';
import { ByteRangeError } from './sysex-errors';

export type SysExMessage = ReadonlyArray<number>;

export function assertDataByte(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0x7f) {
    throw new ByteRangeError(field, value);
  }
}

/** Splits a 28-bit size into four 7-bit bytes, most significant first. */
export function toSevenBitSize(length: number): number[] {
  const bytes: number[] = [];
  for (let index = RQ1_SIZE_BYTES - 1; index >= 0; index--) {
    bytes.push(Math.floor(length / 2 ** (7 * index)) & 0x7f);
  }
  return bytes;
}

export function fromSevenBitSize(bytes: ReadonlyArray<number>): number {
  return bytes.reduce((length, value) => length * 128 + value, 0);
}

@Injectable()
export class SysExMessageBuilder {
  constructor(@Inject(DEVICE_IDENTITY) private readonly identity: DeviceIdentity) {}

  header(): number[] {
    return [
      START_OF_SYSEX,
      this.identity.manufacturerId,
      this.identity.deviceId,
      ...this.identity.modelId,
    ];
  }

  buildDt1(
    address: AddressTriple,
    offset: number,
    value: number | ReadonlyArray<number>,
  ): SysExMessage {
    const data = typeof value === 'number' ? [value] : [...value];
    if (data.length === 0) {
      throw new ByteRangeError('value', 0, 0x7f, 'value carries no bytes');
    }
    const body = this.addressBytes(address, offset);
    data.forEach((byte, index) => assertDataByte(`value[${index}]`, byte));

    return this.frame(RolandCommand.DT1, [...body, ...data]);
  }

  buildRq1(address: AddressTriple, offset: number, length: number): SysExMessage {
    const body = this.addressBytes(address, offset);
    if (!Number.isInteger(length) || length < 0 || length > MAX_RQ1_LENGTH) {
      throw new ByteRangeError('length', length, MAX_RQ1_LENGTH);
    }

    return this.frame(RolandCommand.RQ1, [...body, ...toSevenBitSize(length)]);
  }

  buildIdentityRequest(): SysExMessage {
    return [
      START_OF_SYSEX,
      UNIVERSAL_NON_REALTIME,
      this.identity.deviceId,
      GENERAL_INFORMATION,
      IDENTITY_REQUEST,
      END_OF_SYSEX,
    ];
  }

  private addressBytes(address: AddressTriple, offset: number): number[] {
    const bytes = [address.area, address.part, address.group, offset];
    ['area', 'part', 'group', 'offset'].forEach((field, index) =>
      assertDataByte(field, bytes[index]),
    );
    return bytes;
  }

  private frame(command: RolandCommand, payload: number[]): SysExMessage {
    return Object.freeze([
      ...this.header(),
      command,
      ...payload,
      rolandChecksum(payload),
      END_OF_SYSEX,
    ]);
  }
}
