export const START_OF_SYSEX = 0xf0;
export const END_OF_SYSEX = 0xf7;

export const ROLAND_MANUFACTURER_ID = 0x41;

export enum RolandCommand {
  RQ1 = 0x11,
  DT1 = 0x12,
}

// F0 + manufacturer + device + 4 model bytes
export const SYSEX_HEADER_LENGTH = 7;

// header + command + 4 address bytes + checksum + F7
export const MINIMUM_MESSAGE_LENGTH = SYSEX_HEADER_LENGTH + 1 + 4 + 1 + 1;

export const RQ1_SIZE_BYTES = 4;
export const MAX_RQ1_LENGTH = 0x0fffffff;

// Universal non-realtime identity messages
export const UNIVERSAL_NON_REALTIME = 0x7e;
export const GENERAL_INFORMATION = 0x06;
export const IDENTITY_REQUEST = 0x01;
export const IDENTITY_REPLY = 0x02;

export const JDXI_FAMILY_CODE: ReadonlyArray<number> = [0x0e, 0x03];

export function toHex(bytes: ReadonlyArray<number>): string {
  return bytes
    .map((value) => value.toString(16).toUpperCase().padStart(2, '0'))
    .join(' ');
}
