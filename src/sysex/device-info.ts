import {
  END_OF_SYSEX,
  GENERAL_INFORMATION,
  IDENTITY_REPLY,
  JDXI_FAMILY_CODE,
  ROLAND_MANUFACTURER_ID,
  START_OF_SYSEX,
  UNIVERSAL_NON_REALTIME,
} from './sysex-constants';

// F0 7E dev 06 02 mfr fam fam model model ver ver ver ver F7
export const IDENTITY_REPLY_LENGTH = 15;

export interface DeviceInfo {
  readonly deviceId: number;
  readonly manufacturerId: number;
  readonly familyCode: ReadonlyArray<number>;
  readonly modelNumber: ReadonlyArray<number>;
  readonly version: ReadonlyArray<number>;
  readonly isRoland: boolean;
  readonly isJdxi: boolean;
  readonly versionString: string;
}

export function decodeIdentityReply(
  bytes: ReadonlyArray<number>,
): DeviceInfo | undefined {
  if (
    bytes.length !== IDENTITY_REPLY_LENGTH ||
    bytes[0] !== START_OF_SYSEX ||
    bytes[1] !== UNIVERSAL_NON_REALTIME ||
    bytes[3] !== GENERAL_INFORMATION ||
    bytes[4] !== IDENTITY_REPLY ||
    bytes[bytes.length - 1] !== END_OF_SYSEX
  ) {
    return undefined;
  }

  const manufacturerId = bytes[5];
  const familyCode = bytes.slice(6, 8);
  const version = bytes.slice(10, 14);
  const isRoland = manufacturerId === ROLAND_MANUFACTURER_ID;

  return {
    deviceId: bytes[2],
    manufacturerId,
    familyCode,
    modelNumber: bytes.slice(8, 10),
    version,
    isRoland,
    isJdxi:
      isRoland &&
      familyCode.every((value, index) => value === JDXI_FAMILY_CODE[index]),
    versionString: `v${version[0]}.${String(version[1]).padStart(2, '0')}`,
  };
}

export function describeDevice(info: DeviceInfo): string {
  if (info.isJdxi) {
    return `Roland JD-Xi, firmware ${info.versionString}`;
  }
  return info.isRoland
    ? `Roland device, firmware ${info.versionString}`
    : 'Unknown device';
}
