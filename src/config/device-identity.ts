import { z } from 'zod';
import { ROLAND_MANUFACTURER_ID } from '../sysex/sysex-constants';

export interface DeviceIdentity {
  readonly manufacturerId: number;
  readonly deviceId: number;
  readonly modelId: ReadonlyArray<number>;
}

export const DEVICE_IDENTITY = Symbol('DEVICE_IDENTITY');
export const JDXI_CONFIG = Symbol('JDXI_CONFIG');

export const JDXI_MODEL_ID: ReadonlyArray<number> = [0x00, 0x00, 0x00, 0x0e];
export const DEFAULT_DEVICE_ID = 0x10;

export const DEFAULT_DEVICE_IDENTITY: DeviceIdentity = {
  manufacturerId: ROLAND_MANUFACTURER_ID,
  deviceId: DEFAULT_DEVICE_ID,
  modelId: JDXI_MODEL_ID,
};

const integerSetting = z
  .string()
  .trim()
  .regex(/^(0x[0-9a-fA-F]+|\d+)$/, 'expected a decimal or 0x-prefixed number')
  .transform((value) =>
    value.startsWith('0x') ? parseInt(value.slice(2), 16) : parseInt(value, 10),
  );

const jdxiConfigSchema = z.object({
  JDXI_DEVICE_ID: integerSetting
    .pipe(z.number().int().min(0x10).max(0x1f))
    .default(String(DEFAULT_DEVICE_ID)),
  JDXI_PROGRAM_CHANNEL: integerSetting
    .pipe(z.number().int().min(1).max(16))
    .default('16'),
  PORT: integerSetting.pipe(z.number().int().min(1).max(65535)).default('3000'),
});

export interface JdxiConfig {
  readonly deviceIdentity: DeviceIdentity;
  // 1-based MIDI channel used for bank select and program change
  readonly programChannel: number;
  readonly port: number;
}

/** Reads the JD-Xi settings from the environment. Throws a ZodError when a value is invalid. */
export function loadJdxiConfig(
  env: Record<string, string | undefined> = process.env,
): JdxiConfig {
  const settings = jdxiConfigSchema.parse(env);
  return {
    deviceIdentity: { ...DEFAULT_DEVICE_IDENTITY, deviceId: settings.JDXI_DEVICE_ID },
    programChannel: settings.JDXI_PROGRAM_CHANNEL,
    port: settings.PORT,
  };
}
