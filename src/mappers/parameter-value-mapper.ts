import {
  DEFAULT_CENTER,
  DisplayValue,
  ParameterSpec,
} from '../parameters/parameter-spec';
import { InvalidRawError, OutOfRangeError } from '../sysex/sysex-errors';

const NIBBLE_COUNT = 4;
const NIBBLE_MASK = 0x0f;

/**
 * Converts between the values shown in the editor and the raw values the
 * JD-Xi stores, following the encoding declared by each parameter spec.
 */
export class ParameterValueMapper {
  toRaw(spec: ParameterSpec, displayValue: DisplayValue): number {
    if (spec.encoding === 'enum') {
      return this.convertFromEnumDisplay(spec, displayValue);
    }
    if (typeof displayValue === 'string') {
      throw new OutOfRangeError(
        spec.id,
        displayValue,
        'a label was given to a numeric parameter',
      );
    }
    this.assertDisplayInRange(spec, displayValue);

    if (spec.encoding === 'signed_offset') {
      return this.convertFromSignedOffset(displayValue, spec.center);
    }
    return this.convertFromScaledDisplay(spec, displayValue);
  }

  toDisplay(spec: ParameterSpec, raw: number): DisplayValue {
    if (!Number.isInteger(raw) || raw < spec.rawMin || raw > spec.rawMax) {
      throw new InvalidRawError(
        spec.id,
        raw,
        `expected an integer between ${spec.rawMin} and ${spec.rawMax}`,
      );
    }

    switch (spec.encoding) {
      case 'enum': {
        const option = (spec.options ?? []).find((item) => item.raw === raw);
        if (option === undefined) {
          throw new InvalidRawError(spec.id, raw, 'matches no option');
        }
        return option.label;
      }
      case 'signed_offset':
        return this.convertToSignedOffset(raw, spec.center);
      case 'unsigned':
        return this.convertToScaledDisplay(spec, raw);
    }
  }

  /**
   * Data bytes of a raw value as they travel in a DT1 message. Four byte
   * parameters are split into nibbles, most significant first.
   */
  toBytes(spec: ParameterSpec, raw: number): number[] {
    if (!Number.isInteger(raw) || raw < spec.rawMin || raw > spec.rawMax) {
      throw new InvalidRawError(
        spec.id,
        raw,
        `expected an integer between ${spec.rawMin} and ${spec.rawMax}`,
      );
    }
    return spec.size === 1 ? [raw] : this.convertToNibbles(raw);
  }

  fromBytes(spec: ParameterSpec, bytes: ReadonlyArray<number>): number {
    if (bytes.length !== spec.size) {
      throw new InvalidRawError(
        spec.id,
        bytes,
        `expected ${spec.size} byte(s), got ${bytes.length}`,
      );
    }
    if (spec.size === 1) {
      return bytes[0];
    }
    if (bytes.some((value) => !Number.isInteger(value) || value < 0 || value > NIBBLE_MASK)) {
      throw new InvalidRawError(spec.id, bytes, 'nibble above 15');
    }
    return this.convertFromNibbles(bytes);
  }

  convertToNibbles(value: number): number[] {
    const nibbles: number[] = [];
    for (let index = NIBBLE_COUNT - 1; index >= 0; index--) {
      nibbles.push((value >> (index * 4)) & NIBBLE_MASK);
    }
    return nibbles;
  }

  convertFromNibbles(nibbles: ReadonlyArray<number>): number {
    return nibbles.reduce((value, nibble) => (value << 4) | nibble, 0);
  }

  convertFromSignedOffset(displayValue: number, center = DEFAULT_CENTER): number {
    return center + displayValue;
  }

  convertToSignedOffset(raw: number, center = DEFAULT_CENTER): number {
    return raw - center;
  }

  private convertFromScaledDisplay(spec: ParameterSpec, displayValue: number): number {
    const displayWidth = spec.displayMax - spec.displayMin;
    if (displayWidth === 0) {
      return spec.rawMin;
    }
    const rawWidth = spec.rawMax - spec.rawMin;
    const raw = Math.round(
      spec.rawMin + ((displayValue - spec.displayMin) * rawWidth) / displayWidth,
    );
    return Math.min(spec.rawMax, Math.max(spec.rawMin, raw));
  }

  private convertToScaledDisplay(spec: ParameterSpec, raw: number): number {
    const rawWidth = spec.rawMax - spec.rawMin;
    if (rawWidth === 0) {
      return spec.displayMin;
    }
    const displayWidth = spec.displayMax - spec.displayMin;
    return Math.round(
      spec.displayMin + ((raw - spec.rawMin) * displayWidth) / rawWidth,
    );
  }

  private convertFromEnumDisplay(spec: ParameterSpec, displayValue: DisplayValue): number {
    const options = spec.options ?? [];
    if (typeof displayValue === 'string') {
      const option = options.find((item) => item.label === displayValue);
      if (option === undefined) {
        throw new OutOfRangeError(spec.id, displayValue, 'unknown option');
      }
      return option.raw;
    }
    if (!Number.isInteger(displayValue) || displayValue < 0 || displayValue >= options.length) {
      throw new OutOfRangeError(
        spec.id,
        displayValue,
        `option index must be between 0 and ${options.length - 1}`,
      );
    }
    return options[displayValue].raw;
  }

  private assertDisplayInRange(spec: ParameterSpec, displayValue: number): void {
    if (!Number.isInteger(displayValue)) {
      throw new OutOfRangeError(spec.id, displayValue, 'not an integer');
    }
    if (displayValue < spec.displayMin || displayValue > spec.displayMax) {
      throw new OutOfRangeError(
        spec.id,
        displayValue,
        `expected a value between ${spec.displayMin} and ${spec.displayMax}`,
      );
    }
  }
}
