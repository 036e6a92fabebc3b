import { ParameterSection } from '../parameters/parameter-spec';

export enum SynthType {
  PROGRAM = 'PROGRAM',
  DIGITAL_1 = 'DIGITAL_1',
  DIGITAL_2 = 'DIGITAL_2',
  ANALOG = 'ANALOG',
  DRUMS = 'DRUMS',
}

export interface AddressTriple {
  readonly area: number;
  readonly part: number;
  readonly group: number;
}

export const TEMPORARY_PROGRAM_AREA = 0x18;
export const TEMPORARY_TONE_AREA = 0x19;

export const DIGITAL_PARTIAL_GROUP = 0x20;
export const DIGITAL_MODIFY_GROUP = 0x50;
export const DRUM_PARTIAL_GROUP = 0x2e;

export interface PartialRange {
  readonly min: number;
  readonly max: number;
  // an analog tone has one partial that may be addressed without an index
  readonly implicit: boolean;
}

export interface SynthTypeLayout {
  readonly area: number;
  readonly part: number;
  readonly sections: ReadonlyArray<ParameterSection>;
  readonly partials?: PartialRange;
}

export const SYNTH_TYPE_LAYOUTS: Readonly<Record<SynthType, SynthTypeLayout>> = {
  [SynthType.PROGRAM]: {
    area: TEMPORARY_PROGRAM_AREA,
    part: 0x00,
    sections: ['common'],
  },
  [SynthType.DIGITAL_1]: {
    area: TEMPORARY_TONE_AREA,
    part: 0x01,
    sections: ['common', 'partial', 'modify'],
    partials: { min: 1, max: 3, implicit: false },
  },
  [SynthType.DIGITAL_2]: {
    area: TEMPORARY_TONE_AREA,
    part: 0x21,
    sections: ['common', 'partial', 'modify'],
    partials: { min: 1, max: 3, implicit: false },
  },
  [SynthType.ANALOG]: {
    area: TEMPORARY_TONE_AREA,
    part: 0x42,
    sections: ['partial'],
    partials: { min: 1, max: 1, implicit: true },
  },
  [SynthType.DRUMS]: {
    area: TEMPORARY_TONE_AREA,
    part: 0x70,
    sections: ['common', 'partial'],
    partials: { min: 1, max: 37, implicit: false },
  },
};

export const SYNTH_TYPES: ReadonlyArray<SynthType> = Object.values(SynthType);

export function isSynthType(value: string): value is SynthType {
  return SYNTH_TYPES.some((synthType) => synthType === value);
}
