import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import drumPartialNameList from './data/drum-partial-names.json';
import {
  AddressTriple,
  DIGITAL_MODIFY_GROUP,
  DIGITAL_PARTIAL_GROUP,
  DRUM_PARTIAL_GROUP,
  SYNTH_TYPES,
  SYNTH_TYPE_LAYOUTS,
  SynthType,
} from './synth-type';
import { ParameterSection, ParameterSpec } from '../parameters/parameter-spec';
import {
  ANALOG_PARAMETERS,
  DIGITAL_COMMON_PARAMETERS,
  DIGITAL_MODIFY_PARAMETERS,
  DIGITAL_PARTIAL_PARAMETERS,
  DRUM_COMMON_PARAMETERS,
  DRUM_PARTIAL_PARAMETERS,
  PROGRAM_COMMON_PARAMETERS,
  ParameterTable,
} from '../parameters/parameter-tables';
import {
  InvalidPartialError,
  UnknownParameterError,
} from '../sysex/sysex-errors';

export const DRUM_PARTIAL_NAMES: ReadonlyArray<string> = z
  .array(z.string().min(1))
  .length(37)
  .parse(drumPartialNameList);

export interface ResolvedParameter {
  readonly address: AddressTriple;
  readonly offset: number;
  readonly spec: ParameterSpec;
  // undefined for common and modify parameters and for the analog tone
  readonly partialIndex?: number;
}

export interface ParameterLocation {
  readonly synthType: SynthType;
  readonly partialIndex?: number;
  readonly spec: ParameterSpec;
}

export interface SpanLocation extends ParameterLocation {
  // position of the parameter's first byte within the span
  readonly index: number;
}

interface SectionMatch {
  readonly synthType: SynthType;
  readonly partialIndex?: number;
  readonly table: ParameterTable;
  // linear offset of the matched group from the section start
  readonly base: number;
}

export interface SectionAddress {
  readonly address: AddressTriple;
  readonly size: number;
}

const SECTION_TABLES: Readonly<
  Record<SynthType, Partial<Record<ParameterSection, ParameterTable>>>
> = {
  [SynthType.PROGRAM]: { common: PROGRAM_COMMON_PARAMETERS },
  [SynthType.DIGITAL_1]: {
    common: DIGITAL_COMMON_PARAMETERS,
    partial: DIGITAL_PARTIAL_PARAMETERS,
    modify: DIGITAL_MODIFY_PARAMETERS,
  },
  [SynthType.DIGITAL_2]: {
    common: DIGITAL_COMMON_PARAMETERS,
    partial: DIGITAL_PARTIAL_PARAMETERS,
    modify: DIGITAL_MODIFY_PARAMETERS,
  },
  [SynthType.ANALOG]: { partial: ANALOG_PARAMETERS },
  [SynthType.DRUMS]: {
    common: DRUM_COMMON_PARAMETERS,
    partial: DRUM_PARTIAL_PARAMETERS,
  },
};

const DRUM_PARTIAL_GROUP_STRIDE = 2;
const GROUP_SPAN = 0x80;

const DEFAULT_SECTION_SIZE = 0x40;
const DRUM_COMMON_SIZE = 0x12;
// sent as 00 00 01 43 in the 7-bit size field
const DRUM_PARTIAL_SIZE = (0x01 << 7) | 0x43;

/**
 * Maps logical JD-Xi parameters onto the temporary program and tone areas,
 * and maps received addresses back onto parameters.
 */
@Injectable()
export class AddressResolver {
  resolve(
    synthType: SynthType,
    partialIndex: number | undefined,
    parameterId: string,
  ): ResolvedParameter {
    const spec = this.findSpec(synthType, parameterId);
    const { address, partialIndex: normalized } = this.sectionTriple(
      synthType,
      spec.section,
      partialIndex,
    );
    // offsets past 0x7F carry into the group byte
    return {
      address: { ...address, group: address.group + Math.floor(spec.address / GROUP_SPAN) },
      offset: spec.address % GROUP_SPAN,
      spec,
      partialIndex: normalized,
    };
  }

  sectionAddress(
    synthType: SynthType,
    section: ParameterSection,
    partialIndex?: number,
  ): SectionAddress {
    const { address } = this.sectionTriple(synthType, section, partialIndex);
    return { address, size: this.sectionSize(synthType, section) };
  }

  /** 1-based drum partial index for a pad name such as `BD1` or `F#4`. */
  drumPartialIndex(name: string): number {
    const index = DRUM_PARTIAL_NAMES.indexOf(name);
    if (index < 0) {
      throw new InvalidPartialError(SynthType.DRUMS, name, 'unknown drum partial');
    }
    return index + 1;
  }

  drumPartialName(partialIndex: number): string | undefined {
    return DRUM_PARTIAL_NAMES[partialIndex - 1];
  }

  lookup(address: AddressTriple, offset: number): ParameterLocation | undefined {
    const section = this.findSection(address);
    if (section === undefined) {
      return undefined;
    }
    for (const spec of section.table.values()) {
      if (spec.address === section.base + offset) {
        return {
          synthType: section.synthType,
          partialIndex: section.partialIndex,
          spec,
        };
      }
    }
    return undefined;
  }

  /**
   * Every parameter whose bytes lie entirely within `[offset, offset + length)`.
   * Spans may run past offset 0x7F into the next group.
   */
  lookupSpan(
    address: AddressTriple,
    offset: number,
    length: number,
  ): SpanLocation[] {
    const section = this.findSection(address);
    if (section === undefined) {
      return [];
    }
    const start = section.base + offset;
    return Array.from(section.table.values())
      .filter(
        (spec) =>
          spec.address >= start && spec.address + spec.size <= start + length,
      )
      .sort((left, right) => left.address - right.address)
      .map((spec) => ({
        synthType: section.synthType,
        partialIndex: section.partialIndex,
        spec,
        index: spec.address - start,
      }));
  }

  private findSpec(synthType: SynthType, parameterId: string): ParameterSpec {
    const tables = SECTION_TABLES[synthType];
    for (const section of SYNTH_TYPE_LAYOUTS[synthType].sections) {
      const spec = tables[section]?.get(parameterId);
      if (spec !== undefined) {
        return spec;
      }
    }
    throw new UnknownParameterError(synthType, parameterId);
  }

  private sectionTriple(
    synthType: SynthType,
    section: ParameterSection,
    partialIndex: number | undefined,
  ): { address: AddressTriple; partialIndex?: number } {
    const layout = SYNTH_TYPE_LAYOUTS[synthType];
    if (!layout.sections.includes(section)) {
      throw new InvalidPartialError(
        synthType,
        partialIndex,
        `there is no ${section} section`,
      );
    }

    if (section !== 'partial') {
      if (partialIndex !== undefined) {
        throw new InvalidPartialError(
          synthType,
          partialIndex,
          `${section} parameters take no partial index`,
        );
      }
      const group = section === 'modify' ? DIGITAL_MODIFY_GROUP : 0x00;
      return { address: { area: layout.area, part: layout.part, group } };
    }

    const range = layout.partials;
    if (range === undefined) {
      throw new InvalidPartialError(synthType, partialIndex, 'no partials');
    }
    if (partialIndex === undefined && range.implicit) {
      return { address: { area: layout.area, part: layout.part, group: 0x00 } };
    }
    if (
      partialIndex === undefined ||
      !Number.isInteger(partialIndex) ||
      partialIndex < range.min ||
      partialIndex > range.max
    ) {
      throw new InvalidPartialError(
        synthType,
        partialIndex,
        `expected a partial between ${range.min} and ${range.max}`,
      );
    }
    if (range.implicit) {
      return { address: { area: layout.area, part: layout.part, group: 0x00 } };
    }

    const group =
      synthType === SynthType.DRUMS
        ? DRUM_PARTIAL_GROUP + DRUM_PARTIAL_GROUP_STRIDE * (partialIndex - 1)
        : DIGITAL_PARTIAL_GROUP + (partialIndex - 1);
    return {
      address: { area: layout.area, part: layout.part, group },
      partialIndex,
    };
  }

  private sectionSize(synthType: SynthType, section: ParameterSection): number {
    if (synthType === SynthType.DRUMS) {
      return section === 'common' ? DRUM_COMMON_SIZE : DRUM_PARTIAL_SIZE;
    }
    return DEFAULT_SECTION_SIZE;
  }

  private findSection(address: AddressTriple): SectionMatch | undefined {
    const synthType = SYNTH_TYPES.find(
      (candidate) =>
        SYNTH_TYPE_LAYOUTS[candidate].area === address.area &&
        SYNTH_TYPE_LAYOUTS[candidate].part === address.part,
    );
    if (synthType === undefined) {
      return undefined;
    }
    const tables = SECTION_TABLES[synthType];
    const layout = SYNTH_TYPE_LAYOUTS[synthType];

    if (synthType === SynthType.ANALOG) {
      return address.group === 0x00 && tables.partial !== undefined
        ? { synthType, table: tables.partial, base: 0 }
        : undefined;
    }
    if (address.group === 0x00 && tables.common !== undefined) {
      return { synthType, table: tables.common, base: 0 };
    }
    if (address.group === DIGITAL_MODIFY_GROUP && tables.modify !== undefined) {
      return { synthType, table: tables.modify, base: 0 };
    }

    const range = layout.partials;
    if (range === undefined || tables.partial === undefined) {
      return undefined;
    }
    // a drum partial spans two groups
    const stride = synthType === SynthType.DRUMS ? DRUM_PARTIAL_GROUP_STRIDE : 1;
    const delta =
      address.group -
      (synthType === SynthType.DRUMS ? DRUM_PARTIAL_GROUP : DIGITAL_PARTIAL_GROUP);
    const partialIndex = Math.floor(delta / stride) + 1;
    if (delta < 0 || partialIndex < range.min || partialIndex > range.max) {
      return undefined;
    }
    return {
      synthType,
      partialIndex,
      table: tables.partial,
      base: (delta % stride) * GROUP_SPAN,
    };
  }
}
