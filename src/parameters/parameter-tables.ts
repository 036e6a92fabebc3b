import analogTable from './data/analog.json';
import digitalCommonTable from './data/digital-common.json';
import digitalModifyTable from './data/digital-modify.json';
import digitalPartialTable from './data/digital-partial.json';
import drumCommonTable from './data/drum-common.json';
import drumPartialTable from './data/drum-partial.json';
import programCommonTable from './data/program-common.json';
import {
  ParameterSpec,
  expandParameterEntry,
  parameterTableSchema,
  validateParameterSpec,
} from './parameter-spec';

export type ParameterTable = ReadonlyMap<string, ParameterSpec>;

export function loadParameterTable(source: unknown): ParameterTable {
  const table = parameterTableSchema.parse(source);
  const specs = new Map<string, ParameterSpec>();
  for (const entry of table.parameters) {
    if (specs.has(entry.id)) {
      throw new Error(`Duplicate parameter id ${entry.id}`);
    }
    specs.set(
      entry.id,
      Object.freeze(validateParameterSpec(expandParameterEntry(entry, table.section))),
    );
  }
  return specs;
}

export const ANALOG_PARAMETERS = loadParameterTable(analogTable);
export const DIGITAL_COMMON_PARAMETERS = loadParameterTable(digitalCommonTable);
export const DIGITAL_MODIFY_PARAMETERS = loadParameterTable(digitalModifyTable);
export const DIGITAL_PARTIAL_PARAMETERS = loadParameterTable(digitalPartialTable);
export const DRUM_COMMON_PARAMETERS = loadParameterTable(drumCommonTable);
export const DRUM_PARTIAL_PARAMETERS = loadParameterTable(drumPartialTable);
export const PROGRAM_COMMON_PARAMETERS = loadParameterTable(programCommonTable);
