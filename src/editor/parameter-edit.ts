import { z } from 'zod';
import { SynthType } from '../address/synth-type';
import { ParameterSection } from '../parameters/parameter-spec';

export const parameterEditSchema = z.object({
  synthType: z.nativeEnum(SynthType),
  parameterId: z.string().min(1),
  // drum partials may also be given by pad name, e.g. "BD1"
  partialIndex: z.union([z.number().int(), z.string().min(1)]).optional(),
  displayValue: z.union([z.number(), z.string()]),
});

export type ParameterEdit = z.infer<typeof parameterEditSchema>;

export const sectionSchema = z.enum(['common', 'partial', 'modify']);

export const inboundMessageSchema = z.array(z.number().int().min(0).max(0xff)).min(1);

export interface DecodedParameter {
  readonly synthType: SynthType;
  readonly partialIndex?: number;
  readonly parameterId: string;
  readonly section: ParameterSection;
  readonly raw: number;
  readonly displayValue: number | string;
}
