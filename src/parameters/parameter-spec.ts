import { z } from 'zod';

export type ParameterEncoding = 'unsigned' | 'signed_offset' | 'enum';

export type ParameterSection = 'common' | 'partial' | 'modify';

export type ParameterSize = 1 | 4;

export interface EnumOption {
  readonly raw: number;
  readonly label: string;
}

/**
 * Immutable description of one JD-Xi parameter: where it lives inside its
 * section, the raw range the device accepts and how raw values map to what
 * the editor shows. `address` is a linear byte offset from the section start.
 *
 * For enum parameters the display range is the option index range.
 */
export interface ParameterSpec {
  readonly id: string;
  readonly section: ParameterSection;
  readonly address: number;
  readonly rawMin: number;
  readonly rawMax: number;
  readonly displayMin: number;
  readonly displayMax: number;
  readonly encoding: ParameterEncoding;
  readonly center?: number;
  readonly options?: ReadonlyArray<EnumOption>;
  readonly size: ParameterSize;
}

export type DisplayValue = number | string;

export const DEFAULT_CENTER = 64;

const MAX_SEVEN_BIT = 0x7f;
const MAX_NIBBLE_PACKED = 0xffff;
// two 7-bit address bytes
const MAX_SECTION_OFFSET = 0x3fff;

/**
 * Tables list addresses the way the device's address map does, as two 7-bit
 * bytes: `0x13A` is one group past the section start, offset `0x3A`.
 * Returns the linear byte offset within the section.
 */
export function convertFromAddressNotation(notation: number): number {
  return (notation >> 8) * 0x80 + (notation & 0xff);
}

const addressSchema = z
  .union([
    z.number().int(),
    z
      .string()
      .regex(/^0x[0-9a-fA-F]+$/)
      .transform((value) => parseInt(value.slice(2), 16)),
  ])
  .pipe(
    z
      .number()
      .int()
      .min(0)
      .max(0x7f7f)
      .refine((notation) => (notation & 0xff) <= MAX_SEVEN_BIT, {
        message: 'each address byte must be between 0x00 and 0x7F',
      }),
  )
  .transform(convertFromAddressNotation);

const enumOptionSchema = z.object({
  raw: z.number().int().min(0),
  label: z.string().min(1),
});

export const parameterSpecSchema = z
  .object({
    id: z.string().min(1),
    section: z.enum(['common', 'partial', 'modify']),
    address: z.number().int().min(0).max(MAX_SECTION_OFFSET),
    rawMin: z.number().int().min(0),
    rawMax: z.number().int().min(0),
    displayMin: z.number().int(),
    displayMax: z.number().int(),
    encoding: z.enum(['unsigned', 'signed_offset', 'enum']),
    center: z.number().int().optional(),
    options: z.array(enumOptionSchema).optional(),
    size: z.union([z.literal(1), z.literal(4)]),
  })
  .superRefine((spec, ctx) => {
    if (spec.rawMax < spec.rawMin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${spec.id}: rawMax is below rawMin`,
      });
    }
    if (spec.displayMax < spec.displayMin) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${spec.id}: displayMax is below displayMin`,
      });
    }
    const limit = spec.size === 1 ? MAX_SEVEN_BIT : MAX_NIBBLE_PACKED;
    if (spec.rawMax > limit) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${spec.id}: rawMax ${spec.rawMax} does not fit in ${spec.size} byte(s)`,
      });
    }
    if (spec.encoding === 'signed_offset') {
      const center = spec.center ?? DEFAULT_CENTER;
      if (
        spec.rawMin !== center + spec.displayMin ||
        spec.rawMax !== center + spec.displayMax
      ) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${spec.id}: raw range is not the display range shifted by ${center}`,
        });
      }
    }
    if (spec.encoding === 'enum') {
      const options = spec.options ?? [];
      if (options.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${spec.id}: enum parameter has no options`,
        });
      }
      const outside = options.filter(
        (option) => option.raw < spec.rawMin || option.raw > spec.rawMax,
      );
      if (outside.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${spec.id}: option ${outside[0].label} lies outside the raw range`,
        });
      }
    }
  });

/**
 * Compact form used by the JSON tables. Ranges that follow from the encoding
 * may be left out and are filled in by {@link expandParameterEntry}.
 */
const unsignedEntrySchema = z.object({
  id: z.string().min(1),
  address: addressSchema,
  encoding: z.literal('unsigned'),
  rawMin: z.number().int().default(0),
  rawMax: z.number().int().default(MAX_SEVEN_BIT),
  displayMin: z.number().int().optional(),
  displayMax: z.number().int().optional(),
  size: z.union([z.literal(1), z.literal(4)]).default(1),
});

const signedOffsetEntrySchema = z.object({
  id: z.string().min(1),
  address: addressSchema,
  encoding: z.literal('signed_offset'),
  center: z.number().int().default(DEFAULT_CENTER),
  displayMin: z.number().int(),
  displayMax: z.number().int(),
});

const enumEntrySchema = z.object({
  id: z.string().min(1),
  address: addressSchema,
  encoding: z.literal('enum'),
  rawMin: z.number().int().default(0),
  options: z.array(z.string().min(1)).nonempty(),
});

export const parameterEntrySchema = z.discriminatedUnion('encoding', [
  unsignedEntrySchema,
  signedOffsetEntrySchema,
  enumEntrySchema,
]);

export type ParameterEntry = z.infer<typeof parameterEntrySchema>;

export const parameterTableSchema = z.object({
  section: z.enum(['common', 'partial', 'modify']),
  parameters: z.array(parameterEntrySchema),
});

export function expandParameterEntry(
  entry: ParameterEntry,
  section: ParameterSection,
): ParameterSpec {
  switch (entry.encoding) {
    case 'unsigned':
      return {
        id: entry.id,
        section,
        address: entry.address,
        rawMin: entry.rawMin,
        rawMax: entry.rawMax,
        displayMin: entry.displayMin ?? entry.rawMin,
        displayMax: entry.displayMax ?? entry.rawMax,
        encoding: 'unsigned',
        size: entry.size,
      };
    case 'signed_offset':
      return {
        id: entry.id,
        section,
        address: entry.address,
        rawMin: entry.center + entry.displayMin,
        rawMax: entry.center + entry.displayMax,
        displayMin: entry.displayMin,
        displayMax: entry.displayMax,
        encoding: 'signed_offset',
        center: entry.center,
        size: 1,
      };
    case 'enum':
      return {
        id: entry.id,
        section,
        address: entry.address,
        rawMin: entry.rawMin,
        rawMax: entry.rawMin + entry.options.length - 1,
        displayMin: 0,
        displayMax: entry.options.length - 1,
        encoding: 'enum',
        options: entry.options.map((label, index) => ({
          raw: entry.rawMin + index,
          label,
        })),
        size: 1,
      };
  }
}

/**
 * Checks the range invariants of a spec and returns it unchanged.
 * Throws a ZodError describing every broken invariant.
 */
export function validateParameterSpec(spec: ParameterSpec): ParameterSpec {
  parameterSpecSchema.parse(spec);
  return spec;
}
