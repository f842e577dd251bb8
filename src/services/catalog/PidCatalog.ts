// PID catalog: metadata for every parameter the bridge knows how to stream

import { z } from 'zod';
import pidData from '../../../data/pids.json';
import { ParameterId, isRecognizedParameter, normalizeParameterId } from '../../models/Parameter';
import { UnitSystem } from '../../models/Measurement';

const valueRangeSchema = z
  .object({
    min: z.number(),
    max: z.number(),
  })
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });

export const pidDefinitionSchema = z.object({
  id: z
    .string()
    .transform(normalizeParameterId)
    .refine(isRecognizedParameter, { message: 'unrecognized parameter id' }),
  label: z.string().min(1),
  name: z.string().min(1),
  units: z.string().min(1).optional(),
  typicalRange: valueRangeSchema.optional(),
  warningRange: valueRangeSchema.optional(),
  dangerRange: valueRangeSchema.optional(),
  kind: z.enum(['gauge', 'status']).default('gauge'),
  enabled: z.boolean().default(false),
});

export type ValueRange = z.infer<typeof valueRangeSchema>;
export type PidDefinition = z.infer<typeof pidDefinitionSchema>;

interface UnitConversion {
  label: string;
  convert: (value: number) => number;
}

const IMPERIAL_CONVERSIONS: Record<string, UnitConversion> = {
  '°C': { label: '°F', convert: (v) => (v * 9) / 5 + 32 },
  'km/h': { label: 'mph', convert: (v) => v * 0.621371 },
  kPa: { label: 'psi', convert: (v) => v * 0.145038 },
  km: { label: 'mi', convert: (v) => v * 0.621371 },
  'g/s': { label: 'lb/min', convert: (v) => v * 0.132277 },
  'L/h': { label: 'gal/h', convert: (v) => v * 0.264172 },
};

/**
 * Conversion from a metric unit label to the given unit system. Labels without
 * an imperial counterpart (RPM, %, V, ...) convert to themselves.
 */
export function conversionFor(metricLabel: string, units: UnitSystem): UnitConversion {
  const imperial = IMPERIAL_CONVERSIONS[metricLabel];
  if (units === 'imperial' && imperial) {
    return imperial;
  }
  return { label: metricLabel, convert: (v) => v };
}

export class PidCatalog {
  private readonly byId: Map<ParameterId, PidDefinition>;

  constructor(readonly definitions: readonly PidDefinition[]) {
    this.byId = new Map(definitions.map((definition) => [definition.id, definition]));
  }

  /** Validates raw catalog entries; throws a ZodError describing bad entries. */
  static fromJSON(raw: unknown): PidCatalog {
    const definitions = z.array(pidDefinitionSchema).parse(raw);
    const ids = new Set<string>();
    for (const definition of definitions) {
      if (ids.has(definition.id)) {
        throw new Error(`Duplicate PID in catalog: ${definition.id}`);
      }
      ids.add(definition.id);
    }
    return new PidCatalog(definitions);
  }

  static standard(): PidCatalog {
    return PidCatalog.fromJSON(pidData);
  }

  get(parameterId: ParameterId): PidDefinition | undefined {
    return this.byId.get(normalizeParameterId(parameterId));
  }

  has(parameterId: ParameterId): boolean {
    return this.byId.has(normalizeParameterId(parameterId));
  }

  gauges(): PidDefinition[] {
    return this.definitions.filter((definition) => definition.kind === 'gauge');
  }

  unitLabel(parameterId: ParameterId, units: UnitSystem): string {
    const metric = this.get(parameterId)?.units;
    return metric ? conversionFor(metric, units).label : '';
  }

  typicalRange(parameterId: ParameterId, units: UnitSystem): ValueRange | undefined {
    const definition = this.get(parameterId);
    if (!definition?.typicalRange) return undefined;
    return convertRange(definition.typicalRange, definition.units, units);
  }

  /** Smallest range covering the typical, warning and danger bands, in the given units. */
  combinedRange(parameterId: ParameterId, units: UnitSystem): ValueRange | undefined {
    const definition = this.get(parameterId);
    if (!definition) return undefined;
    const ranges = [definition.typicalRange, definition.warningRange, definition.dangerRange].filter(
      (range): range is ValueRange => range !== undefined
    );
    if (ranges.length === 0) return undefined;
    const combined = {
      min: Math.min(...ranges.map((range) => range.min)),
      max: Math.max(...ranges.map((range) => range.max)),
    };
    return convertRange(combined, definition.units, units);
  }
}

function convertRange(range: ValueRange, metricLabel: string | undefined, units: UnitSystem): ValueRange {
  if (!metricLabel) return range;
  const { convert } = conversionFor(metricLabel, units);
  return { min: convert(range.min), max: convert(range.max) };
}
