import { z } from 'zod';
import { isRecognizedParameter, normalizeParameterId } from '../models/Parameter';

export const parameterIdSchema = z
  .string()
  .min(2)
  .max(12)
  .transform(normalizeParameterId)
  .refine(isRecognizedParameter, { message: 'Unrecognized parameter id' });

const tokenParams = z.object({
  token: z.string().uuid(),
});

export const replaceInterestSchema = z.object({
  params: tokenParams,
  body: z.object({
    parameters: z.array(parameterIdSchema).max(64),
  }),
});

export const clearInterestSchema = z.object({
  params: tokenParams,
});

export const resetStatsSchema = z.object({
  body: z
    .object({
      parameterId: parameterIdSchema.optional(),
    })
    .default({}),
});

export const setUnitsSchema = z.object({
  body: z.object({
    units: z.enum(['metric', 'imperial']),
  }),
});

export const setCatalogEnabledSchema = z.object({
  params: z.object({
    parameterId: parameterIdSchema,
  }),
  body: z.object({
    enabled: z.boolean(),
  }),
});
