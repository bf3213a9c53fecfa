import { z } from 'zod';
import { PRESET_NAMES, PROCESSING_MODES, parseProviderPriority } from '../../config/processing.config';

// Accepts "true"/"false" strings as well as booleans
const flag = z.preprocess(
  value => (typeof value === 'string' ? value.trim().toLowerCase() === 'true' : value),
  z.boolean()
);

const providerPriority = z.string().transform((raw, ctx) => {
  try {
    return parseProviderPriority(raw);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error)
    });
    return z.NEVER;
  }
});

export const updateConfigSchema = z.object({
  processing_mode: z.enum(PROCESSING_MODES).optional(),
  provider_priority: providerPriority.optional(),
  cost_optimization: flag.optional(),
  auto_fallback: flag.optional()
});

export type UpdateConfigDto = z.infer<typeof updateConfigSchema>;

export const applyPresetSchema = z.object({
  preset: z.enum(PRESET_NAMES, {
    errorMap: () => ({ message: `preset must be one of: ${PRESET_NAMES.join(', ')}` })
  })
});

export type ApplyPresetDto = z.infer<typeof applyPresetSchema>;
