import { z } from 'zod';
import { PROCESSING_MODES, PROVIDER_PREFERENCES } from '../../config/processing.config';

export const JOB_LEVELS = ['entry', 'mid', 'senior'] as const;

export const uploadResumeSchema = z.object({
  level: z.enum(JOB_LEVELS, {
    errorMap: () => ({ message: `level must be one of: ${JOB_LEVELS.join(', ')}` })
  }),
  job_description: z.string().trim().min(1).optional()
});

export type UploadResumeDto = z.infer<typeof uploadResumeSchema>;

export const processingSwitchesSchema = z.object({
  processing_mode: z.enum(PROCESSING_MODES).default('hybrid'),
  llm_provider: z.enum(PROVIDER_PREFERENCES).default('auto')
});

export type ProcessingSwitchesDto = z.infer<typeof processingSwitchesSchema>;
