import { z } from 'zod';
import { ValidationError } from './errors';
import { MAX_DIFFICULTY } from './generator';
import { DEFAULT_SLOT_DURATION_MS } from './entropy';

export const EngineConfigSchema = z.object({
  program_id: z.string().min(1).default('puzzle-collectibles'),
  authority_seed: z.string().min(1).default('authority'),
  collection_id: z.string().min(1).optional(),
  symbol: z.string().max(10).default('PUZZLE'),
  hidden_trait: z
    .object({
      enabled: z.boolean().default(false),
      placeholder: z.string().min(1).default('???'),
    })
    .default({}),
  limits: z
    .object({
      max_difficulty: z.number().int().min(0).max(MAX_DIFFICULTY).default(MAX_DIFFICULTY),
      max_name_length: z.number().int().positive().default(32),
      max_uri_length: z.number().int().positive().default(200),
    })
    .default({}),
  entropy: z
    .object({
      genesis_ms: z.number().int().min(0).default(0),
      slot_duration_ms: z.number().int().positive().default(DEFAULT_SLOT_DURATION_MS),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export function parseEngineConfig(raw: unknown, source = 'engine config'): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `invalid ${source}`,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}
