import { z } from 'zod';

export const ModelDescriptorSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  /** Price per prompt token as the provider quotes it. */
  promptPrice: z.number(),
  contextLength: z.number().int(),
});
export type ModelDescriptor = z.infer<typeof ModelDescriptorSchema>;

export const MODEL_CACHE_FORMAT_VERSION = '1.0';

export const ModelCacheEntrySchema = z.object({
  credentialHash: z.string(),
  models: z.array(ModelDescriptorSchema),
  modelCount: z.number().int(),
  cachedAt: z.number(),
  expiresAt: z.number(),
  version: z.string().default(MODEL_CACHE_FORMAT_VERSION),
});
export type ModelCacheEntry = z.infer<typeof ModelCacheEntrySchema>;

export const DEFAULT_CONTEXT_LENGTH = 4096;

export const DEFAULT_MODEL: ModelDescriptor = {
  id: 'anthropic/claude-sonnet-4',
  name: 'Claude Sonnet 4 (Fallback)',
  description: 'Used when the model catalog cannot be loaded',
  promptPrice: 0.000003,
  contextLength: 200_000,
};
