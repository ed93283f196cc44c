import { z } from 'zod';

// Provider types
export const embeddingProviders = [
  'openai',
  'google',
  'cohere',
  'mistral',
  'ollama',
  'openai-compatible'
] as const;
export type EmbeddingProvider = (typeof embeddingProviders)[number];

// Matching defaults (label resolution tiers)
export const DEFAULT_SIMILARITY_THRESHOLD = 0.75;
export const DEFAULT_AMBIGUITY_THRESHOLD = 0.05;
export const DEFAULT_MAX_CANDIDATES = 5;
export const DEFAULT_MAX_PATH_LENGTH = 10;
export const DEFAULT_PORT = 6367;

const embeddingSchema = z
  .object({
    provider: z.enum(embeddingProviders),
    providerName: z.string().min(1).optional(),
    model: z.string().min(1),
    dimensions: z.number().int().positive(),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional()
  })
  .superRefine((data, ctx) => {
    const cloudProviders = ['openai', 'google', 'cohere', 'mistral'];
    if (cloudProviders.includes(data.provider)) {
      if (!data.apiKey)
        ctx.addIssue({
          code: 'custom',
          path: ['apiKey'],
          message: `apiKey required for provider '${data.provider}'`
        });
      if (data.baseUrl)
        ctx.addIssue({
          code: 'custom',
          path: ['baseUrl'],
          message: `baseUrl not allowed for provider '${data.provider}'`
        });
    }
    if (data.provider === 'openai-compatible' && !data.baseUrl) {
      ctx.addIssue({
        code: 'custom',
        path: ['baseUrl'],
        message: "baseUrl required for provider 'openai-compatible'"
      });
    }
    if (data.provider !== 'openai-compatible' && data.providerName) {
      ctx.addIssue({
        code: 'custom',
        path: ['providerName'],
        message: "providerName only allowed for provider 'openai-compatible'"
      });
    }
  });
export type EmbeddingConfig = z.infer<typeof embeddingSchema>;

const matchingSchema = z
  .object({
    similarityThreshold: z.number().min(0).max(1).optional(),
    ambiguityThreshold: z.number().min(0).max(1).optional(),
    maxCandidates: z.number().int().min(1).optional()
  })
  .optional();

// Config schema
export const configSchema = z
  .object({
    $schema: z.string().optional(),

    server: z
      .object({
        port: z.number().int().min(1).max(65535).optional()
      })
      .optional(),

    // Omitted embedding section disables similarity matching (exact + normalized only)
    embedding: embeddingSchema.optional(),

    matching: matchingSchema,

    analysis: z
      .object({
        maxPathLength: z.number().int().min(1).optional()
      })
      .optional()
  })
  .transform((data) => {
    const server = {
      port: data.server?.port ?? DEFAULT_PORT
    };

    const matching = {
      similarityThreshold: data.matching?.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD,
      ambiguityThreshold: data.matching?.ambiguityThreshold ?? DEFAULT_AMBIGUITY_THRESHOLD,
      maxCandidates: data.matching?.maxCandidates ?? DEFAULT_MAX_CANDIDATES
    };

    const analysis = {
      maxPathLength: data.analysis?.maxPathLength ?? DEFAULT_MAX_PATH_LENGTH
    };

    return { server, embedding: data.embedding ?? null, matching, analysis };
  });

export type Config = z.infer<typeof configSchema>;
