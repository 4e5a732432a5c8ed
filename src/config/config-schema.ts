import { z } from 'zod'

const unit = z.number().min(0).max(1)
const modelIdRegex = /^[a-z0-9][a-z0-9_-]{0,63}$/

const modelSchema = z.object({
  id: z.string().regex(modelIdRegex, 'Model id must be lowercase alphanumeric with "-" or "_"'),
  name: z.string().min(1).max(100),
  backend: z.enum(['openai-compatible', 'anthropic']).default('openai-compatible'),
  endpoint: z.string().url().optional(),
  apiModel: z.string().min(1),
  credential: z.string().min(1),
  capabilities: z.array(z.string().min(1)).min(1),
  specialization: z.record(z.string(), unit).default({}),
  reliability: unit.default(0.9),
  contextWindow: z.number().int().positive().default(32_000)
})

const signatureSchema = z.object({
  patterns: z
    .array(
      z.object({
        pattern: z.string().min(1).refine(isValidRegex, 'Pattern must be a valid regular expression'),
        weight: z.number().positive()
      })
    )
    .min(1)
})

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().int().min(0).default(500),
  maxDelayMs: z.number().int().min(0).default(8_000),
  factor: z.number().min(1).default(2),
  jitter: unit.default(0.2)
})

export const conductorConfigSchema = z
  .object({
    models: z.array(modelSchema).min(1),

    routing: z
      .object({
        defaultModel: z.string().optional(),
        fallbackChain: z.array(z.string()).default([]),
        confidenceThreshold: unit.default(0.8),
        multiModelCategories: z
          .array(z.string())
          .default(['complex_analysis', 'code_review', 'system_design']),
        multiModelCount: z.number().int().min(2).default(2),
        latencyWindowMs: z.number().int().positive().default(15 * 60_000),
        signatures: z.record(z.string(), signatureSchema).optional()
      })
      .default({}),

    orchestration: z
      .object({
        globalTimeoutMs: z.number().int().positive().default(60_000),
        attemptTimeoutMs: z.number().int().positive().default(30_000),
        retry: retrySchema.default({})
      })
      .default({}),

    circuit: z
      .object({
        failureThreshold: z.number().int().min(1).default(3),
        cooldownMs: z.number().int().min(0).default(30_000)
      })
      .default({}),

    synthesis: z
      .object({
        similarityThreshold: unit.default(0.85),
        strategies: z.record(z.string(), z.enum(['sections', 'code', 'key-points'])).default({})
      })
      .default({}),

    context: z
      .object({
        maxTurns: z.number().int().min(1).default(10),
        ttlMs: z.number().int().positive().default(3_600_000),
        reservedOutputTokens: z.number().int().min(0).default(1024)
      })
      .default({}),

    cache: z
      .object({
        enabled: z.boolean().default(true),
        ttlMs: z.number().int().positive().default(3_600_000),
        maxEntries: z.number().int().min(1).default(500)
      })
      .default({}),

    performance: z
      .object({
        maxRecords: z.number().int().min(1).default(1000)
      })
      .default({}),

    generation: z
      .object({
        systemPrompt: z.string().optional(),
        temperature: z.number().min(0).max(2).default(0.7),
        maxTokens: z.number().int().positive().default(2000),
        topP: unit.default(0.9)
      })
      .default({}),

    storage: z
      .object({
        /** SQLite file for performance records and encrypted secrets. */
        databasePath: z.string().optional(),
        /** Environment variable holding the secret-store passphrase. */
        masterKeyEnv: z.string().default('CONDUCTOR_MASTER_KEY')
      })
      .default({}),

    logging: z
      .object({
        level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
      })
      .default({})
  })
  .superRefine((config, ctx) => {
    const ids = new Set<string>()
    config.models.forEach((m, i) => {
      if (ids.has(m.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['models', i, 'id'], message: `Duplicate model id "${m.id}"` })
      }
      ids.add(m.id)
    })

    const { defaultModel, fallbackChain } = config.routing
    if (defaultModel !== undefined && !ids.has(defaultModel)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['routing', 'defaultModel'],
        message: `Unknown model "${defaultModel}"`
      })
    }
    fallbackChain.forEach((id, i) => {
      if (!ids.has(id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['routing', 'fallbackChain', i], message: `Unknown model "${id}"` })
      }
    })

    const { attemptTimeoutMs, globalTimeoutMs } = config.orchestration
    if (attemptTimeoutMs > globalTimeoutMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['orchestration', 'attemptTimeoutMs'],
        message: 'attemptTimeoutMs cannot exceed globalTimeoutMs'
      })
    }
  })

export type ConductorConfig = z.infer<typeof conductorConfigSchema>
export type ConductorConfigInput = z.input<typeof conductorConfigSchema>
export type ModelConfig = z.infer<typeof modelSchema>
export type RetryConfig = z.infer<typeof retrySchema>

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source, 'i')
    return true
  } catch {
    return false
  }
}
