import {z} from 'zod'

const positiveInt = z.coerce.number().int().positive()

const optionalTrimmed = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
)

export const appConfigSchema = z.object({
  provider: z.enum(['mock', 'openai']).default('openai'),
  model: optionalTrimmed,
  baseURL: optionalTrimmed,
  apiKeyEnv: z.string().default('OPENAI_API_KEY'),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  maxTokens: positiveInt.default(2048),
  summaryModel: optionalTrimmed,
  workspace: z.string().default(process.cwd()),
  server: z
    .object({
      host: z.string().default('127.0.0.1'),
      port: z.coerce.number().int().min(0).max(65_535).default(4010),
      heartbeatMs: positiveInt.default(30_000)
    })
    .default({}),
  runtime: z
    .object({
      modelTimeoutMs: positiveInt.default(120_000),
      toolTimeoutMs: positiveInt.default(120_000),
      maxToolRounds: positiveInt.default(8),
      summarizeThreshold: positiveInt.default(30),
      summaryKeepRecent: positiveInt.default(10)
    })
    .default({}),
  web: z
    .object({
      searchUrl: optionalTrimmed,
      timeoutMs: positiveInt.default(15_000)
    })
    .default({})
})

export type AppConfig = z.infer<typeof appConfigSchema>
export type RuntimeConfig = AppConfig['runtime']
