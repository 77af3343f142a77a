import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {appConfigSchema, type AppConfig} from './schema.js'
import {getGlobalEnvPath} from './paths.js'

dotenv.config({path: getGlobalEnvPath()})
dotenv.config()

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function positiveIntFromEnv(name: string): number | undefined {
  const parsed = Number.parseInt(process.env[name] ?? '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {}
}

function definedEntries(entries: Record<string, number | undefined>): Record<string, number> {
  const result: Record<string, number> = {}
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) result[key] = value
  }
  return result
}

export async function loadConfig(): Promise<AppConfig> {
  const explorer = cosmiconfig('termpilot')
  const result = await explorer.search()
  const base = section(result?.config)
  const baseServer = section(base.server)
  const baseRuntime = section(base.runtime)
  const baseWeb = section(base.web)

  const merged: Record<string, unknown> = {
    ...base,
    provider: nonEmpty(process.env.TERMPILOT_PROVIDER) ?? base.provider,
    model: nonEmpty(process.env.TERMPILOT_MODEL) ?? nonEmpty(process.env.OPENAI_MODEL) ?? base.model,
    baseURL: nonEmpty(process.env.OPENAI_BASE_URL) ?? base.baseURL,
    summaryModel: nonEmpty(process.env.TERMPILOT_SUMMARY_MODEL) ?? base.summaryModel,
    workspace: nonEmpty(process.env.TERMPILOT_WORKSPACE) ?? base.workspace,
    server: {
      ...baseServer,
      ...(nonEmpty(process.env.TERMPILOT_HOST) ? {host: nonEmpty(process.env.TERMPILOT_HOST)} : {}),
      ...definedEntries({port: positiveIntFromEnv('TERMPILOT_PORT')})
    },
    runtime: {
      ...baseRuntime,
      ...definedEntries({
        modelTimeoutMs: positiveIntFromEnv('TERMPILOT_MODEL_TIMEOUT_MS'),
        toolTimeoutMs: positiveIntFromEnv('TERMPILOT_TOOL_TIMEOUT_MS'),
        maxToolRounds: positiveIntFromEnv('TERMPILOT_MAX_TOOL_ROUNDS'),
        summarizeThreshold: positiveIntFromEnv('TERMPILOT_SUMMARIZE_THRESHOLD')
      })
    },
    web: {
      ...baseWeb,
      ...(nonEmpty(process.env.TERMPILOT_SEARCH_URL) ? {searchUrl: nonEmpty(process.env.TERMPILOT_SEARCH_URL)} : {})
    }
  }

  return appConfigSchema.parse(merged)
}
