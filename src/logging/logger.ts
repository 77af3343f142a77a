import pino from 'pino'
import type {Logger} from 'pino'

export type {Logger} from 'pino'

/**
 * JSON logger on stdout. Silenced under Vitest or NODE_ENV=test; the level
 * comes from TERMPILOT_LOG_LEVEL (default "info").
 */
export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === 'true'
  const nodeEnv = process.env.NODE_ENV ?? 'development'
  const level = process.env.TERMPILOT_LOG_LEVEL ?? 'info'

  return pino(
    {
      level,
      enabled: !(isVitest || nodeEnv === 'test'),
      base: {...bindings, app: 'termpilot'},
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {paths: ['apiKey', '*.apiKey', 'headers.authorization'], censor: '[REDACTED]'}
    },
    pino.destination({dest: 1, sync: nodeEnv !== 'production'})
  )
}

export function makeNoopLogger(): Logger {
  return pino({enabled: false})
}
