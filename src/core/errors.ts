export class TermpilotError extends Error {
  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Network or connect failure while talking to the provider. */
export class TransportError extends TermpilotError {}

/** Provider answered with a non-2xx status. */
export class ProviderError extends TermpilotError {
  readonly status: number
  readonly body: string

  constructor(status: number, body: string, options?: {cause?: unknown}) {
    super(`Provider returned HTTP ${status}${body ? `: ${body}` : ''}`, options)
    this.status = status
    this.body = body
  }
}

export class TimeoutError extends TermpilotError {
  readonly timeoutMs: number

  constructor(what: string, timeoutMs: number) {
    super(`${what} timed out after ${timeoutMs}ms`)
    this.timeoutMs = timeoutMs
  }
}

export type StoppedScope = 'global' | 'session'

export class SessionStoppedError extends TermpilotError {
  readonly scope: StoppedScope

  constructor(scope: StoppedScope) {
    super(
      scope === 'global'
        ? 'AI is globally stopped. Please contact administrator.'
        : "AI session is currently stopped. Send a 'start_ai' message to resume."
    )
    this.scope = scope
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Rejects with a TimeoutError when `promise` has not settled within `timeoutMs`.
 * The timer is unref'd so it never keeps the process alive.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(what, timeoutMs))
    }, timeoutMs)
    timer.unref?.()
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    if (timer) clearTimeout(timer)
  }
}
