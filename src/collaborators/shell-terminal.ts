import {execa} from 'execa'
import type {TerminalEntry, TerminalEntryType, TerminalProvider, TerminalWriteResult} from './types.js'

const MAX_HISTORY_ENTRIES = 100

function resolveShell(): string | true {
  const shell = process.env.SHELL?.trim()
  if (shell) return shell
  if (process.platform === 'win32') return process.env.ComSpec || 'cmd.exe'
  return true
}

/**
 * Bounded per-session terminal history. Entries are kept oldest first and
 * trimmed to the most recent MAX_HISTORY_ENTRIES.
 */
export class TerminalHistory {
  private readonly histories = new Map<string, TerminalEntry[]>()

  add(sessionId: string, type: TerminalEntryType, content: string): void {
    const history = this.histories.get(sessionId) ?? []
    history.push({type, content, timestamp: new Date().toISOString()})
    this.histories.set(sessionId, history.slice(-MAX_HISTORY_ENTRIES))
  }

  get(sessionId: string, lines: number): TerminalEntry[] {
    const history = this.histories.get(sessionId) ?? []
    if (lines <= 0) return []
    return history.slice(-lines).map((entry) => ({...entry}))
  }

  clear(sessionId: string): void {
    this.histories.delete(sessionId)
  }
}

export type ShellTerminalOptions = {
  cwd: string
  timeoutMs?: number
  history?: TerminalHistory
}

/**
 * Runs each written line as a shell command in the workspace and records the
 * command and its output in the session's history.
 */
export class ShellTerminalProvider implements TerminalProvider {
  readonly history: TerminalHistory
  private readonly cwd: string
  private readonly timeoutMs: number

  constructor(options: ShellTerminalOptions) {
    this.cwd = options.cwd
    this.timeoutMs = options.timeoutMs ?? 60_000
    this.history = options.history ?? new TerminalHistory()
  }

  async read(sessionId: string, maxLines: number): Promise<TerminalEntry[]> {
    return this.history.get(sessionId, maxLines)
  }

  release(sessionId: string): void {
    this.history.clear(sessionId)
  }

  async write(sessionId: string, text: string): Promise<TerminalWriteResult> {
    const command = text.replace(/\r?\n$/, '')
    if (!command.trim()) {
      return {ok: true, message: 'Empty input ignored'}
    }

    this.history.add(sessionId, 'command', command)
    try {
      const {stdout, stderr, exitCode, timedOut} = await execa(command, {
        cwd: this.cwd,
        reject: false,
        shell: resolveShell(),
        timeout: this.timeoutMs
      })
      const output = [stdout, stderr].filter(Boolean).join('\n')
      if (output) this.history.add(sessionId, 'output', output)
      if (timedOut) {
        this.history.add(sessionId, 'output', `[timed out after ${this.timeoutMs}ms]`)
      }
      return {ok: true, message: `Command finished with exit code ${exitCode ?? 'unknown'}`}
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return {ok: false, error: `Failed to run command: ${message}`}
    }
  }
}
