import {setTimeout as delay} from 'node:timers/promises'
import {z} from 'zod'
import type {TerminalEntry, TerminalProvider} from '../collaborators/types.js'
import {defineTool, fail, ok} from './types.js'

const POLL_INTERVAL_MS = 50
const HISTORY_PROBE = 100

function formatEntries(entries: TerminalEntry[]) {
  return entries.map((entry) => ({
    type: entry.type,
    content: entry.content.trim(),
    timestamp: entry.timestamp
  }))
}

function fingerprint(entries: TerminalEntry[]): string {
  const last = entries.at(-1)
  return last ? `${entries.length}:${last.timestamp}:${last.content}` : '0'
}

/**
 * Polls the terminal until output that differs from `baseline` stops changing
 * for one poll interval, or until `timeoutMs` passes.
 */
export async function waitForStableOutput(
  terminal: TerminalProvider,
  sessionId: string,
  baseline: string,
  timeoutMs: number
): Promise<{settled: boolean; entries: TerminalEntry[]}> {
  const deadline = Date.now() + timeoutMs
  while (Date.now() < deadline) {
    const current = fingerprint(await terminal.read(sessionId, HISTORY_PROBE))
    if (current !== baseline) {
      await delay(POLL_INTERVAL_MS)
      const again = fingerprint(await terminal.read(sessionId, HISTORY_PROBE))
      if (again === current) {
        return {settled: true, entries: await terminal.read(sessionId, 20)}
      }
      continue
    }
    await delay(POLL_INTERVAL_MS)
  }
  return {settled: false, entries: await terminal.read(sessionId, 20)}
}

const lines = (max: number) => z.coerce.number().int().min(1).default(20).transform((value) => Math.min(value, max))

export const readTerminal = defineTool({
  name: 'read_terminal',
  description: 'Read recent terminal output and commands. Use this to see what happened after running a command.',
  schema: z.object({
    lines: lines(100).describe('Number of recent entries to read (max 100)')
  }),
  async handler(args, context) {
    const entries = await context.terminal.read(context.sessionId, args.lines)
    return ok({
      terminal_output: formatEntries(entries),
      entry_count: entries.length,
      note: 'Recent terminal output and commands'
    })
  }
})

export const sendToTerminal = defineTool({
  name: 'send_to_terminal',
  description:
    'Send input to the terminal and, by default, wait for the output to settle and return it. Runs the command in the user workspace.',
  schema: z.object({
    input: z.string().optional().describe('Text or command to send'),
    command: z.string().optional().describe('Alias of input'),
    add_newline: z.boolean().default(true).describe('Append a newline so the command executes'),
    auto_read: z.boolean().default(true).describe('Wait for and return the resulting output'),
    sleep_seconds: z.coerce.number().positive().default(1.5).describe('Maximum seconds to wait for output')
  }),
  async handler(args, context) {
    const input = args.input ?? args.command
    if (!input) {
      return fail("Missing required parameter: 'input' or 'command'")
    }

    const finalInput = args.add_newline ? `${input}\n` : input
    const baseline = fingerprint(await context.terminal.read(context.sessionId, HISTORY_PROBE))
    const written = await context.terminal.write(context.sessionId, finalInput)
    if (!written.ok) return fail(written.error)

    const base = {
      message: written.message,
      sent_input: finalInput,
      note: 'Input sent to terminal successfully'
    }
    if (!args.auto_read) return ok(base)

    const {settled, entries} = await waitForStableOutput(
      context.terminal,
      context.sessionId,
      baseline,
      Math.round(args.sleep_seconds * 1000)
    )
    return ok({
      ...base,
      terminal_output: formatEntries(entries),
      auto_read: true,
      note: settled
        ? 'Command sent and monitored until completion'
        : `Command sent, timed out after ${args.sleep_seconds}s, showing partial results`
    })
  }
})

export const getTerminalHistory = defineTool({
  name: 'get_terminal_history',
  description: 'Get the command and output history of the terminal session.',
  schema: z.object({
    lines: lines(50).describe('Number of history entries (max 50)')
  }),
  async handler(args, context) {
    const entries = await context.terminal.read(context.sessionId, args.lines)
    return ok({history: formatEntries(entries), entry_count: entries.length})
  }
})

export const sleep = defineTool({
  name: 'sleep',
  description: 'Wait for a number of seconds (0.1 to 10), e.g. for a long-running command to produce output.',
  schema: z.object({
    seconds: z.coerce.number().describe('Seconds to wait')
  }),
  async handler(args) {
    const seconds = Math.max(0.1, Math.min(args.seconds, 10))
    await delay(Math.round(seconds * 1000))
    return ok({slept_seconds: seconds, message: `Waited for ${seconds} seconds`})
  }
})

export const suggestTerminalCommand = defineTool({
  name: 'suggest_terminal_command',
  description: 'Suggest a command for the user to approve instead of running it directly.',
  schema: z.object({
    command: z.string().min(1).describe('The command to suggest'),
    reason: z.string().describe('Why this command is useful')
  }),
  async handler(args) {
    return ok({
      message: 'Command suggestion created',
      command: args.command,
      reason: args.reason,
      status: 'awaiting_approval',
      note: 'This command is awaiting user approval before execution.'
    })
  }
})

export const terminalTools = [readTerminal, sendToTerminal, getTerminalHistory, sleep, suggestTerminalCommand]
