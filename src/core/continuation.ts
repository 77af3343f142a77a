import type {ToolCall} from '../providers/types.js'

export type GenerationOutcome =
  | {ok: true; text: string; toolCalls: ToolCall[]}
  | {ok: false; text: string; error: Error}

/** One session's view of a tool loop: generate, run the calls, or give up on them. */
export interface ToolCycle {
  readonly originalRequest: string
  /** Streams one generation; `continuationPrompt` is sent after the history but not stored in it. */
  generate(continuationPrompt?: string): Promise<GenerationOutcome>
  executeTools(calls: ToolCall[]): Promise<void>
  /** Answers calls that will not run so the history stays well-formed for the next request. */
  abandonTools(calls: ToolCall[], reason: string): void
}

export type ContinuationResult =
  | {status: 'completed'; rounds: number; text: string}
  | {status: 'failed'; rounds: number; text: string; error: Error}
  | {status: 'round_limit'; rounds: number; text: string; message: string}

export function buildContinuationPrompt(originalRequest: string): string {
  return [
    "Based on the tool results above, continue to fully answer the user's original question.",
    'If the user asked for file contents or analysis and you only listed files, read those files now.',
    'If the user asked for analysis and you only read files, provide that analysis now.',
    "Continue taking actions until you've completely fulfilled the user's request.",
    '',
    `Original user request: ${originalRequest}`
  ].join('\n')
}

export function roundLimitMessage(maxToolRounds: number): string {
  return `Stopped after ${maxToolRounds} tool rounds without a final answer. Send a new message to continue.`
}

/**
 * Drives generate → execute tools → generate until a generation asks for no
 * tools, it fails, or `maxToolRounds` tool rounds have run.
 */
export class ContinuationController {
  readonly maxToolRounds: number

  constructor(options: {maxToolRounds?: number} = {}) {
    this.maxToolRounds = Math.max(1, options.maxToolRounds ?? 8)
  }

  /** With `resume`, tool results are already in the history and the first generation is a continuation. */
  async run(cycle: ToolCycle, options: {resume?: boolean} = {}): Promise<ContinuationResult> {
    const prompt = buildContinuationPrompt(cycle.originalRequest)
    let generation = await cycle.generate(options.resume ? prompt : undefined)
    let rounds = 0

    while (generation.ok && generation.toolCalls.length > 0) {
      if (rounds >= this.maxToolRounds) {
        const message = roundLimitMessage(this.maxToolRounds)
        cycle.abandonTools(generation.toolCalls, message)
        return {status: 'round_limit', rounds, text: generation.text, message}
      }

      rounds += 1
      await cycle.executeTools(generation.toolCalls)
      generation = await cycle.generate(prompt)
    }

    if (!generation.ok) {
      return {status: 'failed', rounds, text: generation.text, error: generation.error}
    }
    return {status: 'completed', rounds, text: generation.text}
  }
}
