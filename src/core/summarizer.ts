import type {Logger} from '../logging/logger.js'
import type {ChatMessage, LLMProvider} from '../providers/types.js'
import {TermpilotError} from './errors.js'

export type SummaryLength = 'short' | 'medium' | 'long'

export type SummarizeOptions = {
  reason: string
  keepRecent?: number
  summaryLength?: SummaryLength
}

export type SummarizeOutcome =
  | {action: 'none'; messages: ChatMessage[]}
  | {
      action: 'summarized'
      messages: ChatMessage[]
      summary: string
      originalCount: number
      condensedCount: number
    }

export type ConversationSummarizerOptions = {
  model?: string
  keepRecent?: number
  logger?: Logger
}

export const SUMMARY_PREFIX = 'Previous conversation summary: '
const MIN_SUMMARIZABLE = 4
const SUMMARY_SYSTEM_PROMPT = 'You are a helpful assistant that creates concise summaries.'

const LENGTH_INSTRUCTIONS: Record<SummaryLength, string> = {
  short: 'Keep the summary very concise (2-3 sentences).',
  medium: 'Provide a moderate summary (1-2 paragraphs).',
  long: 'Provide a detailed summary (2-3 paragraphs).'
}

function reasonContext(reason: string): string {
  switch (reason) {
    case 'topic_change':
      return 'The user is switching to a completely different topic.'
    case 'automatic_length_limit':
      return 'The conversation has become too long and needs to be condensed.'
    case 'user_request':
      return 'The user has explicitly requested a summary.'
    default:
      return 'The conversation needs to be summarized.'
  }
}

export function buildSummaryPrompt(messages: ChatMessage[], reason: string, length: SummaryLength): string {
  const transcript = messages
    .filter((message) => message.role !== 'system')
    .map((message) => `${message.role.toUpperCase()}: ${message.content}`)
    .join('\n\n')

  return [
    `You are an expert at summarizing technical conversations. Please provide a comprehensive summary of this AI assistant conversation. ${reasonContext(reason)} ${LENGTH_INSTRUCTIONS[length]}`,
    '',
    'Preserve key technical details, commands executed and their outcomes, files created or modified,',
    'the current state of ongoing work, decisions taken, error resolutions and unresolved next steps.',
    '',
    'CONVERSATION TO SUMMARIZE:',
    transcript
  ].join('\n')
}

/**
 * Position of the last assistant message whose tool calls are not all
 * answered yet, i.e. the batch a running turn is still executing.
 */
function pendingToolCallStart(messages: ChatMessage[]): number | undefined {
  for (let index = messages.length - 1; index >= 0; index -= 1) {
    const message = messages[index]
    if (message.role !== 'assistant' || !message.toolCalls || message.toolCalls.length === 0) continue
    const answered = new Set(
      messages.slice(index + 1).flatMap((later) => (later.role === 'tool' && later.toolCallId ? [later.toolCallId] : []))
    )
    return message.toolCalls.every((call) => answered.has(call.id)) ? undefined : index
  }
  return undefined
}

/**
 * System messages, then one summary message, then the last `keepRecent`
 * non-system messages. A kept window never starts with a tool result whose
 * assistant call was cut off, and always reaches back to an assistant message
 * whose calls are still running so their results have something to answer.
 */
export function condenseHistory(messages: ChatMessage[], summary: string, keepRecent: number): ChatMessage[] {
  const system = messages.filter((message) => message.role === 'system')
  const rest = messages.filter((message) => message.role !== 'system')
  let start = keepRecent > 0 ? Math.max(0, rest.length - keepRecent) : rest.length
  const pending = pendingToolCallStart(rest)
  if (pending !== undefined) start = Math.min(start, pending)

  const recent = rest.slice(start)
  while (recent.length > 0 && recent[0].role === 'tool') {
    recent.shift()
  }

  return [...system, {role: 'system', content: `${SUMMARY_PREFIX}${summary}`}, ...recent]
}

/** Compacts a history through an isolated, non-streaming generation that sees no conversation state. */
export class ConversationSummarizer {
  private readonly provider: LLMProvider
  private readonly model?: string
  private readonly keepRecent: number
  private readonly logger?: Logger

  constructor(provider: LLMProvider, options: ConversationSummarizerOptions = {}) {
    this.provider = provider
    this.model = options.model
    this.keepRecent = options.keepRecent ?? 10
    this.logger = options.logger
  }

  async summarize(messages: ChatMessage[], options: SummarizeOptions): Promise<SummarizeOutcome> {
    if (messages.length < MIN_SUMMARIZABLE) {
      return {action: 'none', messages}
    }

    const prompt = buildSummaryPrompt(messages, options.reason, options.summaryLength ?? 'medium')
    const response = await this.provider.chat(
      [
        {role: 'system', content: SUMMARY_SYSTEM_PROMPT},
        {role: 'user', content: prompt}
      ],
      {temperature: 0.3, maxTokens: 1000, ...(this.model ? {model: this.model} : {})}
    )

    const summary = response.text.trim()
    if (!summary) {
      throw new TermpilotError('Summary generation returned no text')
    }

    const condensed = condenseHistory(messages, summary, options.keepRecent ?? this.keepRecent)
    this.logger?.info(
      {reason: options.reason, from: messages.length, to: condensed.length},
      'conversation summarized'
    )
    return {
      action: 'summarized',
      messages: condensed,
      summary,
      originalCount: messages.length,
      condensedCount: condensed.length
    }
  }
}
