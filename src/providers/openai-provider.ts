import OpenAI from 'openai'
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool
} from 'openai/resources/chat/completions'
import {ProviderError, TimeoutError, TransportError, errorMessage, withTimeout} from '../core/errors.js'
import {generateToolCallId} from '../core/tool-call-assembler.js'
import type {Logger} from '../logging/logger.js'
import {decodeEventStream, readableToIterable} from './sse-decoder.js'
import type {
  ChatMessage,
  GenerationOptions,
  LLMProvider,
  ProviderResponse,
  ProviderToolDefinition,
  StreamDelta,
  ToolCall
} from './types.js'

type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

export type OpenAIProviderOptions = {
  apiKey: string
  model: string
  baseUrl?: string
  temperature?: number
  maxTokens?: number
  timeoutMs?: number
  retryCount?: number
  fetch?: FetchLike
  logger?: Logger
}

function safeJsonSnippet(value: unknown): string {
  try {
    return JSON.stringify(value).slice(0, 500)
  } catch {
    return '[unserializable response]'
  }
}

export function toMessageParams(messages: ChatMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case 'tool':
        if (message.toolCallId) {
          return {role: 'tool', content: message.content, tool_call_id: message.toolCallId}
        }
        return {role: 'user', content: `[tool] ${message.content}`}
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: message.content,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: {name: call.name, arguments: call.arguments}
            }))
          }
        }
        return {role: 'assistant', content: message.content}
      case 'system':
        return {role: 'system', content: message.content}
      case 'user':
        return {role: 'user', content: message.content}
    }
  })
}

export function toToolParams(tools: ProviderToolDefinition[]): ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema
    }
  }))
}

function responseToolCalls(completion: OpenAI.Chat.Completions.ChatCompletion): ToolCall[] {
  const rawCalls = completion.choices[0]?.message?.tool_calls ?? []
  const calls: ToolCall[] = []
  for (const call of rawCalls) {
    if (call.type !== 'function') continue
    calls.push({
      id: call.id || generateToolCallId(),
      name: call.function.name,
      arguments: call.function.arguments ?? ''
    })
  }
  return calls
}

/**
 * OpenAI-compatible provider. Streaming reads the raw event-stream body and
 * hands it to the stream decoder, so reasoning fields from any dialect survive.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai'
  readonly model: string
  private readonly client: OpenAI
  private readonly temperature: number
  private readonly maxTokens: number
  private readonly timeoutMs: number
  private readonly retryCount: number
  private readonly logger?: Logger

  constructor(options: OpenAIProviderOptions) {
    this.model = options.model
    this.temperature = options.temperature ?? 0.7
    this.maxTokens = options.maxTokens ?? 2048
    this.timeoutMs = options.timeoutMs ?? 120_000
    this.retryCount = options.retryCount ?? 1
    this.logger = options.logger
    const rawBaseUrl = options.baseUrl ?? 'https://api.openai.com/v1'
    const baseURL = rawBaseUrl.replace(/\/+$/, '')
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL,
      maxRetries: 0,
      ...(options.fetch ? {fetch: options.fetch} : {})
    })
  }

  private baseRequest(messages: ChatMessage[], options: GenerationOptions) {
    const tools = options.tools ?? []
    return {
      model: options.model ?? this.model,
      messages: toMessageParams(messages),
      temperature: options.temperature ?? this.temperature,
      max_tokens: options.maxTokens ?? this.maxTokens,
      ...(tools.length > 0 ? {tools: toToolParams(tools), tool_choice: 'auto' as const} : {})
    }
  }

  async *streamChat(messages: ChatMessage[], options: GenerationOptions = {}): AsyncGenerator<StreamDelta> {
    const request: ChatCompletionCreateParamsStreaming = {
      ...this.baseRequest(messages, options),
      stream: true
    }
    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.timeoutMs)
    timer.unref?.()
    const forwardAbort = () => controller.abort()
    options.signal?.addEventListener('abort', forwardAbort, {once: true})

    try {
      let response: Response
      try {
        response = await this.client.chat.completions
          .create(request, {signal: controller.signal, maxRetries: 0})
          .asResponse()
      } catch (error) {
        throw timedOut ? new TimeoutError('Model request', this.timeoutMs) : this.translateError(error)
      }

      if (!response.body) {
        throw new TransportError('Provider returned an empty stream body')
      }

      try {
        yield* decodeEventStream(readableToIterable(response.body), this.logger)
      } catch (error) {
        if (timedOut) throw new TimeoutError('Model request', this.timeoutMs)
        throw error
      }
    } finally {
      clearTimeout(timer)
      options.signal?.removeEventListener('abort', forwardAbort)
    }
  }

  async chat(messages: ChatMessage[], options: GenerationOptions = {}): Promise<ProviderResponse> {
    const request: ChatCompletionCreateParamsNonStreaming = this.baseRequest(messages, options)

    let lastError: unknown
    for (let attempt = 0; attempt <= this.retryCount; attempt += 1) {
      try {
        const completion = await withTimeout(
          this.client.chat.completions.create(request, {signal: options.signal}),
          this.timeoutMs,
          'Model request'
        )
        const content = completion.choices[0]?.message?.content ?? ''
        const toolCalls = responseToolCalls(completion)
        if (!content && toolCalls.length === 0) {
          throw new TransportError(`Model returned empty completion payload. Response snippet: ${safeJsonSnippet(completion)}`)
        }

        return {text: content, toolCalls}
      } catch (error) {
        lastError = this.translateError(error)
        if (lastError instanceof ProviderError && lastError.status < 500) break
        this.logger?.warn({attempt, err: errorMessage(lastError)}, 'model request failed')
      }
    }

    throw lastError
  }

  private translateError(error: unknown): Error {
    if (error instanceof OpenAI.APIError && typeof error.status === 'number') {
      const body = error.error === undefined ? error.message : safeJsonSnippet(error.error)
      return new ProviderError(error.status, body, {cause: error})
    }
    if (error instanceof TimeoutError || error instanceof TransportError) return error
    return new TransportError(`Request failed: ${errorMessage(error)}`, {cause: error})
  }
}
