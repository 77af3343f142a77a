export type ChatRole = 'system' | 'user' | 'assistant' | 'tool'

export type ToolCall = {
  id: string
  name: string
  /** Raw argument text as produced by the model; expected to be JSON. */
  arguments: string
}

export type ChatMessage = {
  role: ChatRole
  content: string
  toolCallId?: string
  toolName?: string
  /** Tool calls requested by an assistant message, replayed verbatim on later requests. */
  toolCalls?: ToolCall[]
}

export type ProviderToolDefinition = {
  name: string
  description: string
  inputSchema: Record<string, unknown>
}

export type StreamDelta =
  | {type: 'content'; text: string}
  | {type: 'thinking'; text: string}
  | {
      type: 'tool_call_fragment'
      index: number
      id?: string
      name?: string
      argumentsFragment?: string
    }
  | {type: 'finish'; reason: string}

export type ToolCallFragment = Extract<StreamDelta, {type: 'tool_call_fragment'}>

export type GenerationOptions = {
  tools?: ProviderToolDefinition[]
  model?: string
  temperature?: number
  maxTokens?: number
  signal?: AbortSignal
}

export type ProviderResponse = {
  text: string
  toolCalls: ToolCall[]
}

export interface LLMProvider {
  readonly name: string
  readonly model: string
  /** Lazy, finite, non-restartable sequence of deltas for one generation. */
  streamChat(messages: ChatMessage[], options?: GenerationOptions): AsyncIterable<StreamDelta>
  chat(messages: ChatMessage[], options?: GenerationOptions): Promise<ProviderResponse>
}
