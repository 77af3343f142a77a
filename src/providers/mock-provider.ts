import type {ChatMessage, GenerationOptions, LLMProvider, ProviderResponse, StreamDelta} from './types.js'

function reply(messages: ChatMessage[]): string {
  const last = messages.at(-1)
  if (!last) return 'No input provided.'
  return `Mock response: ${last.content}`
}

/** Offline provider: echoes the last message, streamed word by word. */
export class MockProvider implements LLMProvider {
  readonly name = 'mock'
  readonly model = 'mock'

  async *streamChat(messages: ChatMessage[], _options?: GenerationOptions): AsyncGenerator<StreamDelta> {
    const words = reply(messages).split(/(?<= )/)
    for (const word of words) {
      yield {type: 'content', text: word}
    }
    yield {type: 'finish', reason: 'stop'}
  }

  async chat(messages: ChatMessage[], _options?: GenerationOptions): Promise<ProviderResponse> {
    return {text: reply(messages), toolCalls: []}
  }
}
