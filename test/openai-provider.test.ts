import {describe, expect, it, vi} from 'vitest'
import {z} from 'zod'
import {ProviderError, TransportError} from '../src/core/errors.js'
import {OpenAIProvider, toMessageParams} from '../src/providers/openai-provider.js'
import {collect} from './helpers/fakes.js'

const requestBodySchema = z.object({
  model: z.string(),
  stream: z.boolean().optional(),
  temperature: z.number(),
  max_tokens: z.number(),
  tool_choice: z.string().optional(),
  tools: z.array(z.object({type: z.literal('function'), function: z.object({name: z.string()})})).optional()
})

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input
  return input instanceof URL ? input.toString() : input.url
}

function sse(...payloads: unknown[]): string {
  return `${payloads.map((payload) => `data: ${JSON.stringify(payload)}\n\n`).join('')}data: [DONE]\n\n`
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {status, headers: {'Content-Type': 'application/json'}})
}

describe('OpenAIProvider', () => {
  it('streams deltas from an openai-compatible endpoint', async () => {
    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      expect(urlOf(input)).toBe('https://example-llm.com/v1/chat/completions')
      const body = requestBodySchema.parse(JSON.parse(String(init?.body)))
      expect(body).toMatchObject({model: 'gpt-test-model', stream: true, temperature: 0.2, max_tokens: 64, tool_choice: 'auto'})
      expect(body.tools?.map((tool) => tool.function.name)).toEqual(['list_files'])
      return new Response(
        sse(
          {choices: [{delta: {reasoning_content: 'let me see'}}]},
          {choices: [{delta: {content: 'Hi'}}]},
          {choices: [{delta: {tool_calls: [{index: 0, id: 'call_1', function: {name: 'list_files', arguments: '{}'}}]}}]},
          {choices: [{delta: {}, finish_reason: 'tool_calls'}]}
        ),
        {status: 200, headers: {'Content-Type': 'text/event-stream'}}
      )
    })
    const provider = new OpenAIProvider({
      apiKey: 'test-key',
      model: 'gpt-test-model',
      baseUrl: 'https://example-llm.com/v1/',
      temperature: 0.2,
      maxTokens: 64,
      fetch: fetchMock
    })

    const deltas = await collect(
      provider.streamChat([{role: 'user', content: 'hello'}], {
        tools: [{name: 'list_files', description: 'List files', inputSchema: {type: 'object', properties: {}}}]
      })
    )

    expect(deltas).toEqual([
      {type: 'thinking', text: 'let me see'},
      {type: 'content', text: 'Hi'},
      {type: 'tool_call_fragment', index: 0, id: 'call_1', name: 'list_files', argumentsFragment: '{}'},
      {type: 'finish', reason: 'tool_calls'},
      {type: 'finish', reason: 'stop'}
    ])
    expect(fetchMock).toHaveBeenCalledOnce()
  })

  it('surfaces a non-2xx stream response as ProviderError', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({error: {message: 'bad key'}}, 401))
    const provider = new OpenAIProvider({apiKey: 'test-key', model: 'gpt-test-model', fetch: fetchMock})

    const failure = await collect(provider.streamChat([{role: 'user', content: 'hello'}])).catch((error: unknown) => error)

    expect(failure).toBeInstanceOf(ProviderError)
    expect(failure).toHaveProperty('status', 401)
    expect(failure).toHaveProperty('message', expect.stringContaining('bad key'))
  })

  it('returns text and tool calls from a non-streaming completion', async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({
        choices: [
          {
            message: {
              content: 'done',
              tool_calls: [{id: 'call_9', type: 'function', function: {name: 'sleep', arguments: '{"seconds":1}'}}]
            }
          }
        ]
      })
    )
    const provider = new OpenAIProvider({apiKey: 'test-key', model: 'gpt-test-model', fetch: fetchMock})

    expect(await provider.chat([{role: 'user', content: 'hello'}])).toEqual({
      text: 'done',
      toolCalls: [{id: 'call_9', name: 'sleep', arguments: '{"seconds":1}'}]
    })
  })

  it('retries a server error once', async () => {
    const fetchMock = vi
      .fn(async () => jsonResponse({choices: [{message: {content: 'second time'}}]}))
      .mockImplementationOnce(async () => jsonResponse({error: {message: 'overloaded'}}, 503))
    const provider = new OpenAIProvider({apiKey: 'test-key', model: 'gpt-test-model', fetch: fetchMock})

    expect(await provider.chat([{role: 'user', content: 'hello'}])).toEqual({text: 'second time', toolCalls: []})
    expect(fetchMock).toHaveBeenCalledTimes(2)
  })

  it('does not retry a client error', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({error: {message: 'no such model'}}, 404))
    const provider = new OpenAIProvider({apiKey: 'test-key', model: 'gpt-test-model', fetch: fetchMock})

    await expect(provider.chat([{role: 'user', content: 'hello'}])).rejects.toBeInstanceOf(ProviderError)
    expect(fetchMock).toHaveBeenCalledOnce()
  })

  it('rejects an empty completion payload', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({choices: [{message: {content: ''}}]}))
    const provider = new OpenAIProvider({apiKey: 'test-key', model: 'gpt-test-model', retryCount: 0, fetch: fetchMock})

    await expect(provider.chat([{role: 'user', content: 'hello'}])).rejects.toBeInstanceOf(TransportError)
  })
})

describe('toMessageParams', () => {
  it('replays assistant tool calls and links tool results', () => {
    expect(
      toMessageParams([
        {role: 'assistant', content: '', toolCalls: [{id: 'call_1', name: 'sleep', arguments: '{}'}]},
        {role: 'tool', content: '{"success":true}', toolCallId: 'call_1', toolName: 'sleep'},
        {role: 'tool', content: 'orphan'}
      ])
    ).toEqual([
      {
        role: 'assistant',
        content: '',
        tool_calls: [{id: 'call_1', type: 'function', function: {name: 'sleep', arguments: '{}'}}]
      },
      {role: 'tool', content: '{"success":true}', tool_call_id: 'call_1'},
      {role: 'user', content: '[tool] orphan'}
    ])
  })
})
