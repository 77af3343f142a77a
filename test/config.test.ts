import {afterEach, describe, expect, it, vi} from 'vitest'
import {loadConfig} from '../src/config/load-config.js'
import {appConfigSchema} from '../src/config/schema.js'
import {TermpilotError} from '../src/core/errors.js'
import {DEFAULT_OPENAI_MODEL, createProvider, sessionFactory} from '../src/core/runtime.js'
import {makeNoopLogger} from '../src/logging/logger.js'
import {MockProvider} from '../src/providers/mock-provider.js'
import {OpenAIProvider} from '../src/providers/openai-provider.js'
import {WorkspaceFileSystem} from '../src/collaborators/workspace-filesystem.js'
import {fakeCollaborators} from './helpers/fakes.js'

describe('appConfigSchema', () => {
  it('fills every section with defaults', () => {
    const config = appConfigSchema.parse({workspace: '/tmp/ws'})

    expect(config).toMatchObject({
      provider: 'openai',
      apiKeyEnv: 'OPENAI_API_KEY',
      temperature: 0.7,
      maxTokens: 2048,
      server: {host: '127.0.0.1', port: 4010, heartbeatMs: 30_000},
      runtime: {
        modelTimeoutMs: 120_000,
        toolTimeoutMs: 120_000,
        maxToolRounds: 8,
        summarizeThreshold: 30,
        summaryKeepRecent: 10
      },
      web: {timeoutMs: 15_000}
    })
    expect(config.model).toBeUndefined()
  })

  it('treats blank optional strings as unset', () => {
    const config = appConfigSchema.parse({model: '  ', baseURL: '', summaryModel: ' small '})
    expect(config.model).toBeUndefined()
    expect(config.baseURL).toBeUndefined()
    expect(config.summaryModel).toBe('small')
  })

  it('rejects out-of-range values', () => {
    expect(appConfigSchema.safeParse({temperature: 3}).success).toBe(false)
    expect(appConfigSchema.safeParse({runtime: {maxToolRounds: 0}}).success).toBe(false)
  })
})

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('lets environment variables override the file and defaults', async () => {
    vi.stubEnv('TERMPILOT_PROVIDER', 'mock')
    vi.stubEnv('TERMPILOT_MODEL', 'gpt-test-model')
    vi.stubEnv('TERMPILOT_PORT', '5055')
    vi.stubEnv('TERMPILOT_MAX_TOOL_ROUNDS', '3')
    vi.stubEnv('TERMPILOT_SEARCH_URL', 'http://search.test/search')

    const config = await loadConfig()

    expect(config.provider).toBe('mock')
    expect(config.model).toBe('gpt-test-model')
    expect(config.server.port).toBe(5055)
    expect(config.runtime.maxToolRounds).toBe(3)
    expect(config.web.searchUrl).toBe('http://search.test/search')
  })
})

describe('createProvider', () => {
  it('builds the mock provider without credentials', () => {
    const config = appConfigSchema.parse({provider: 'mock'})
    expect(createProvider(config, undefined, {})).toBeInstanceOf(MockProvider)
  })

  it('requires the configured API key variable', () => {
    const config = appConfigSchema.parse({apiKeyEnv: 'TEST_LLM_KEY'})
    expect(() => createProvider(config, undefined, {})).toThrow(
      new TermpilotError('TEST_LLM_KEY is missing. Set it in your environment or .env file.')
    )
  })

  it('builds an OpenAI-compatible provider with the default model', () => {
    const config = appConfigSchema.parse({})
    const provider = createProvider(config, undefined, {OPENAI_API_KEY: 'test-key'})
    expect(provider).toBeInstanceOf(OpenAIProvider)
    expect(provider.model).toBe(DEFAULT_OPENAI_MODEL)
  })
})

describe('sessionFactory', () => {
  it('gives every session its own system prompt and shared services', () => {
    const config = appConfigSchema.parse({provider: 'mock', workspace: '/tmp/ws'})
    const provider = new MockProvider()
    const collaborators = fakeCollaborators(new WorkspaceFileSystem('/tmp/ws'))
    const build = sessionFactory(config, {provider, collaborators, logger: makeNoopLogger()})

    const first = build('chat_aaaaaaaaaaaa')
    const second = build('chat_bbbbbbbbbbbb')

    expect(first.provider).toBe(provider)
    expect(first.dispatcher).toBe(second.dispatcher)
    expect(first.summarizer).toBe(second.summarizer)
    expect(first.systemPrompt).toContain('chat_aaaaaaaaaaaa')
    expect(first.systemPrompt).toContain('/tmp/ws')
    expect(second.systemPrompt).toContain('chat_bbbbbbbbbbbb')
  })
})
