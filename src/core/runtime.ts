import {HttpWebProvider} from '../collaborators/http-web.js'
import {ShellTerminalProvider} from '../collaborators/shell-terminal.js'
import {WorkspaceFileSystem} from '../collaborators/workspace-filesystem.js'
import type {AppConfig} from '../config/schema.js'
import type {Logger} from '../logging/logger.js'
import {MockProvider} from '../providers/mock-provider.js'
import {OpenAIProvider} from '../providers/openai-provider.js'
import type {LLMProvider} from '../providers/types.js'
import {ToolDispatcher, DEFAULT_TOOLS} from '../tools/dispatcher.js'
import {TermpilotError} from './errors.js'
import type {SessionActorOptions, SessionCollaborators} from './session-actor.js'
import {ConversationSummarizer} from './summarizer.js'
import {buildSystemPrompt} from './system-prompt.js'

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini'

export function createProvider(config: AppConfig, logger?: Logger, env: NodeJS.ProcessEnv = process.env): LLMProvider {
  if (config.provider === 'mock') return new MockProvider()

  const apiKey = env[config.apiKeyEnv]?.trim()
  if (!apiKey) {
    throw new TermpilotError(`${config.apiKeyEnv} is missing. Set it in your environment or .env file.`)
  }

  return new OpenAIProvider({
    apiKey,
    model: config.model ?? DEFAULT_OPENAI_MODEL,
    baseUrl: config.baseURL,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    timeoutMs: config.runtime.modelTimeoutMs,
    logger
  })
}

export function createCollaborators(config: AppConfig): SessionCollaborators {
  return {
    terminal: new ShellTerminalProvider({cwd: config.workspace, timeoutMs: config.runtime.toolTimeoutMs}),
    files: new WorkspaceFileSystem(config.workspace),
    web: new HttpWebProvider({searchUrl: config.web.searchUrl, timeoutMs: config.web.timeoutMs})
  }
}

/**
 * Everything a new session needs apart from its id. Sessions share the
 * provider, collaborators and dispatcher; each gets its own history.
 */
export function sessionFactory(
  config: AppConfig,
  services: {provider: LLMProvider; collaborators: SessionCollaborators; logger: Logger}
): (sessionId: string) => Omit<SessionActorOptions, 'id' | 'isGloballyStopped'> {
  const dispatcher = new ToolDispatcher(DEFAULT_TOOLS, {timeoutMs: config.runtime.toolTimeoutMs})
  const summarizer = new ConversationSummarizer(services.provider, {
    model: config.summaryModel,
    keepRecent: config.runtime.summaryKeepRecent,
    logger: services.logger
  })

  return (sessionId) => ({
    provider: services.provider,
    collaborators: services.collaborators,
    systemPrompt: buildSystemPrompt({sessionId, workspace: config.workspace}),
    runtime: config.runtime,
    dispatcher,
    summarizer,
    logger: services.logger
  })
}
