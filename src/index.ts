export {HtmlTextExtractor} from './collaborators/html-text.js'
export {HttpWebProvider, normalizeUrl} from './collaborators/http-web.js'
export {ShellTerminalProvider, TerminalHistory} from './collaborators/shell-terminal.js'
export {WorkspaceFileSystem} from './collaborators/workspace-filesystem.js'
export type * from './collaborators/types.js'
export {loadConfig} from './config/load-config.js'
export {appConfigSchema, type AppConfig, type RuntimeConfig} from './config/schema.js'
export {ContinuationController, buildContinuationPrompt} from './core/continuation.js'
export {
  ProviderError,
  SessionStoppedError,
  TermpilotError,
  TimeoutError,
  TransportError
} from './core/errors.js'
export {EventChannel} from './core/event-channel.js'
export {createCollaborators, createProvider, sessionFactory} from './core/runtime.js'
export {
  SessionActor,
  type AiStatus,
  type SessionActorOptions,
  type SessionConfig,
  type SessionEvent,
  type SessionState,
  type ToolResultMessage
} from './core/session-actor.js'
export {SessionRegistry, generateSessionId, type SessionEntry, type SessionStatus} from './core/session-registry.js'
export {ConversationSummarizer, condenseHistory} from './core/summarizer.js'
export {ToolCallAssembler, generateToolCallId} from './core/tool-call-assembler.js'
export {makeLogger, makeNoopLogger} from './logging/logger.js'
export {MockProvider} from './providers/mock-provider.js'
export {OpenAIProvider} from './providers/openai-provider.js'
export {decodeEventStream} from './providers/sse-decoder.js'
export type * from './providers/types.js'
export {ChatServer, parseInbound} from './server/chat-server.js'
export {DEFAULT_TOOLS, ToolDispatcher} from './tools/dispatcher.js'
export {TOOL_NAMES, defineTool, type ToolContext, type ToolName, type ToolResult} from './tools/types.js'
