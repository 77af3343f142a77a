import type {FileSystemProvider, TerminalProvider, WebProvider} from '../collaborators/types.js'
import type {RuntimeConfig} from '../config/schema.js'
import {makeNoopLogger, type Logger} from '../logging/logger.js'
import type {ChatMessage, LLMProvider, ToolCall} from '../providers/types.js'
import {DEFAULT_TOOLS, ToolDispatcher} from '../tools/dispatcher.js'
import {fail, type ToolContext, type ToolResult} from '../tools/types.js'
import {ContinuationController, type ContinuationResult, type GenerationOutcome, type ToolCycle} from './continuation.js'
import {SessionStoppedError, TermpilotError, TimeoutError, errorMessage, withTimeout} from './errors.js'
import {EventChannel} from './event-channel.js'
import {ConversationSummarizer} from './summarizer.js'
import {ToolCallAssembler} from './tool-call-assembler.js'

export type SessionState = 'idle' | 'streaming' | 'executing_tools'

export type AiStatus = 'ready' | 'thinking' | 'working' | 'stopped'

export type SessionEvent =
  | {type: 'stream_start'; model: string}
  | {type: 'stream_chunk'; content: string; role?: 'thinking'}
  | {type: 'stream_end'; reason: string}
  | {type: 'tool_usage'; content: string; tool_calls: ToolCall[]}
  | {type: 'tool_result'; tool_name: string; tool_call: ToolCall; result: ToolResult}
  | {type: 'ai_status'; status: AiStatus}
  | {type: 'error'; content: string}

export type SessionConfig = {
  model: string
  temperature?: number
  maxTokens?: number
  toolsEnabled: boolean
}

export type ToolResultMessage = {
  toolCall: ToolCall
  result: ToolResult
}

export type SessionCollaborators = {
  terminal: TerminalProvider
  files: FileSystemProvider
  web: WebProvider
}

export type SessionActorOptions = {
  id: string
  provider: LLMProvider
  collaborators: SessionCollaborators
  systemPrompt?: string
  config?: Partial<SessionConfig>
  runtime?: Partial<RuntimeConfig>
  dispatcher?: ToolDispatcher
  summarizer?: ConversationSummarizer
  isGloballyStopped?: () => boolean
  logger?: Logger
}

type Emit = (event: SessionEvent) => void

const DEFAULT_RUNTIME: RuntimeConfig = {
  modelTimeoutMs: 120_000,
  toolTimeoutMs: 120_000,
  maxToolRounds: 8,
  summarizeThreshold: 30,
  summaryKeepRecent: 10
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new TermpilotError(errorMessage(error))
}

function describeToolUsage(calls: ToolCall[]): string {
  return `Using tools: ${calls.map((call) => call.name || '(unnamed)').join(', ')}`
}

/**
 * One conversation. Owns the history, config and stopped flag; every turn and
 * every history mutation runs on a single serial queue, so at most one
 * generation/tool loop is in flight at a time.
 */
export class SessionActor {
  readonly id: string
  private readonly provider: LLMProvider
  private readonly collaborators: SessionCollaborators
  private readonly runtime: RuntimeConfig
  private readonly dispatcher: ToolDispatcher
  private readonly summarizer: ConversationSummarizer
  private readonly continuation: ContinuationController
  private readonly globallyStopped: () => boolean
  private readonly logger: Logger
  private history: ChatMessage[] = []
  private config: SessionConfig
  private stopped = false
  private currentState: SessionState = 'idle'
  private tail: Promise<void> = Promise.resolve()

  constructor(options: SessionActorOptions) {
    this.id = options.id
    this.provider = options.provider
    this.collaborators = options.collaborators
    this.runtime = {...DEFAULT_RUNTIME, ...options.runtime}
    this.logger = (options.logger ?? makeNoopLogger()).child({sessionId: options.id})
    this.dispatcher = options.dispatcher ?? new ToolDispatcher(DEFAULT_TOOLS, {timeoutMs: this.runtime.toolTimeoutMs})
    this.summarizer =
      options.summarizer ??
      new ConversationSummarizer(options.provider, {keepRecent: this.runtime.summaryKeepRecent, logger: this.logger})
    this.continuation = new ContinuationController({maxToolRounds: this.runtime.maxToolRounds})
    this.globallyStopped = options.isGloballyStopped ?? (() => false)
    this.config = {model: options.provider.model, toolsEnabled: true, ...options.config}
    if (options.systemPrompt) {
      this.history.push({role: 'system', content: options.systemPrompt})
    }
  }

  get state(): SessionState {
    return this.currentState
  }

  get isStopped(): boolean {
    return this.stopped
  }

  stop(): void {
    this.stopped = true
  }

  resume(): void {
    this.stopped = false
  }

  /** Stops the session and, once any running turn has finished, releases its terminal state. */
  close(): Promise<void> {
    this.stop()
    return this.enqueue(async () => {
      try {
        this.collaborators.terminal.release?.(this.id)
      } catch (error) {
        this.logger.warn({err: errorMessage(error)}, 'terminal release failed')
      }
    })
  }

  getConfig(): SessionConfig {
    return {...this.config}
  }

  updateConfig(partial: Partial<SessionConfig>): Promise<SessionConfig> {
    return this.enqueue(async () => {
      this.config = {...this.config, ...partial}
      return {...this.config}
    })
  }

  getHistory(): Promise<ChatMessage[]> {
    return this.enqueue(async () => this.history.map((message) => ({...message})))
  }

  replaceHistory(messages: ChatMessage[]): Promise<void> {
    return this.enqueue(async () => {
      this.history = messages.map((message) => ({...message}))
    })
  }

  /** Drops everything but the system messages. */
  clearHistory(): Promise<void> {
    return this.enqueue(async () => {
      this.history = this.history.filter((message) => message.role === 'system')
    })
  }

  /**
   * Queues a user turn and returns its live events. Throws SessionStoppedError
   * right away when the session or the whole process is stopped; a turn
   * already running is never interrupted.
   */
  submit(content: string): AsyncIterable<SessionEvent> {
    this.assertAccepting()
    return this.startTurn((emit) => this.userTurn(content, emit))
  }

  /** Request/response form of `submit`: resolves to the final assistant text. */
  async chat(content: string): Promise<string> {
    this.assertAccepting()
    const result = await this.enqueue(() => this.userTurn(content, () => undefined))
    if (result.status === 'failed') throw result.error
    if (result.status === 'round_limit') throw new TermpilotError(result.message)
    return result.text
  }

  /**
   * Appends results for tool calls already present in the history and lets the
   * agent carry on with tools enabled until it stops asking for them.
   */
  continueAutonomously(toolResults: ToolResultMessage[]): AsyncIterable<SessionEvent> {
    return this.startTurn(async (emit) => {
      for (const {toolCall, result} of toolResults) this.appendToolResult(toolCall, result)
      return this.runLoop(emit, this.lastUserRequest(), true)
    })
  }

  private async userTurn(content: string, emit: Emit): Promise<ContinuationResult> {
    await this.autoSummarize()
    this.history.push({role: 'user', content})
    return this.runLoop(emit, content, false)
  }

  private assertAccepting(): void {
    if (this.globallyStopped()) throw new SessionStoppedError('global')
    if (this.stopped) throw new SessionStoppedError('session')
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task)
    this.tail = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  private startTurn(body: (emit: Emit) => Promise<ContinuationResult>): AsyncIterable<SessionEvent> {
    const events = new EventChannel<SessionEvent>()
    void this.enqueue(() => body((event) => events.push(event))).then(
      () => events.close(),
      (error: unknown) => events.fail(error)
    )
    return events
  }

  private async runLoop(emit: Emit, originalRequest: string, resume: boolean): Promise<ContinuationResult> {
    const cycle: ToolCycle = {
      originalRequest,
      generate: (prompt) => this.generate(emit, prompt),
      executeTools: (calls) => this.executeTools(emit, calls),
      abandonTools: (calls, reason) => {
        for (const call of calls) this.appendToolResult(call, fail(reason))
      }
    }

    try {
      const result = await this.continuation.run(cycle, {resume})
      if (result.status === 'round_limit') {
        this.logger.warn({rounds: result.rounds}, 'tool round limit reached')
        emit({type: 'error', content: result.message})
      }
      return result
    } finally {
      this.currentState = 'idle'
      emit({type: 'ai_status', status: 'ready'})
    }
  }

  private async generate(emit: Emit, continuationPrompt?: string): Promise<GenerationOutcome> {
    this.currentState = 'streaming'
    emit({type: 'ai_status', status: 'thinking'})

    const messages: ChatMessage[] = continuationPrompt
      ? [...this.history, {role: 'user', content: continuationPrompt}]
      : [...this.history]
    const tools = this.config.toolsEnabled ? this.dispatcher.definitions : []
    emit({type: 'stream_start', model: this.config.model})

    const assembler = new ToolCallAssembler(this.logger)
    const controller = new AbortController()
    let text = ''
    let finishReason = 'stop'
    let active = true

    const consume = async () => {
      const stream = this.provider.streamChat(messages, {
        tools,
        model: this.config.model,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
        signal: controller.signal
      })
      for await (const delta of stream) {
        if (!active) break
        switch (delta.type) {
          case 'content':
            text += delta.text
            emit({type: 'stream_chunk', content: delta.text})
            break
          case 'thinking':
            emit({type: 'stream_chunk', content: delta.text, role: 'thinking'})
            break
          case 'tool_call_fragment':
            assembler.push(delta)
            break
          case 'finish':
            finishReason = delta.reason
            break
        }
      }
    }

    try {
      await withTimeout(consume(), this.runtime.modelTimeoutMs, 'Model request')
    } catch (error) {
      active = false
      controller.abort()
      const failure = toError(error)
      this.logger.warn({err: failure.message, timedOut: failure instanceof TimeoutError}, 'generation failed')
      if (text) this.history.push({role: 'assistant', content: text})
      emit({type: 'error', content: failure.message})
      emit({type: 'stream_end', reason: 'error'})
      return {ok: false, text, error: failure}
    }

    const toolCalls = assembler.finish()
    this.history.push({role: 'assistant', content: text, ...(toolCalls.length > 0 ? {toolCalls} : {})})
    emit({type: 'stream_end', reason: toolCalls.length > 0 ? 'tool_calls' : finishReason})
    return {ok: true, text, toolCalls}
  }

  private async executeTools(emit: Emit, calls: ToolCall[]): Promise<void> {
    this.currentState = 'executing_tools'
    emit({type: 'tool_usage', content: describeToolUsage(calls), tool_calls: calls})
    emit({type: 'ai_status', status: 'working'})

    const context = this.toolContext()
    for (const call of calls) {
      const result = await this.dispatcher.execute(call.name, call.arguments, context)
      this.appendToolResult(call, result)
      emit({type: 'tool_result', tool_name: call.name, tool_call: call, result})
    }
  }

  private toolContext(): ToolContext {
    return {
      sessionId: this.id,
      ...this.collaborators,
      history: {
        get: () => this.history.map((message) => ({...message})),
        replace: (messages) => {
          this.history = messages.map((message) => ({...message}))
        }
      },
      summarizer: this.summarizer,
      logger: this.logger
    }
  }

  private appendToolResult(call: ToolCall, result: ToolResult): void {
    this.history.push({
      role: 'tool',
      content: JSON.stringify(result),
      toolCallId: call.id,
      toolName: call.name
    })
  }

  private lastUserRequest(): string {
    for (let index = this.history.length - 1; index >= 0; index -= 1) {
      if (this.history[index].role === 'user') return this.history[index].content
    }
    return ''
  }

  private async autoSummarize(): Promise<void> {
    if (this.history.length <= this.runtime.summarizeThreshold) return
    try {
      const outcome = await this.summarizer.summarize(this.history, {
        reason: 'automatic_length_limit',
        keepRecent: this.runtime.summaryKeepRecent
      })
      if (outcome.action === 'summarized') this.history = outcome.messages
    } catch (error) {
      this.logger.warn({err: errorMessage(error)}, 'automatic summarization failed, keeping full history')
    }
  }
}
