import {TimeoutError, errorMessage, withTimeout} from '../core/errors.js'
import type {ProviderToolDefinition} from '../providers/types.js'
import {summarizeChat} from './chat-summary.js'
import {fileTools} from './files.js'
import {terminalTools} from './terminal.js'
import {fail, type ToolContext, type ToolDefinition, type ToolResult} from './types.js'
import {webTools} from './web.js'

export const DEFAULT_TOOLS: ToolDefinition[] = [...terminalTools, ...fileTools, ...webTools, summarizeChat]

export type ToolDispatcherOptions = {
  timeoutMs?: number
}

type ParsedArguments = {ok: true; value: unknown} | {ok: false}

function parseArguments(text: string): ParsedArguments {
  if (!text.trim()) return {ok: true, value: {}}
  try {
    return {ok: true, value: JSON.parse(text)}
  } catch {
    return {ok: false}
  }
}

/**
 * Routes a tool call by name. `execute` never rejects: bad arguments, unknown
 * names, handler failures and timeouts all come back as `{success: false}`
 * results the model can read and react to.
 */
export class ToolDispatcher {
  private readonly tools = new Map<string, ToolDefinition>()
  private readonly timeoutMs: number

  constructor(tools: ToolDefinition[] = DEFAULT_TOOLS, options: ToolDispatcherOptions = {}) {
    for (const tool of tools) this.tools.set(tool.name, tool)
    this.timeoutMs = options.timeoutMs ?? 120_000
  }

  get definitions(): ProviderToolDefinition[] {
    return [...this.tools.values()].map(({name, description, inputSchema}) => ({name, description, inputSchema}))
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  async execute(name: string, argumentsText: string, context: ToolContext): Promise<ToolResult> {
    const parsed = parseArguments(argumentsText)
    if (!parsed.ok) {
      context.logger.debug({tool: name, arguments: argumentsText.slice(0, 200)}, 'unparseable tool arguments')
      return fail('Invalid function arguments')
    }

    const tool = this.tools.get(name)
    if (!tool) return fail(`Unknown tool: ${name}`)

    const startedAt = Date.now()
    try {
      const result = await withTimeout(tool.run(parsed.value, context), this.timeoutMs, `Tool ${name}`)
      context.logger.debug({tool: name, success: result.success, ms: Date.now() - startedAt}, 'tool finished')
      return result
    } catch (error) {
      context.logger.warn({tool: name, err: errorMessage(error)}, 'tool failed')
      if (error instanceof TimeoutError) return fail(error.message)
      return fail(`Tool ${name} failed: ${errorMessage(error)}`)
    }
  }
}
