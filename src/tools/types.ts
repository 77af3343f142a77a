import {z} from 'zod'
import {zodToJsonSchema} from 'zod-to-json-schema'
import type {FileSystemProvider, TerminalProvider, WebProvider} from '../collaborators/types.js'
import type {ConversationSummarizer} from '../core/summarizer.js'
import type {Logger} from '../logging/logger.js'
import type {ChatMessage, ProviderToolDefinition} from '../providers/types.js'

export const TOOL_NAMES = [
  'read_terminal',
  'send_to_terminal',
  'get_terminal_history',
  'sleep',
  'suggest_terminal_command',
  'create_file',
  'read_file',
  'update_file',
  'append_to_file',
  'delete_file',
  'find_and_replace_in_file',
  'list_files',
  'search_web',
  'browse_web',
  'summarize_chat'
] as const

export type ToolName = (typeof TOOL_NAMES)[number]

export type ToolSuccess = {success: true} & Record<string, unknown>
export type ToolFailure = {success: false; error: string} & Record<string, unknown>
export type ToolResult = ToolSuccess | ToolFailure

/**
 * History access handed to tools while a turn is running. `replace` writes
 * straight into the running turn's history instead of going through the
 * actor's queue, which is busy with that very turn.
 */
export type HistoryAccess = {
  get(): ChatMessage[]
  replace(messages: ChatMessage[]): void
}

export type ToolContext = {
  sessionId: string
  terminal: TerminalProvider
  files: FileSystemProvider
  web: WebProvider
  history: HistoryAccess
  summarizer: ConversationSummarizer
  logger: Logger
}

export type ToolDefinition = ProviderToolDefinition & {
  name: ToolName
  run(args: unknown, context: ToolContext): Promise<ToolResult>
}

export function ok(fields: Record<string, unknown> = {}): ToolSuccess {
  return {...fields, success: true as const}
}

export function fail(error: string, fields: Record<string, unknown> = {}): ToolFailure {
  return {...fields, success: false as const, error}
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

export function toJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const raw = zodToJsonSchema(schema, {$refStrategy: 'none'})
  return Object.fromEntries(Object.entries(raw).filter(([key]) => key !== '$schema'))
}

/** Binds a zod input schema to a handler; arguments are validated before the handler sees them. */
export function defineTool<S extends z.ZodTypeAny>(definition: {
  name: ToolName
  description: string
  schema: S
  handler: (args: z.output<S>, context: ToolContext) => Promise<ToolResult>
}): ToolDefinition {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: toJsonSchema(definition.schema),
    async run(args, context) {
      const parsed = definition.schema.safeParse(args)
      if (!parsed.success) {
        return fail(`Invalid arguments for ${definition.name}: ${formatIssues(parsed.error)}`)
      }
      return definition.handler(parsed.data, context)
    }
  }
}
