import {z} from 'zod'
import {errorMessage} from '../core/errors.js'
import {defineTool, fail, ok, type ToolResult} from './types.js'

async function attempt(prefix: string, action: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await action()
  } catch (error) {
    return fail(`${prefix}: ${errorMessage(error)}`)
  }
}

function countOccurrences(content: string, search: string): number {
  return content.split(search).length - 1
}

/** Replaces the first `limit` occurrences, or all of them when no limit is given. */
export function replaceLiteral(
  content: string,
  search: string,
  replacement: string,
  limit?: number
): {content: string; count: number} {
  const parts = content.split(search)
  const available = parts.length - 1
  const count = limit === undefined ? available : Math.min(limit, available)
  if (count === 0) return {content, count}

  const head = parts.slice(0, count + 1).join(replacement)
  const tail = parts.slice(count + 1)
  return {content: [head, ...tail].join(search), count}
}

const path = z.string().min(1).describe('Path relative to the workspace')

export const createFile = defineTool({
  name: 'create_file',
  description: 'Create a new file (or overwrite one) with the given content. Parent directories are created.',
  schema: z.object({path, content: z.string().describe('Full file content')}),
  handler: async (args, context) =>
    attempt('Failed to create file', async () => {
      const created = await context.files.create(args.path, args.content)
      return ok({message: `File created successfully at ${args.path}`, path: args.path, size: created.size})
    })
})

export const readFile = defineTool({
  name: 'read_file',
  description: 'Read a file, optionally only the 1-based inclusive line range start_line..end_line.',
  schema: z.object({
    path,
    start_line: z.coerce.number().int().min(1).optional(),
    end_line: z.coerce.number().int().min(1).optional()
  }),
  handler: async (args, context) =>
    attempt('Failed to read file', async () => {
      const result = await context.files.read(args.path, {startLine: args.start_line, endLine: args.end_line})
      return ok({
        content: result.content,
        path: args.path,
        total_lines: result.totalLines,
        ...(result.startLine === undefined ? {} : {lines_shown: `${result.startLine}-${result.endLine}`})
      })
    })
})

export const updateFile = defineTool({
  name: 'update_file',
  description: 'Replace the whole content of an existing file.',
  schema: z.object({path, content: z.string()}),
  handler: async (args, context) =>
    attempt('Failed to update file', async () => {
      const updated = await context.files.update(args.path, args.content)
      return ok({message: 'File updated successfully', path: args.path, size: updated.size})
    })
})

export const appendToFile = defineTool({
  name: 'append_to_file',
  description: 'Append content to the end of a file, creating it when missing.',
  schema: z.object({path, content: z.string()}),
  handler: async (args, context) =>
    attempt('Failed to append to file', async () => {
      const {created} = await context.files.append(args.path, args.content)
      return ok({
        message: created ? 'File created with appended content' : 'Content appended successfully',
        path: args.path
      })
    })
})

export const deleteFile = defineTool({
  name: 'delete_file',
  description: 'Delete a file.',
  schema: z.object({path}),
  handler: async (args, context) =>
    attempt('Failed to delete file', async () => {
      await context.files.delete(args.path)
      return ok({message: 'File deleted successfully', path: args.path})
    })
})

export const findAndReplaceInFile = defineTool({
  name: 'find_and_replace_in_file',
  description: 'Replace literal occurrences of search_text with replace_text in a file.',
  schema: z.object({
    path,
    search_text: z.string().min(1),
    replace_text: z.string(),
    max_replacements: z.coerce.number().int().positive().optional().describe('Replace at most this many occurrences')
  }),
  async handler(args, context) {
    if (!(await context.files.exists(args.path))) {
      return fail(`File not found: ${args.path}`)
    }

    return attempt('Error processing file', async () => {
      const {content} = await context.files.read(args.path)
      if (countOccurrences(content, args.search_text) === 0) {
        return ok({
          message: `No occurrences of '${args.search_text}' found in ${args.path}`,
          replacements_made: 0
        })
      }

      const replaced = replaceLiteral(content, args.search_text, args.replace_text, args.max_replacements)
      await context.files.update(args.path, replaced.content)
      return ok({
        message: `Successfully replaced ${replaced.count} occurrence(s) in ${args.path}`,
        replacements_made: replaced.count
      })
    })
  }
})

export const listFiles = defineTool({
  name: 'list_files',
  description: 'List files and directories at a path (default: workspace root).',
  schema: z.object({path: z.string().default('.')}),
  async handler(args, context) {
    try {
      const files = await context.files.list(args.path)
      return ok({path: args.path, files, count: files.length})
    } catch (error) {
      return fail(errorMessage(error))
    }
  }
})

export const fileTools = [
  createFile,
  readFile,
  updateFile,
  appendToFile,
  deleteFile,
  findAndReplaceInFile,
  listFiles
]
