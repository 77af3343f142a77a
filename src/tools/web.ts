import {z} from 'zod'
import {defineTool, fail, ok} from './types.js'

export const searchWeb = defineTool({
  name: 'search_web',
  description: 'Search the web and return ranked results with title, url and snippet.',
  schema: z.object({
    query: z.string().min(1).describe('Search keywords'),
    max_results: z.coerce
      .number()
      .int()
      .min(1)
      .default(5)
      .transform((value) => Math.min(value, 10))
      .describe('Number of results (max 10)')
  }),
  async handler(args, context) {
    const result = await context.web.search(args.query, args.max_results)
    if (!result.ok) return fail(result.error)
    return ok({query: args.query, results_count: result.results.length, results: result.results})
  }
})

export const browseWeb = defineTool({
  name: 'browse_web',
  description: 'Fetch a web page and return its readable text content.',
  schema: z.object({
    url: z.string().min(1).describe('Page URL; https:// is assumed when no scheme is given'),
    max_content_length: z.coerce
      .number()
      .int()
      .min(1)
      .default(8000)
      .transform((value) => Math.min(value, 20_000))
      .describe('Maximum characters of content to return (max 20000)')
  }),
  async handler(args, context) {
    const result = await context.web.fetch(args.url, args.max_content_length)
    if (!result.ok) {
      return fail(result.error, result.suggestion ? {suggestion: result.suggestion} : {})
    }
    return ok({
      url: result.url,
      ...(result.title ? {title: result.title} : {}),
      content: result.content,
      content_length: result.content.length,
      truncated: result.truncated
    })
  }
})

export const webTools = [searchWeb, browseWeb]
