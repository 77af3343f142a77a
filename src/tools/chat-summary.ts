import {z} from 'zod'
import {errorMessage} from '../core/errors.js'
import {defineTool, fail, ok} from './types.js'

export const summarizeChat = defineTool({
  name: 'summarize_chat',
  description:
    'Condense the conversation history into a summary plus the most recent messages. Use when the conversation is long or the topic changes.',
  schema: z.object({
    reason: z.string().default('user_request').describe('topic_change, automatic_length_limit or user_request'),
    max_history_length: z.coerce.number().int().min(1).default(10).describe('Recent messages to keep verbatim'),
    summary_length: z.enum(['short', 'medium', 'long']).default('medium')
  }),
  async handler(args, context) {
    try {
      const outcome = await context.summarizer.summarize(context.history.get(), {
        reason: args.reason,
        keepRecent: args.max_history_length,
        summaryLength: args.summary_length
      })
      if (outcome.action === 'none') {
        return ok({message: 'Chat history is too short to summarize', action: 'none'})
      }

      context.history.replace(outcome.messages)
      return ok({
        message: 'Chat history summarized successfully',
        action: 'summarized',
        reason: args.reason,
        original_message_count: outcome.originalCount,
        condensed_message_count: outcome.condensedCount,
        summary_preview: outcome.summary.length > 200 ? `${outcome.summary.slice(0, 200)}...` : outcome.summary
      })
    } catch (error) {
      return fail(`Error summarizing chat: ${errorMessage(error)}`)
    }
  }
})
