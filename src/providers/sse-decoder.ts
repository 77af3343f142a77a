import type {Logger} from '../logging/logger.js'
import {TermpilotError, TransportError, errorMessage} from '../core/errors.js'
import type {StreamDelta} from './types.js'

const DATA_PREFIX = 'data:'
const DONE_SENTINEL = '[DONE]'

export type ByteSource = AsyncIterable<Uint8Array | string>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

function reasoningText(delta: Record<string, unknown>): string | undefined {
  return nonEmptyString(delta.reasoning) ?? nonEmptyString(delta.reasoning_content)
}

/**
 * Maps one parsed event payload to deltas, in the order
 * thinking, content, tool-call fragments, finish.
 */
export function deltasFromPayload(payload: unknown): StreamDelta[] {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) return []
  const choice: unknown = payload.choices[0]
  if (!isRecord(choice)) return []

  const deltas: StreamDelta[] = []
  const delta = isRecord(choice.delta) ? choice.delta : undefined

  if (delta) {
    const reasoning = reasoningText(delta)
    if (reasoning) deltas.push({type: 'thinking', text: reasoning})

    const content = nonEmptyString(delta.content)
    if (content) {
      deltas.push(delta.role === 'thinking' ? {type: 'thinking', text: content} : {type: 'content', text: content})
    }

    if (Array.isArray(delta.tool_calls)) {
      delta.tool_calls.forEach((raw: unknown, position: number) => {
        if (!isRecord(raw)) return
        const fn = isRecord(raw.function) ? raw.function : {}
        const index = typeof raw.index === 'number' && Number.isInteger(raw.index) ? raw.index : position
        deltas.push({
          type: 'tool_call_fragment',
          index,
          ...(nonEmptyString(raw.id) ? {id: nonEmptyString(raw.id)} : {}),
          ...(nonEmptyString(fn.name) ? {name: nonEmptyString(fn.name)} : {}),
          ...(typeof fn.arguments === 'string' ? {argumentsFragment: fn.arguments} : {})
        })
      })
    }
  }

  const finishReason = nonEmptyString(choice.finish_reason)
  if (finishReason) deltas.push({type: 'finish', reason: finishReason})

  return deltas
}

function payloadOf(line: string): string | undefined {
  if (!line.startsWith(DATA_PREFIX)) return undefined
  return line.slice(DATA_PREFIX.length).trim()
}

/**
 * Decodes a `text/event-stream` body into StreamDeltas.
 *
 * The sequence ends at `data: [DONE]` (one `finish("stop")`) or when the
 * source is exhausted. A source failure ends it with a TransportError; a
 * malformed event is skipped.
 */
export async function* decodeEventStream(source: ByteSource, logger?: Logger): AsyncGenerator<StreamDelta> {
  const decoder = new TextDecoder()
  let buffer = ''

  function* drainLines(final: boolean): Generator<string> {
    let newline = buffer.indexOf('\n')
    while (newline >= 0) {
      yield buffer.slice(0, newline).replace(/\r$/, '')
      buffer = buffer.slice(newline + 1)
      newline = buffer.indexOf('\n')
    }
    if (final && buffer.length > 0) {
      const rest = buffer.replace(/\r$/, '')
      buffer = ''
      yield rest
    }
  }

  function* handleLines(final: boolean): Generator<StreamDelta | typeof DONE_SENTINEL> {
    for (const line of drainLines(final)) {
      const payload = payloadOf(line)
      if (payload === undefined || payload === '') continue
      if (payload === DONE_SENTINEL) {
        yield DONE_SENTINEL
        return
      }

      let parsed: unknown
      try {
        parsed = JSON.parse(payload)
      } catch {
        logger?.debug({payload: payload.slice(0, 200)}, 'dropping malformed stream event')
        continue
      }

      yield* deltasFromPayload(parsed)
    }
  }

  try {
    for await (const chunk of source) {
      buffer += typeof chunk === 'string' ? chunk : decoder.decode(chunk, {stream: true})
      for (const item of handleLines(false)) {
        if (item === DONE_SENTINEL) {
          yield {type: 'finish', reason: 'stop'}
          return
        }
        yield item
      }
    }
  } catch (error) {
    if (error instanceof TermpilotError) throw error
    throw new TransportError(`Stream interrupted: ${errorMessage(error)}`, {cause: error})
  }

  buffer += decoder.decode()
  for (const item of handleLines(true)) {
    if (item === DONE_SENTINEL) {
      yield {type: 'finish', reason: 'stop'}
      return
    }
    yield item
  }
}

/** Adapts a web ReadableStream to an async iterable, releasing the reader when iteration stops. */
export async function* readableToIterable(stream: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader()
  try {
    while (true) {
      const {done, value} = await reader.read()
      if (done) return
      if (value) yield value
    }
  } finally {
    await reader.cancel().catch(() => undefined)
    reader.releaseLock()
  }
}
