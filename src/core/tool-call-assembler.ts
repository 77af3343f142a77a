import {randomBytes} from 'node:crypto'
import type {Logger} from '../logging/logger.js'
import type {ToolCall, ToolCallFragment} from '../providers/types.js'

type Slot = {
  seen: boolean
  id?: string
  name?: string
  arguments: string
}

export function generateToolCallId(): string {
  return `call_${randomBytes(12).toString('hex')}`
}

/**
 * Rebuilds complete tool calls from the indexed fragments of one stream.
 * Parallel calls may interleave; `index` is the only thing tying fragments together.
 */
export class ToolCallAssembler {
  private readonly slots: Slot[] = []
  private readonly logger?: Logger

  constructor(logger?: Logger) {
    this.logger = logger
  }

  /** Fragments without a non-negative integer index cannot be placed and are dropped. */
  push(fragment: ToolCallFragment): void {
    const index = fragment.index
    if (!Number.isInteger(index) || index < 0) {
      this.logger?.debug({index}, 'dropping tool call fragment with invalid index')
      return
    }

    while (this.slots.length <= index) {
      this.slots.push({seen: false, arguments: ''})
    }

    const slot = this.slots[index]
    slot.seen = true
    if (fragment.id) slot.id = fragment.id
    if (fragment.name) slot.name = fragment.name
    if (fragment.argumentsFragment) slot.arguments += fragment.argumentsFragment
  }

  get size(): number {
    return this.slots.filter((slot) => slot.seen).length
  }

  /** Ordered calls for every index that received at least one fragment. */
  finish(idFactory: () => string = generateToolCallId): ToolCall[] {
    return this.slots
      .filter((slot) => slot.seen)
      .map((slot) => ({
        id: slot.id ?? idFactory(),
        name: slot.name ?? '',
        arguments: slot.arguments
      }))
  }
}
