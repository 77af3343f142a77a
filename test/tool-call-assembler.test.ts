import pino from 'pino'
import {describe, expect, it} from 'vitest'
import {ToolCallAssembler, generateToolCallId} from '../src/core/tool-call-assembler.js'

describe('ToolCallAssembler', () => {
  it('concatenates argument fragments in arrival order', () => {
    const assembler = new ToolCallAssembler()
    assembler.push({type: 'tool_call_fragment', index: 0, id: 'call_1', name: 'read_file', argumentsFragment: '{"path"'})
    assembler.push({type: 'tool_call_fragment', index: 0, argumentsFragment: ': "a.txt"'})
    assembler.push({type: 'tool_call_fragment', index: 0, argumentsFragment: '}'})

    expect(assembler.finish()).toEqual([{id: 'call_1', name: 'read_file', arguments: '{"path": "a.txt"}'}])
  })

  it('keeps interleaved parallel calls apart by index', () => {
    const assembler = new ToolCallAssembler()
    assembler.push({type: 'tool_call_fragment', index: 0, id: 'call_a', name: 'list_files', argumentsFragment: '{'})
    assembler.push({type: 'tool_call_fragment', index: 1, id: 'call_b', name: 'read_file', argumentsFragment: '{"path":'})
    assembler.push({type: 'tool_call_fragment', index: 0, argumentsFragment: '}'})
    assembler.push({type: 'tool_call_fragment', index: 1, argumentsFragment: '"x"}'})

    expect(assembler.finish()).toEqual([
      {id: 'call_a', name: 'list_files', arguments: '{}'},
      {id: 'call_b', name: 'read_file', arguments: '{"path":"x"}'}
    ])
    expect(assembler.size).toBe(2)
  })

  it('never lets an empty id or name overwrite a set one', () => {
    const assembler = new ToolCallAssembler()
    assembler.push({type: 'tool_call_fragment', index: 0, id: 'call_keep', name: 'sleep'})
    assembler.push({type: 'tool_call_fragment', index: 0, id: '', name: '', argumentsFragment: '{"seconds":1}'})

    expect(assembler.finish()).toEqual([{id: 'call_keep', name: 'sleep', arguments: '{"seconds":1}'}])
  })

  it('generates ids for calls that never received one', () => {
    const assembler = new ToolCallAssembler()
    assembler.push({type: 'tool_call_fragment', index: 0, name: 'sleep', argumentsFragment: '{}'})

    const [call] = assembler.finish(() => 'call_generated')
    expect(call).toEqual({id: 'call_generated', name: 'sleep', arguments: '{}'})
  })

  it('drops placeholder slots that no fragment reached', () => {
    const assembler = new ToolCallAssembler()
    assembler.push({type: 'tool_call_fragment', index: 2, id: 'call_late', name: 'list_files'})

    expect(assembler.finish()).toEqual([{id: 'call_late', name: 'list_files', arguments: ''}])
  })

  it('drops fragments with a negative or fractional index instead of merging them into slot 0', () => {
    const lines: string[] = []
    const logger = pino({level: 'debug'}, {write: (line: string) => lines.push(line)})
    const assembler = new ToolCallAssembler(logger)
    assembler.push({type: 'tool_call_fragment', index: 0, id: 'call_a', name: 'list_files', argumentsFragment: '{}'})
    assembler.push({type: 'tool_call_fragment', index: -1, id: 'call_bad', name: 'delete_file', argumentsFragment: 'x'})
    assembler.push({type: 'tool_call_fragment', index: 0.5, argumentsFragment: 'y'})

    expect(assembler.finish()).toEqual([{id: 'call_a', name: 'list_files', arguments: '{}'}])
    expect(lines.map((line) => JSON.parse(line))).toMatchObject([
      {level: 20, index: -1, msg: 'dropping tool call fragment with invalid index'},
      {level: 20, index: 0.5, msg: 'dropping tool call fragment with invalid index'}
    ])
  })

  it('returns nothing when no fragment arrived', () => {
    expect(new ToolCallAssembler().finish()).toEqual([])
  })
})

describe('generateToolCallId', () => {
  it('produces call_ followed by 24 hex characters', () => {
    const id = generateToolCallId()
    expect(id).toMatch(/^call_[0-9a-f]{24}$/)
    expect(generateToolCallId()).not.toBe(id)
  })
})
