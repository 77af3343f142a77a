import {mkdtemp, readFile, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {afterEach, beforeEach, describe, expect, it} from 'vitest'
import {z} from 'zod'
import {WorkspaceFileSystem} from '../src/collaborators/workspace-filesystem.js'
import {ConversationSummarizer} from '../src/core/summarizer.js'
import {ToolDispatcher} from '../src/tools/dispatcher.js'
import {replaceLiteral} from '../src/tools/files.js'
import {TOOL_NAMES, defineTool} from '../src/tools/types.js'
import type {ChatMessage} from '../src/providers/types.js'
import {FakeTerminal, FakeWeb, ScriptedProvider, toolContext} from './helpers/fakes.js'

describe('ToolDispatcher', () => {
  let workspace: string
  let files: WorkspaceFileSystem
  const dispatcher = new ToolDispatcher()

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'termpilot-tools-'))
    files = new WorkspaceFileSystem(workspace)
  })

  afterEach(async () => {
    await rm(workspace, {recursive: true, force: true})
  })

  describe('dispatch contract', () => {
    it('exposes every tool with an object JSON schema', () => {
      const definitions = dispatcher.definitions
      expect(definitions.map((tool) => tool.name)).toEqual([...TOOL_NAMES])
      for (const tool of definitions) {
        expect(tool.inputSchema.type).toBe('object')
        expect(tool.inputSchema).not.toHaveProperty('$schema')
      }
      const readFileTool = definitions.find((tool) => tool.name === 'read_file')
      expect(readFileTool?.inputSchema.required).toEqual(['path'])
    })

    it('reports unparseable arguments', async () => {
      const result = await dispatcher.execute('read_file', '{"path": ', toolContext({files}))
      expect(result).toEqual({success: false, error: 'Invalid function arguments'})
    })

    it('reports unknown tools', async () => {
      const result = await dispatcher.execute('format_disk', '{}', toolContext({files}))
      expect(result).toEqual({success: false, error: 'Unknown tool: format_disk'})
    })

    it('reports schema violations with the offending field', async () => {
      const result = await dispatcher.execute('read_file', '{}', toolContext({files}))
      expect(result).toEqual({success: false, error: 'Invalid arguments for read_file: path: Required'})
    })

    it('treats empty argument text as an empty object', async () => {
      await writeFile(join(workspace, 'a.txt'), 'x')
      const result = await dispatcher.execute('list_files', '  ', toolContext({files}))
      expect(result).toMatchObject({success: true, path: '.', count: 1})
    })

    it('turns a throwing handler into a failure result', async () => {
      const broken = new ToolDispatcher([
        defineTool({
          name: 'sleep',
          description: 'broken',
          schema: z.object({}),
          handler: async () => {
            throw new Error('boom')
          }
        })
      ])
      const result = await broken.execute('sleep', '{}', toolContext({files}))
      expect(result).toEqual({success: false, error: 'Tool sleep failed: boom'})
    })

    it('times out a handler that never settles', async () => {
      const stuck = new ToolDispatcher(
        [
          defineTool({
            name: 'sleep',
            description: 'stuck',
            schema: z.object({}),
            handler: () => new Promise(() => undefined)
          })
        ],
        {timeoutMs: 20}
      )
      const result = await stuck.execute('sleep', '{}', toolContext({files}))
      expect(result).toEqual({success: false, error: 'Tool sleep timed out after 20ms'})
    })
  })

  describe('file tools', () => {
    it('creates, reads a line range, appends and deletes', async () => {
      const context = toolContext({files})

      const created = await dispatcher.execute(
        'create_file',
        JSON.stringify({path: 'src/notes.txt', content: 'one\ntwo\nthree\nfour'}),
        context
      )
      expect(created).toEqual({
        success: true,
        message: 'File created successfully at src/notes.txt',
        path: 'src/notes.txt',
        size: 18
      })

      const read = await dispatcher.execute('read_file', '{"path":"src/notes.txt","start_line":2,"end_line":3}', context)
      expect(read).toEqual({
        success: true,
        content: 'two\nthree',
        path: 'src/notes.txt',
        total_lines: 4,
        lines_shown: '2-3'
      })

      const appended = await dispatcher.execute('append_to_file', '{"path":"logs/run.log","content":"started\\n"}', context)
      expect(appended).toEqual({success: true, message: 'File created with appended content', path: 'logs/run.log'})
      expect(await readFile(join(workspace, 'logs/run.log'), 'utf8')).toBe('started\n')

      const deleted = await dispatcher.execute('delete_file', '{"path":"src/notes.txt"}', context)
      expect(deleted).toEqual({success: true, message: 'File deleted successfully', path: 'src/notes.txt'})
      expect(await files.exists('src/notes.txt')).toBe(false)
    })

    it('replaces a bounded number of literal occurrences', async () => {
      await writeFile(join(workspace, 'a.txt'), 'a-a-a')
      const result = await dispatcher.execute(
        'find_and_replace_in_file',
        '{"path":"a.txt","search_text":"a","replace_text":"b","max_replacements":2}',
        toolContext({files})
      )

      expect(result).toEqual({success: true, message: 'Successfully replaced 2 occurrence(s) in a.txt', replacements_made: 2})
      expect(await readFile(join(workspace, 'a.txt'), 'utf8')).toBe('b-b-a')
    })

    it('reports a missing file for find and replace', async () => {
      const result = await dispatcher.execute(
        'find_and_replace_in_file',
        '{"path":"nope.txt","search_text":"a","replace_text":"b"}',
        toolContext({files})
      )
      expect(result).toEqual({success: false, error: 'File not found: nope.txt'})
    })

    it('refuses to update a file that does not exist', async () => {
      const result = await dispatcher.execute('update_file', '{"path":"nope.txt","content":"x"}', toolContext({files}))
      expect(result).toEqual({success: false, error: 'Failed to update file: File not found: nope.txt'})
    })

    it('keeps paths inside the workspace', async () => {
      const result = await dispatcher.execute('create_file', '{"path":"../escape.txt","content":"x"}', toolContext({files}))
      expect(result).toEqual({success: false, error: "Failed to create file: Path '../escape.txt' is outside workspace."})
    })

    it('lists directories before files', async () => {
      await writeFile(join(workspace, 'b.txt'), 'bb')
      await files.create('docs/readme.md', '#')

      const result = await dispatcher.execute('list_files', '{}', toolContext({files}))
      expect(result.success).toBe(true)
      expect(result.files).toMatchObject([
        {name: 'docs', type: 'directory'},
        {name: 'b.txt', type: 'file', size: 2}
      ])
    })

    it('reports a directory that cannot be listed', async () => {
      const result = await dispatcher.execute('list_files', '{"path":"missing"}', toolContext({files}))
      expect(result.success).toBe(false)
      expect(result.error).toMatch(/^Failed to list directory: ENOENT/)
    })
  })

  describe('terminal tools', () => {
    it('sends input and returns the settled output', async () => {
      const terminal = new FakeTerminal()
      const result = await dispatcher.execute('send_to_terminal', '{"command":"ls"}', toolContext({files, terminal}))

      expect(terminal.writes).toEqual(['ls\n'])
      expect(result).toEqual({
        success: true,
        message: 'sent',
        sent_input: 'ls\n',
        terminal_output: [
          {type: 'command', content: 'ls', timestamp: '2024-01-01T00:00:01.000Z'},
          {type: 'output', content: 'output of ls', timestamp: '2024-01-01T00:00:02.000Z'}
        ],
        auto_read: true,
        note: 'Command sent and monitored until completion'
      })
    })

    it('skips reading when auto_read is off', async () => {
      const result = await dispatcher.execute(
        'send_to_terminal',
        '{"input":"pwd","auto_read":false,"add_newline":false}',
        toolContext({files})
      )
      expect(result).toEqual({success: true, message: 'sent', sent_input: 'pwd', note: 'Input sent to terminal successfully'})
    })

    it('requires input or command', async () => {
      const result = await dispatcher.execute('send_to_terminal', '{}', toolContext({files}))
      expect(result).toEqual({success: false, error: "Missing required parameter: 'input' or 'command'"})
    })

    it('passes terminal write failures through', async () => {
      const result = await dispatcher.execute('send_to_terminal', '{"input":"fail"}', toolContext({files}))
      expect(result).toEqual({success: false, error: 'terminal is gone'})
    })

    it('caps the number of lines read', async () => {
      const terminal = new FakeTerminal()
      await terminal.write('chat_test', 'echo hi\n')
      const result = await dispatcher.execute('read_terminal', '{"lines":500}', toolContext({files, terminal}))
      expect(result).toMatchObject({success: true, entry_count: 2, note: 'Recent terminal output and commands'})
    })

    it('clamps sleep to at least a tenth of a second', async () => {
      const result = await dispatcher.execute('sleep', '{"seconds":0}', toolContext({files}))
      expect(result).toEqual({success: true, slept_seconds: 0.1, message: 'Waited for 0.1 seconds'})
    })

    it('records command suggestions without running them', async () => {
      const terminal = new FakeTerminal()
      const result = await dispatcher.execute(
        'suggest_terminal_command',
        '{"command":"rm -rf build","reason":"clean"}',
        toolContext({files, terminal})
      )
      expect(result).toMatchObject({success: true, command: 'rm -rf build', status: 'awaiting_approval'})
      expect(terminal.writes).toEqual([])
    })
  })

  describe('web tools', () => {
    it('caps search results at ten', async () => {
      const web = new FakeWeb()
      const result = await dispatcher.execute('search_web', '{"query":"vitest","max_results":50}', toolContext({files, web}))
      expect(web.searches).toEqual([{query: 'vitest', maxResults: 10}])
      expect(result).toMatchObject({success: true, query: 'vitest', results_count: 1})
    })

    it('passes fetch errors with their suggestion', async () => {
      const web = new FakeWeb()
      const result = await dispatcher.execute('browse_web', '{"url":"example.com/missing"}', toolContext({files, web}))
      expect(web.fetches).toEqual([{url: 'example.com/missing', maxLength: 8000}])
      expect(result).toEqual({
        success: false,
        error: 'Page not found (404). The URL may not exist.',
        suggestion: 'Try search_web.'
      })
    })
  })

  describe('summarize_chat', () => {
    const history: ChatMessage[] = [
      {role: 'system', content: 'sys'},
      {role: 'user', content: 'q1'},
      {role: 'assistant', content: 'a1'},
      {role: 'user', content: 'q2'},
      {role: 'assistant', content: 'a2'}
    ]

    it('replaces the history with a summary and the recent window', async () => {
      const provider = new ScriptedProvider([], ['the gist'])
      const context = toolContext({files, summarizer: new ConversationSummarizer(provider)}, history)

      const result = await dispatcher.execute('summarize_chat', '{"reason":"topic_change","max_history_length":2}', context)

      expect(result).toEqual({
        success: true,
        message: 'Chat history summarized successfully',
        action: 'summarized',
        reason: 'topic_change',
        original_message_count: 5,
        condensed_message_count: 4,
        summary_preview: 'the gist'
      })
      expect(context.historyRef.current).toEqual([
        {role: 'system', content: 'sys'},
        {role: 'system', content: 'Previous conversation summary: the gist'},
        {role: 'user', content: 'q2'},
        {role: 'assistant', content: 'a2'}
      ])
    })

    it('leaves short histories alone', async () => {
      const context = toolContext({files}, history.slice(0, 3))
      const result = await dispatcher.execute('summarize_chat', '{}', context)
      expect(result).toEqual({success: true, message: 'Chat history is too short to summarize', action: 'none'})
      expect(context.historyRef.current).toHaveLength(3)
    })
  })
})

describe('replaceLiteral', () => {
  it('replaces every occurrence without a limit', () => {
    expect(replaceLiteral('x.y.z', '.', '/')).toEqual({content: 'x/y/z', count: 2})
  })

  it('leaves content untouched when nothing matches', () => {
    expect(replaceLiteral('abc', 'q', 'r', 3)).toEqual({content: 'abc', count: 0})
  })
})
