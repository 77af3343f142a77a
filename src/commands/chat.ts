import {Command, Flags} from '@oclif/core'
import {createInterface} from 'node:readline/promises'
import {stdin as stdIn, stdout as stdOut} from 'node:process'
import {loadConfig} from '../config/load-config.js'
import {SessionStoppedError, errorMessage} from '../core/errors.js'
import {createCollaborators, createProvider, sessionFactory} from '../core/runtime.js'
import type {SessionEvent} from '../core/session-actor.js'
import {SessionRegistry, generateSessionId} from '../core/session-registry.js'
import {makeLogger} from '../logging/logger.js'

const CHAT_COMMANDS = ['/help', '/exit', '/quit', '/clear', '/history', '/config', '/session', '/stop', '/start']

const ANSI = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m'
}

function red(text: string): string {
  return `${ANSI.red}${text}${ANSI.reset}`
}

function dim(text: string): string {
  return `${ANSI.dim}${text}${ANSI.reset}`
}

function cyan(text: string): string {
  return `${ANSI.cyan}${text}${ANSI.reset}`
}

function shorten(text: string, max = 500): string {
  if (text.length <= max) return text
  return `${text.slice(0, max)}\n...[truncated]`
}

function printHelp(log: (line: string) => void): void {
  log(cyan('chat commands:'))
  log(cyan('  /help                    show this help'))
  log(cyan('  /exit or /quit           exit chat'))
  log(cyan('  /clear                   clear history (system prompt is kept)'))
  log(cyan('  /history [n]             show recent non-system messages (default 20)'))
  log(cyan('  /config                  print resolved config'))
  log(cyan('  /session                 show session id, state and message count'))
  log(cyan('  /stop, /start            stop or resume accepting new messages'))
}

function createCompleter() {
  return (line: string): [string[], string] => {
    if (!line.startsWith('/')) return [[], line]
    const hits = CHAT_COMMANDS.filter((command) => command.startsWith(line))
    return [hits.length > 0 ? hits : CHAT_COMMANDS, line]
  }
}

export default class Chat extends Command {
  static override description = 'Interactive terminal chat over a single session'

  static override flags = {
    quiet: Flags.boolean({description: 'hide tool activity and show only assistant text'}),
    thinking: Flags.boolean({description: 'show reasoning text streamed by the model'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Chat)
    const config = await loadConfig()
    const logger = makeLogger({command: 'chat'})
    const provider = createProvider(config, logger)
    const registry = new SessionRegistry()
    const optionsFor = sessionFactory(config, {provider, collaborators: createCollaborators(config), logger})
    const sessionId = generateSessionId()
    const {actor} = registry.create({...optionsFor(sessionId), id: sessionId})
    const rl = createInterface({input: stdIn, output: stdOut, completer: createCompleter()})

    const render = (event: SessionEvent) => {
      switch (event.type) {
        case 'stream_start':
          stdOut.write(cyan('assistant> '))
          return
        case 'stream_chunk':
          if (event.role === 'thinking') {
            if (flags.thinking) stdOut.write(dim(event.content))
            return
          }
          stdOut.write(event.content)
          return
        case 'stream_end':
          stdOut.write('\n')
          return
        case 'tool_usage':
          if (!flags.quiet) this.log(cyan(`[tools] ${event.content}`))
          return
        case 'tool_result':
          if (!flags.quiet) {
            this.log(cyan(`[tool ${event.tool_name}] success=${event.result.success}`))
            this.log(dim(shorten(JSON.stringify(event.result), 300)))
          }
          return
        case 'error':
          this.log(red(`error: ${event.content}`))
          return
        case 'ai_status':
          return
      }
    }

    this.log(cyan(`termpilot chat started (${provider.name}/${provider.model}). Type /help for commands.`))

    try {
      while (true) {
        let input = ''
        try {
          input = (await rl.question(cyan('you> '))).trim()
        } catch {
          this.log(cyan('\nInterrupted. Type /exit to quit.'))
          continue
        }

        if (!input) continue
        if (input === '/exit' || input === '/quit') break

        if (input === '/help') {
          printHelp((line) => this.log(line))
          continue
        }

        if (input === '/clear') {
          await actor.clearHistory()
          this.log(cyan('history cleared'))
          continue
        }

        if (input.startsWith('/history')) {
          const maybeCount = Number.parseInt(input.split(/\s+/)[1] ?? '20', 10)
          const count = Number.isFinite(maybeCount) && maybeCount > 0 ? maybeCount : 20
          const messages = (await actor.getHistory()).filter((message) => message.role !== 'system').slice(-count)
          if (messages.length === 0) {
            this.log(cyan('(history empty)'))
            continue
          }

          for (const message of messages) {
            this.log(`${message.role}> ${shorten(message.content, 300)}`)
          }
          continue
        }

        if (input === '/config') {
          this.log(JSON.stringify({...config, session: actor.getConfig()}, null, 2))
          continue
        }

        if (input === '/session') {
          const nonSystem = (await actor.getHistory()).filter((message) => message.role !== 'system').length
          const {status} = registry.get(sessionId)
          this.log(cyan(`session: ${sessionId} status=${status} state=${actor.state} messages(non-system): ${nonSystem}`))
          continue
        }

        if (input === '/stop' || input === '/start') {
          registry.setStatus(sessionId, input === '/stop' ? 'stopped' : 'running')
          this.log(cyan(input === '/stop' ? 'session stopped' : 'session resumed'))
          continue
        }

        if (input.startsWith('/')) {
          this.log(red(`unknown command: ${input}`))
          this.log(cyan('type /help to see supported commands'))
          continue
        }

        try {
          registry.touch(sessionId)
          for await (const event of actor.submit(input)) render(event)
        } catch (error) {
          if (error instanceof SessionStoppedError) {
            this.log(red(error.message))
            continue
          }
          this.log(red(`turn failed: ${errorMessage(error)}`))
        }
      }
    } finally {
      registry.remove(sessionId)
      rl.close()
    }
  }
}
