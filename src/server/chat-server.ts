import {createServer, type Server} from 'node:http'
import {WebSocket, WebSocketServer, type RawData} from 'ws'
import {z} from 'zod'
import {SessionStoppedError, errorMessage} from '../core/errors.js'
import type {SessionActorOptions, SessionEvent} from '../core/session-actor.js'
import {generateSessionId, type SessionRegistry} from '../core/session-registry.js'
import {makeNoopLogger, type Logger} from '../logging/logger.js'

const inboundSchema = z.discriminatedUnion('type', [
  z.object({type: z.literal('chat_message'), content: z.string()}),
  z.object({type: z.literal('stop_ai')}),
  z.object({type: z.literal('start_ai')}),
  z.object({type: z.literal('clear_history')}),
  z.object({type: z.literal('ping')})
])

export type InboundMessage = z.infer<typeof inboundSchema>

export type ParsedInbound =
  | {kind: 'message'; message: InboundMessage}
  | {kind: 'unknown'}
  | {kind: 'ignored'}

/** JSON frames are validated; a non-JSON frame is read as a plain chat message. */
export function parseInbound(raw: string): ParsedInbound {
  let decoded: unknown
  try {
    decoded = JSON.parse(raw)
  } catch {
    const content = raw.trim()
    return content ? {kind: 'message', message: {type: 'chat_message', content}} : {kind: 'ignored'}
  }

  const parsed = inboundSchema.safeParse(decoded)
  return parsed.success ? {kind: 'message', message: parsed.data} : {kind: 'unknown'}
}

export type OutboundEvent =
  | SessionEvent
  | {type: 'system'; content: string}
  | {type: 'pong'}
  | {type: 'ai_status'; status: 'stopped' | 'ready'; message: string}

export type ChatServerOptions = {
  registry: SessionRegistry
  createSession: (sessionId: string) => Omit<SessionActorOptions, 'id' | 'isGloballyStopped'>
  heartbeatMs?: number
  logger?: Logger
}

function welcomeMessage(sessionId: string): string {
  return [
    `Chat system connected! I'm your AI assistant for session ${sessionId}. I can help you with terminal commands and system administration.`,
    '',
    `- Session ID: ${sessionId}`,
    `- Started: ${new Date().toISOString()}`
  ].join('\n')
}

/**
 * WebSocket front end. Each connection owns one registry session for its
 * lifetime; session events are relayed to the socket in order.
 */
export class ChatServer {
  private readonly registry: SessionRegistry
  private readonly createSession: ChatServerOptions['createSession']
  private readonly heartbeatMs: number
  private readonly logger: Logger
  private httpServer?: Server
  private wss?: WebSocketServer
  private heartbeat?: NodeJS.Timeout

  constructor(options: ChatServerOptions) {
    this.registry = options.registry
    this.createSession = options.createSession
    this.heartbeatMs = options.heartbeatMs ?? 30_000
    this.logger = options.logger ?? makeNoopLogger()
  }

  async listen(port: number, host = '127.0.0.1'): Promise<number> {
    const httpServer = createServer()
    const wss = new WebSocketServer({server: httpServer})
    wss.on('connection', (socket) => this.accept(socket))

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject)
      httpServer.listen(port, host, () => {
        httpServer.off('error', reject)
        resolve()
      })
    })

    this.heartbeat = setInterval(() => {
      for (const client of wss.clients) {
        if (client.readyState === WebSocket.OPEN) client.ping()
      }
    }, this.heartbeatMs)
    this.heartbeat.unref()

    this.httpServer = httpServer
    this.wss = wss
    const address = httpServer.address()
    const boundPort = typeof address === 'object' && address ? address.port : port
    this.logger.info({host, port: boundPort}, 'chat server listening')
    return boundPort
  }

  async close(): Promise<void> {
    if (this.heartbeat) clearInterval(this.heartbeat)
    const wss = this.wss
    const httpServer = this.httpServer
    this.wss = undefined
    this.httpServer = undefined

    if (wss) {
      for (const client of wss.clients) client.terminate()
      await new Promise<void>((resolve) => wss.close(() => resolve()))
    }
    if (httpServer) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()))
      })
    }
  }

  private accept(socket: WebSocket): void {
    const sessionId = generateSessionId()
    this.registry.create({...this.createSession(sessionId), id: sessionId})
    const logger = this.logger.child({sessionId})
    logger.info('chat connection opened')

    const send = (event: OutboundEvent) => {
      if (socket.readyState !== WebSocket.OPEN) return
      socket.send(JSON.stringify({...event, timestamp: new Date().toISOString(), session_id: sessionId}))
    }

    if (this.registry.isGloballyStopped()) {
      send({type: 'error', content: 'AI is globally stopped.'})
    } else {
      send({type: 'system', content: welcomeMessage(sessionId)})
    }

    socket.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) return
      const parsed = parseInbound(data.toString())
      if (parsed.kind === 'ignored') return
      if (parsed.kind === 'unknown') {
        send({type: 'error', content: 'Unknown message type'})
        return
      }

      void this.handle(parsed.message, sessionId, send).catch((error: unknown) => {
        logger.error({err: errorMessage(error)}, 'failed to handle inbound message')
        send({type: 'error', content: errorMessage(error)})
      })
    })

    socket.on('close', () => {
      this.registry.remove(sessionId)
      logger.info('chat connection closed')
    })

    socket.on('error', (error) => {
      logger.warn({err: error.message}, 'chat socket error')
    })
  }

  private async handle(message: InboundMessage, sessionId: string, send: (event: OutboundEvent) => void): Promise<void> {
    if (!this.registry.has(sessionId)) return
    const entry = this.registry.get(sessionId)
    this.registry.touch(sessionId)

    switch (message.type) {
      case 'ping':
        send({type: 'pong'})
        return
      case 'stop_ai':
        this.registry.setStatus(sessionId, 'stopped')
        send({type: 'ai_status', status: 'stopped', message: `AI execution stopped for session ${sessionId}`})
        return
      case 'start_ai':
        if (this.registry.isGloballyStopped()) {
          send({type: 'error', content: 'AI is globally stopped. Cannot start session.'})
          return
        }
        this.registry.setStatus(sessionId, 'running')
        send({type: 'ai_status', status: 'ready', message: `AI execution resumed for session ${sessionId}`})
        return
      case 'clear_history':
        await entry.actor.clearHistory()
        send({type: 'system', content: 'Chat history cleared'})
        return
      case 'chat_message': {
        let events: AsyncIterable<SessionEvent>
        try {
          events = entry.actor.submit(message.content)
        } catch (error) {
          if (error instanceof SessionStoppedError) {
            send({type: 'error', content: error.message})
            return
          }
          throw error
        }
        for await (const event of events) send(event)
      }
    }
  }
}
