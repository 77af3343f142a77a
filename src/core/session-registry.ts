import {randomBytes} from 'node:crypto'
import {SessionActor, type SessionActorOptions} from './session-actor.js'

export type SessionStatus = 'running' | 'stopped'

export type SessionEntry = {
  id: string
  actor: SessionActor
  status: SessionStatus
  createdAt: string
  lastActivity: string
}

export type SessionSummary = Omit<SessionEntry, 'actor'>

export function generateSessionId(): string {
  return `chat_${randomBytes(6).toString('hex')}`
}

/**
 * Process-wide table of live sessions plus the global stop switch. Every
 * method is synchronous, so no caller ever observes a half-applied mutation.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionEntry>()
  private globalStopped = false

  create(options: Omit<SessionActorOptions, 'id' | 'isGloballyStopped'> & {id?: string}): SessionEntry {
    const id = options.id ?? generateSessionId()
    if (this.sessions.has(id)) throw new Error(`Session already exists: ${id}`)

    const actor = new SessionActor({...options, id, isGloballyStopped: () => this.globalStopped})
    const now = new Date().toISOString()
    const entry: SessionEntry = {id, actor, status: 'running', createdAt: now, lastActivity: now}
    this.sessions.set(id, entry)
    return entry
  }

  get(sessionId: string): SessionEntry {
    const entry = this.sessions.get(sessionId)
    if (!entry) throw new Error(`Session not found: ${sessionId}`)
    return entry
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId)
  }

  /** Closes the actor so it takes no further turns and releases its terminal, then forgets it. */
  remove(sessionId: string): boolean {
    const entry = this.sessions.get(sessionId)
    if (!entry) return false
    void entry.actor.close()
    this.sessions.delete(sessionId)
    return true
  }

  setStatus(sessionId: string, status: SessionStatus): SessionEntry {
    const entry = this.get(sessionId)
    entry.status = status
    if (status === 'stopped') entry.actor.stop()
    else entry.actor.resume()
    entry.lastActivity = new Date().toISOString()
    return entry
  }

  touch(sessionId: string): void {
    const entry = this.sessions.get(sessionId)
    if (entry) entry.lastActivity = new Date().toISOString()
  }

  list(): SessionSummary[] {
    return [...this.sessions.values()].map(({actor: _actor, ...summary}) => ({...summary}))
  }

  get size(): number {
    return this.sessions.size
  }

  isGloballyStopped(): boolean {
    return this.globalStopped
  }

  setGlobalStopped(stopped: boolean): void {
    this.globalStopped = stopped
  }
}
