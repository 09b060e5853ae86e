// src/gateway/sessions.ts — In-memory chat session store with idle eviction

import { ulid } from "ulid"
import type { ConductorLogger } from "../conductor/logger.js"

export type MessageRole = "user" | "assistant"

export interface SessionMessage {
  role: MessageRole
  content: string
  timestamp: string
}

export interface Session {
  session_id: string
  created_at: string
  messages: SessionMessage[]
}

interface ManagedSession {
  session: Session
  lastActivity: number
}

export interface SessionStoreOptions {
  maxSessions?: number
  idleMs?: number
  /** Eviction sweep interval (default: 60s) */
  sweepIntervalMs?: number
  clock?: () => number
  logger?: ConductorLogger
}

const MAX_SESSIONS = 100
const SESSION_IDLE_MS = 30 * 60 * 1000 // 30 minutes

export class SessionStore {
  private sessions = new Map<string, ManagedSession>()
  private evictionTimer: ReturnType<typeof setInterval>
  private readonly maxSessions: number
  private readonly idleMs: number
  private readonly clock: () => number
  private readonly logger: ConductorLogger

  constructor(options: SessionStoreOptions = {}) {
    this.maxSessions = options.maxSessions ?? MAX_SESSIONS
    this.idleMs = options.idleMs ?? SESSION_IDLE_MS
    this.clock = options.clock ?? Date.now
    this.logger = options.logger ?? console

    this.evictionTimer = setInterval(() => this.evictIdle(), options.sweepIntervalMs ?? 60_000)
    this.evictionTimer.unref()
  }

  /** Existing session for `id`, or a new one (under `id` when given, else a fresh id) */
  getOrCreate(id?: string): Session {
    if (id) {
      const existing = this.get(id)
      if (existing) return existing
    }

    if (this.sessions.size >= this.maxSessions) {
      this.evictIdle()
      if (this.sessions.size >= this.maxSessions) this.evictLeastRecent()
    }

    const now = this.clock()
    const session: Session = {
      session_id: id ?? ulid(),
      created_at: new Date(now).toISOString(),
      messages: [],
    }
    this.sessions.set(session.session_id, { session, lastActivity: now })
    return session
  }

  get(id: string): Session | undefined {
    const managed = this.sessions.get(id)
    if (!managed) return undefined
    managed.lastActivity = this.clock()
    return managed.session
  }

  append(id: string, role: MessageRole, content: string): void {
    const session = this.get(id)
    if (!session) return
    session.messages.push({ role, content, timestamp: new Date(this.clock()).toISOString() })
  }

  delete(id: string): boolean {
    return this.sessions.delete(id)
  }

  getActiveCount(): number {
    return this.sessions.size
  }

  getMessageCount(): number {
    let total = 0
    for (const managed of this.sessions.values()) {
      total += managed.session.messages.length
    }
    return total
  }

  /** Evict sessions idle longer than the idle window. Returns count evicted. */
  evictIdle(): number {
    const now = this.clock()
    let evicted = 0
    for (const [id, managed] of this.sessions) {
      if (now - managed.lastActivity > this.idleMs) {
        this.sessions.delete(id)
        evicted++
      }
    }
    if (evicted > 0) {
      this.logger.info(`[gateway] evicted ${evicted} idle sessions`, { evicted })
    }
    return evicted
  }

  /** Stop the eviction timer. */
  close(): void {
    clearInterval(this.evictionTimer)
  }

  private evictLeastRecent(): void {
    let oldest: [string, number] | undefined
    for (const [id, managed] of this.sessions) {
      if (!oldest || managed.lastActivity < oldest[1]) oldest = [id, managed.lastActivity]
    }
    if (oldest) {
      this.sessions.delete(oldest[0])
      this.logger.warn(`[gateway] session limit reached, evicted ${oldest[0]}`, { session_id: oldest[0] })
    }
  }
}
