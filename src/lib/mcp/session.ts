/**
 * Session management for the MCP endpoint
 * A session is created by `initialize` and addressed by the Mcp-Session-Id header.
 */

import { randomUUID } from 'node:crypto';
import { cloneConfig, type QueryConfig } from './query-config';

export interface SessionData {
    sessionId: string;
    config: QueryConfig; // snapshot of the process config when the session was created
    createdAt: Date;
    lastActivity: Date;
}

/**
 * In-memory session store. The only owner of session state: callers receive
 * copies of the config snapshot, never the stored mapping.
 * In production, this could be backed by Redis or a database.
 */
export class SessionStore {
    private _sessions = new Map<string, SessionData>();

    constructor(private readonly _newId: () => string = randomUUID) {}

    /**
     * Create a new session holding a copy of the given config.
     */
    create(config: QueryConfig): SessionData {
        let sessionId = this._newId();
        while (this._sessions.has(sessionId)) {
            sessionId = this._newId();
        }

        const now = new Date();
        const session: SessionData = { sessionId, config: cloneConfig(config), createdAt: now, lastActivity: now };
        this._sessions.set(sessionId, session);
        return { ...session, config: cloneConfig(session.config) };
    }

    /**
     * Look up a session and mark it active.
     */
    get(sessionId: string): SessionData | undefined {
        const session = this._sessions.get(sessionId);
        if (!session) return undefined;
        session.lastActivity = new Date();
        return { ...session, config: cloneConfig(session.config) };
    }

    has(sessionId: string): boolean {
        return this._sessions.has(sessionId);
    }

    /**
     * Delete a session. Returns false when it did not exist.
     */
    delete(sessionId: string): boolean {
        return this._sessions.delete(sessionId);
    }

    clear(): void {
        this._sessions.clear();
    }

    get size(): number {
        return this._sessions.size;
    }

    getSessionIds(): string[] {
        return Array.from(this._sessions.keys());
    }

    /**
     * Remove sessions idle for longer than maxAge milliseconds. Returns how many were removed.
     */
    cleanupStale(maxAge: number, now = Date.now()): number {
        let cleaned = 0;
        for (const [sessionId, session] of this._sessions) {
            if (now - session.lastActivity.getTime() > maxAge) {
                this._sessions.delete(sessionId);
                cleaned++;
            }
        }
        return cleaned;
    }

    /**
     * Sweep idle sessions every `interval` ms. The timer does not keep the process alive.
     * Returns a function that stops the sweeper.
     */
    startSweeper(maxAge: number, interval = Math.max(1000, Math.min(maxAge, 60_000))): () => void {
        const timer = setInterval(() => this.cleanupStale(maxAge), interval);
        timer.unref();
        return () => clearInterval(timer);
    }
}
