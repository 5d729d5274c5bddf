/**
 * Session Store - in-process map from session id to its live challenge
 *
 * Every method is synchronous, so each is a single step on the event loop:
 * no caller can observe two sessions installed for the same id.
 */

import { SessionId } from '../types/challenge';
import { ChallengeSession } from './challengeSession';

export class SessionStore {
    private readonly sessions = new Map<SessionId, ChallengeSession>();

    get(sessionId: SessionId): ChallengeSession | null {
        return this.sessions.get(sessionId) ?? null;
    }

    has(sessionId: SessionId): boolean {
        return this.sessions.has(sessionId);
    }

    /**
     * Install a session, returning whatever it replaced
     */
    swap(sessionId: SessionId, session: ChallengeSession): ChallengeSession | null {
        const previous = this.sessions.get(sessionId) ?? null;
        this.sessions.set(sessionId, session);
        return previous;
    }

    /**
     * Remove and return the session for an id
     */
    take(sessionId: SessionId): ChallengeSession | null {
        const previous = this.sessions.get(sessionId) ?? null;
        this.sessions.delete(sessionId);
        return previous;
    }

    /**
     * Remove only if `session` is still the installed one
     */
    takeIf(sessionId: SessionId, session: ChallengeSession): boolean {
        if (this.sessions.get(sessionId) !== session) return false;
        this.sessions.delete(sessionId);
        return true;
    }

    entries(): Array<[SessionId, ChallengeSession]> {
        return Array.from(this.sessions.entries());
    }

    size(): number {
        return this.sessions.size;
    }

    /**
     * Empty the store, returning everything it held
     */
    clear(): ChallengeSession[] {
        const all = Array.from(this.sessions.values());
        this.sessions.clear();
        return all;
    }
}
