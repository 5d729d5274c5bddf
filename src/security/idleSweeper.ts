/**
 * Idle challenge expiry, kept outside the manager: the core never expires
 * anything on its own.
 */

import { SessionId } from '../types/challenge';
import { ChallengeManager } from '../utils/challengeManager';
import { SecurityLogger } from '../utils/securityLogger';

export interface IdleSweeperOptions {
    idleMs: number;
    intervalMs: number;
    now?: () => number;
}

export class IdleSweeper {
    private timer: NodeJS.Timeout | null = null;
    private readonly now: () => number;

    constructor(
        private readonly manager: ChallengeManager,
        private readonly options: IdleSweeperOptions
    ) {
        if (options.idleMs <= 0) {
            throw new Error('idleMs must be positive');
        }
        this.now = options.now ?? Date.now;
    }

    /**
     * Remove every challenge with no input for longer than idleMs
     */
    sweep(): SessionId[] {
        const expired = this.manager.idleSince(this.now() - this.options.idleMs);
        for (const sessionId of expired) {
            this.manager.removeChallenge(sessionId);
        }
        if (expired.length > 0) {
            SecurityLogger.info('Expired idle challenges', {
                type: 'CHALLENGE_EXPIRED',
                details: { count: expired.length },
            });
        }
        return expired;
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => this.sweep(), this.options.intervalMs);
        this.timer.unref();
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = null;
    }
}
