/**
 * Captcha Gate
 *
 * Binds a ChallengeManager to the host's player model: issuing a challenge
 * raises the host's "captcha pending" state and hands it the image, solving
 * it clears that state, and a regenerated challenge is re-sent.
 */

import { ChallengeOutcome, SessionId } from '../types/challenge';
import { ChallengeManager } from '../utils/challengeManager';
import { SecurityLogger } from '../utils/securityLogger';

export interface CaptchaPlayer {
    sessionId: SessionId;
    zoom: number;
}

export interface CaptchaHost<P extends CaptchaPlayer = CaptchaPlayer> {
    onChallengeIssued(player: P, image: Buffer): void | Promise<void>;
    onChallengeCleared(player: P): void | Promise<void>;
}

export class CaptchaGate<P extends CaptchaPlayer = CaptchaPlayer> {
    constructor(
        private readonly manager: ChallengeManager,
        private readonly host: CaptchaHost<P>
    ) {}

    /**
     * Put the player behind a fresh challenge.
     * Returns false when no challenge could be issued; the host may retry.
     */
    async issueFor(player: P): Promise<boolean> {
        try {
            await this.manager.generate(player.sessionId, player.zoom);
            return await this.deliver(player);
        } catch (error) {
            SecurityLogger.error('Failed to issue challenge to player', error, {
                sessionId: player.sessionId,
                zoom: player.zoom,
            });
            return false;
        }
    }

    async handleInput(player: P, symbol: number): Promise<ChallengeOutcome> {
        let outcome: ChallengeOutcome;
        try {
            outcome = await this.manager.submitInput(player.sessionId, symbol);
        } catch (error) {
            SecurityLogger.error('Challenge regeneration failed', error, { sessionId: player.sessionId });
            return 'absent';
        }

        if (outcome === 'solved') {
            await this.host.onChallengeCleared(player);
        } else if (outcome === 'regenerated') {
            await this.deliver(player);
        }
        return outcome;
    }

    isPending(player: P): boolean {
        return this.manager.contains(player.sessionId);
    }

    /**
     * Drop the player's challenge without notifying the host (disconnects)
     */
    release(player: P): void {
        this.manager.removeChallenge(player.sessionId);
    }

    private async deliver(player: P): Promise<boolean> {
        const image = this.manager.getChallenge(player.sessionId);
        if (!image) return false;
        await this.host.onChallengeIssued(player, image);
        return true;
    }
}
