import { DEFAULT_MAX_FAILURES } from '../config/captcha';
import { ChallengeOutcome, EncoderOptions, RenderedChallenge, SessionId, Zoom } from '../types/challenge';
import { ArrowCaptchaGenerator, assertZoom } from './arrowCaptcha';
import { ChallengeSession } from './challengeSession';
import { DisposedError, EncodingError, GenerationFailedError } from './errors';
import { MetricsService } from './metricsService';
import { isArrowSymbol } from './sequenceGenerator';
import { SecurityLogger } from './securityLogger';
import { SessionStore } from './sessionStore';

/**
 * Renders one challenge. Hosts may swap this for a worker-pool dispatch.
 */
export type Synthesizer = (zoom: Zoom) => Promise<RenderedChallenge>;

export interface ChallengeManagerOptions {
    maxFailures?: number;
    encoder?: Partial<EncoderOptions>;
    synthesize?: Synthesizer;
    metrics?: MetricsService;
    store?: SessionStore;
    now?: () => number;
}

export class ChallengeManager {
    readonly maxFailures: number;
    readonly metrics: MetricsService;
    private readonly store: SessionStore;
    private readonly synthesize: Synthesizer;
    private readonly now: () => number;

    // Latest generate() ticket per id; a render finishing after a newer generate()
    // or a removal is dropped
    private readonly pending = new Map<SessionId, number>();
    private ticketCounter = 0;

    constructor(options: ChallengeManagerOptions = {}) {
        this.maxFailures = options.maxFailures ?? DEFAULT_MAX_FAILURES;
        this.metrics = options.metrics ?? new MetricsService();
        this.store = options.store ?? new SessionStore();
        this.now = options.now ?? Date.now;

        if (options.synthesize) {
            this.synthesize = options.synthesize;
        } else {
            const generator = new ArrowCaptchaGenerator(options.encoder);
            this.synthesize = (zoom) => generator.generate(zoom);
        }
    }

    /**
     * Replace any challenge for `sessionId` with a freshly rendered one.
     * Rendering happens with nothing held; only the finished session is published.
     */
    async generate(sessionId: SessionId, zoom: number): Promise<void> {
        assertZoom(zoom);

        const ticket = ++this.ticketCounter;
        this.pending.set(sessionId, ticket);
        this.store.take(sessionId)?.dispose();

        let session: ChallengeSession;
        try {
            const rendered = await this.synthesize(zoom);
            session = new ChallengeSession({
                sessionId,
                zoom,
                correctSequence: rendered.sequence,
                imageBytes: rendered.image,
                now: this.now,
            });
        } catch (error) {
            if (this.pending.get(sessionId) === ticket) {
                this.pending.delete(sessionId);
            }
            this.metrics.recordGenerationFailure();
            SecurityLogger.error('Challenge generation failed', error, { sessionId, zoom });

            if (error instanceof EncodingError) throw error;
            throw new GenerationFailedError(`Failed to generate challenge for session ${String(sessionId)}`, { cause: error });
        }

        if (this.pending.get(sessionId) !== ticket) {
            // superseded or removed while rendering
            session.dispose();
            return;
        }
        this.pending.delete(sessionId);

        this.store.swap(sessionId, session)?.dispose();
        this.metrics.recordIssued(zoom);
        SecurityLogger.info('Challenge issued', { type: 'CHALLENGE_ISSUED', sessionId, zoom });
    }

    contains(sessionId: SessionId): boolean {
        const session = this.store.get(sessionId);
        return session !== null && !session.isDisposed();
    }

    /**
     * Encoded image of the live challenge, or null when missing or disposed
     */
    getChallenge(sessionId: SessionId): Buffer | null {
        const session = this.store.get(sessionId);
        if (!session) return null;

        try {
            return session.getImageBytes();
        } catch (error) {
            if (error instanceof DisposedError) return null;
            throw error;
        }
    }

    async submitInput(sessionId: SessionId, symbol: number): Promise<ChallengeOutcome> {
        const session = this.store.get(sessionId);
        if (!session || session.isDisposed()) return 'absent';

        if (session.addInput(symbol)) {
            this.store.takeIf(sessionId, session);
            this.metrics.recordSolved();
            SecurityLogger.info('Challenge solved', { type: 'CHALLENGE_SUCCESS', sessionId });
            return 'solved';
        }
        if (session.isDisposed()) return 'absent';
        if (!isArrowSymbol(symbol)) return 'pending';

        if (session.isFull()) {
            const failures = session.recordFailure();
            this.metrics.recordInputFailure();

            if (failures >= this.maxFailures) {
                SecurityLogger.warn('Challenge failure threshold reached, regenerating', {
                    type: 'CHALLENGE_FAILED',
                    sessionId,
                    details: { failures, maxFailures: this.maxFailures },
                });
                await this.generate(sessionId, session.zoom);
                if (!this.contains(sessionId)) return 'absent';
                this.metrics.recordRegenerated();
                return 'regenerated';
            }
        }
        return 'pending';
    }

    /**
     * Drop the challenge and cancel any render still in flight for the id
     */
    removeChallenge(sessionId: SessionId): void {
        this.pending.delete(sessionId);
        const session = this.store.take(sessionId);
        if (session?.dispose()) {
            this.metrics.recordRemoved();
        }
    }

    /**
     * Sessions idle since before `cutoff`; used by external expiry policies
     */
    idleSince(cutoff: number): SessionId[] {
        return this.store
            .entries()
            .filter(([, session]) => session.getLastActivity() < cutoff)
            .map(([sessionId]) => sessionId);
    }

    size(): number {
        return this.store.size();
    }

    clear(): void {
        this.pending.clear();
        for (const session of this.store.clear()) {
            session.dispose();
        }
    }
}
