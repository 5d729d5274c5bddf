import { ArrowSymbol, SessionId, Zoom } from '../types/challenge';
import { DisposedError } from './errors';
import { isArrowSymbol, SEQUENCE_LENGTH, sequenceToString } from './sequenceGenerator';

export interface ChallengeSessionInit {
    sessionId: SessionId;
    zoom: Zoom;
    correctSequence: readonly ArrowSymbol[];
    imageBytes: Buffer;
    now?: () => number;
}

/**
 * One challenge's mutable state.
 *
 * Input state (entered buffer, fail count) and the image are touched only by
 * synchronous methods, so each method is its own critical section on the
 * event loop. `disposed` flips once; whoever flips it releases the resources.
 */
export class ChallengeSession {
    readonly sessionId: SessionId;
    readonly zoom: Zoom;
    readonly createdAt: number;
    private readonly correctSequence: string;
    private readonly now: () => number;

    private entered: ArrowSymbol[] = [];
    private failCount = 0;
    private imageBytes: Buffer | null;
    private disposed = false;
    private lastInputAt: number;

    constructor(init: ChallengeSessionInit) {
        if (init.correctSequence.length !== SEQUENCE_LENGTH || !init.correctSequence.every(isArrowSymbol)) {
            throw new Error(`Correct sequence must be ${SEQUENCE_LENGTH} symbols over {0,1,2}`);
        }
        this.sessionId = init.sessionId;
        this.zoom = init.zoom;
        this.correctSequence = sequenceToString(init.correctSequence);
        this.imageBytes = Buffer.from(init.imageBytes);
        this.now = init.now ?? Date.now;
        this.createdAt = this.now();
        this.lastInputAt = this.createdAt;
    }

    /**
     * Push one symbol through the six-wide sliding window.
     * Returns true only when this input completed the challenge.
     */
    addInput(symbol: number): boolean {
        if (this.disposed) return false;
        if (!isArrowSymbol(symbol)) return false;

        if (this.entered.length >= SEQUENCE_LENGTH) {
            this.entered.shift();
        }
        this.entered.push(symbol);
        this.lastInputAt = this.now();

        const completed = this.entered.length === SEQUENCE_LENGTH && this.verify();
        if (completed) {
            this.dispose();
        }
        return completed;
    }

    verify(): boolean {
        return sequenceToString(this.entered) === this.correctSequence;
    }

    isFull(): boolean {
        return this.entered.length === SEQUENCE_LENGTH;
    }

    /**
     * Count one full-but-wrong window; returns the new total
     */
    recordFailure(): number {
        this.failCount += 1;
        return this.failCount;
    }

    getFailCount(): number {
        return this.failCount;
    }

    getEnteredValue(): string {
        return sequenceToString(this.entered);
    }

    getLastActivity(): number {
        return this.lastInputAt;
    }

    /**
     * Copy of the encoded image
     */
    getImageBytes(): Buffer {
        if (this.disposed || this.imageBytes === null) {
            throw new DisposedError();
        }
        return Buffer.from(this.imageBytes);
    }

    isDisposed(): boolean {
        return this.disposed;
    }

    /**
     * Release the image and clear input. Returns true for the call that did
     * the release, false for every later one.
     */
    dispose(): boolean {
        if (this.disposed) return false;
        this.disposed = true;

        this.imageBytes = null;
        this.entered = [];
        return true;
    }
}
