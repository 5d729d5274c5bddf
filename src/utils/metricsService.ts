/**
 * CAPTCHA Metrics Service
 * In-process counters for the challenge lifecycle
 */

import { Zoom } from '../types/challenge';

export interface CaptchaMetrics {
    challengesIssued: number;
    challengesSolved: number;
    challengesRegenerated: number;
    challengesRemoved: number;
    inputFailures: number;
    generationFailures: number;
    issuedByZoom: Record<Zoom, number>;
}

function emptyMetrics(): CaptchaMetrics {
    return {
        challengesIssued: 0,
        challengesSolved: 0,
        challengesRegenerated: 0,
        challengesRemoved: 0,
        inputFailures: 0,
        generationFailures: 0,
        issuedByZoom: { 1: 0, 2: 0, 3: 0, 4: 0 },
    };
}

export class MetricsService {
    private metrics = emptyMetrics();

    recordIssued(zoom: Zoom): void {
        this.metrics.challengesIssued++;
        this.metrics.issuedByZoom[zoom]++;
    }

    recordSolved(): void {
        this.metrics.challengesSolved++;
    }

    recordRegenerated(): void {
        this.metrics.challengesRegenerated++;
    }

    recordRemoved(): void {
        this.metrics.challengesRemoved++;
    }

    recordInputFailure(): void {
        this.metrics.inputFailures++;
    }

    recordGenerationFailure(): void {
        this.metrics.generationFailures++;
    }

    /**
     * Success rate over issued challenges, 0 when none were issued
     */
    getSolveRate(): number {
        const { challengesIssued, challengesSolved } = this.metrics;
        if (challengesIssued === 0) return 0;
        return Math.round((challengesSolved / challengesIssued) * 10000) / 100;
    }

    snapshot(): CaptchaMetrics {
        return { ...this.metrics, issuedByZoom: { ...this.metrics.issuedByZoom } };
    }

    reset(): void {
        this.metrics = emptyMetrics();
    }
}
