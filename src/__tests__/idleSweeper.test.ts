import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { IdleSweeper } from '../security/idleSweeper';
import { ChallengeManager } from '../utils/challengeManager';
import { stubSynthesizer } from './helpers';

describe('IdleSweeper', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('removes challenges idle for longer than the limit', async () => {
    let now = 0;
    const manager = new ChallengeManager({
      synthesize: stubSynthesizer([[0, 1, 2, 0, 1, 2]]).synthesize,
      now: () => now,
    });
    await manager.generate('a', 1);
    now = 500;
    await manager.generate('b', 1);
    now = 800;
    await manager.submitInput('a', 0);

    const sweeper = new IdleSweeper(manager, { idleMs: 1000, intervalMs: 100, now: () => now });

    now = 1500;
    expect(sweeper.sweep()).toEqual([]);

    now = 1601;
    expect(sweeper.sweep()).toEqual(['b']);
    expect(manager.contains('a')).toBe(true);
    expect(manager.contains('b')).toBe(false);
  });

  it('requires a positive idle limit', () => {
    expect(() => new IdleSweeper(new ChallengeManager(), { idleMs: 0, intervalMs: 100 })).toThrow('idleMs must be positive');
  });

  it('sweeps on its interval until stopped', () => {
    vi.useFakeTimers();
    const sweeper = new IdleSweeper(new ChallengeManager(), { idleMs: 1000, intervalMs: 100 });
    const sweep = vi.spyOn(sweeper, 'sweep');

    sweeper.start();
    sweeper.start();
    vi.advanceTimersByTime(350);
    expect(sweep).toHaveBeenCalledTimes(3);

    sweeper.stop();
    vi.advanceTimersByTime(500);
    expect(sweep).toHaveBeenCalledTimes(3);
  });
});
