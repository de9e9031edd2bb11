/**
 * HuntTickRunner: periodic driver for a HuntSession.
 *
 * Sensors push fixes as fast as they like; each interval processes only the
 * newest one. Re-entrancy guard: a listener that calls runOnce() from inside
 * a tick is ignored. Pause keeps the timer but skips ticks.
 */

import type { PlayerFix } from '@coinquest/shared';
import type { ProximityUpdateResult } from '../proximity/proximityEngine';
import type { HuntSession } from './huntSession';

export class HuntTickRunner {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private paused = false;
  private pendingFix: PlayerFix | null = null;
  private tickNo = 0;
  private rejected = 0;

  constructor(
    private session: HuntSession,
    private intervalMs: number = session.config.tickIntervalMs,
  ) {}

  /** Store the latest fix; an unprocessed older fix is discarded */
  pushFix(fix: PlayerFix): void {
    this.pendingFix = fix;
  }

  start(): void {
    if (this.timer) return;

    console.log(`[Ticker] Started (${this.intervalMs}ms interval)`);

    this.timer = setInterval(() => {
      try {
        this.runOnce();
      } catch (err) {
        console.error('[Ticker] Unhandled error:', err);
      }
    }, this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.pendingFix = null;
    console.log('[Ticker] Stopped');
  }

  pause(): void {
    if (this.paused) return;
    this.paused = true;
    console.log('[Ticker] Paused');
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    console.log('[Ticker] Resumed');
  }

  isStarted(): boolean {
    return this.timer !== null;
  }

  isRunning(): boolean {
    return this.running;
  }

  isPaused(): boolean {
    return this.paused;
  }

  /** Ticks that reached the session */
  getCurrentTick(): number {
    return this.tickNo;
  }

  getRejectedCount(): number {
    return this.rejected;
  }

  /**
   * Process the pending fix now. Returns null when there was nothing to do
   * (no new fix, paused, or already inside a tick).
   */
  runOnce(): ProximityUpdateResult | null {
    if (this.running || this.paused) return null;

    const fix = this.pendingFix;
    if (!fix) return null;
    this.pendingFix = null;

    this.running = true;
    try {
      this.tickNo++;
      const result = this.session.tick(fix);
      if (!result.accepted) this.rejected++;
      return result;
    } finally {
      this.running = false;
    }
  }
}
