import { Logger } from '@nestjs/common';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerSettings {
  failureThreshold: number;
  waitDurationInOpenStateMs: number;
  maxWaitDurationInHalfOpenStateMs: number;
}

export interface CircuitSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  openedAt?: number;
  openUntil?: number;
}

/**
 * Handed out by `tryAcquire`. Outcomes are only counted while the breaker is
 * still in the generation that issued the permit, so a slow call that
 * started before a transition cannot flip the state afterwards.
 */
export interface CircuitPermit {
  readonly generation: number;
  readonly probe: boolean;
}

/**
 * CLOSED --failures >= threshold--> OPEN --wait elapsed--> HALF_OPEN
 * HALF_OPEN --success--> CLOSED, HALF_OPEN --failure--> OPEN
 *
 * HALF_OPEN admits a single probe. Every method runs to completion without
 * yielding, so each check-and-flip is atomic on the event loop.
 */
export class CircuitBreaker {
  private readonly logger = new Logger(CircuitBreaker.name);
  private state: CircuitState = 'CLOSED';
  private generation = 0;
  private consecutiveFailures = 0;
  private openedAt?: number;
  private openUntil?: number;
  private halfOpenSince?: number;
  private probeInFlight = false;

  constructor(
    private readonly settings: CircuitBreakerSettings,
    private readonly clock: () => number = Date.now,
  ) {}

  tryAcquire(): CircuitPermit | null {
    const now = this.clock();

    if (this.state === 'OPEN') {
      if (this.openUntil !== undefined && now < this.openUntil) return null;
      this.transition('HALF_OPEN', now);
    }

    if (this.state === 'HALF_OPEN') {
      const maxWait = this.settings.maxWaitDurationInHalfOpenStateMs;
      if (maxWait > 0 && this.halfOpenSince !== undefined && now - this.halfOpenSince >= maxWait) {
        this.logger.warn(`No probe outcome within ${maxWait}ms in HALF_OPEN, reopening circuit`);
        this.transition('OPEN', now);
        return null;
      }
      if (this.probeInFlight) return null;
      this.probeInFlight = true;
      return { generation: this.generation, probe: true };
    }

    return { generation: this.generation, probe: false };
  }

  recordSuccess(permit: CircuitPermit): void {
    if (!this.isCurrent(permit)) return;
    this.consecutiveFailures = 0;
    if (this.state === 'HALF_OPEN') {
      this.transition('CLOSED', this.clock());
    }
  }

  recordFailure(permit: CircuitPermit): void {
    if (!this.isCurrent(permit)) return;
    this.consecutiveFailures++;
    if (this.state === 'HALF_OPEN') {
      this.transition('OPEN', this.clock());
    } else if (this.consecutiveFailures >= this.settings.failureThreshold) {
      this.transition('OPEN', this.clock());
    }
  }

  /** Give back a permit whose call ended without an outcome (caller abort). */
  release(permit: CircuitPermit): void {
    if (permit.probe && this.isCurrent(permit)) {
      this.probeInFlight = false;
    }
  }

  snapshot(): CircuitSnapshot {
    const snapshot: CircuitSnapshot = {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
    };
    if (this.openedAt !== undefined) snapshot.openedAt = this.openedAt;
    if (this.openUntil !== undefined) snapshot.openUntil = this.openUntil;
    return snapshot;
  }

  private isCurrent(permit: CircuitPermit): boolean {
    return permit.generation === this.generation && this.state !== 'OPEN';
  }

  private transition(next: CircuitState, now: number): void {
    const previous = this.state;
    this.state = next;
    this.generation++;
    this.probeInFlight = false;

    switch (next) {
      case 'OPEN':
        this.openedAt = now;
        this.openUntil = now + this.settings.waitDurationInOpenStateMs;
        this.halfOpenSince = undefined;
        this.logger.warn(
          `Circuit ${previous} -> OPEN after ${this.consecutiveFailures} consecutive failures, ` +
            `engine calls suspended for ${this.settings.waitDurationInOpenStateMs}ms`,
        );
        break;
      case 'HALF_OPEN':
        this.halfOpenSince = now;
        this.logger.log('Circuit OPEN -> HALF_OPEN, probing policy engine');
        break;
      case 'CLOSED':
        this.consecutiveFailures = 0;
        this.openedAt = undefined;
        this.openUntil = undefined;
        this.halfOpenSince = undefined;
        this.logger.log(`Circuit ${previous} -> CLOSED`);
        break;
    }
  }
}
