import { Injectable } from '@nestjs/common';

export type DecisionOutcome = 'allow' | 'deny' | 'error';

export interface DecisionMetricsSnapshot {
  decisions: Record<DecisionOutcome, number>;
  engineSuccess: number;
  engineFailure: number;
  fallback: number;
  duration: {
    count: number;
    totalMs: number;
    maxMs: number;
  };
}

/**
 * In-process counters for decision calls. `error` counts decisions that were
 * resolved by the fail-closed fallback.
 */
@Injectable()
export class DecisionMetrics {
  private readonly decisions: Record<DecisionOutcome, number> = { allow: 0, deny: 0, error: 0 };
  private engineSuccess = 0;
  private engineFailure = 0;
  private fallback = 0;
  private durationCount = 0;
  private durationTotalMs = 0;
  private durationMaxMs = 0;

  recordDecision(outcome: DecisionOutcome, durationMs: number): void {
    this.decisions[outcome]++;
    if (outcome === 'error') this.fallback++;
    this.durationCount++;
    this.durationTotalMs += durationMs;
    this.durationMaxMs = Math.max(this.durationMaxMs, durationMs);
  }

  recordEngineSuccess(): void {
    this.engineSuccess++;
  }

  recordEngineFailure(): void {
    this.engineFailure++;
  }

  snapshot(): DecisionMetricsSnapshot {
    return {
      decisions: { ...this.decisions },
      engineSuccess: this.engineSuccess,
      engineFailure: this.engineFailure,
      fallback: this.fallback,
      duration: {
        count: this.durationCount,
        totalMs: this.durationTotalMs,
        maxMs: this.durationMaxMs,
      },
    };
  }
}
