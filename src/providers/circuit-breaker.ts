import { Clock, systemClock } from '../clock.js';

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  failureThreshold?: number; // default: 3
  cooldownMs?: number;       // default: 120000
  clock?: Clock;
}

/**
 * Per-provider circuit breaker.
 *
 * closed    -> calls allowed; consecutive failures counted
 * open      -> calls refused until the cooldown elapses
 * half_open -> exactly one probe call allowed; its outcome closes or re-opens
 *
 * One failure is recorded per exhausted invoke, not per network attempt.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private blockedUntil = 0;
  private probeInFlight = false;
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly clock: Clock;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 3;
    this.cooldownMs = options.cooldownMs ?? 120_000;
    this.clock = options.clock ?? systemClock;
  }

  get currentState(): CircuitState {
    return this.state;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  /**
   * Ask permission for a call. Moving from open to half_open happens here, and
   * the caller that receives `true` in half_open owns the probe.
   */
  tryAcquire(): boolean {
    switch (this.state) {
      case 'closed':
        return true;
      case 'open':
        if (this.clock.now() < this.blockedUntil) {
          return false;
        }
        this.state = 'half_open';
        this.probeInFlight = true;
        return true;
      case 'half_open':
        if (this.probeInFlight) {
          return false;
        }
        this.probeInFlight = true;
        return true;
    }
  }

  recordSuccess(): void {
    this.state = 'closed';
    this.consecutiveFailures = 0;
    this.blockedUntil = 0;
    this.probeInFlight = false;
  }

  recordFailure(): void {
    this.consecutiveFailures++;
    if (this.state === 'half_open' || this.consecutiveFailures >= this.failureThreshold) {
      this.trip();
    }
  }

  /**
   * Give the probe slot back without judging the provider (caller cancelled).
   */
  releaseProbe(): void {
    if (this.state === 'half_open') {
      this.probeInFlight = false;
    }
  }

  /**
   * Milliseconds until an open circuit admits a probe; 0 when not open.
   */
  remainingCooldownMs(): number {
    if (this.state !== 'open') {
      return 0;
    }
    return Math.max(0, this.blockedUntil - this.clock.now());
  }

  private trip(): void {
    this.state = 'open';
    this.probeInFlight = false;
    this.blockedUntil = this.clock.now() + this.cooldownMs;
  }
}
