import type { CircuitBreakerConfig } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

/**
 * Consecutive-failure circuit breaker for one agent/provider pair.
 *
 * CLOSED → OPEN after `failureThreshold` consecutive failures.
 * OPEN → HALF_OPEN once `cooldownMs` has elapsed; one probe runs at a time.
 * HALF_OPEN → CLOSED after `successThreshold` probe successes, → OPEN on any failure.
 */
export class CircuitBreaker {
    private state: CircuitState = 'CLOSED';
    private consecutiveFailures = 0;
    private probeSuccesses = 0;
    private probeInFlight = false;
    private openedAt = 0;

    constructor(
        readonly name: string,
        private readonly config: CircuitBreakerConfig,
        private readonly clock: () => number = Date.now
    ) {}

    getState(): CircuitState {
        this.refresh();
        return this.state;
    }

    /**
     * Whether a call may go to the provider now.
     */
    allowRequest(): boolean {
        this.refresh();
        switch (this.state) {
            case 'CLOSED':
                return true;
            case 'OPEN':
                return false;
            case 'HALF_OPEN':
                if (this.probeInFlight) return false;
                this.probeInFlight = true;
                return true;
        }
    }

    recordSuccess(): void {
        if (this.state === 'HALF_OPEN') {
            this.probeInFlight = false;
            this.probeSuccesses += 1;
            if (this.probeSuccesses >= this.config.successThreshold) {
                this.transition('CLOSED');
            }
            return;
        }
        this.consecutiveFailures = 0;
    }

    recordFailure(): void {
        if (this.state === 'HALF_OPEN') {
            this.transition('OPEN');
            return;
        }
        this.consecutiveFailures += 1;
        if (this.state === 'CLOSED' && this.consecutiveFailures >= this.config.failureThreshold) {
            this.transition('OPEN');
        }
    }

    /**
     * Release a half-open probe slot without a verdict (the call was cancelled).
     */
    releaseProbe(): void {
        if (this.state === 'HALF_OPEN') this.probeInFlight = false;
    }

    /**
     * Force the breaker closed (operator action).
     */
    reset(): void {
        this.transition('CLOSED');
    }

    private refresh(): void {
        if (this.state === 'OPEN' && this.clock() - this.openedAt >= this.config.cooldownMs) {
            this.transition('HALF_OPEN');
        }
    }

    private transition(next: CircuitState): void {
        const previous = this.state;
        this.state = next;
        this.probeInFlight = false;
        this.probeSuccesses = 0;
        if (next === 'OPEN') this.openedAt = this.clock();
        if (next === 'CLOSED') this.consecutiveFailures = 0;

        if (previous !== next) {
            const level = next === 'OPEN' ? 'warn' : 'info';
            logger[level]({ breaker: this.name, from: previous, to: next }, 'Circuit breaker state change');
        }
    }
}
