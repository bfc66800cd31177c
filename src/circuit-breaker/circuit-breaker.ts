import type { Logger } from 'pino';

// =================================================================
// CIRCUIT BREAKER
// =================================================================
//
// Stops calling a failing backend for a cool-down, then probes it.
//
//            5 consecutive failures
//   CLOSED ─────────────────────────▶ OPEN
//     ▲                                 │ 30s cool-down elapsed
//     │ 5 probe successes               ▼ (on next attempt/state read)
//     └──────────────────────────── HALF_OPEN
//                                       │ any probe failure
//                                       └──────▶ OPEN (fresh cool-down)
//
// Configuration:
//   failureThreshold: 5      consecutive failures that trip it
//   openTimeoutMs: 30000     cool-down before probing
//   halfOpenMaxProbes: 5     probes let through while HALF_OPEN
//   intervalMs: 10000        CLOSED counts are wiped this often
//
// GENERATIONS:
//   Every state change (and every CLOSED interval rollover) starts a
//   new generation and clears the counts. A ticket remembers the
//   generation it was issued in; outcomes from an older generation
//   are dropped, so a slow response can't trip a breaker that has
//   since moved on.
//
// Every attempt/report runs to completion on the event loop, so a
// breaker's counters are never seen half-updated. Each breaker owns
// its own state; nothing is shared between services.
// =================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
    failureThreshold: number;
    openTimeoutMs: number;
    halfOpenMaxProbes: number;
    intervalMs: number; // 0 disables the CLOSED rollover
}

export const DEFAULT_BREAKER_OPTIONS: CircuitBreakerOptions = {
    failureThreshold: 5,
    openTimeoutMs: 30_000,
    halfOpenMaxProbes: 5,
    intervalMs: 10_000,
};

export interface BreakerTicket {
    /** Record the outcome of the permitted call. Exactly once per ticket. */
    report(success: boolean): void;

    /** Give the slot back without an outcome (caller went away). */
    release(): void;

    readonly settled: boolean;
}

export type Permission =
    | { permitted: true; ticket: BreakerTicket }
    | { permitted: false; reason: 'open' | 'not-configured' };

interface Counts {
    requests: number;
    consecutiveFailures: number;
    consecutiveSuccesses: number;
}

export interface StateChange {
    from: CircuitState;
    to: CircuitState;
    at: string;
}

export class TicketAlreadySettledError extends Error {
    constructor(breaker: string) {
        super(`Circuit breaker ticket for ${breaker} was already settled`);
        this.name = 'TicketAlreadySettledError';
    }
}

export class CircuitBreaker {
    private state: CircuitState = 'CLOSED';
    private generation = 0;
    private counts: Counts = emptyCounts();
    private expiry = 0; // CLOSED: next rollover, OPEN: end of cool-down
    private outstanding = 0;

    private totals = {
        totalAttempts: 0,
        totalFailures: 0,
        totalRejected: 0,
        totalSuccesses: 0,
    };
    private stateChanges: StateChange[] = [];

    private options: CircuitBreakerOptions;
    private logger: Logger;

    constructor(
        public readonly name: string,
        options: Partial<CircuitBreakerOptions>,
        logger: Logger,
        private now: () => number = Date.now,
    ) {
        this.options = { ...DEFAULT_BREAKER_OPTIONS, ...options };
        this.logger = logger.child({ component: 'circuit-breaker', service: name });
        this.startGeneration(this.now());
    }

    /**
     * Ask to call the backend. A permitted attempt MUST be settled
     * through its ticket (report or release) exactly once.
     */
    attempt(): Permission {
        const now = this.now();
        const state = this.currentState(now);
        this.totals.totalAttempts++;

        if (state === 'OPEN') {
            this.totals.totalRejected++;
            return { permitted: false, reason: 'open' };
        }

        if (state === 'HALF_OPEN' && this.counts.requests >= this.options.halfOpenMaxProbes) {
            // Probe slots taken, everyone else waits for the verdict
            this.totals.totalRejected++;
            return { permitted: false, reason: 'open' };
        }

        this.counts.requests++;
        this.outstanding++;
        return { permitted: true, ticket: this.issueTicket(this.generation) };
    }

    getState(): CircuitState {
        return this.currentState(this.now());
    }

    /** Tickets issued and not yet settled. Zero when the gateway is idle. */
    inFlight(): number {
        return this.outstanding;
    }

    getStats() {
        return {
            name: this.name,
            state: this.getState(),
            options: this.options,
            consecutiveFailures: this.counts.consecutiveFailures,
            inFlight: this.outstanding,
            ...this.totals,
            stateChanges: this.stateChanges.slice(-10), // Last 10
        };
    }

    private issueTicket(generation: number): BreakerTicket {
        let settled = false;
        const settle = () => {
            if (settled) throw new TicketAlreadySettledError(this.name);
            settled = true;
            this.outstanding--;
        };

        return {
            report: (success: boolean) => {
                settle();
                if (success) {
                    this.onSuccess(generation);
                } else {
                    this.onFailure(generation);
                }
            },
            release: () => {
                settle();
                const now = this.now();
                this.currentState(now);
                if (generation === this.generation && this.counts.requests > 0) {
                    this.counts.requests--;
                }
            },
            get settled() {
                return settled;
            },
        };
    }

    private onSuccess(generation: number): void {
        const now = this.now();
        const state = this.currentState(now);
        if (generation !== this.generation) return;

        this.totals.totalSuccesses++;
        this.counts.consecutiveFailures = 0;
        this.counts.consecutiveSuccesses++;

        if (state === 'HALF_OPEN' && this.counts.consecutiveSuccesses >= this.options.halfOpenMaxProbes) {
            // Probes passed. Backend is healthy again.
            this.transitionTo('CLOSED', now);
        }
    }

    private onFailure(generation: number): void {
        const now = this.now();
        const state = this.currentState(now);
        if (generation !== this.generation) return;

        this.totals.totalFailures++;
        this.counts.consecutiveSuccesses = 0;
        this.counts.consecutiveFailures++;

        switch (state) {
        case 'CLOSED':
            if (this.counts.consecutiveFailures >= this.options.failureThreshold) {
                this.transitionTo('OPEN', now);
            }
            break;

        case 'HALF_OPEN':
            // Probe failed. Backend is still down.
            this.transitionTo('OPEN', now);
            break;
        }
    }

    /** Apply time-driven changes: CLOSED rollover and OPEN → HALF_OPEN. */
    private currentState(now: number): CircuitState {
        switch (this.state) {
        case 'CLOSED':
            if (this.expiry > 0 && now >= this.expiry) {
                this.startGeneration(now);
            }
            break;

        case 'OPEN':
            if (now >= this.expiry) {
                this.transitionTo('HALF_OPEN', now);
            }
            break;
        }
        return this.state;
    }

    private transitionTo(newState: CircuitState, now: number): void {
        const from = this.state;
        if (from === newState) return;
        this.state = newState;
        this.startGeneration(now);

        this.stateChanges.push({ from, to: newState, at: new Date(now).toISOString() });
        if (this.stateChanges.length > 50) this.stateChanges.shift();

        this.logger.warn({ from, to: newState },'Circuit breaker state changed');
    }

    private startGeneration(now: number): void {
        this.generation++;
        this.counts = emptyCounts();

        switch (this.state) {
        case 'CLOSED':
            this.expiry = this.options.intervalMs > 0 ? now + this.options.intervalMs : 0;
            break;
        case 'OPEN':
            this.expiry = now + this.options.openTimeoutMs;
            break;
        case 'HALF_OPEN':
            this.expiry = 0;
            break;
        }
    }
}

function emptyCounts(): Counts {
    return { requests: 0, consecutiveFailures: 0, consecutiveSuccesses: 0 };
}
