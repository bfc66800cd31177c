import type { Logger } from 'pino';
import { CircuitBreaker, TicketAlreadySettledError, type BreakerTicket, type CircuitBreakerOptions, type CircuitState, type Permission } from './circuit-breaker';

// =================================================================
// CIRCUIT BREAKER REGISTRY — one breaker PER service
// =================================================================
//
// Built once at start-up from the service table and never changed:
// no insertion or removal at runtime, so lookups need no locking and
// a failing transaction-service can't slow down user-service.
//
//   breaker-enabled service  → its own CircuitBreaker
//   breaker-disabled service → always permitted (no-op ticket)
//   unknown service          → rejected, 'not-configured'
// =================================================================

export interface BreakerServiceSpec {
    name: string;
    circuitBreaker: boolean;
}

const passThroughTicket = (service: string): BreakerTicket => {
    let settled = false;
    const settle = () => {
        if (settled) throw new TicketAlreadySettledError(service);
        settled = true;
    };
    return {
        report: () => settle(),
        release: () => settle(),
        get settled() {
            return settled;
        },
    };
};

export class CircuitBreakerRegistry {
    private readonly breakers: ReadonlyMap<string, CircuitBreaker>;
    private readonly known: ReadonlySet<string>;

    constructor(
        services: BreakerServiceSpec[],
        options: Partial<CircuitBreakerOptions>,
        logger: Logger,
        now: () => number = Date.now,
    ) {
        const breakers = new Map<string, CircuitBreaker>();
        for (const service of services) {
            if (service.circuitBreaker) {
                breakers.set(service.name, new CircuitBreaker(service.name, options, logger, now));
            }
        }
        this.breakers = breakers;
        this.known = new Set(services.map(s => s.name));
    }

    attempt(service: string): Permission {
        const breaker = this.breakers.get(service);
        if (breaker) return breaker.attempt();

        if (this.known.has(service)) {
            return { permitted: true, ticket: passThroughTicket(service) };
        }
        return { permitted: false, reason: 'not-configured' };
    }

    /** Breaker state, or undefined for services without one. */
    state(service: string): CircuitState | undefined {
        return this.breakers.get(service)?.getState();
    }

    get(service: string): CircuitBreaker | undefined {
        return this.breakers.get(service);
    }

    /** Unsettled tickets across every breaker. */
    inFlight(): number {
        let total = 0;
        for (const breaker of this.breakers.values()) total += breaker.inFlight();
        return total;
    }

    stats() {
        return Object.fromEntries(
            [...this.breakers.entries()].map(([name, breaker]) => [name, breaker.getStats()]),
        );
    }
}
