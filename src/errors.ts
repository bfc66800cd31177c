// =================================================================
// ERROR TAXONOMY
// =================================================================
//
//   ClientError              → caller's fault (credentials, quota).
//                              Specific status, minimal detail.
//   DependencyDegradedError  → counting store / blacklist down.
//                              Logged, never shown; the check applies
//                              its failure policy instead.
//   BackendUnavailableError  → breaker open, transport failure,
//                              unknown service. Generic 503.
//   ConfigurationError       → bad config. Fatal at boot, 500 at
//                              request time for a broken target.
//
// Every external failure is converted into one of these at the call
// boundary. Raw store/transport text stays in the logs.
// =================================================================

export class GatewayError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly publicMessage: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }

    /** Body sent to the caller. Never carries internal detail. */
    toResponseBody(): Record<string, string | number> {
        return { error: this.publicMessage };
    }
}

export class ClientError extends GatewayError {
    constructor(status: number, publicMessage: string) {
        super(publicMessage, status, publicMessage);
    }
}

export class DependencyDegradedError extends GatewayError {
    constructor(
        public readonly dependency: string,
        cause: unknown,
    ) {
        super(`${dependency} unavailable: ${describeCause(cause)}`, 503, 'Service temporarily unavailable', { cause });
    }
}

export type UnavailableReason = 'open' | 'not-configured' | 'transport';

export class BackendUnavailableError extends GatewayError {
    constructor(
        public readonly service: string,
        public readonly reason: UnavailableReason,
        cause?: unknown,
    ) {
        super(
            `${service} unavailable (${reason})${cause === undefined ? '' : `: ${describeCause(cause)}`}`,
            503,
            reason === 'not-configured' ? 'Service not configured' : 'Service temporarily unavailable',
            { cause },
        );
    }

    toResponseBody(): Record<string, string | number> {
        if (this.reason === 'not-configured') {
            return { error: this.publicMessage };
        }
        return { error: this.publicMessage, service: this.service };
    }
}

export class ConfigurationError extends GatewayError {
    constructor(message: string, cause?: unknown) {
        super(message, 500, 'Configuration error', { cause });
    }
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    return String(cause);
}
