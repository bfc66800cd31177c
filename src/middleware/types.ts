// =================================================================
// MIDDLEWARE TYPES
// =================================================================
//
// Every middleware receives a GatewayContext and a next() function.
//
// GatewayContext carries data between middleware:
//   - The Express req/res
//   - The route group being served (which checks apply)
//   - Caller identity (set by auth)
//   - Resolved backend target (set by target resolution)
//   - Breaker ticket (set by circuit breaker, settled by proxy)
//
// next() passes control to the next middleware in the chain.
// If a middleware doesn't call next(), the chain stops.
// That is how a 401/429/503 short-circuits everything after it.
// =================================================================

import type { Request, Response } from 'express';
import type { Logger } from 'pino';
import type { Identity } from '../auth/types';
import type { BreakerTicket } from '../circuit-breaker/circuit-breaker';
import type { ServiceTarget } from '../proxy/forwarder';
import type { RouteGroup } from '../routes';

export interface GatewayContext {
    req: Request;
    res: Response;
    startTime: number;
    logger: Logger;

    requestId: string;
    clientIp: string;
    route: RouteGroup;

    // Set by middleware as request flows through
    identity?: Identity;
    target?: ServiceTarget;
    ticket?: BreakerTicket;

    meta: {
        stoppedBy?: string;
        upstreamStatus?: number;
    };
}

export type NextFunction = () => Promise<void>;

export interface GatewayMiddleware {
    name: string;
    handle(ctx: GatewayContext, next: NextFunction): Promise<void>;
}
