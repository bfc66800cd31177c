import type { NextFunction, Request, Response } from 'express';

// =================================================================
// SECURE HEADERS
// =================================================================
// Set on every response the gateway writes, including /health and
// 404s. Plain Express middleware, mounted before any route.
// Backend responses may override them.
// =================================================================

export const SECURE_HEADERS: Readonly<Record<string, string>> = {
    'X-XSS-Protection': '1; mode=block',
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'SAMEORIGIN',
};

export function secureHeaders() {
    return (_req: Request, res: Response, next: NextFunction): void => {
        for (const [name, value] of Object.entries(SECURE_HEADERS)) {
            res.setHeader(name, value);
        }
        next();
    };
}
