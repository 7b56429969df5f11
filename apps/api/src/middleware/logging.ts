/**
 * Logging Middleware
 *
 * Logs requests and responses with timing.
 */

import type { Request, Response, NextFunction } from 'express';

export function loggingMiddleware(
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const startTime = Date.now();
    const method = req.method;
    const url = req.originalUrl;

    console.log(`→ ${method} ${url}`);

    res.on('finish', () => {
        const duration = Date.now() - startTime;
        const status = res.statusCode;

        const statusEmoji = status >= 400 ? '❌' : status >= 300 ? '↪️' : '✅';
        console.log(`← ${statusEmoji} ${method} ${url} ${status} (${duration}ms)`);
    });

    next();
}
