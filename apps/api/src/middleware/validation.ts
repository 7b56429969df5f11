/**
 * Validation Middleware
 *
 * Validates incoming enrichment requests using Zod schemas.
 */

import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

const CalendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const EnrichRequestSchema = z
    .object({
        query: z.string().trim().min(1, 'Query text is required'),
        mode: z.enum(['exact', 'substring']).optional(),
        from: CalendarDateSchema.optional(),
        to: CalendarDateSchema.optional(),
    })
    .refine(body => (body.from === undefined) === (body.to === undefined), {
        message: 'from and to must be given together',
        path: ['from'],
    })
    .refine(body => !body.from || !body.to || body.from <= body.to, {
        message: 'from must not be after to',
        path: ['from'],
    });

export type EnrichRequest = z.infer<typeof EnrichRequestSchema>;

export const ListQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).optional(),
});

function sendValidationError(res: Response, error: z.ZodError): void {
    res.status(400).json({
        error: 'Validation failed',
        details: error.errors.map(e => ({
            path: e.path.join('.'),
            message: e.message,
        })),
    });
}

/**
 * Validate enrich request middleware
 */
export function validateEnrichRequest(
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const result = EnrichRequestSchema.safeParse(req.body);
    if (!result.success) {
        sendValidationError(res, result.error);
        return;
    }
    req.body = result.data;
    next();
}

/**
 * Validate ?limit= on list endpoints
 */
export function validateListQuery(
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const result = ListQuerySchema.safeParse(req.query);
    if (!result.success) {
        sendValidationError(res, result.error);
        return;
    }
    next();
}
