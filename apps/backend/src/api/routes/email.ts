// Email Routes
// Process inbox emails into suggested replies and submit reviewed replies

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ProcessEmailRequest, SubmitDraftRequest } from '@enrollment/contracts';
import type { AppServices } from '../../services/index.js';
import { validate } from '../../platform/validation/index.js';
import { asyncHandler } from '../middleware.js';

const processSchema = z.object({
    sessionId: z.string().min(1),
    emailId: z.string().min(1).optional(),
}) satisfies z.ZodType<ProcessEmailRequest>;

const draftSchema = z.object({
    emailId: z.string().min(1),
    sessionId: z.string().min(1),
    responseText: z.string().min(1),
    send: z.boolean().default(false),
}) satisfies z.ZodType<SubmitDraftRequest>;

const listSchema = z.object({
    sessionId: z.string().min(1),
    limit: z.coerce.number().int().min(1).max(50).default(10),
});

export function createEmailRouter(services: AppServices): Router {
    const router = Router();
    const { email } = services;

    /**
     * POST /api/email/process
     * Read an email (the first in the inbox without an id) and draft a reply
     */
    router.post('/process', asyncHandler(async (req: Request, res: Response) => {
        const body = validate(processSchema, req.body);
        const result = await services.track('email', () => email.processEmail(body));
        res.json({ ok: true, ...result });
    }));

    /**
     * POST /api/email/draft
     * Submit a reviewed reply, sending it or saving it as a CRM draft
     */
    router.post('/draft', asyncHandler(async (req: Request, res: Response) => {
        const body = validate(draftSchema, req.body);
        const result = await services.track('email', () => email.submitDraft(body));
        res.json({ ok: true, status: 'success', result });
    }));

    router.get('/list', asyncHandler(async (req: Request, res: Response) => {
        const query = validate(listSchema, req.query, 'query');
        const emails = await services.track('email', () => email.listEmails(query));
        res.json({ ok: true, emails });
    }));

    return router;
}
