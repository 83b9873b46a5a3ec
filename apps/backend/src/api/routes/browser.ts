// Browser Routes
// CRM browser sessions, login and inbox navigation
// NO secrets in logs

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { BrowserAction, BrowserSessionRequest } from '@enrollment/contracts';
import type { AppServices } from '../../services/index.js';
import { validate } from '../../platform/validation/index.js';
import { asyncHandler } from '../middleware.js';

const actionSchema = z.enum(['start', 'navigate', 'click', 'input', 'content', 'screenshot', 'end']) satisfies z.ZodType<BrowserAction>;

const sessionSchema = z.object({
    action: actionSchema,
    url: z.string().url().optional(),
    selector: z.string().min(1).optional(),
    text: z.string().optional(),
    sessionId: z.string().min(1).optional(),
    timeout: z.number().int().positive().max(300000).optional(),
}) satisfies z.ZodType<BrowserSessionRequest>;

const loginSchema = z.object({
    username: z.string().optional(),
    password: z.string().optional(),
    securityAnswer: z.string().optional(),
});

const inboxSchema = z.object({
    sessionId: z.string().min(1),
});

export function createBrowserRouter(services: AppServices): Router {
    const router = Router();
    const { browser, config } = services;

    /**
     * POST /api/browser/session
     * Start, drive or end a browser session; a page failure answers 502 with the error result
     */
    router.post('/session', asyncHandler(async (req: Request, res: Response) => {
        const body = validate(sessionSchema, req.body);
        const result = await services.track('browser', () => browser.manageSession(body));

        const ok = result.status === 'success';
        res.status(ok ? 200 : 502).json({ ok, ...result });
    }));

    /**
     * POST /api/browser/login
     * Log in to the CRM; missing fields fall back to the configured credentials
     */
    router.post('/login', asyncHandler(async (req: Request, res: Response) => {
        const body = validate(loginSchema, req.body ?? {});
        const result = await services.track('browser', () => browser.loginToCrm({
            username: body.username || config.crm.username,
            password: body.password || config.crm.password,
            securityAnswer: body.securityAnswer || config.crm.securityAnswer || undefined,
        }));

        const ok = result.status === 'success';
        res.status(ok ? 200 : 401).json({ ok, ...result });
    }));

    router.post('/navigate/inbox', asyncHandler(async (req: Request, res: Response) => {
        const { sessionId } = validate(inboxSchema, req.body);
        const result = await services.track('browser', () => browser.navigateToInbox(sessionId));
        res.json({ ok: true, ...result });
    }));

    router.get('/status/:sessionId', (req: Request, res: Response) => {
        const { sessionId } = req.params;
        res.json({ ok: true, sessionId, status: browser.getSessionStatus(sessionId) });
    });

    return router;
}
