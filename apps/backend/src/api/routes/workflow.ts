// Workflow Routes
// Counselor sessions, commands, reviewer draft edits and the live event stream

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { CommandRequest, UpdateDraftRequest } from '@enrollment/contracts';
import type { AppServices } from '../../services/index.js';
import { NotFoundError } from '../../utils/errors.js';
import { validate } from '../../platform/validation/index.js';
import { asyncHandler } from '../middleware.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('api');

const commandSchema = z.object({
    command: z.string().trim().min(1),
    sessionId: z.string().min(1).optional(),
}) satisfies z.ZodType<CommandRequest>;

const draftSchema = z.object({
    responseText: z.string().min(1),
}) satisfies z.ZodType<UpdateDraftRequest>;

const eventsQuerySchema = z.object({
    sessionId: z.string().min(1).optional(),
});

export function createWorkflowRouter(services: AppServices): Router {
    const router = Router();
    const { workflow, sse } = services;

    /**
     * POST /api/workflow/command
     * Run a command on the given session, or on the active one
     */
    router.post('/command', asyncHandler(async (req: Request, res: Response) => {
        const { command, sessionId } = validate(commandSchema, req.body);
        const result = await services.track('workflow', () => workflow.processCommand(command, sessionId));
        res.json({ ok: true, ...result });
    }));

    router.post('/session', asyncHandler(async (_req: Request, res: Response) => {
        const result = await services.track('workflow', () => workflow.createSession());
        res.status(201).json({ ok: true, ...result });
    }));

    router.delete('/session/:sessionId', asyncHandler(async (req: Request, res: Response) => {
        const { sessionId } = req.params;
        const result = await services.track('workflow', () => workflow.endSession(sessionId));
        if (result.status === 'error') {
            throw new NotFoundError('Workflow session', sessionId);
        }
        res.json({ ok: true, ...result });
    }));

    router.get('/sessions', (_req: Request, res: Response) => {
        res.json({ ok: true, sessions: workflow.getAllSessions() });
    });

    router.get('/session/:sessionId', (req: Request, res: Response) => {
        const { sessionId } = req.params;
        const session = workflow.getSession(sessionId);
        if (!session) {
            throw new NotFoundError('Workflow session', sessionId);
        }
        res.json({ ok: true, session });
    });

    router.get('/session/:sessionId/events', (req: Request, res: Response) => {
        const { sessionId } = req.params;
        const events = workflow.getSessionEvents(sessionId);
        if (!events) {
            throw new NotFoundError('Workflow session', sessionId);
        }
        res.json({ ok: true, sessionId, events });
    });

    /**
     * PUT /api/workflow/session/:sessionId/draft
     * Reviewer edit of the pending draft
     */
    router.put('/session/:sessionId/draft', asyncHandler(async (req: Request, res: Response) => {
        const { responseText } = validate(draftSchema, req.body);
        const session = await workflow.updateDraft(req.params.sessionId, responseText);
        res.json({ ok: true, session });
    }));

    /**
     * GET /api/workflow/events?sessionId=
     * SSE stream of workflow state changes
     */
    router.get('/events', (req: Request, res: Response) => {
        const { sessionId } = validate(eventsQuerySchema, req.query, 'query');

        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no'); // Disable buffering in nginx
        res.flushHeaders();

        const unsubscribe = sse.registerClient(sessionId ?? null, res);
        req.on('close', () => {
            unsubscribe();
        });

        logger.info(`Workflow event stream established${sessionId ? ` for session ${sessionId}` : ''}`);
    });

    return router;
}

const aliasCommandSchema = z.object({
    command: z.string().trim().min(1),
});

/**
 * Top-level /workflow aliases for voice clients that only send query strings
 */
export function createWorkflowAliasRouter(services: AppServices): Router {
    const router = Router();
    const { workflow } = services;

    router.post('/command', asyncHandler(async (req: Request, res: Response) => {
        const { command } = validate(aliasCommandSchema, { ...req.body, ...req.query }, 'command');
        const result = await services.track('workflow', () => workflow.processCommand(command));
        res.json({ ok: true, ...result });
    }));

    router.get('/sessions', (_req: Request, res: Response) => {
        res.json({ ok: true, sessions: workflow.getAllSessions() });
    });

    router.get('/session/:sessionId', (req: Request, res: Response) => {
        const { sessionId } = req.params;
        const session = workflow.getSession(sessionId);
        if (!session) {
            throw new NotFoundError('Workflow session', sessionId);
        }
        res.json({ ok: true, session });
    });

    router.post('/session/:sessionId/end', asyncHandler(async (req: Request, res: Response) => {
        const { sessionId } = req.params;
        const result = await services.track('workflow', () => workflow.endSession(sessionId));
        if (result.status === 'error') {
            throw new NotFoundError('Workflow session', sessionId);
        }
        res.json({ ok: true, ...result });
    }));

    return router;
}
