// System Routes
// Health, metrics and the root landing page

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { Router, type Request, type Response } from 'express';
import type { HealthResponse } from '@enrollment/contracts';
import type { AppServices } from '../../services/index.js';
import { NotFoundError } from '../../utils/errors.js';

export const APP_NAME = 'enrollment-assistant';
export const APP_VERSION = '0.1.0';

export function createSystemRouter(services: AppServices): Router {
    const router = Router();
    const { monitor } = services;
    const indexPath = resolve(services.config.server.staticDir, 'index.html');

    router.get('/health', (_req: Request, res: Response) => {
        const body: HealthResponse = {
            status: 'healthy',
            service: APP_NAME,
            version: APP_VERSION,
            timestamp: new Date().toISOString(),
        };
        res.json(body);
    });

    router.get('/metrics', (_req: Request, res: Response) => {
        res.json({
            system: monitor.getSystemMetrics(),
            services: monitor.getAllMetrics(),
        });
    });

    router.get('/metrics/:serviceName', (req: Request, res: Response) => {
        const { serviceName } = req.params;
        const metrics = monitor.getServiceMetrics(serviceName);
        if (!metrics) {
            throw new NotFoundError('Service', serviceName);
        }
        res.json(metrics.toJSON());
    });

    /**
     * GET /
     * The bundled review page when present, app info otherwise
     */
    router.get('/', (_req: Request, res: Response) => {
        if (existsSync(indexPath)) {
            res.sendFile(indexPath);
            return;
        }
        res.json({
            name: APP_NAME,
            version: APP_VERSION,
            description: 'Voice-driven assistant for drafting replies to student emails in the CRM',
            endpoints: {
                health: '/health',
                metrics: '/metrics',
                voice: '/api/voice',
                browser: '/api/browser',
                email: '/api/email',
                workflow: '/api/workflow',
                knowledge: '/api/knowledge',
            },
        });
    });

    return router;
}
