// Express Application
// Middleware, routers and error handling, without binding a port

import express, { type Express } from 'express';
import cors from 'cors';
import { resolve } from 'node:path';
import type { AppServices } from './services/index.js';
import { createBrowserRouter } from './api/routes/browser.js';
import { createEmailRouter } from './api/routes/email.js';
import { createKnowledgeRouter } from './api/routes/knowledge.js';
import { createSystemRouter } from './api/routes/system.js';
import { createVoiceRouter } from './api/routes/voice.js';
import { createWorkflowAliasRouter, createWorkflowRouter } from './api/routes/workflow.js';
import { globalErrorHandler, notFoundHandler, requestLogger } from './api/middleware.js';

// Base64 audio uploads are large
const JSON_BODY_LIMIT = '25mb';

export function createApp(services: AppServices): Express {
    const app = express();
    const { server } = services.config;

    app.use(cors({
        origin: [...server.corsOrigins],
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'X-Request-Id'],
        credentials: true,
        optionsSuccessStatus: 200, // Some legacy browsers choke on 204
    }));

    app.use(requestLogger);
    app.use(express.json({ limit: JSON_BODY_LIMIT }));

    app.use('/static', express.static(resolve(server.staticDir)));
    app.use('/', createSystemRouter(services));

    app.use('/api/voice', createVoiceRouter(services));
    app.use('/api/browser', createBrowserRouter(services));
    app.use('/api/email', createEmailRouter(services));
    app.use('/api/workflow', createWorkflowRouter(services));
    app.use('/api/knowledge', createKnowledgeRouter(services));
    app.use('/workflow', createWorkflowAliasRouter(services));

    app.use(notFoundHandler);
    app.use(globalErrorHandler);

    return app;
}
