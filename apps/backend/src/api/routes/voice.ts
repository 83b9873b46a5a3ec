// Voice Routes
// Spoken commands, wake-word checks, speech output and the streaming activator

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ActivatorStatus, VoiceCommandRequest } from '@enrollment/contracts';
import type { AppServices } from '../../services/index.js';
import { decodeAudio } from '../../services/voice.js';
import { ServiceUnavailableError } from '../../utils/errors.js';
import { validate } from '../../platform/validation/index.js';
import { asyncHandler } from '../middleware.js';

const audioSchema = z.object({
    audioData: z.string().min(1),
    sampleRate: z.number().int().positive().max(192000).optional(),
    channels: z.number().int().min(1).max(8).optional(),
}) satisfies z.ZodType<VoiceCommandRequest>;

const speakSchema = z.object({
    text: z.string().min(1),
});

export function createVoiceRouter(services: AppServices): Router {
    const router = Router();
    const { voice, workflow } = services;

    /**
     * POST /api/voice/process
     * Transcribe audio and map it to a workflow command
     */
    router.post('/process', asyncHandler(async (req: Request, res: Response) => {
        const body = validate(audioSchema, req.body);
        const result = await services.track('voice', () => voice.processCommand(body));
        res.json({ ok: true, ...result });
    }));

    router.get('/status', (_req: Request, res: Response) => {
        res.json({ ok: true, status: voice.getStatus() });
    });

    router.post('/wake-word/detect', asyncHandler(async (req: Request, res: Response) => {
        const body = validate(audioSchema, req.body);
        const result = await services.track('voice', () => voice.detectWakeWord(body));
        res.json({ ok: true, ...result });
    }));

    /**
     * POST /api/voice/speak
     * Synthesize spoken feedback, returned as MP3
     */
    router.post('/speak', asyncHandler(async (req: Request, res: Response) => {
        const { text } = validate(speakSchema, req.body);
        const audio = await services.track('voice', () => voice.synthesize(text));
        res.type('audio/mpeg').send(audio);
    }));

    /**
     * POST /api/voice/activator/audio
     * Feed one audio chunk to the wake-word activator
     */
    router.post('/activator/audio', asyncHandler(async (req: Request, res: Response) => {
        const { audioData } = validate(audioSchema, req.body);
        const activator = workflow.activator;
        if (!activator) {
            throw new ServiceUnavailableError('voice', 'Voice activator is not running');
        }

        const chunk = decodeAudio(audioData);
        const result = await services.track('voice', () => activator.processAudio(chunk));
        res.json({ ok: true, ...result });
    }));

    router.get('/activator/status', (_req: Request, res: Response) => {
        const status: ActivatorStatus = workflow.activator?.getStatus() ?? {
            isListening: false,
            state: 'stopped',
            wakeWord: services.config.voice.wakeWord,
            commandsQueued: 0,
        };
        res.json({ ok: true, ...status });
    });

    return router;
}
