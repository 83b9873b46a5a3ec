// Knowledge Routes
// Knowledge documents used as reference material for reply drafts

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { IngestKnowledgeRequest, KnowledgeDocumentDTO, KnowledgeMatchDTO } from '@enrollment/contracts';
import type { AppServices } from '../../services/index.js';
import type { KnowledgeDocument } from '../../modules/knowledge/index.js';
import { NotFoundError } from '../../utils/errors.js';
import { validate } from '../../platform/validation/index.js';
import { asyncHandler } from '../middleware.js';

const ingestSchema = z.object({
    title: z.string().trim().min(1),
    content: z.string().trim().min(1),
    description: z.string().optional(),
}) satisfies z.ZodType<IngestKnowledgeRequest>;

const searchSchema = z.object({
    q: z.string().trim().min(1),
    limit: z.coerce.number().int().min(1).max(20).default(5),
});

function toDTO(document: KnowledgeDocument): KnowledgeDocumentDTO {
    return {
        id: document.id,
        title: document.title,
        description: document.description,
        chunkCount: document.chunks.length,
        createdAt: new Date(document.createdAt).toISOString(),
        updatedAt: new Date(document.updatedAt).toISOString(),
    };
}

export function createKnowledgeRouter(services: AppServices): Router {
    const router = Router();
    const { knowledge, retrieval } = services;

    router.get('/documents', asyncHandler(async (_req: Request, res: Response) => {
        const documents = await knowledge.listDocuments();
        res.json({ ok: true, documents: documents.map(toDTO) });
    }));

    /**
     * POST /api/knowledge/documents
     * Ingest a new knowledge document
     */
    router.post('/documents', asyncHandler(async (req: Request, res: Response) => {
        const body = validate(ingestSchema, req.body);
        const document = await knowledge.ingestDocument(body);
        res.status(201).json({ ok: true, document: toDTO(document) });
    }));

    router.get('/documents/:documentId', asyncHandler(async (req: Request, res: Response) => {
        const { documentId } = req.params;
        const document = await knowledge.getDocument(documentId);
        if (!document) {
            throw new NotFoundError('Knowledge document', documentId);
        }
        res.json({ ok: true, document: { ...toDTO(document), content: document.content } });
    }));

    router.delete('/documents/:documentId', asyncHandler(async (req: Request, res: Response) => {
        const { documentId } = req.params;
        await knowledge.deleteDocument(documentId);
        res.json({ ok: true, deleted: documentId });
    }));

    /**
     * GET /api/knowledge/search?q=&limit=
     * Keyword retrieval over knowledge chunks
     */
    router.get('/search', asyncHandler(async (req: Request, res: Response) => {
        const { q, limit } = validate(searchSchema, req.query, 'query');
        const results = await retrieval.retrieve(q, { limit });
        const matches: KnowledgeMatchDTO[] = results.map((result) => ({
            chunkId: result.chunkId,
            documentId: result.documentId,
            content: result.content,
            similarity: result.similarity,
        }));
        res.json({ ok: true, query: q, matches });
    }));

    return router;
}
