// Knowledge Module
// Handles knowledge ingestion and storage for reply drafting
// NOTE: This module OWNS knowledge data writes
// In-memory implementation, optionally seeded from a JSON file at startup

import { createHash, randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { NotFoundError, ValidationError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('knowledge');

const MIN_CHUNK_LENGTH = 10;

export type KnowledgeSourceType = 'manual' | 'upload' | 'seed';

export interface KnowledgeChunk {
    id: string;
    documentId: string;
    chunkIndex: number;
    content: string;
    contentHash: string;
}

export interface KnowledgeDocument {
    id: string;
    title: string;
    description?: string;
    sourceType: KnowledgeSourceType;
    content: string;
    chunks: KnowledgeChunk[];
    createdAt: number;
    updatedAt: number;
}

export interface IngestDocumentParams {
    title: string;
    content: string;
    description?: string;
    sourceType?: KnowledgeSourceType;
}

/**
 * Split content on blank lines; paragraphs under ten characters are dropped
 * but still consume an index so chunk ids stay stable per paragraph
 */
export function chunkContent(content: string, documentId: string): KnowledgeChunk[] {
    const paragraphs = content.split(/\n\s*\n+/).filter((p) => p.trim().length > 0);
    const chunks: KnowledgeChunk[] = [];

    paragraphs.forEach((paragraph, index) => {
        const text = paragraph.trim();
        if (text.length < MIN_CHUNK_LENGTH) return;

        chunks.push({
            id: `chunk_${documentId}_${index}`,
            documentId,
            chunkIndex: index,
            content: text,
            contentHash: createHash('sha256').update(text).digest('hex').slice(0, 16),
        });
    });

    return chunks;
}

export class KnowledgeStore {
    private readonly documents = new Map<string, KnowledgeDocument>();
    private readonly order = new Map<string, number>();
    private sequence = 0;

    constructor(private readonly clock: () => number = Date.now) {}

    async ingestDocument(params: IngestDocumentParams): Promise<KnowledgeDocument> {
        if (!params.title.trim()) {
            throw new ValidationError('title must not be empty');
        }
        if (!params.content.trim()) {
            throw new ValidationError('content must not be empty');
        }

        const id = `doc_${randomUUID()}`;
        const now = this.clock();
        const document: KnowledgeDocument = {
            id,
            title: params.title.trim(),
            description: params.description,
            sourceType: params.sourceType ?? 'manual',
            content: params.content,
            chunks: chunkContent(params.content, id),
            createdAt: now,
            updatedAt: now,
        };

        this.documents.set(id, document);
        this.order.set(id, this.sequence++);
        logger.info(`Ingested document "${document.title}" with ${document.chunks.length} chunks`);

        return document;
    }

    async getDocument(documentId: string): Promise<KnowledgeDocument | null> {
        return this.documents.get(documentId) ?? null;
    }

    /** Newest first */
    async listDocuments(): Promise<KnowledgeDocument[]> {
        return [...this.documents.values()].sort((a, b) =>
            b.createdAt - a.createdAt || (this.order.get(b.id) ?? 0) - (this.order.get(a.id) ?? 0)
        );
    }

    async deleteDocument(documentId: string): Promise<void> {
        if (!this.documents.delete(documentId)) {
            throw new NotFoundError('Knowledge document', documentId);
        }
        this.order.delete(documentId);
        logger.info(`Deleted document ${documentId}`);
    }

    allChunks(): KnowledgeChunk[] {
        const chunks: KnowledgeChunk[] = [];
        for (const document of this.documents.values()) {
            chunks.push(...document.chunks);
        }
        return chunks;
    }
}

// ============================================
// SEEDING
// ============================================

const seedSchema = z.array(z.object({
    title: z.string().min(1),
    content: z.string().min(1),
    description: z.string().optional(),
}));

/**
 * Load a JSON array of { title, content } documents into the store
 * @returns number of documents ingested
 */
export async function seedKnowledge(store: KnowledgeStore, path: string): Promise<number> {
    let raw: unknown;
    try {
        raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
        throw new ValidationError(`Could not read knowledge seed file: ${errorMessage(error)}`, { path });
    }

    const parsed = seedSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ValidationError('Knowledge seed file is malformed', {
            path,
            issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
    }

    for (const entry of parsed.data) {
        await store.ingestDocument({ ...entry, sourceType: 'seed' });
    }
    logger.info(`Seeded ${parsed.data.length} knowledge documents from ${path}`);
    return parsed.data.length;
}
