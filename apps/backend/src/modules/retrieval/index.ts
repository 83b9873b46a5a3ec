// Retrieval Module
// Keyword retrieval over knowledge chunks for reply drafting
//
// Retrieval only reads knowledge chunks, it never mutates source documents

import type { KnowledgeStore } from '../knowledge/index.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('retrieval');

const STOP_WORDS = new Set([
    'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
    'of', 'with', 'is', 'are', 'was', 'were', 'been', 'be', 'have', 'has',
    'had', 'do', 'does', 'did', 'will', 'would', 'should', 'could', 'may',
    'might', 'must', 'can', 'this', 'that', 'these', 'those', 'it', 'its',
]);

export interface RetrievalResult {
    chunkId: string;
    documentId: string;
    content: string;
    similarity: number; // 0-1 score
}

export interface RetrievalOptions {
    limit?: number;
    minSimilarity?: number;
}

/**
 * Lowercased words longer than two characters, stop words removed
 */
export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/\W+/)
        .filter((word) => word.length > 2)
        .filter((word) => !STOP_WORDS.has(word));
}

/**
 * Share of query tokens that appear in the content
 */
export function keywordSimilarity(query: string, content: string): number {
    const queryWords = tokenize(query);
    if (queryWords.length === 0) return 0;

    const contentWords = new Set(tokenize(content));
    const matches = queryWords.filter((word) => contentWords.has(word)).length;
    return matches / queryWords.length;
}

export class RetrievalService {
    constructor(private readonly store: KnowledgeStore) {}

    async retrieve(query: string, options: RetrievalOptions = {}): Promise<RetrievalResult[]> {
        const limit = options.limit ?? 5;
        const minSimilarity = options.minSimilarity ?? 0.1;

        const chunks = this.store.allChunks();
        if (chunks.length === 0) {
            logger.debug('No knowledge chunks to search');
            return [];
        }

        const results = chunks
            .map((chunk) => ({
                chunkId: chunk.id,
                documentId: chunk.documentId,
                content: chunk.content,
                similarity: keywordSimilarity(query, chunk.content),
            }))
            .filter((result) => result.similarity >= minSimilarity)
            .sort((a, b) => b.similarity - a.similarity)
            .slice(0, limit);

        logger.debug(`Found ${results.length} chunks for query "${query.substring(0, 50)}"`);
        return results;
    }
}
