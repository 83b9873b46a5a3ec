// Reply Drafting Types
// Drafts are suggestions only: nothing leaves the system before a counselor reviews it

import type { EmailIntent } from '@enrollment/contracts';

export type DraftSource = 'llm' | 'template';

export interface DraftResult {
    readonly intent: EmailIntent;
    readonly confidence: number;
    readonly response: string;
    readonly source: DraftSource;
}

/** A knowledge snippet offered to the drafter as reference material */
export interface KnowledgeSnippet {
    readonly content: string;
    readonly similarity: number;
}
