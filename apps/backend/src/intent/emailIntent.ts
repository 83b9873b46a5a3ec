// Email Intent
// Deterministic keyword classification of student emails
// Used directly when no LLM is configured and as the fallback for LLM output

import type { EmailContent, EmailIntent } from '@enrollment/contracts';
import intentKeywords from './intentKeywords.json' with { type: 'json' };

/** Declaration order breaks score ties */
export const EMAIL_INTENTS: readonly EmailIntent[] = [
    'status_inquiry',
    'application_requirements',
    'deadline_question',
    'financial_aid',
    'document_submission',
    'program_information',
    'general_inquiry',
];

const KEYWORDS: Record<EmailIntent, readonly string[]> = intentKeywords;

const NO_MATCH_CONFIDENCE = 0.3;
const BASE_CONFIDENCE = 0.5;
const CONFIDENCE_PER_HIT = 0.15;
const MAX_CONFIDENCE = 0.95;

export interface IntentClassification {
    intent: EmailIntent;
    confidence: number;
    hits: number;
}

export function isEmailIntent(value: unknown): value is EmailIntent {
    return typeof value === 'string' && EMAIL_INTENTS.some((intent) => intent === value);
}

export function countKeywordHits(text: string, intent: EmailIntent): number {
    return KEYWORDS[intent].filter((keyword) => text.includes(keyword)).length;
}

export function classifyIntent(email: Pick<EmailContent, 'subject' | 'body'>): IntentClassification {
    const text = `${email.subject}\n${email.body}`.toLowerCase();

    let best: EmailIntent = 'general_inquiry';
    let bestHits = 0;
    for (const intent of EMAIL_INTENTS) {
        const hits = countKeywordHits(text, intent);
        if (hits > bestHits) {
            best = intent;
            bestHits = hits;
        }
    }

    if (bestHits === 0) {
        return { intent: 'general_inquiry', confidence: NO_MATCH_CONFIDENCE, hits: 0 };
    }

    return {
        intent: best,
        confidence: Math.min(MAX_CONFIDENCE, BASE_CONFIDENCE + CONFIDENCE_PER_HIT * bestHits),
        hits: bestHits,
    };
}
