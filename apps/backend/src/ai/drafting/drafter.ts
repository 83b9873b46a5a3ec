// Response Drafter
// LLM reply drafting with a deterministic template fallback
// Every failure path degrades to the template; drafting never throws

import type { EmailContent, EmailIntent } from '@enrollment/contracts';
import type { LlmJsonClient } from '../../services/openai.js';
import type { DraftResult, KnowledgeSnippet } from './types.js';
import { buildDraftPrompt } from './prompt.js';
import { classifyIntent, isEmailIntent } from '../../intent/emailIntent.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import templates from './templates.json' with { type: 'json' };

const logger = createLogger('drafter');

const MAX_OUTPUT_TOKENS = 1024;

const INTENT_TEMPLATES: Record<EmailIntent, string> = templates.intents;

function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

/**
 * Name to greet: the display name's first word, else the address's local part
 * "Jane Doe <jane@uni.edu>" -> "Jane", "jane.doe@uni.edu" -> "Jane"
 */
export function greetingName(sender: string): string {
    const display = sender.replace(/<[^>]*>/g, '').replace(/["']/g, '').trim();
    const source = display.includes('@') || display.length === 0
        ? (sender.match(/([^<\s@]+)@/)?.[1] ?? '').split(/[._+-]/)[0] ?? ''
        : display.split(/\s+/)[0] ?? '';

    if (!source) return 'Student';
    return source.charAt(0).toUpperCase() + source.slice(1).toLowerCase();
}

export function templateReply(
    email: EmailContent,
    intent: EmailIntent,
    knowledge: readonly KnowledgeSnippet[]
): string {
    const parts = [`Dear ${greetingName(email.sender)},`, INTENT_TEMPLATES[intent]];

    const [top] = knowledge;
    if (top) {
        parts.push(`${templates.knowledgeLead}\n${top.content}`);
    }

    parts.push(templates.closing, templates.signature);
    return parts.join('\n\n');
}

export interface ResponseDrafterOptions {
    llm?: LlmJsonClient;
    model?: string;
}

export class ResponseDrafter {
    constructor(private readonly options: ResponseDrafterOptions = {}) {}

    async draft(email: EmailContent, knowledge: readonly KnowledgeSnippet[] = []): Promise<DraftResult> {
        const keyword = classifyIntent(email);
        const fallback = (): DraftResult => ({
            intent: keyword.intent,
            confidence: keyword.confidence,
            response: templateReply(email, keyword.intent, knowledge),
            source: 'template',
        });

        const { llm } = this.options;
        if (!llm || !llm.isConfigured()) {
            return fallback();
        }

        let raw: unknown;
        try {
            const { system, user } = buildDraftPrompt(email, knowledge, keyword.intent);
            raw = await llm.completeJson({
                system,
                user,
                model: this.options.model,
                maxOutputTokens: MAX_OUTPUT_TOKENS,
            });
        } catch (error) {
            logger.warn(`LLM drafting failed, using template: ${errorMessage(error)}`);
            return fallback();
        }

        if (typeof raw !== 'object' || raw === null) {
            logger.warn('LLM returned a non-object draft, using template');
            return fallback();
        }

        const obj = raw as Record<string, unknown>;
        const response = typeof obj.response === 'string' ? obj.response.trim() : '';
        if (response.length === 0) {
            logger.warn('LLM returned an empty draft, using template');
            return fallback();
        }

        return {
            intent: isEmailIntent(obj.intent) ? obj.intent : keyword.intent,
            confidence: typeof obj.confidence === 'number' && Number.isFinite(obj.confidence)
                ? clamp(obj.confidence, 0, 1)
                : keyword.confidence,
            response,
            source: 'llm',
        };
    }
}
