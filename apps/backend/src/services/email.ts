// Email Service
// Read an email from the CRM, classify it, draft a reply, and submit reviewed replies
// Processed emails are cached by id for the rest of the process lifetime

import type {
    EmailContent,
    EmailSummary,
    ProcessEmailRequest,
    ProcessEmailResponse,
    SubmitDraftRequest,
    SubmitDraftResult,
} from '@enrollment/contracts';
import type { BrowserService } from './browser/index.js';
import type { ResponseDrafter } from '../ai/drafting/drafter.js';
import type { DraftResult } from '../ai/drafting/types.js';
import type { RetrievalService } from '../modules/retrieval/index.js';
import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('email');

const KNOWLEDGE_LIMIT = 3;
const MAX_LIST_LIMIT = 50;

export interface EmailServiceOptions {
    browser: BrowserService;
    drafter: ResponseDrafter;
    retrieval: RetrievalService;
    clock?: () => Date;
}

export class EmailService {
    private readonly cache = new Map<string, EmailContent>();
    private readonly clock: () => Date;

    constructor(private readonly options: EmailServiceOptions) {
        this.clock = options.clock ?? (() => new Date());
    }

    async processEmail(request: ProcessEmailRequest): Promise<ProcessEmailResponse> {
        logger.info(`Processing email for session ${request.sessionId}`);
        const email = await this.readEmail(request.sessionId, request.emailId);
        const draft = await this.draftReply(email);
        logger.info(`Email ${email.emailId} classified as ${draft.intent} (${draft.source})`);

        return {
            email,
            suggestedResponse: draft.response,
            intent: draft.intent,
            confidence: draft.confidence,
        };
    }

    /**
     * Open an email in the CRM (the first inbox row without an id) and cache it
     */
    async readEmail(sessionId: string, emailId?: string): Promise<EmailContent> {
        const email = await this.options.browser.readEmail(sessionId, emailId);
        this.cache.set(email.emailId, email);
        return email;
    }

    async draftReply(email: EmailContent): Promise<DraftResult> {
        const knowledge = await this.options.retrieval.retrieve(`${email.subject} ${email.body}`, {
            limit: KNOWLEDGE_LIMIT,
        });
        return this.options.drafter.draft(email, knowledge);
    }

    async submitDraft(request: SubmitDraftRequest): Promise<SubmitDraftResult> {
        if (request.responseText.trim().length === 0) {
            throw new ValidationError('responseText must not be empty');
        }

        const send = request.send ?? false;
        await this.options.browser.submitReply(request.sessionId, request.emailId, request.responseText, send);

        return {
            emailId: request.emailId,
            status: 'success',
            action: send ? 'sent' : 'saved as draft',
            timestamp: this.clock().toISOString(),
        };
    }

    async listEmails(args: { sessionId: string; limit?: number }): Promise<EmailSummary[]> {
        const limit = args.limit ?? 10;
        if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
            throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`);
        }
        return this.options.browser.listInboxEmails(args.sessionId, limit);
    }

    getCachedEmail(emailId: string): EmailContent | null {
        return this.cache.get(emailId) ?? null;
    }
}
