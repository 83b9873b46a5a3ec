// Browser Service
// CRM automation: generic page sessions plus the login, inbox and reply flows
// One page per session id; sessions live until ended or shutdown

import { randomUUID } from 'node:crypto';
import type {
    BrowserAction,
    BrowserResponse,
    BrowserSessionRequest,
    BrowserSessionStatus,
    EmailContent,
    EmailSummary,
    LoginRequest,
} from '@enrollment/contracts';
import type { BrowserDriver, CrmElement, CrmPage } from './driver.js';
import { CRM_SELECTORS, messageUrl } from './selectors.js';
import { NotFoundError, ValidationError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export { PlaywrightDriver } from './driver.js';
export type { BrowserDriver, CrmElement, CrmPage } from './driver.js';
export { CRM_SELECTORS } from './selectors.js';

const logger = createLogger('browser');

const DEFAULT_TIMEOUT_MS = 30000;
const SECURITY_PROMPT_TIMEOUT_MS = 3000;

export interface BrowserServiceOptions {
    driver: BrowserDriver;
    crmUrl: string;
    timeoutMs?: number;
}

interface BrowserSession {
    id: string;
    page: CrmPage;
}

function success(sessionId: string, extra: Partial<BrowserResponse> = {}): BrowserResponse {
    return {
        sessionId,
        status: 'success',
        content: null,
        screenshot: null,
        error: null,
        ...extra,
    };
}

function failure(sessionId: string | null, error: string): BrowserResponse {
    return {
        sessionId,
        status: 'error',
        content: null,
        screenshot: null,
        error,
    };
}

function requireArg(value: string | undefined, name: string, action: string): string {
    if (value === undefined || value.length === 0) {
        throw new ValidationError(`${name} is required for ${action} action`);
    }
    return value;
}

function clean(text: string | null): string {
    return (text ?? '').trim();
}

export class BrowserService {
    private readonly sessions = new Map<string, BrowserSession>();
    private readonly driver: BrowserDriver;
    private readonly crmUrl: string;
    private readonly timeoutMs: number;

    constructor(options: BrowserServiceOptions) {
        this.driver = options.driver;
        this.crmUrl = options.crmUrl;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    get activeSessions(): number {
        return this.sessions.size;
    }

    // ============================================
    // GENERIC SESSION ACTIONS
    // ============================================

    /**
     * Bad input and unknown sessions throw. Page failures come back as an
     * error result; a start whose first navigation fails closes its page.
     */
    async manageSession(request: BrowserSessionRequest): Promise<BrowserResponse> {
        const timeout = request.timeout ?? this.timeoutMs;

        switch (request.action) {
            case 'start':
                return this.openSession(request.url, timeout);
            case 'navigate': {
                const url = requireArg(request.url, 'url', 'navigate');
                const session = this.requireSession(request.sessionId);
                return this.attempt('navigate', session, async () => {
                    await session.page.goto(url, { timeout });
                    return success(session.id, { content: session.page.url() });
                });
            }
            case 'click': {
                const selector = requireArg(request.selector, 'selector', 'click');
                const session = this.requireSession(request.sessionId);
                return this.attempt('click', session, async () => {
                    await session.page.click(selector, { timeout });
                    return success(session.id);
                });
            }
            case 'input': {
                const selector = requireArg(request.selector, 'selector', 'input');
                const { text } = request;
                if (text === undefined) {
                    throw new ValidationError('text is required for input action');
                }
                const session = this.requireSession(request.sessionId);
                return this.attempt('input', session, async () => {
                    await session.page.fill(selector, text, { timeout });
                    return success(session.id);
                });
            }
            case 'content': {
                const session = this.requireSession(request.sessionId);
                return this.attempt('content', session, async () =>
                    success(session.id, { content: await session.page.content() })
                );
            }
            case 'screenshot': {
                const session = this.requireSession(request.sessionId);
                return this.attempt('screenshot', session, async () => {
                    const image = await session.page.screenshot();
                    return success(session.id, { screenshot: image.toString('base64') });
                });
            }
            case 'end': {
                const session = this.requireSession(request.sessionId);
                return this.attempt('end', session, async () => {
                    await this.closeSession(session.id);
                    return success(session.id, { content: 'Session ended' });
                });
            }
            default: {
                const unknown: never = request.action;
                throw new ValidationError(`Unknown browser action: ${String(unknown)}`);
            }
        }
    }

    getSessionStatus(sessionId: string): BrowserSessionStatus {
        return this.sessions.has(sessionId) ? 'active' : 'not_found';
    }

    async closeSession(sessionId: string): Promise<void> {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new NotFoundError('Browser session', sessionId);
        }
        this.sessions.delete(sessionId);
        await session.page.close();
        logger.info(`Session closed: ${sessionId}`);
    }

    async closeAll(): Promise<void> {
        const ids = [...this.sessions.keys()];
        for (const id of ids) {
            try {
                await this.closeSession(id);
            } catch (error) {
                logger.warn(`Failed to close session ${id}: ${errorMessage(error)}`);
            }
        }
        await this.driver.close();
    }

    // ============================================
    // CRM FLOWS
    // ============================================

    async loginToCrm(credentials: LoginRequest): Promise<BrowserResponse> {
        if (!credentials.username || !credentials.password) {
            throw new ValidationError('username and password are required');
        }

        const session = await this.startSession();
        const { page } = session;
        const selectors = CRM_SELECTORS.login;

        try {
            logger.info('Logging in to CRM');
            await page.goto(this.crmUrl, { timeout: this.timeoutMs });
            await page.fill(selectors.username, credentials.username, { timeout: this.timeoutMs });
            await page.fill(selectors.password, credentials.password, { timeout: this.timeoutMs });
            await page.click(selectors.submit, { timeout: this.timeoutMs });

            if (await this.securityPromptShown(page)) {
                if (!credentials.securityAnswer) {
                    throw new Error('Security question requested but no answer configured');
                }
                logger.info('Answering security question');
                await page.fill(selectors.securityAnswer, credentials.securityAnswer, { timeout: this.timeoutMs });
                await page.click(selectors.securitySubmit, { timeout: this.timeoutMs });
            }

            await page.waitFor(CRM_SELECTORS.inbox.list, { timeout: this.timeoutMs });
            logger.info(`Login successful (session ${session.id})`);
            return success(session.id, { content: 'Login successful' });
        } catch (error) {
            logger.error('Login failed', undefined, error);
            await this.discardSession(session.id);
            return failure(null, `Login failed: ${errorMessage(error)}`);
        }
    }

    async navigateToInbox(sessionId: string): Promise<BrowserResponse> {
        const session = this.requireSession(sessionId);
        await session.page.goto(this.crmUrl, { timeout: this.timeoutMs });
        await session.page.waitFor(CRM_SELECTORS.inbox.list, { timeout: this.timeoutMs });
        return success(session.id, { content: 'Navigated to inbox' });
    }

    async listInboxEmails(sessionId: string, limit: number): Promise<EmailSummary[]> {
        const session = this.requireSession(sessionId);
        await this.ensureInbox(session.page);

        const rows = await session.page.queryAll(CRM_SELECTORS.inbox.row);
        const emails: EmailSummary[] = [];
        for (const row of rows.slice(0, limit)) {
            const summary = await this.readRow(row);
            if (summary) emails.push(summary);
        }
        return emails;
    }

    /**
     * Open one email, or the first inbox row when no id is given
     */
    async readEmail(sessionId: string, emailId?: string): Promise<EmailContent> {
        const session = this.requireSession(sessionId);
        const { page } = session;

        let id = emailId;
        if (!id) {
            await this.ensureInbox(page);
            const [first] = await page.queryAll(CRM_SELECTORS.inbox.row);
            const firstId = first ? await first.attribute(CRM_SELECTORS.inbox.rowId) : null;
            if (!firstId) {
                throw new NotFoundError('Email');
            }
            id = firstId;
        }

        await this.openMessage(page, id);
        const selectors = CRM_SELECTORS.message;

        const attachments: string[] = [];
        for (const element of await page.queryAll(selectors.attachment)) {
            const name = clean(await element.text());
            if (name) attachments.push(name);
        }

        return {
            emailId: id,
            subject: clean(await page.text(selectors.subject, { timeout: this.timeoutMs })),
            sender: clean(await page.text(selectors.sender, { timeout: this.timeoutMs })),
            recipient: clean(await page.text(selectors.recipient, { timeout: this.timeoutMs })),
            date: clean(await page.text(selectors.date, { timeout: this.timeoutMs })),
            body: clean(await page.text(selectors.body, { timeout: this.timeoutMs })),
            attachments: attachments.length > 0 ? attachments : null,
        };
    }

    async submitReply(sessionId: string, emailId: string, text: string, send: boolean): Promise<void> {
        const session = this.requireSession(sessionId);
        const { page } = session;
        const selectors = CRM_SELECTORS.message;

        await this.openMessage(page, emailId);
        await page.click(selectors.replyButton, { timeout: this.timeoutMs });
        await page.fill(selectors.replyBody, text, { timeout: this.timeoutMs });
        await page.click(send ? selectors.sendButton : selectors.saveDraftButton, { timeout: this.timeoutMs });

        logger.info(`Reply to ${emailId} ${send ? 'sent' : 'saved as draft'}`);
    }

    // ============================================
    // HELPERS
    // ============================================

    private async startSession(): Promise<BrowserSession> {
        const page = await this.driver.newPage();
        const session: BrowserSession = { id: randomUUID(), page };
        this.sessions.set(session.id, session);
        logger.info(`Session started: ${session.id}`);
        return session;
    }

    private async openSession(url: string | undefined, timeout: number): Promise<BrowserResponse> {
        let session: BrowserSession;
        try {
            session = await this.startSession();
        } catch (error) {
            return this.failed('start', null, error);
        }
        if (!url) {
            return success(session.id);
        }

        try {
            await session.page.goto(url, { timeout });
            return success(session.id);
        } catch (error) {
            await this.discardSession(session.id);
            return this.failed('start', null, error);
        }
    }

    private async attempt(
        action: BrowserAction,
        session: BrowserSession,
        run: () => Promise<BrowserResponse>
    ): Promise<BrowserResponse> {
        try {
            return await run();
        } catch (error) {
            return this.failed(action, session.id, error);
        }
    }

    private failed(action: BrowserAction, sessionId: string | null, error: unknown): BrowserResponse {
        const message = errorMessage(error);
        logger.warn(`Browser ${action} failed: ${message}`);
        return failure(sessionId, `${action} failed: ${message}`);
    }

    private async discardSession(sessionId: string): Promise<void> {
        await this.closeSession(sessionId).catch((closeError: unknown) => {
            logger.warn(`Failed to close session ${sessionId}: ${errorMessage(closeError)}`);
        });
    }

    private requireSession(sessionId: string | undefined): BrowserSession {
        if (!sessionId) {
            throw new ValidationError('sessionId is required');
        }
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new NotFoundError('Browser session', sessionId);
        }
        return session;
    }

    private async securityPromptShown(page: CrmPage): Promise<boolean> {
        try {
            await page.waitFor(CRM_SELECTORS.login.securityQuestion, { timeout: SECURITY_PROMPT_TIMEOUT_MS });
            return true;
        } catch {
            // No prompt within the window means the CRM skipped the question
            return page.isVisible(CRM_SELECTORS.login.securityQuestion);
        }
    }

    private async ensureInbox(page: CrmPage): Promise<void> {
        if (!(await page.isVisible(CRM_SELECTORS.inbox.list))) {
            await page.goto(this.crmUrl, { timeout: this.timeoutMs });
        }
        await page.waitFor(CRM_SELECTORS.inbox.list, { timeout: this.timeoutMs });
    }

    private async openMessage(page: CrmPage, emailId: string): Promise<void> {
        await page.goto(messageUrl(this.crmUrl, emailId), { timeout: this.timeoutMs });
        await page.waitFor(CRM_SELECTORS.message.view, { timeout: this.timeoutMs });
    }

    private async readRow(row: CrmElement): Promise<EmailSummary | null> {
        const selectors = CRM_SELECTORS.inbox;
        const emailId = await row.attribute(selectors.rowId);
        if (!emailId) return null;

        const className = (await row.attribute('class')) ?? '';
        return {
            emailId,
            subject: clean(await row.text(selectors.rowSubject)),
            sender: clean(await row.text(selectors.rowSender)),
            date: clean(await row.text(selectors.rowDate)),
            read: !className.split(/\s+/).includes(selectors.rowUnreadClass),
        };
    }
}
