// Workflow Controller
// Orchestrates a counselor session end to end:
// voice command -> CRM login -> inbox -> read email -> draft -> human review -> submit
//
// Command handlers never throw; failures become an `error` event and an error result

import { randomUUID } from 'node:crypto';
import type {
    CommandResult,
    CreateSessionResponse,
    EndSessionResponse,
    SessionSummary,
    VoiceActivationEvent,
    WorkflowEvent,
    WorkflowState,
} from '@enrollment/contracts';
import type { BrowserService } from '../../services/browser/index.js';
import type { EmailService } from '../../services/email.js';
import type { Transcriber } from '../../services/deepgram.js';
import { WorkflowSession, type Clock } from './session.js';
import { parseCommand } from '../../intent/commandParser.js';
import { VoiceActivator } from '../../voice/activator.js';
import { ConflictError, NotFoundError, ValidationError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('workflow');

export type WorkflowEventListener = (event: WorkflowEvent) => void | Promise<void>;

export type WorkflowBrowser = Pick<BrowserService, 'loginToCrm' | 'navigateToInbox' | 'manageSession'>;
export type WorkflowEmail = Pick<EmailService, 'readEmail' | 'draftReply' | 'submitDraft' | 'getCachedEmail'>;

export interface WorkflowControllerOptions {
    browser: WorkflowBrowser;
    email: WorkflowEmail;
    credentials: {
        username: string;
        password: string;
        securityAnswer: string;
    };
    voice: {
        enabled: boolean;
        wakeWord: string;
        transcriber: Transcriber;
    };
    clock?: Clock;
}

export class WorkflowController {
    private readonly sessions = new Map<string, WorkflowSession>();
    private readonly listeners: WorkflowEventListener[] = [];
    private readonly clock: Clock;
    private voiceActivator: VoiceActivator | null = null;

    constructor(private readonly options: WorkflowControllerOptions) {
        this.clock = options.clock ?? (() => new Date());
    }

    get activator(): VoiceActivator | null {
        return this.voiceActivator;
    }

    async initialize(): Promise<{ status: 'initialized'; voice: boolean }> {
        logger.info('Initializing workflow controller');

        const { voice } = this.options;
        if (voice.enabled && !this.voiceActivator) {
            this.voiceActivator = new VoiceActivator({
                wakeWord: voice.wakeWord,
                transcriber: voice.transcriber,
                callback: (event) => this.handleVoiceEvent(event),
                logger: logger.child('voice'),
            });
            this.voiceActivator.start();
        }

        logger.info('Workflow controller initialized');
        return { status: 'initialized', voice: this.voiceActivator !== null };
    }

    // ============================================
    // SESSIONS
    // ============================================

    async createSession(): Promise<CreateSessionResponse> {
        const session = new WorkflowSession(randomUUID(), this.clock);
        this.sessions.set(session.sessionId, session);
        logger.info(`Created workflow session ${session.sessionId}`);

        await this.emit(session, 'listening', 'Session created, listening for commands');
        return { sessionId: session.sessionId, status: 'created' };
    }

    async endSession(sessionId: string): Promise<EndSessionResponse> {
        const session = this.sessions.get(sessionId);
        if (!session) {
            logger.warn(`Attempted to end unknown session ${sessionId}`);
            return { status: 'error', message: 'Session not found' };
        }

        if (session.browserSessionId) {
            try {
                await this.options.browser.manageSession({ action: 'end', sessionId: session.browserSessionId });
            } catch (error) {
                logger.error('Error closing browser session', { sessionId }, error);
            }
        }

        await this.emit(session, 'idle', 'Session ended');
        this.sessions.delete(sessionId);
        logger.info(`Ended workflow session ${sessionId}`);

        return { status: 'ended', sessionId };
    }

    getSession(sessionId: string): SessionSummary | null {
        return this.sessions.get(sessionId)?.summary() ?? null;
    }

    getAllSessions(): SessionSummary[] {
        return [...this.sessions.values()].map((session) => session.summary());
    }

    getSessionEvents(sessionId: string): WorkflowEvent[] | null {
        const session = this.sessions.get(sessionId);
        return session ? [...session.events] : null;
    }

    /**
     * Reviewer edit of the pending draft before it is submitted
     */
    async updateDraft(sessionId: string, responseText: string): Promise<SessionSummary> {
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new NotFoundError('Workflow session', sessionId);
        }
        if (session.currentState !== 'reviewing') {
            throw new ConflictError(`Session is ${session.currentState}, drafts can only be edited while reviewing`);
        }
        if (responseText.trim().length === 0) {
            throw new ValidationError('responseText must not be empty');
        }

        session.draftResponse = responseText;
        await this.emit(session, 'reviewing', 'Draft updated by reviewer', { draftResponse: responseText });
        return session.summary();
    }

    // ============================================
    // COMMANDS
    // ============================================

    async processCommand(command: string, sessionId?: string): Promise<CommandResult> {
        let session: WorkflowSession;
        if (sessionId) {
            const found = this.sessions.get(sessionId);
            if (!found) {
                throw new NotFoundError('Workflow session', sessionId);
            }
            session = found;
        } else {
            session = this.getActiveSession() ?? (await this.createSessionInternal());
        }

        return this.runCommand(session, command);
    }

    private async runCommand(session: WorkflowSession, command: string): Promise<CommandResult> {
        logger.info(`Processing command for session ${session.sessionId}: ${command}`);
        await this.emit(session, 'processing_command', `Processing command: ${command}`, { command });

        const parsed = parseCommand(command);
        try {
            switch (parsed.command) {
                case 'login':
                    return await this.handleLogin(session);
                case 'inbox':
                    return await this.handleInbox(session);
                case 'read_email':
                    return await this.handleReadEmail(session);
                case 'generate_response':
                    return await this.handleGenerateResponse(session);
                case 'submit':
                    return await this.handleSubmit(session, true);
                case 'save_draft':
                    return await this.handleSubmit(session, false);
                case 'end_session': {
                    await this.endSession(session.sessionId);
                    return { status: 'ended', message: 'Session ended', sessionId: session.sessionId };
                }
                case 'unknown':
                    logger.warn(`Unknown command: ${command}`);
                    await this.emit(session, 'error', `Unknown command: ${command}`);
                    return { status: 'error', message: 'Unknown command', sessionId: session.sessionId };
            }
        } catch (error) {
            return this.fail(session, 'Error processing command', error);
        }
    }

    private async handleLogin(session: WorkflowSession): Promise<CommandResult> {
        await this.emit(session, 'authenticating', 'Authenticating to CRM');

        try {
            const { credentials } = this.options;
            const result = await this.options.browser.loginToCrm({
                username: credentials.username,
                password: credentials.password,
                securityAnswer: credentials.securityAnswer || undefined,
            });

            if (result.status !== 'success' || !result.sessionId) {
                await this.emit(session, 'error', `Authentication failed: ${result.error ?? 'unknown error'}`);
                return { status: 'error', message: 'Authentication failed', sessionId: session.sessionId };
            }

            session.browserSessionId = result.sessionId;
            await this.emit(session, 'listening', 'Authentication successful, listening for next command');
            return { status: 'success', message: 'Authentication successful', sessionId: session.sessionId };
        } catch (error) {
            return this.fail(session, 'Error during authentication', error);
        }
    }

    private async handleInbox(session: WorkflowSession): Promise<CommandResult> {
        const browserSessionId = await this.requireBrowser(session, 'Cannot navigate to inbox');
        if (!browserSessionId) {
            return { status: 'error', message: 'Not authenticated', sessionId: session.sessionId };
        }

        await this.emit(session, 'navigating', 'Navigating to inbox');
        try {
            const result = await this.options.browser.navigateToInbox(browserSessionId);
            if (result.status !== 'success') {
                await this.emit(session, 'error', `Navigation failed: ${result.error ?? 'unknown error'}`);
                return { status: 'error', message: 'Navigation failed', sessionId: session.sessionId };
            }

            await this.emit(session, 'listening', 'Navigation successful, listening for next command');
            return { status: 'success', message: 'Navigation successful', sessionId: session.sessionId };
        } catch (error) {
            return this.fail(session, 'Error during navigation', error);
        }
    }

    private async handleReadEmail(session: WorkflowSession): Promise<CommandResult> {
        const browserSessionId = await this.requireBrowser(session, 'Cannot read email');
        if (!browserSessionId) {
            return { status: 'error', message: 'Not authenticated', sessionId: session.sessionId };
        }

        await this.emit(session, 'reading_email', 'Reading email');
        try {
            const email = await this.options.email.readEmail(browserSessionId);
            session.currentEmailId = email.emailId;
            session.currentEmail = email;
            session.draftResponse = null;

            await this.emit(session, 'listening', `Email read: ${email.subject}`, { email });
            return { status: 'success', message: 'Email read successfully', sessionId: session.sessionId, email };
        } catch (error) {
            return this.fail(session, 'Error reading email', error);
        }
    }

    private async handleGenerateResponse(session: WorkflowSession): Promise<CommandResult> {
        const emailId = session.currentEmailId;
        if (!emailId) {
            logger.warn('Cannot generate response: No email selected');
            await this.emit(session, 'error', 'Cannot generate response: No email selected');
            return { status: 'error', message: 'No email selected', sessionId: session.sessionId };
        }

        await this.emit(session, 'generating_response', 'Generating email response');
        try {
            let email = session.currentEmail ?? this.options.email.getCachedEmail(emailId);
            if (!email) {
                const browserSessionId = session.browserSessionId;
                if (!browserSessionId) {
                    throw new ValidationError('Not authenticated');
                }
                email = await this.options.email.readEmail(browserSessionId, emailId);
            }

            const draft = await this.options.email.draftReply(email);
            session.draftResponse = draft.response;

            await this.emit(session, 'reviewing', 'Response generated, ready for review', {
                draftResponse: draft.response,
                intent: draft.intent,
                confidence: draft.confidence,
            });
            return {
                status: 'success',
                message: 'Response generated',
                sessionId: session.sessionId,
                draftResponse: draft.response,
            };
        } catch (error) {
            return this.fail(session, 'Error generating response', error);
        }
    }

    private async handleSubmit(session: WorkflowSession, send: boolean): Promise<CommandResult> {
        const emailId = session.currentEmailId;
        if (!emailId) {
            logger.warn('Cannot submit response: No email selected');
            await this.emit(session, 'error', 'Cannot submit response: No email selected');
            return { status: 'error', message: 'No email selected', sessionId: session.sessionId };
        }

        const draft = session.draftResponse;
        if (!draft) {
            logger.warn('Cannot submit response: No draft response created');
            await this.emit(session, 'error', 'Cannot submit response: No draft response created');
            return { status: 'error', message: 'No draft response created', sessionId: session.sessionId };
        }

        await this.emit(session, 'submitting', `Submitting response as ${send ? 'email' : 'draft'}`);
        try {
            const browserSessionId = session.browserSessionId;
            if (!browserSessionId) {
                throw new ValidationError('Not authenticated');
            }

            const result = await this.options.email.submitDraft({
                emailId,
                sessionId: browserSessionId,
                responseText: draft,
                send,
            });

            const message = `Response ${result.action} successfully`;
            await this.emit(session, 'listening', message);
            session.clearEmail();
            return { status: 'success', message, sessionId: session.sessionId };
        } catch (error) {
            return this.fail(session, 'Error submitting response', error);
        }
    }

    // ============================================
    // EVENTS
    // ============================================

    registerEventListener(listener: WorkflowEventListener): () => void {
        this.listeners.push(listener);
        logger.info(`Registered event listener, total: ${this.listeners.length}`);

        return () => {
            const index = this.listeners.indexOf(listener);
            if (index !== -1) {
                this.listeners.splice(index, 1);
            }
        };
    }

    async shutdown(): Promise<void> {
        this.voiceActivator?.stop();
        for (const sessionId of [...this.sessions.keys()]) {
            await this.endSession(sessionId);
        }
        logger.info('Workflow controller shut down');
    }

    // ============================================
    // HELPERS
    // ============================================

    /** Most recently started session that is not idle */
    getActiveSession(): WorkflowSession | null {
        let active: WorkflowSession | null = null;
        for (const session of this.sessions.values()) {
            if (session.currentState === 'idle') continue;
            if (!active || session.startTime.getTime() >= active.startTime.getTime()) {
                active = session;
            }
        }
        return active;
    }

    private async createSessionInternal(): Promise<WorkflowSession> {
        const { sessionId } = await this.createSession();
        const session = this.sessions.get(sessionId);
        if (!session) {
            throw new NotFoundError('Workflow session', sessionId);
        }
        return session;
    }

    private async handleVoiceEvent(event: VoiceActivationEvent): Promise<void> {
        logger.info(`Received voice event: ${event.event}`);

        if (event.event === 'wake_word_detected') {
            await this.createSession();
            return;
        }

        const session = this.getActiveSession();
        if (!session) {
            logger.warn('Received command but no active session exists');
            return;
        }
        await this.runCommand(session, event.command);
    }

    private async requireBrowser(session: WorkflowSession, action: string): Promise<string | null> {
        if (session.browserSessionId) return session.browserSessionId;

        logger.warn(`${action}: Not authenticated`);
        await this.emit(session, 'error', `${action}: Not authenticated`);
        return null;
    }

    private async fail(session: WorkflowSession, prefix: string, error: unknown): Promise<CommandResult> {
        const message = errorMessage(error);
        logger.error(prefix, { sessionId: session.sessionId }, error);
        await this.emit(session, 'error', `${prefix}: ${message}`);
        return { status: 'error', message, sessionId: session.sessionId };
    }

    private async emit(
        session: WorkflowSession,
        state: WorkflowState,
        message: string,
        data: Record<string, unknown> | null = null
    ): Promise<void> {
        const event = session.addEvent(state, message, data);
        for (const listener of [...this.listeners]) {
            try {
                await listener(event);
            } catch (error) {
                logger.error('Error in event listener', undefined, error);
            }
        }
    }
}
