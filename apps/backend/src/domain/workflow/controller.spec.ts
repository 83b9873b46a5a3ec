import { describe, it, expect, beforeEach } from 'vitest';
import type { WorkflowEvent } from '@enrollment/contracts';
import { WorkflowController } from './controller.js';
import { BrowserService } from '../../services/browser/index.js';
import { EmailService } from '../../services/email.js';
import { ResponseDrafter } from '../../ai/drafting/drafter.js';
import { KnowledgeStore } from '../../modules/knowledge/index.js';
import { RetrievalService } from '../../modules/retrieval/index.js';
import { CRM_URL, FakeCrm, FakeTranscriber } from '../../testing/fakes.js';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors.js';

describe('WorkflowController', () => {
    let crm: FakeCrm;
    let transcriber: FakeTranscriber;
    let events: WorkflowEvent[];

    function createController(options: { password?: string; voice?: boolean } = {}): WorkflowController {
        const browser = new BrowserService({ driver: crm.driver(), crmUrl: CRM_URL, timeoutMs: 50 });
        const email = new EmailService({
            browser,
            drafter: new ResponseDrafter(),
            retrieval: new RetrievalService(new KnowledgeStore()),
        });
        const controller = new WorkflowController({
            browser,
            email,
            credentials: { username: 'counselor', password: options.password ?? 'test-secret', securityAnswer: '' },
            voice: { enabled: options.voice ?? false, wakeWord: 'hey assistant', transcriber },
        });
        controller.registerEventListener((event) => {
            events.push(event);
        });
        return controller;
    }

    beforeEach(() => {
        crm = new FakeCrm();
        transcriber = new FakeTranscriber();
        events = [];
    });

    it('should run a full review workflow', async () => {
        crm.addMessage({ subject: 'FAFSA help', body: 'Where do I find the FAFSA form?' });
        const controller = createController();

        const login = await controller.processCommand('log in');
        const sessionId = login.sessionId;
        expect(login).toEqual({ status: 'success', message: 'Authentication successful', sessionId });

        expect((await controller.processCommand('open inbox', sessionId)).message).toBe('Navigation successful');

        const read = await controller.processCommand('read the email', sessionId);
        expect(read.message).toBe('Email read successfully');
        expect(read.email?.subject).toBe('FAFSA help');

        const generated = await controller.processCommand('generate a reply', sessionId);
        expect(generated.status).toBe('success');
        expect(generated.draftResponse?.startsWith('Dear Jane,\n\nThank you for reaching out about financial aid.')).toBe(true);
        expect(controller.getSession(sessionId)).toMatchObject({ currentState: 'reviewing', hasDraft: true, currentEmailId: 'msg-1' });

        await controller.updateDraft(sessionId, 'Dear Jane, the form is on the portal.');

        const submitted = await controller.processCommand('send it', sessionId);
        expect(submitted).toEqual({ status: 'success', message: 'Response sent successfully', sessionId });
        expect(crm.replies).toEqual([{ emailId: 'msg-1', text: 'Dear Jane, the form is on the portal.', action: 'send' }]);
        expect(controller.getSession(sessionId)).toMatchObject({ currentState: 'listening', hasDraft: false, currentEmailId: null });

        expect(events.map((e) => e.state)).toEqual([
            'listening',
            'processing_command', 'authenticating', 'listening',
            'processing_command', 'navigating', 'listening',
            'processing_command', 'reading_email', 'listening',
            'processing_command', 'generating_response', 'reviewing',
            'reviewing',
            'processing_command', 'submitting', 'listening',
        ]);
        expect(controller.getSessionEvents(sessionId)).toEqual(events);
    });

    it('should save a draft instead of sending', async () => {
        crm.addMessage();
        const controller = createController();
        const { sessionId } = await controller.processCommand('log in');
        await controller.processCommand('read the email', sessionId);
        await controller.processCommand('generate a reply', sessionId);

        const saved = await controller.processCommand('save as draft', sessionId);

        expect(saved.message).toBe('Response saved as draft successfully');
        expect(crm.replies[0]?.action).toBe('save_draft');
        expect(events.at(-2)?.message).toBe('Submitting response as draft');
    });

    it('should refuse CRM commands before login', async () => {
        const controller = createController();
        const { sessionId } = await controller.createSession();

        const inbox = await controller.processCommand('open inbox', sessionId);
        expect(inbox).toEqual({ status: 'error', message: 'Not authenticated', sessionId });
        expect(events.at(-1)).toMatchObject({ state: 'error', message: 'Cannot navigate to inbox: Not authenticated' });

        expect((await controller.processCommand('read the email', sessionId)).message).toBe('Not authenticated');
        expect((await controller.processCommand('generate a reply', sessionId)).message).toBe('No email selected');
        expect((await controller.processCommand('send it', sessionId)).message).toBe('No email selected');
        expect(events.at(-1)?.message).toBe('Cannot submit response: No email selected');
    });

    it('should refuse to submit without a draft', async () => {
        crm.addMessage();
        const controller = createController();
        const { sessionId } = await controller.processCommand('log in');
        await controller.processCommand('read the email', sessionId);

        const result = await controller.processCommand('send it', sessionId);

        expect(result.message).toBe('No draft response created');
        expect(crm.replies).toEqual([]);
    });

    it('should report a failed login', async () => {
        const controller = createController({ password: 'wrong-secret' });

        const result = await controller.processCommand('log in');

        expect(result.status).toBe('error');
        expect(result.message).toBe('Authentication failed');
        expect(events.at(-1)?.state).toBe('error');
        expect(events.at(-1)?.message?.startsWith('Authentication failed: Login failed: Timeout')).toBe(true);
    });

    it('should report an error when reading an empty inbox', async () => {
        const controller = createController();
        const { sessionId } = await controller.processCommand('log in');

        const result = await controller.processCommand('read the email', sessionId);

        expect(result).toEqual({ status: 'error', message: 'Email not found', sessionId });
        expect(events.at(-1)?.message).toBe('Error reading email: Email not found');
    });

    it('should reject unknown commands', async () => {
        const controller = createController();
        const { sessionId } = await controller.createSession();

        const result = await controller.processCommand('make coffee', sessionId);

        expect(result).toEqual({ status: 'error', message: 'Unknown command', sessionId });
        expect(events.at(-1)?.message).toBe('Unknown command: make coffee');
    });

    it('should reject an unknown session id', async () => {
        const controller = createController();

        await expect(controller.processCommand('log in', 'missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reuse the active session for commands without an id', async () => {
        const controller = createController();
        const { sessionId } = await controller.createSession();

        const result = await controller.processCommand('make coffee');

        expect(result.sessionId).toBe(sessionId);
        expect(controller.getAllSessions()).toHaveLength(1);
    });

    describe('updateDraft', () => {
        it('should only edit drafts under review', async () => {
            const controller = createController();
            const { sessionId } = await controller.createSession();

            await expect(controller.updateDraft('missing', 'text')).rejects.toBeInstanceOf(NotFoundError);
            await expect(controller.updateDraft(sessionId, 'text')).rejects.toBeInstanceOf(ConflictError);
        });

        it('should reject an empty draft', async () => {
            crm.addMessage();
            const controller = createController();
            const { sessionId } = await controller.processCommand('log in');
            await controller.processCommand('read the email', sessionId);
            await controller.processCommand('generate a reply', sessionId);

            await expect(controller.updateDraft(sessionId, '   ')).rejects.toBeInstanceOf(ValidationError);
        });
    });

    describe('sessions', () => {
        it('should end a session and close its browser page', async () => {
            const controller = createController();
            const { sessionId } = await controller.processCommand('log in');

            const ended = await controller.processCommand('goodbye', sessionId);

            expect(ended).toEqual({ status: 'ended', message: 'Session ended', sessionId });
            expect(controller.getSession(sessionId)).toBeNull();
            expect(controller.getSessionEvents(sessionId)).toBeNull();
            expect(crm.pages[0]?.closed).toBe(true);
            expect(events.at(-1)).toMatchObject({ state: 'idle', message: 'Session ended' });
        });

        it('should report ending an unknown session', async () => {
            const controller = createController();

            expect(await controller.endSession('missing')).toEqual({ status: 'error', message: 'Session not found' });
        });

        it('should end every session on shutdown', async () => {
            const controller = createController();
            await controller.createSession();
            await controller.createSession();

            await controller.shutdown();

            expect(controller.getAllSessions()).toEqual([]);
        });
    });

    describe('event listeners', () => {
        it('should stop notifying after unsubscribe', async () => {
            const controller = createController();
            const seen: string[] = [];
            const unsubscribe = controller.registerEventListener((event) => {
                seen.push(event.state);
            });

            await controller.createSession();
            unsubscribe();
            await controller.createSession();

            expect(seen).toEqual(['listening']);
            expect(events).toHaveLength(2);
        });

        it('should keep going when a listener throws', async () => {
            const controller = createController();
            controller.registerEventListener(() => {
                throw new Error('listener broke');
            });

            const { sessionId } = await controller.createSession();

            expect(controller.getSession(sessionId)?.currentState).toBe('listening');
        });
    });

    describe('voice activation', () => {
        it('should not start an activator when voice is disabled', async () => {
            const controller = createController();

            expect(await controller.initialize()).toEqual({ status: 'initialized', voice: false });
            expect(controller.activator).toBeNull();
        });

        it('should open a session on the wake word and run the next command', async () => {
            const controller = createController({ voice: true });
            expect(await controller.initialize()).toEqual({ status: 'initialized', voice: true });
            const activator = controller.activator;
            if (!activator) throw new Error('activator not started');

            const wake = await activator.processAudio(Buffer.from('hey assistant'));
            expect(wake.type).toBe('wake_word');
            const [session] = controller.getAllSessions();
            expect(session?.currentState).toBe('listening');

            const command = await activator.processAudio(Buffer.from('log in'));
            expect(command.type).toBe('command');
            expect(controller.getSession(session?.sessionId ?? '')?.browserSessionId).not.toBeNull();

            await controller.shutdown();
            expect(activator.isListening).toBe(false);
        });
    });
});
