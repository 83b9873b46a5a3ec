import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { once } from 'node:events';
import type { Server } from 'node:http';
import { createApp } from './app.js';
import { createServices, type AppServices } from './services/index.js';
import { FakeCrm, FakeLlm, FakeTranscriber, audio, testConfig } from './testing/fakes.js';

interface HttpResult {
    status: number;
    contentType: string;
    body: unknown;
    text: string;
}

describe('HTTP API', () => {
    let crm: FakeCrm;
    let llm: FakeLlm;
    let services: AppServices;
    let server: Server;
    let baseUrl: string;

    beforeEach(async () => {
        crm = new FakeCrm();
        llm = new FakeLlm();
        llm.configured = false;
        services = createServices(testConfig({ LOG_LEVEL: 'error' }), {
            driver: crm.driver(),
            transcriber: new FakeTranscriber(),
            llm,
        });

        server = createApp(services).listen(0, '127.0.0.1');
        await once(server, 'listening');
        const address = server.address();
        if (!address || typeof address === 'string') throw new Error('server has no port');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        await services.browser.closeAll();
        services.sse.closeAll();
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
    });

    async function call(method: string, path: string, body?: unknown): Promise<HttpResult> {
        const response = await fetch(`${baseUrl}${path}`, {
            method,
            headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
            body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
        });
        const contentType = response.headers.get('content-type') ?? '';
        const text = await response.text();
        return {
            status: response.status,
            contentType,
            body: contentType.includes('application/json') ? JSON.parse(text) : null,
            text,
        };
    }

    async function login(): Promise<string> {
        const { body } = await call('POST', '/api/browser/login', {});
        if (typeof body !== 'object' || body === null || !('sessionId' in body) || typeof body.sessionId !== 'string') {
            throw new Error('login failed in test setup');
        }
        return body.sessionId;
    }

    async function createWorkflowSession(): Promise<string> {
        const { body } = await call('POST', '/api/workflow/session');
        if (typeof body !== 'object' || body === null || !('sessionId' in body) || typeof body.sessionId !== 'string') {
            throw new Error('session creation failed in test setup');
        }
        return body.sessionId;
    }

    describe('system', () => {
        it('should report health', async () => {
            const { status, body } = await call('GET', '/health');

            expect(status).toBe(200);
            expect(body).toMatchObject({ status: 'healthy', service: 'enrollment-assistant', version: '0.1.0' });
        });

        it('should describe the app at the root without a bundled page', async () => {
            const { body } = await call('GET', '/');

            expect(body).toMatchObject({ name: 'enrollment-assistant', endpoints: { workflow: '/api/workflow' } });
        });

        it('should return 404 for unknown routes', async () => {
            const { status, body } = await call('GET', '/nope');

            expect(status).toBe(404);
            expect(body).toMatchObject({ ok: false, code: 'NOT_FOUND', error: 'Route not found: GET /nope' });
        });

        it('should track service calls in metrics', async () => {
            await createWorkflowSession();

            const all = await call('GET', '/metrics');
            expect(all.body).toMatchObject({
                system: { servicesCount: 4, totalRequests: 1 },
                services: { workflow: { requests: { total: 1, success: 1, error: 0 } } },
            });

            const one = await call('GET', '/metrics/workflow');
            expect(one.body).toMatchObject({ serviceName: 'workflow', requests: { successRate: '100.00%' } });

            const missing = await call('GET', '/metrics/unknown');
            expect(missing.status).toBe(404);
            expect(missing.body).toMatchObject({ error: "Service with id 'unknown' not found" });
        });
    });

    describe('request validation', () => {
        it('should reject invalid bodies with the issue list', async () => {
            const { status, body } = await call('POST', '/api/workflow/command', {});

            expect(status).toBe(400);
            expect(body).toMatchObject({
                ok: false,
                code: 'VALIDATION_ERROR',
                error: 'Invalid request body',
                context: { issues: ['command: Required'] },
            });
        });

        it('should reject malformed JSON', async () => {
            const { status, body } = await call('POST', '/api/workflow/command', '{"command":');

            expect(status).toBe(400);
            expect(body).toMatchObject({ code: 'VALIDATION_ERROR', error: 'Request body is not valid JSON' });
        });
    });

    describe('workflow', () => {
        it('should manage sessions and run commands', async () => {
            const sessionId = await createWorkflowSession();

            const command = await call('POST', '/api/workflow/command', { command: 'log in', sessionId });
            expect(command.body).toEqual({ ok: true, status: 'success', message: 'Authentication successful', sessionId });

            const session = await call('GET', `/api/workflow/session/${sessionId}`);
            expect(session.body).toMatchObject({ ok: true, session: { sessionId, currentState: 'listening', events: 4 } });

            const events = await call('GET', `/api/workflow/session/${sessionId}/events`);
            expect(events.body).toMatchObject({ ok: true, sessionId });

            const list = await call('GET', '/api/workflow/sessions');
            expect(list.body).toMatchObject({ ok: true, sessions: [{ sessionId }] });

            const ended = await call('DELETE', `/api/workflow/session/${sessionId}`);
            expect(ended.body).toEqual({ ok: true, status: 'ended', sessionId });

            expect((await call('DELETE', `/api/workflow/session/${sessionId}`)).status).toBe(404);
            expect((await call('GET', `/api/workflow/session/${sessionId}`)).status).toBe(404);
            expect((await call('GET', `/api/workflow/session/${sessionId}/events`)).status).toBe(404);
        });

        it('should return 404 for commands on an unknown session', async () => {
            const { status } = await call('POST', '/api/workflow/command', { command: 'log in', sessionId: 'missing' });

            expect(status).toBe(404);
        });

        it('should only accept draft edits while reviewing', async () => {
            const sessionId = await createWorkflowSession();

            const { status, body } = await call('PUT', `/api/workflow/session/${sessionId}/draft`, { responseText: 'Hi' });

            expect(status).toBe(409);
            expect(body).toMatchObject({ code: 'CONFLICT' });
        });

        it('should serve the draft review flow', async () => {
            crm.addMessage({ subject: 'Deadline', body: 'Is there an extension?' });
            const sessionId = await createWorkflowSession();
            await call('POST', '/api/workflow/command', { command: 'log in', sessionId });
            await call('POST', '/api/workflow/command', { command: 'read the email', sessionId });
            const generated = await call('POST', '/api/workflow/command', { command: 'generate a reply', sessionId });
            expect(generated.body).toMatchObject({ ok: true, status: 'success', message: 'Response generated' });

            const edited = await call('PUT', `/api/workflow/session/${sessionId}/draft`, { responseText: 'Edited reply' });
            expect(edited.body).toMatchObject({ ok: true, session: { currentState: 'reviewing', hasDraft: true } });

            await call('POST', '/api/workflow/command', { command: 'save as draft', sessionId });
            expect(crm.replies).toEqual([{ emailId: 'msg-1', text: 'Edited reply', action: 'save_draft' }]);
        });

        it('should stream state changes to event subscribers', async () => {
            const sessionId = await createWorkflowSession();
            const response = await fetch(`${baseUrl}/api/workflow/events?sessionId=${sessionId}`);
            expect(response.status).toBe(200);
            expect(response.headers.get('content-type')).toBe('text/event-stream');

            const reader = response.body?.getReader();
            if (!reader) throw new Error('event stream has no body');
            const decoder = new TextDecoder();
            let received = '';
            const readUntil = async (marker: string): Promise<void> => {
                while (!received.includes(marker)) {
                    const { value, done } = await reader.read();
                    if (done) throw new Error(`stream ended before ${marker}`);
                    received += decoder.decode(value, { stream: true });
                }
            };

            await readUntil('connection-established');
            await call('POST', '/api/workflow/command', { command: 'log in', sessionId });
            await readUntil('workflow.state');
            await reader.cancel();

            const frame = received.split('\n\n').find((chunk) => chunk.includes('workflow.state')) ?? '';
            expect(frame.startsWith('data: ')).toBe(true);
            expect(JSON.parse(frame.slice('data: '.length))).toMatchObject({
                type: 'workflow.state',
                sessionId,
                event: { sessionId },
            });
        });

        it('should serve the top-level aliases', async () => {
            const command = await call('POST', '/workflow/command?command=make%20coffee');
            expect(command.body).toMatchObject({ ok: true, status: 'error', message: 'Unknown command' });

            const list = await call('GET', '/workflow/sessions');
            expect(list.body).toMatchObject({ sessions: [{ currentState: 'error' }] });

            const sessionId = services.workflow.getAllSessions()[0]?.sessionId ?? '';
            expect((await call('GET', `/workflow/session/${sessionId}`)).status).toBe(200);
            expect((await call('POST', `/workflow/session/${sessionId}/end`)).body)
                .toEqual({ ok: true, status: 'ended', sessionId });
            expect((await call('POST', `/workflow/session/${sessionId}/end`)).status).toBe(404);
        });
    });

    describe('browser and email', () => {
        it('should log in with the configured credentials', async () => {
            const { status, body } = await call('POST', '/api/browser/login', {});

            expect(status).toBe(200);
            expect(body).toMatchObject({ ok: true, status: 'success', content: 'Login successful' });
        });

        it('should reject bad credentials with 401', async () => {
            const { status, body } = await call('POST', '/api/browser/login', { password: 'wrong-secret' });

            expect(status).toBe(401);
            expect(body).toMatchObject({ ok: false, status: 'error', sessionId: null });
        });

        it('should answer 502 when a browser action fails on the page', async () => {
            crm.failNavigation = true;

            const started = await call('POST', '/api/browser/session', { action: 'start', url: 'https://portal.test/' });

            expect(started.status).toBe(502);
            expect(started.body).toEqual({
                ok: false,
                sessionId: null,
                status: 'error',
                content: null,
                screenshot: null,
                error: 'start failed: net::ERR_CONNECTION_REFUSED',
            });
            expect(services.browser.activeSessions).toBe(0);
        });

        it('should keep the session when navigation fails', async () => {
            const sessionId = await login();
            crm.failNavigation = true;

            const { status, body } = await call('POST', '/api/browser/session', {
                action: 'navigate',
                url: 'https://portal.test/apply',
                sessionId,
            });

            expect(status).toBe(502);
            expect(body).toMatchObject({ ok: false, sessionId, error: 'navigate failed: net::ERR_CONNECTION_REFUSED' });
            expect(services.browser.getSessionStatus(sessionId)).toBe('active');
        });

        it('should report session status', async () => {
            const sessionId = await login();

            expect((await call('GET', `/api/browser/status/${sessionId}`)).body)
                .toEqual({ ok: true, sessionId, status: 'active' });
            expect((await call('POST', '/api/browser/navigate/inbox', { sessionId })).body)
                .toMatchObject({ ok: true, content: 'Navigated to inbox' });
            expect((await call('POST', '/api/browser/session', { action: 'end', sessionId })).body)
                .toMatchObject({ ok: true, content: 'Session ended' });
            expect((await call('GET', `/api/browser/status/${sessionId}`)).body)
                .toEqual({ ok: true, sessionId, status: 'not_found' });
        });

        it('should process, list and submit emails', async () => {
            crm.addMessage({ subject: 'Transcript', body: 'I uploaded my transcript.' });
            crm.addMessage({ subject: 'Hello', body: 'Just saying hi.' });
            const sessionId = await login();

            const processed = await call('POST', '/api/email/process', { sessionId });
            expect(processed.body).toMatchObject({
                ok: true,
                email: { emailId: 'msg-1', subject: 'Transcript' },
                intent: 'document_submission',
            });

            const listed = await call('GET', `/api/email/list?sessionId=${sessionId}&limit=1`);
            expect(listed.body).toEqual({
                ok: true,
                emails: [{ emailId: 'msg-1', subject: 'Transcript', sender: 'Jane Doe <jane@student.test>', date: '2024-03-01', read: false }],
            });

            const submitted = await call('POST', '/api/email/draft', {
                sessionId,
                emailId: 'msg-2',
                responseText: 'Hi there',
                send: true,
            });
            expect(submitted.body).toMatchObject({ ok: true, status: 'success', result: { emailId: 'msg-2', action: 'sent' } });
            expect(crm.replies).toEqual([{ emailId: 'msg-2', text: 'Hi there', action: 'send' }]);
        });

        it('should reject an out of range list limit', async () => {
            const { status } = await call('GET', '/api/email/list?sessionId=s-1&limit=99');

            expect(status).toBe(400);
        });
    });

    describe('voice', () => {
        it('should map spoken audio to a command', async () => {
            const { body } = await call('POST', '/api/voice/process', { audioData: audio('please open my inbox') });

            expect(body).toMatchObject({
                ok: true,
                command: 'inbox',
                action: 'browser_navigate',
                transcript: 'please open my inbox',
                status: 'success',
            });
        });

        it('should detect the wake word', async () => {
            const { body } = await call('POST', '/api/voice/wake-word/detect', { audioData: audio('hey assistant') });

            expect(body).toMatchObject({ ok: true, detected: true });
        });

        it('should reject audio that is not base64', async () => {
            const { status } = await call('POST', '/api/voice/process', { audioData: 'not base64!' });

            expect(status).toBe(400);
        });

        it('should return synthesized speech as mp3', async () => {
            const { status, contentType, text } = await call('POST', '/api/voice/speak', { text: 'Email sent' });

            expect(status).toBe(200);
            expect(contentType).toBe('audio/mpeg');
            expect(text).toBe('mp3:Email sent');
        });

        it('should report a stopped activator before initialization', async () => {
            const status = await call('GET', '/api/voice/activator/status');
            expect(status.body).toEqual({
                ok: true,
                isListening: false,
                state: 'stopped',
                wakeWord: 'hey assistant',
                commandsQueued: 0,
            });

            const chunk = await call('POST', '/api/voice/activator/audio', { audioData: audio('hey assistant') });
            expect(chunk.status).toBe(503);
        });

        it('should feed the running activator', async () => {
            await services.workflow.initialize();

            const { body } = await call('POST', '/api/voice/activator/audio', { audioData: audio('hey assistant') });

            expect(body).toMatchObject({ ok: true, type: 'wake_word', detected: true });
            expect(services.workflow.getAllSessions()).toHaveLength(1);
            await services.workflow.shutdown();
        });
    });

    describe('knowledge', () => {
        it('should ingest, search and delete documents', async () => {
            const created = await call('POST', '/api/knowledge/documents', {
                title: 'Aid',
                content: 'Submit the FAFSA before the priority deadline.\n\nHousing opens in August.',
            });
            expect(created.status).toBe(201);
            expect(created.body).toMatchObject({ ok: true, document: { title: 'Aid', chunkCount: 2 } });

            const [document] = await services.knowledge.listDocuments();
            const id = document?.id ?? '';

            const fetched = await call('GET', `/api/knowledge/documents/${id}`);
            expect(fetched.body).toMatchObject({ document: { id, content: 'Submit the FAFSA before the priority deadline.\n\nHousing opens in August.' } });

            const listed = await call('GET', '/api/knowledge/documents');
            expect(listed.body).toMatchObject({ ok: true, documents: [{ id }] });

            const search = await call('GET', '/api/knowledge/search?q=fafsa%20deadline');
            expect(search.body).toEqual({
                ok: true,
                query: 'fafsa deadline',
                matches: [{
                    chunkId: `chunk_${id}_0`,
                    documentId: id,
                    content: 'Submit the FAFSA before the priority deadline.',
                    similarity: 1,
                }],
            });

            expect((await call('DELETE', `/api/knowledge/documents/${id}`)).body).toEqual({ ok: true, deleted: id });
            expect((await call('GET', `/api/knowledge/documents/${id}`)).status).toBe(404);
            expect((await call('DELETE', `/api/knowledge/documents/${id}`)).status).toBe(404);
        });

        it('should require a search query', async () => {
            const { status, body } = await call('GET', '/api/knowledge/search');

            expect(status).toBe(400);
            expect(body).toMatchObject({ error: 'Invalid query' });
        });
    });
});
