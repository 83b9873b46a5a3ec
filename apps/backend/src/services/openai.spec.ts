import { describe, it, expect, vi } from 'vitest';
import { OpenAIClient } from './openai.js';
import { ExternalServiceError, ServiceUnavailableError } from '../utils/errors.js';

function completion(content: string | null): Response {
    return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

function client(fetchImpl: typeof fetch, apiKey = 'test-openai-key'): OpenAIClient {
    return new OpenAIClient({
        apiKey,
        model: 'gpt-4o',
        ttsModel: 'tts-1',
        ttsVoice: 'alloy',
        fetchImpl,
        retryDelayMs: 1,
    });
}

describe('OpenAIClient', () => {
    it('should refuse calls without an API key', async () => {
        const openai = client(vi.fn(), '');
        expect(openai.isConfigured()).toBe(false);
        await expect(openai.completeJson({ system: 's', user: 'u' })).rejects.toBeInstanceOf(ServiceUnavailableError);
    });

    it('should request JSON mode and parse the reply', async () => {
        const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
            completion('{"intent":"financial_aid","confidence":0.8,"response":"Hi"}')
        );

        const result = await client(fetchMock).completeJson({ system: 'sys', user: 'usr', maxOutputTokens: 50 });

        expect(result).toEqual({ intent: 'financial_aid', confidence: 0.8, response: 'Hi' });
        const [input, init] = fetchMock.mock.calls[0] ?? [];
        expect(String(input)).toBe('https://api.openai.com/v1/chat/completions');
        const body: unknown = JSON.parse(String(init?.body));
        expect(body).toEqual({
            model: 'gpt-4o',
            messages: [
                { role: 'system', content: 'sys' },
                { role: 'user', content: 'usr' },
            ],
            response_format: { type: 'json_object' },
            temperature: 0.3,
            max_tokens: 50,
        });
    });

    it('should retry server errors', async () => {
        const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => completion('{}'));
        fetchMock.mockResolvedValueOnce(new Response('overloaded', { status: 503 }));

        await expect(client(fetchMock).completeJson({ system: 's', user: 'u' })).resolves.toEqual({});
        expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should not retry a rejected API key', async () => {
        const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
            new Response('unauthorized', { status: 401 })
        );

        const error = await client(fetchMock).completeJson({ system: 's', user: 'u' }).catch((caught: unknown) => caught);

        expect(error instanceof ExternalServiceError ? error.upstreamStatus : undefined).toBe(401);
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should reject empty content', async () => {
        const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => completion(null));

        await expect(client(fetchMock).completeJson({ system: 's', user: 'u' }))
            .rejects.toThrow('Empty response from OpenAI');
    });

    it('should reject content that is not JSON', async () => {
        const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => completion('not json'));

        await expect(client(fetchMock).completeJson({ system: 's', user: 'u' }))
            .rejects.toBeInstanceOf(ExternalServiceError);
        // the provider answered, so there is no status to retry on
        expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should synthesize speech into a buffer', async () => {
        const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
            new Response('mp3-bytes', { status: 200 })
        );

        const audio = await client(fetchMock).synthesize('Email read');

        expect(audio.toString()).toBe('mp3-bytes');
        const [input, init] = fetchMock.mock.calls[0] ?? [];
        expect(String(input)).toBe('https://api.openai.com/v1/audio/speech');
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'tts-1',
            voice: 'alloy',
            input: 'Email read',
            response_format: 'mp3',
        });
    });
});
