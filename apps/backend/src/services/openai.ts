// OpenAI Service
// Chat completions (JSON mode) for reply drafting and speech synthesis for spoken feedback
// Every call goes through retry logic
// NO secrets in logs

import { ExternalServiceError, ServiceUnavailableError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

const OPENAI_API_URL = 'https://api.openai.com/v1';

const logger = createLogger('openai');

export interface LlmJsonClient {
    isConfigured(): boolean;
    completeJson(args: {
        system: string;
        user: string;
        model?: string;
        maxOutputTokens?: number;
    }): Promise<unknown>;
}

export interface SpeechSynthesizer {
    isConfigured(): boolean;
    synthesize(text: string): Promise<Buffer>;
}

export interface OpenAIClientOptions {
    apiKey: string;
    model: string;
    ttsModel: string;
    ttsVoice: string;
    fetchImpl?: typeof fetch;
    retryDelayMs?: number;
}

interface ChatCompletionResult {
    choices?: Array<{ message?: { content?: string | null } }>;
}

export class OpenAIClient implements LlmJsonClient, SpeechSynthesizer {
    private readonly fetchImpl: typeof fetch;
    private readonly retryDelayMs: number;

    constructor(private readonly options: OpenAIClientOptions) {
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.retryDelayMs = options.retryDelayMs ?? 1000;
    }

    isConfigured(): boolean {
        return Boolean(this.options.apiKey);
    }

    async completeJson(args: {
        system: string;
        user: string;
        model?: string;
        maxOutputTokens?: number;
    }): Promise<unknown> {
        this.requireKey();

        const model = args.model ?? this.options.model;
        const maxTokens = args.maxOutputTokens ?? 1024;

        return withRetry(async () => {
            const response = await this.fetchImpl(`${OPENAI_API_URL}/chat/completions`, {
                method: 'POST',
                headers: this.headers(),
                body: JSON.stringify({
                    model,
                    messages: [
                        { role: 'system', content: args.system },
                        { role: 'user', content: args.user },
                    ],
                    response_format: { type: 'json_object' },
                    temperature: 0.3,
                    max_tokens: maxTokens,
                }),
            });

            if (!response.ok) {
                const errorText = await response.text();
                logger.error(`Request failed: ${response.status} ${errorText.slice(0, 200)}`);
                throw new ExternalServiceError('openai', `OpenAI request failed: ${response.status}`, response.status);
            }

            const result = (await response.json()) as ChatCompletionResult;
            const content = result.choices?.[0]?.message?.content;
            if (!content) {
                throw new ExternalServiceError('openai', 'Empty response from OpenAI');
            }

            try {
                return JSON.parse(content) as unknown;
            } catch (error) {
                throw new ExternalServiceError('openai', `Invalid JSON from OpenAI: ${errorMessage(error)}`);
            }
        }, {
            label: 'openai completion',
            maxAttempts: 3,
            initialDelayMs: this.retryDelayMs,
            maxDelayMs: 10000,
        });
    }

    async synthesize(text: string): Promise<Buffer> {
        this.requireKey();

        return withRetry(async () => {
            const response = await this.fetchImpl(`${OPENAI_API_URL}/audio/speech`, {
                method: 'POST',
                headers: this.headers(),
                body: JSON.stringify({
                    model: this.options.ttsModel,
                    voice: this.options.ttsVoice,
                    input: text,
                    response_format: 'mp3',
                }),
            });

            if (!response.ok) {
                logger.error(`Speech synthesis failed: ${response.status}`);
                throw new ExternalServiceError('openai', `Speech synthesis failed: ${response.status}`, response.status);
            }

            return Buffer.from(await response.arrayBuffer());
        }, {
            label: 'openai speech',
            maxAttempts: 3,
            initialDelayMs: this.retryDelayMs,
            maxDelayMs: 10000,
        });
    }

    private requireKey(): void {
        if (!this.options.apiKey) {
            throw new ServiceUnavailableError('openai', 'OpenAI API key not configured');
        }
    }

    private headers(): Record<string, string> {
        return {
            'Authorization': `Bearer ${this.options.apiKey}`,
            'Content-Type': 'application/json',
        };
    }
}
