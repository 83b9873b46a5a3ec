// Deepgram Service
// Wrapper for the Deepgram prerecorded transcription API
// Short voice clips: one channel, one transcript
// NO secrets in logs

import { ExternalServiceError, ServiceUnavailableError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

const DEEPGRAM_API_URL = 'https://api.deepgram.com/v1/listen';

const logger = createLogger('deepgram');

export interface DeepgramWord {
    word: string;
    start: number;
    end: number;
    confidence: number;
}

export interface DeepgramChannel {
    alternatives?: Array<{
        transcript?: string;
        confidence?: number;
        words?: DeepgramWord[];
    }>;
}

/** Response body of /v1/listen; every level may be missing from an unexpected body */
export interface DeepgramResult {
    results?: {
        channels?: DeepgramChannel[];
    };
    metadata?: {
        request_id: string;
        duration: number;
        channels: number;
    };
}

export interface TranscribeOptions {
    sampleRate: number;
    channels: number;
}

export interface Transcription {
    text: string;
    confidence: number;
}

/**
 * Speech-to-text backend used by the voice service and the activator
 */
export interface Transcriber {
    readonly name: string;
    isConfigured(): boolean;
    transcribe(audio: Buffer, options: TranscribeOptions): Promise<Transcription>;
}

/**
 * WAV files carry their own format header; anything else is sent as raw linear16
 */
export function isWavAudio(audio: Buffer): boolean {
    return audio.length >= 12 &&
        audio.toString('ascii', 0, 4) === 'RIFF' &&
        audio.toString('ascii', 8, 12) === 'WAVE';
}

export function buildListenUrl(audio: Buffer, options: TranscribeOptions): string {
    const url = new URL(DEEPGRAM_API_URL);
    url.searchParams.set('model', 'nova-2');
    url.searchParams.set('punctuate', 'true');
    url.searchParams.set('smart_format', 'true');

    if (!isWavAudio(audio)) {
        url.searchParams.set('encoding', 'linear16');
        url.searchParams.set('sample_rate', String(options.sampleRate));
        url.searchParams.set('channels', String(options.channels));
    }

    return url.toString();
}

/**
 * First alternative of the first channel; an empty transcript when Deepgram heard nothing
 */
export function extractTranscription(result: DeepgramResult): Transcription {
    const alternative = result.results?.channels?.[0]?.alternatives?.[0];
    if (typeof alternative?.transcript !== 'string') {
        return { text: '', confidence: 0 };
    }
    return {
        text: alternative.transcript.trim(),
        confidence: alternative.confidence ?? 0,
    };
}

export class DeepgramTranscriber implements Transcriber {
    readonly name = 'deepgram';

    constructor(
        private readonly apiKey: string,
        private readonly fetchImpl: typeof fetch = fetch,
        private readonly retryDelayMs: number = 500
    ) {}

    isConfigured(): boolean {
        return Boolean(this.apiKey);
    }

    async transcribe(audio: Buffer, options: TranscribeOptions): Promise<Transcription> {
        if (!this.apiKey) {
            throw new ServiceUnavailableError('deepgram', 'Deepgram API key not configured');
        }

        logger.debug(`Transcribing ${audio.byteLength} bytes`);

        const url = buildListenUrl(audio, options);
        const contentType = isWavAudio(audio) ? 'audio/wav' : 'application/octet-stream';

        const result = await withRetry(async () => {
            const response = await this.fetchImpl(url, {
                method: 'POST',
                headers: {
                    'Authorization': `Token ${this.apiKey}`,
                    'Content-Type': contentType,
                },
                body: audio,
            });

            if (!response.ok) {
                logger.error(`Transcription failed: ${response.status}`);
                throw new ExternalServiceError('deepgram', `Deepgram transcription failed: ${response.status}`, response.status);
            }

            return (await response.json()) as DeepgramResult;
        }, {
            label: 'deepgram transcription',
            maxAttempts: 3,
            initialDelayMs: this.retryDelayMs,
            maxDelayMs: 4000,
        });

        const transcription = extractTranscription(result);
        logger.debug(`Transcription complete (${transcription.text.length} chars, confidence ${transcription.confidence})`);
        return transcription;
    }
}
