// Voice Service
// Spoken commands and wake-word checks from base64 audio, plus speech synthesis

import type {
    VoiceCommandResponse,
    VoiceServiceStatus,
    WakeWordResponse,
} from '@enrollment/contracts';
import type { Transcriber } from './deepgram.js';
import type { SpeechSynthesizer } from './openai.js';
import { parseCommand } from '../intent/commandParser.js';
import { WakeWordMatcher } from '../voice/wakeWord.js';
import { ServiceUnavailableError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('voice');

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const MAX_SPEECH_CHARS = 4096;

export interface VoiceServiceOptions {
    enabled: boolean;
    wakeWord: string;
    transcriber: Transcriber;
    synthesizer: SpeechSynthesizer;
}

export interface AudioInput {
    audioData: string;
    sampleRate?: number;
    channels?: number;
}

/**
 * Decode base64 audio; rejects empty or malformed payloads
 */
export function decodeAudio(audioData: string): Buffer {
    const compact = audioData.replace(/\s+/g, '');
    if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
        throw new ValidationError('audioData must be non-empty base64');
    }
    return Buffer.from(compact, 'base64');
}

export class VoiceService {
    private readonly matcher: WakeWordMatcher;

    constructor(private readonly options: VoiceServiceOptions) {
        this.matcher = new WakeWordMatcher(options.wakeWord);
    }

    async processCommand(input: AudioInput): Promise<VoiceCommandResponse> {
        this.requireEnabled();
        const audio = decodeAudio(input.audioData);

        logger.info('Processing voice command');
        const transcription = await this.options.transcriber.transcribe(audio, {
            sampleRate: input.sampleRate ?? 16000,
            channels: input.channels ?? 1,
        });

        const parsed = parseCommand(transcription.text);
        const detected = parsed.command !== 'unknown';

        return {
            command: parsed.command,
            transcript: transcription.text,
            confidence: transcription.confidence * parsed.confidence,
            action: parsed.action,
            status: detected ? 'success' : 'no_command',
            message: detected ? 'Command detected successfully' : 'No known command in audio',
        };
    }

    async detectWakeWord(input: AudioInput): Promise<WakeWordResponse> {
        this.requireEnabled();
        const audio = decodeAudio(input.audioData);

        const transcription = await this.options.transcriber.transcribe(audio, {
            sampleRate: input.sampleRate ?? 16000,
            channels: input.channels ?? 1,
        });

        const match = this.matcher.match(transcription.text);
        logger.debug(`Wake word check: ${match.detected ? 'detected' : 'not detected'}`);

        return {
            detected: match.detected,
            confidence: match.detected ? match.confidence * transcription.confidence : 0,
        };
    }

    async synthesize(text: string): Promise<Buffer> {
        const trimmed = text.trim();
        if (trimmed.length === 0) {
            throw new ValidationError('text must not be empty');
        }
        if (trimmed.length > MAX_SPEECH_CHARS) {
            throw new ValidationError(`text must be at most ${MAX_SPEECH_CHARS} characters`);
        }
        return this.options.synthesizer.synthesize(trimmed);
    }

    getStatus(): VoiceServiceStatus {
        if (!this.options.enabled) return 'disabled';
        if (!this.options.transcriber.isConfigured()) return 'degraded';
        return 'running';
    }

    private requireEnabled(): void {
        if (!this.options.enabled) {
            throw new ServiceUnavailableError('voice', 'Voice processing is disabled');
        }
    }
}
