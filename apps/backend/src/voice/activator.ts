// Voice Activator
// Listens to a stream of audio chunks for the wake word, then captures one command
//
// listening ──wake word──▶ awaiting_command ──command──▶ listening
//                               │
//                               └──window timeout──▶ listening

import type {
    ActivatorAudioResult,
    ActivatorState,
    ActivatorStatus,
    CommandDetectedEvent,
    VoiceActivationEvent,
    WakeWordDetectedEvent,
} from '@enrollment/contracts';
import type { Transcriber } from '../services/deepgram.js';
import { WakeWordMatcher } from './wakeWord.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type VoiceActivationCallback = (event: VoiceActivationEvent) => void | Promise<void>;

export interface QueuedCommand {
    command: string;
    timestamp: number;
}

export interface VoiceActivatorOptions {
    wakeWord: string;
    transcriber: Transcriber;
    /** Receives every event; without one, commands queue up for nextCommand() */
    callback?: VoiceActivationCallback;
    sampleRate?: number;
    channels?: number;
    /** How long to wait for a command after the wake word */
    commandWindowMs?: number;
    logger?: Logger;
}

const DEFAULT_COMMAND_WINDOW_MS = 8000;

export class VoiceActivator {
    readonly wakeWord: string;
    private readonly matcher: WakeWordMatcher;
    private readonly transcriber: Transcriber;
    private readonly callback?: VoiceActivationCallback;
    private readonly sampleRate: number;
    private readonly channels: number;
    private readonly commandWindowMs: number;
    private readonly logger: Logger;

    private state: ActivatorState = 'stopped';
    private readonly commandQueue: QueuedCommand[] = [];
    private commandWindowTimer: ReturnType<typeof setTimeout> | null = null;

    constructor(options: VoiceActivatorOptions) {
        this.wakeWord = options.wakeWord;
        this.matcher = new WakeWordMatcher(options.wakeWord);
        this.transcriber = options.transcriber;
        this.callback = options.callback;
        this.sampleRate = options.sampleRate ?? 16000;
        this.channels = options.channels ?? 1;
        this.commandWindowMs = options.commandWindowMs ?? DEFAULT_COMMAND_WINDOW_MS;
        this.logger = options.logger ?? createLogger('voice-activator');
    }

    get isListening(): boolean {
        return this.state !== 'stopped';
    }

    start(): { status: 'listening' | 'already_listening'; wakeWord: string } {
        if (this.isListening) {
            this.logger.warn('Already listening for voice commands');
            return { status: 'already_listening', wakeWord: this.wakeWord };
        }

        this.logger.info(`Starting to listen for wake word: '${this.wakeWord}'`);
        this.state = 'listening';
        return { status: 'listening', wakeWord: this.wakeWord };
    }

    stop(): { status: 'stopped' | 'not_listening' } {
        if (!this.isListening) {
            this.logger.warn('Not currently listening');
            return { status: 'not_listening' };
        }

        this.logger.info('Stopping voice listening');
        this.clearCommandWindow();
        this.state = 'stopped';
        return { status: 'stopped' };
    }

    /**
     * Transcribe one audio chunk and advance the activation state
     */
    async processAudio(chunk: Buffer): Promise<ActivatorAudioResult> {
        if (!this.isListening || chunk.length === 0) {
            return { type: 'none', detected: false };
        }

        const { text, confidence } = await this.transcriber.transcribe(chunk, {
            sampleRate: this.sampleRate,
            channels: this.channels,
        });

        // The activator may have been stopped while the transcription was in flight
        if (!this.isListening || text.length === 0) {
            return { type: 'none', detected: false };
        }

        if (this.state === 'awaiting_command') {
            return this.acceptCommand(text, confidence);
        }

        const match = this.matcher.match(text);
        if (!match.detected) {
            this.logger.debug('No wake word in audio chunk');
            return { type: 'none', detected: false };
        }

        const wakeConfidence = match.confidence * confidence;
        this.logger.info(`Wake word '${this.wakeWord}' detected`);
        this.openCommandWindow();
        const detected: WakeWordDetectedEvent = { event: 'wake_word_detected', transcript: text, confidence: wakeConfidence };
        await this.emit(detected);

        // "hey assistant, read the email" carries its command in the same breath
        if (match.remainder.length > 0 && this.currentState() === 'awaiting_command') {
            return this.acceptCommand(match.remainder, confidence);
        }

        return {
            type: 'wake_word',
            detected: true,
            confidence: wakeConfidence,
            wakeWord: this.wakeWord,
        };
    }

    /** Read through a method so narrowing from earlier checks does not survive awaits */
    private currentState(): ActivatorState {
        return this.state;
    }

    nextCommand(): QueuedCommand | null {
        return this.commandQueue.shift() ?? null;
    }

    getStatus(): ActivatorStatus {
        return {
            isListening: this.isListening,
            state: this.state,
            wakeWord: this.wakeWord,
            commandsQueued: this.commandQueue.length,
        };
    }

    private async acceptCommand(command: string, confidence: number): Promise<ActivatorAudioResult> {
        this.clearCommandWindow();
        this.state = 'listening';

        this.logger.info(`Command detected: ${command}`);
        if (!this.callback) {
            this.commandQueue.push({ command, timestamp: Date.now() });
        }
        const detected: CommandDetectedEvent = { event: 'command_detected', command, confidence };
        await this.emit(detected);

        return { type: 'command', detected: true, confidence, command };
    }

    private openCommandWindow(): void {
        this.clearCommandWindow();
        this.state = 'awaiting_command';
        this.commandWindowTimer = setTimeout(() => {
            this.commandWindowTimer = null;
            if (this.state === 'awaiting_command') {
                this.logger.info('No command heard, listening for wake word again');
                this.state = 'listening';
            }
        }, this.commandWindowMs);
        this.commandWindowTimer.unref();
    }

    private clearCommandWindow(): void {
        if (this.commandWindowTimer) {
            clearTimeout(this.commandWindowTimer);
            this.commandWindowTimer = null;
        }
    }

    private async emit(event: VoiceActivationEvent): Promise<void> {
        if (!this.callback) return;
        try {
            await this.callback(event);
        } catch (error) {
            this.logger.error(`Error in voice activation callback for ${event.event}`, undefined, error);
        }
    }
}
