// Configuration
// Settings read from the environment (.env is loaded by the entry point)
// NO secrets in logs

import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import type { LogLevel } from '../utils/logger.js';

export class ConfigError extends AppError {
    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`, 500, 'CONFIG_ERROR', false, { issues });
    }
}

const booleanFromEnv = (fallback: boolean) =>
    z
        .string()
        .optional()
        .transform((value, ctx) => {
            if (value === undefined || value.trim() === '') return fallback;
            const normalized = value.trim().toLowerCase();
            if (['true', '1', 'yes'].includes(normalized)) return true;
            if (['false', '0', 'no'].includes(normalized)) return false;
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
            return z.NEVER;
        });

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const listFromEnv = (fallback: string[]) =>
    z
        .string()
        .optional()
        .transform((value) => {
            if (!value || value.trim() === '') return fallback;
            return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
        });

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    HOST: z.string().default('0.0.0.0'),
    CORS_ORIGINS: listFromEnv(['http://localhost:8000', 'http://localhost:3000']),
    LOG_LEVEL: z
        .string()
        .default('info')
        .transform((value) => value.toLowerCase())
        .pipe(z.enum(['debug', 'info', 'warn', 'error'])),

    CRM_URL: z.string().url().default('https://crm.example.edu/manage/inbox/'),
    CRM_USERNAME: z.string().default(''),
    CRM_PASSWORD: z.string().default(''),
    CRM_SECURITY_ANSWER: z.string().default(''),

    WAKE_WORD: z.string().trim().min(1).default('hey assistant'),
    VOICE_ENABLED: booleanFromEnv(true),
    DEEPGRAM_API_KEY: z.string().default(''),

    BROWSER_HEADLESS: booleanFromEnv(false),
    BROWSER_TYPE: z.enum(['chromium', 'firefox', 'webkit']).default('chromium'),
    BROWSER_EXECUTABLE_PATH: optionalString,
    BROWSER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

    OPENAI_API_KEY: z.string().default(''),
    LLM_MODEL: z.string().default('gpt-4o'),
    TTS_MODEL: z.string().default('tts-1'),
    TTS_VOICE: z.string().default('alloy'),

    MONITOR_INTERVAL_MS: z.coerce.number().int().positive().default(300000),
    STATIC_DIR: z.string().default('static'),
    KNOWLEDGE_SEED_PATH: optionalString,
});

export interface AppConfig {
    readonly server: {
        readonly port: number;
        readonly host: string;
        readonly corsOrigins: readonly string[];
        readonly staticDir: string;
    };
    readonly logLevel: LogLevel;
    readonly crm: {
        readonly url: string;
        readonly username: string;
        readonly password: string;
        readonly securityAnswer: string;
    };
    readonly voice: {
        readonly enabled: boolean;
        readonly wakeWord: string;
        readonly deepgramApiKey: string;
    };
    readonly browser: {
        readonly headless: boolean;
        readonly type: 'chromium' | 'firefox' | 'webkit';
        readonly executablePath?: string;
        readonly timeoutMs: number;
    };
    readonly llm: {
        readonly apiKey: string;
        readonly model: string;
        readonly ttsModel: string;
        readonly ttsVoice: string;
    };
    readonly monitorIntervalMs: number;
    readonly knowledgeSeedPath?: string;
}

/**
 * Validate the environment and build the application config
 * Throws ConfigError listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(issues);
    }

    const e = parsed.data;

    return Object.freeze({
        server: {
            port: e.PORT,
            host: e.HOST,
            corsOrigins: e.CORS_ORIGINS,
            staticDir: e.STATIC_DIR,
        },
        logLevel: e.LOG_LEVEL,
        crm: {
            url: e.CRM_URL,
            username: e.CRM_USERNAME,
            password: e.CRM_PASSWORD,
            securityAnswer: e.CRM_SECURITY_ANSWER,
        },
        voice: {
            enabled: e.VOICE_ENABLED,
            wakeWord: e.WAKE_WORD,
            deepgramApiKey: e.DEEPGRAM_API_KEY,
        },
        browser: {
            headless: e.BROWSER_HEADLESS,
            type: e.BROWSER_TYPE,
            executablePath: e.BROWSER_EXECUTABLE_PATH,
            timeoutMs: e.BROWSER_TIMEOUT_MS,
        },
        llm: {
            apiKey: e.OPENAI_API_KEY,
            model: e.LLM_MODEL,
            ttsModel: e.TTS_MODEL,
            ttsVoice: e.TTS_VOICE,
        },
        monitorIntervalMs: e.MONITOR_INTERVAL_MS,
        knowledgeSeedPath: e.KNOWLEDGE_SEED_PATH,
    });
}
