// Service Container
// Builds every service from config and wires them together
// External backends (browser, speech, LLM) can be swapped for in-process fakes

import type { AppConfig } from '../config/index.js';
import { BrowserService, PlaywrightDriver, type BrowserDriver } from './browser/index.js';
import { DeepgramTranscriber, type Transcriber } from './deepgram.js';
import { EmailService } from './email.js';
import { CORE_SERVICES, ServiceMonitor, monitored, type Clock } from './monitoring.js';
import { OpenAIClient, type LlmJsonClient, type SpeechSynthesizer } from './openai.js';
import { VoiceService } from './voice.js';
import { ResponseDrafter } from '../ai/drafting/drafter.js';
import { WorkflowSSEManager } from '../api/workflowSSE.js';
import { WorkflowController } from '../domain/workflow/controller.js';
import { KnowledgeStore } from '../modules/knowledge/index.js';
import { RetrievalService } from '../modules/retrieval/index.js';

export type MonitoredService = (typeof CORE_SERVICES)[number];

export interface ServiceOverrides {
    driver?: BrowserDriver;
    transcriber?: Transcriber;
    llm?: LlmJsonClient & SpeechSynthesizer;
    clock?: Clock;
}

export interface AppServices {
    readonly config: AppConfig;
    readonly monitor: ServiceMonitor;
    readonly voice: VoiceService;
    readonly browser: BrowserService;
    readonly knowledge: KnowledgeStore;
    readonly retrieval: RetrievalService;
    readonly email: EmailService;
    readonly workflow: WorkflowController;
    readonly sse: WorkflowSSEManager;
    /** Run one service call and record its outcome and duration */
    track<T>(service: MonitoredService, fn: () => Promise<T>): Promise<T>;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): AppServices {
    const clock = overrides.clock ?? (() => new Date());

    const monitor = new ServiceMonitor(clock);
    for (const name of CORE_SERVICES) {
        monitor.registerService(name);
    }

    const transcriber = overrides.transcriber ?? new DeepgramTranscriber(config.voice.deepgramApiKey);
    const llm = overrides.llm ?? new OpenAIClient({
        apiKey: config.llm.apiKey,
        model: config.llm.model,
        ttsModel: config.llm.ttsModel,
        ttsVoice: config.llm.ttsVoice,
    });
    const driver = overrides.driver ?? new PlaywrightDriver({
        browserType: config.browser.type,
        headless: config.browser.headless,
        executablePath: config.browser.executablePath,
    });

    const voice = new VoiceService({
        enabled: config.voice.enabled,
        wakeWord: config.voice.wakeWord,
        transcriber,
        synthesizer: llm,
    });

    const browser = new BrowserService({
        driver,
        crmUrl: config.crm.url,
        timeoutMs: config.browser.timeoutMs,
    });

    const knowledge = new KnowledgeStore(() => clock().getTime());
    const retrieval = new RetrievalService(knowledge);

    const email = new EmailService({
        browser,
        drafter: new ResponseDrafter({ llm, model: config.llm.model }),
        retrieval,
        clock,
    });

    const workflow = new WorkflowController({
        browser,
        email,
        credentials: {
            username: config.crm.username,
            password: config.crm.password,
            securityAnswer: config.crm.securityAnswer,
        },
        voice: {
            enabled: config.voice.enabled,
            wakeWord: config.voice.wakeWord,
            transcriber,
        },
        clock,
    });

    const sse = new WorkflowSSEManager();
    workflow.registerEventListener((event) => sse.broadcast(event));

    return {
        config,
        monitor,
        voice,
        browser,
        knowledge,
        retrieval,
        email,
        workflow,
        sse,
        track: <T>(service: MonitoredService, fn: () => Promise<T>) => monitored(monitor, service, fn)(),
    };
}
