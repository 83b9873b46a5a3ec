import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from './index.js';

describe('loadConfig', () => {
    it('should apply defaults to an empty environment', () => {
        const config = loadConfig({});

        expect(config.server.port).toBe(8000);
        expect(config.server.host).toBe('0.0.0.0');
        expect(config.server.corsOrigins).toEqual(['http://localhost:8000', 'http://localhost:3000']);
        expect(config.logLevel).toBe('info');
        expect(config.crm.url).toBe('https://crm.example.edu/manage/inbox/');
        expect(config.voice).toEqual({ enabled: true, wakeWord: 'hey assistant', deepgramApiKey: '' });
        expect(config.browser.headless).toBe(false);
        expect(config.browser.type).toBe('chromium');
        expect(config.browser.timeoutMs).toBe(30000);
        expect(config.llm.model).toBe('gpt-4o');
        expect(config.monitorIntervalMs).toBe(300000);
        expect(config.knowledgeSeedPath).toBeUndefined();
    });

    it('should parse numbers, booleans and lists', () => {
        const config = loadConfig({
            PORT: '9100',
            VOICE_ENABLED: 'no',
            BROWSER_HEADLESS: 'TRUE',
            CORS_ORIGINS: 'http://a.test, http://b.test,',
            LOG_LEVEL: 'DEBUG',
            BROWSER_EXECUTABLE_PATH: '  ',
        });

        expect(config.server.port).toBe(9100);
        expect(config.voice.enabled).toBe(false);
        expect(config.browser.headless).toBe(true);
        expect(config.server.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
        expect(config.logLevel).toBe('debug');
        expect(config.browser.executablePath).toBeUndefined();
    });

    it('should return a frozen object', () => {
        expect(Object.isFrozen(loadConfig({}))).toBe(true);
    });

    it('should report every invalid key', () => {
        let caught: unknown;
        try {
            loadConfig({ PORT: 'abc', BROWSER_TYPE: 'netscape', VOICE_ENABLED: 'maybe' });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigError);
        const message = caught instanceof ConfigError ? caught.message : '';
        expect(message.startsWith('Invalid configuration: ')).toBe(true);
        expect(message).toContain('PORT');
        expect(message).toContain('BROWSER_TYPE');
        expect(message).toContain('VOICE_ENABLED');
    });
});
