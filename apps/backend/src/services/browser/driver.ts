// Browser Driver
// The narrow slice of a browser page the CRM automation needs
// Playwright backs it in production; tests supply an in-process fake

import { chromium, firefox, webkit, type Browser, type Locator, type Page } from 'playwright-core';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('browser-driver');

export interface WaitOptions {
    timeout?: number;
}

export interface CrmElement {
    /** Text of the element itself, or of its first descendant matching the selector */
    text(selector?: string): Promise<string | null>;
    attribute(name: string): Promise<string | null>;
}

export interface CrmPage {
    goto(url: string, options?: WaitOptions): Promise<void>;
    url(): string;
    click(selector: string, options?: WaitOptions): Promise<void>;
    fill(selector: string, value: string, options?: WaitOptions): Promise<void>;
    waitFor(selector: string, options?: WaitOptions): Promise<void>;
    isVisible(selector: string): Promise<boolean>;
    text(selector: string, options?: WaitOptions): Promise<string | null>;
    queryAll(selector: string): Promise<CrmElement[]>;
    content(): Promise<string>;
    screenshot(): Promise<Buffer>;
    close(): Promise<void>;
}

export interface BrowserDriver {
    newPage(): Promise<CrmPage>;
    close(): Promise<void>;
}

export interface PlaywrightDriverOptions {
    browserType: 'chromium' | 'firefox' | 'webkit';
    headless: boolean;
    executablePath?: string;
}

// ============================================
// PLAYWRIGHT IMPLEMENTATION
// ============================================

class PlaywrightElement implements CrmElement {
    constructor(private readonly locator: Locator) {}

    async text(selector?: string): Promise<string | null> {
        if (!selector) {
            return this.locator.textContent();
        }
        const child = this.locator.locator(selector);
        if ((await child.count()) === 0) return null;
        return child.first().textContent();
    }

    attribute(name: string): Promise<string | null> {
        return this.locator.getAttribute(name);
    }
}

class PlaywrightPage implements CrmPage {
    constructor(private readonly page: Page) {}

    async goto(url: string, options: WaitOptions = {}): Promise<void> {
        await this.page.goto(url, { timeout: options.timeout, waitUntil: 'domcontentloaded' });
    }

    url(): string {
        return this.page.url();
    }

    click(selector: string, options: WaitOptions = {}): Promise<void> {
        return this.page.click(selector, { timeout: options.timeout });
    }

    fill(selector: string, value: string, options: WaitOptions = {}): Promise<void> {
        return this.page.fill(selector, value, { timeout: options.timeout });
    }

    async waitFor(selector: string, options: WaitOptions = {}): Promise<void> {
        await this.page.waitForSelector(selector, { timeout: options.timeout });
    }

    isVisible(selector: string): Promise<boolean> {
        return this.page.isVisible(selector);
    }

    text(selector: string, options: WaitOptions = {}): Promise<string | null> {
        return this.page.textContent(selector, { timeout: options.timeout });
    }

    async queryAll(selector: string): Promise<CrmElement[]> {
        const locators = await this.page.locator(selector).all();
        return locators.map((locator) => new PlaywrightElement(locator));
    }

    content(): Promise<string> {
        return this.page.content();
    }

    screenshot(): Promise<Buffer> {
        return this.page.screenshot({ type: 'png' });
    }

    async close(): Promise<void> {
        await this.page.context().close();
    }
}

/**
 * Launches one browser lazily and gives every CRM session its own context
 */
export class PlaywrightDriver implements BrowserDriver {
    private browser: Promise<Browser> | null = null;

    constructor(private readonly options: PlaywrightDriverOptions) {}

    async newPage(): Promise<CrmPage> {
        const browser = await this.launch();
        const context = await browser.newContext();
        const page = await context.newPage();
        return new PlaywrightPage(page);
    }

    async close(): Promise<void> {
        if (!this.browser) return;
        const browser = await this.browser;
        this.browser = null;
        await browser.close();
        logger.info('Browser closed');
    }

    private launch(): Promise<Browser> {
        if (!this.browser) {
            const launcher = { chromium, firefox, webkit }[this.options.browserType];
            logger.info(`Launching ${this.options.browserType} (headless: ${this.options.headless})`);
            this.browser = launcher
                .launch({
                    headless: this.options.headless,
                    executablePath: this.options.executablePath,
                })
                .catch((error: unknown) => {
                    this.browser = null;
                    throw error;
                });
        }
        return this.browser;
    }
}
