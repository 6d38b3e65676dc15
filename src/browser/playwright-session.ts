import { Browser, BrowserContext, Locator, Page, chromium } from 'playwright';
import path from 'path';
import type { ActOutcome, BrowserAction, IBrowserSession, IBrowserSessionFactory } from './index.js';
import type { IPageSnapshot, LocatorTarget } from '../types/index.js';
import { extractAccessibilityTree } from './accessibility-extractor.js';
import { ILogger } from '../infra/logger.js';
import { toError } from '../infra/errors.js';

export interface PlaywrightSessionOptions {
  headless: boolean;
  slowMo: number;
  video: boolean;
  /** Playwright's own timeout per call, in milliseconds */
  actionTimeout: number;
  artifactsDir: string;
}

const VIEWPORT = { width: 1920, height: 1080 };

/**
 * One isolated browser context and page
 */
export class PlaywrightSession implements IBrowserSession {
  private crashed = false;

  constructor(
    public readonly id: string,
    private context: BrowserContext,
    private page: Page,
    private logger: ILogger
  ) {
    page.on('crash', () => {
      this.crashed = true;
      this.logger.error(`Browser page crashed in session ${id}`);
    });
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async act(target: LocatorTarget | null, action: BrowserAction, value?: string): Promise<ActOutcome> {
    try {
      if (target === null) {
        return await this.actOnPage(action, value);
      }
      if (target.kind === 'coordinates') {
        return await this.actAtPoint(target.x, target.y, action, value);
      }
      return await this.actOnLocator(this.page.locator(target.selector).first(), action, value);
    } catch (error) {
      return { ok: false, error: toError(error).message };
    }
  }

  async snapshot(): Promise<IPageSnapshot> {
    const [screenshot, accessibilityTree] = await Promise.all([
      this.page.screenshot({ type: 'png' }),
      extractAccessibilityTree(this.page)
    ]);
    return { url: this.page.url(), screenshot, accessibilityTree };
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  isAlive(): boolean {
    return !this.crashed && !this.page.isClosed();
  }

  async close(): Promise<void> {
    await this.context.close();
  }

  private async actOnPage(action: BrowserAction, value?: string): Promise<ActOutcome> {
    switch (action) {
      case 'press':
        await this.page.keyboard.press(value ?? 'Enter');
        return { ok: true };
      case 'read':
        return { ok: true, text: await this.page.innerText('body'), visible: true };
      default:
        return { ok: false, error: `${action} requires a target element` };
    }
  }

  private async actOnLocator(locator: Locator, action: BrowserAction, value?: string): Promise<ActOutcome> {
    switch (action) {
      case 'click':
        await locator.click();
        return { ok: true };
      case 'type':
        await locator.fill(value ?? '');
        return { ok: true };
      case 'select':
        await locator.selectOption({ label: value ?? '' }).catch(() => locator.selectOption(value ?? ''));
        return { ok: true };
      case 'hover':
        await locator.hover();
        return { ok: true };
      case 'press':
        await locator.press(value ?? 'Enter');
        return { ok: true };
      case 'read': {
        const visible = await locator.isVisible();
        if (!visible) {
          return { ok: true, visible: false };
        }
        const text = await locator.evaluate(el =>
          el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement || el instanceof HTMLSelectElement
            ? el.value
            : el instanceof HTMLElement ? el.innerText : el.textContent ?? ''
        );
        return { ok: true, text, visible };
      }
    }
  }

  private async actAtPoint(x: number, y: number, action: BrowserAction, value?: string): Promise<ActOutcome> {
    switch (action) {
      case 'click':
        await this.page.mouse.click(x, y);
        return { ok: true };
      case 'type':
        await this.page.mouse.click(x, y);
        await this.page.keyboard.type(value ?? '');
        return { ok: true };
      case 'select':
        await this.page.mouse.click(x, y);
        await this.page.keyboard.type(value ?? '');
        await this.page.keyboard.press('Enter');
        return { ok: true };
      case 'hover':
        await this.page.mouse.move(x, y);
        return { ok: true };
      case 'press':
        await this.page.mouse.click(x, y);
        await this.page.keyboard.press(value ?? 'Enter');
        return { ok: true };
      case 'read': {
        const read = await this.page.evaluate(([px, py]) => {
          const el = document.elementFromPoint(px, py);
          if (!el) return null;
          return el instanceof HTMLElement ? el.innerText : el.textContent ?? '';
        }, [x, y] as const);
        return read === null ? { ok: true, visible: false } : { ok: true, text: read, visible: true };
      }
    }
  }
}

/**
 * Shares one Chromium instance; every acquire gets a fresh context
 */
export class PlaywrightSessionFactory implements IBrowserSessionFactory {
  private browser: Browser | null = null;
  private sessions = new Map<string, PlaywrightSession>();
  private counter = 0;

  constructor(
    private options: PlaywrightSessionOptions,
    private logger: ILogger
  ) {}

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser && this.browser.isConnected()) {
      return this.browser;
    }
    this.logger.info('Launching browser...', {
      headless: this.options.headless,
      slowMo: this.options.slowMo
    });
    this.browser = await chromium.launch({
      headless: this.options.headless,
      slowMo: this.options.slowMo
    });
    return this.browser;
  }

  async acquire(workerId: number): Promise<IBrowserSession> {
    const browser = await this.ensureBrowser();
    const context = await browser.newContext({
      viewport: VIEWPORT,
      recordVideo: this.options.video
        ? { dir: path.join(this.options.artifactsDir, 'videos'), size: VIEWPORT }
        : undefined
    });
    context.setDefaultTimeout(this.options.actionTimeout);
    const page = await context.newPage();

    this.counter++;
    const id = `worker-${workerId}-${this.counter}`;
    const session = new PlaywrightSession(id, context, page, this.logger);
    this.sessions.set(id, session);
    this.logger.debug('Browser session acquired', { sessionId: id, workerId });
    return session;
  }

  async release(session: IBrowserSession): Promise<void> {
    const owned = this.sessions.get(session.id);
    if (!owned) {
      return;
    }
    this.sessions.delete(session.id);
    await owned.close();
    this.logger.debug('Browser session released', { sessionId: session.id });
  }

  async close(): Promise<void> {
    for (const session of this.sessions.values()) {
      await session.close().catch((error: unknown) => {
        this.logger.warn('Failed to close browser context', { error: toError(error).message });
      });
    }
    this.sessions.clear();
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }
}
