/**
 * In-process stand-ins for the browser session, session factory and detector
 */

import { vi } from 'vitest';
import type { ActOutcome, BrowserAction, IBrowserSession, IBrowserSessionFactory } from '../../browser/index.js';
import type { IDetection, IElementDetector } from '../../detectors/index.js';
import type { IAccessibilityNode, IPageSnapshot, LocatorTarget } from '../../types/index.js';
import type { ILogger } from '../../infra/logger.js';
import type { IArtifactStore } from '../../infra/artifact-store.js';

export const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn()
});

export interface IRecordedAction {
  target: LocatorTarget | null;
  action: BrowserAction;
  value?: string;
}

export type ActHandler = (
  target: LocatorTarget | null,
  action: BrowserAction,
  value?: string
) => ActOutcome | Promise<ActOutcome> | undefined;

export const LOGIN_TREE: IAccessibilityNode[] = [
  { selector: 'h1', role: 'heading', name: 'Sign in to your account', text: 'Sign in to your account', visible: true,
    boundingBox: { x: 760, y: 120, width: 400, height: 40 } },
  { selector: '#email', role: 'textbox', label: 'Email', placeholder: 'you@example.test', visible: true,
    boundingBox: { x: 760, y: 200, width: 400, height: 36 } },
  { selector: '#password', role: 'textbox', label: 'Password', visible: true,
    boundingBox: { x: 760, y: 260, width: 400, height: 36 } },
  { selector: '#submit', role: 'button', name: 'Sign in', text: 'Sign in', visible: true,
    boundingBox: { x: 760, y: 320, width: 120, height: 40 } },
  { selector: '#cart', role: 'generic', visible: true,
    boundingBox: { x: 1800, y: 20, width: 40, height: 40 } }
];

export class FakeBrowserSession implements IBrowserSession {
  url = 'about:blank';
  tree: IAccessibilityNode[];
  pageText = '';
  screenshot = Buffer.from('fake-png');
  alive = true;
  actions: IRecordedAction[] = [];
  navigations: string[] = [];
  snapshotCount = 0;
  actHandler?: ActHandler;

  constructor(public readonly id: string, tree: IAccessibilityNode[] = LOGIN_TREE) {
    this.tree = tree.map(node => ({ ...node }));
  }

  async navigate(url: string): Promise<void> {
    this.navigations.push(url);
    this.url = url;
  }

  async act(target: LocatorTarget | null, action: BrowserAction, value?: string): Promise<ActOutcome> {
    this.actions.push({ target, action, value });
    const handled = await this.actHandler?.(target, action, value);
    if (handled) {
      return handled;
    }
    if (action !== 'read') {
      return { ok: true };
    }
    if (target === null) {
      return { ok: true, text: this.pageText, visible: true };
    }
    if (target.kind === 'coordinates') {
      return { ok: true, text: '', visible: true };
    }
    const node = this.tree.find(n => n.selector === target.selector);
    if (!node) {
      return { ok: false, error: `element ${target.selector} is not attached to the DOM` };
    }
    return { ok: true, text: node.text ?? node.name ?? '', visible: node.visible !== false };
  }

  async snapshot(): Promise<IPageSnapshot> {
    this.snapshotCount++;
    return {
      url: this.url,
      screenshot: this.screenshot,
      accessibilityTree: this.tree.map(node => ({ ...node }))
    };
  }

  async currentUrl(): Promise<string> {
    return this.url;
  }

  isAlive(): boolean {
    return this.alive;
  }
}

export class FakeSessionFactory implements IBrowserSessionFactory {
  acquired: FakeBrowserSession[] = [];
  released: string[] = [];
  private counter = 0;

  constructor(private build: (id: string, workerId: number) => FakeBrowserSession =
    id => new FakeBrowserSession(id)) {}

  async acquire(workerId: number): Promise<IBrowserSession> {
    this.counter++;
    const session = this.build(`session-${this.counter}`, workerId);
    this.acquired.push(session);
    return session;
  }

  async release(session: IBrowserSession): Promise<void> {
    this.released.push(session.id);
  }

  async close(): Promise<void> {}
}

export class FakeDetector implements IElementDetector {
  readonly name = 'fake-detector';
  calls = 0;

  constructor(private respond: (descriptor?: string) => IDetection[] | Promise<IDetection[]> = () => []) {}

  async detect(_image: Buffer, _classVocabulary: readonly string[], descriptor?: string): Promise<IDetection[]> {
    this.calls++;
    return this.respond(descriptor);
  }
}

export class MemoryArtifactStore implements IArtifactStore {
  saved: Array<{ name: string; bytes: number }> = [];

  async saveScreenshot(name: string, image: Buffer): Promise<string> {
    this.saved.push({ name, bytes: image.length });
    return `screenshots/${String(this.saved.length).padStart(4, '0')}-${name}.png`;
  }
}
