/**
 * Browser session boundary.
 * The engine drives pages only through these interfaces; the Playwright adapter is one implementation.
 */

import type { IPageSnapshot, LocatorTarget } from '../types/index.js';

export type BrowserAction = 'click' | 'type' | 'select' | 'hover' | 'press' | 'read';

export type ActOutcome =
  | { ok: true; text?: string; visible?: boolean }
  | { ok: false; error: string };

export interface IBrowserSession {
  readonly id: string;
  navigate(url: string): Promise<void>;
  /**
   * Perform one interaction. `read` reports the target's text and visibility without changing the page.
   * `press` without a target sends the key to the focused element.
   */
  act(target: LocatorTarget | null, action: BrowserAction, value?: string): Promise<ActOutcome>;
  snapshot(): Promise<IPageSnapshot>;
  currentUrl(): Promise<string>;
  isAlive(): boolean;
}

export interface IBrowserSessionFactory {
  acquire(workerId: number): Promise<IBrowserSession>;
  release(session: IBrowserSession): Promise<void>;
  close(): Promise<void>;
}
