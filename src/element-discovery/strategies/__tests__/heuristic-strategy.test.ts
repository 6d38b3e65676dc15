/**
 * HeuristicStrategy Unit Tests
 *
 * Tests rank ordering, role hints, visibility and the specificity floor
 */

import { describe, it, expect } from 'vitest';
import { HeuristicStrategy } from '../heuristic-strategy.js';
import { LoggerStub } from '../../../infra/logger.js';
import type { IAccessibilityNode, IPageSnapshot } from '../../../types/index.js';

const tree: IAccessibilityNode[] = [
  { selector: '#hidden-email', role: 'textbox', label: 'Email', visible: false },
  { selector: '#email', role: 'textbox', label: 'Email', placeholder: 'you@example.test', visible: true },
  { selector: '#email-help', role: 'generic', text: 'Email us at help', visible: true },
  { selector: '#submit', role: 'button', name: 'Sign in', text: 'Sign in' },
  { selector: '#signin-link', role: 'link', name: 'Sign in' },
  { selector: '#search', role: 'searchbox', placeholder: 'Search products' }
];

const snapshot: IPageSnapshot = {
  url: 'https://shop.example.test/login',
  screenshot: Buffer.from(''),
  accessibilityTree: tree
};

describe('HeuristicStrategy', () => {
  const strategy = new HeuristicStrategy('role', new LoggerStub());

  it('should match a label restricted by the role hint', async () => {
    const locator = await strategy.discover({ descriptor: 'Email field', snapshot });

    expect(locator?.target).toEqual({ kind: 'selector', selector: '#email' });
    expect(locator?.confidence).toBe(0.95);
    expect(locator?.resolvedBy).toBe('heuristic');
  });

  it('should rank exact text highest', async () => {
    const locator = await strategy.discover({ descriptor: 'Sign in button', snapshot });

    expect(locator?.target).toEqual({ kind: 'selector', selector: '#submit' });
    expect(locator?.confidence).toBe(1);
  });

  it('should break ties by document order', async () => {
    const locator = await strategy.discover({ descriptor: 'Sign in', snapshot });

    expect(locator?.target).toEqual({ kind: 'selector', selector: '#submit' });
  });

  it('should match placeholders', async () => {
    const locator = await strategy.discover({ descriptor: 'Search products', snapshot });

    expect(locator?.target).toEqual({ kind: 'selector', selector: '#search' });
    expect(locator?.confidence).toBe(0.9);
  });

  it('should match a role name', async () => {
    const locator = await strategy.discover({ descriptor: 'searchbox', snapshot });

    expect(locator?.target).toEqual({ kind: 'selector', selector: '#search' });
    expect(locator?.confidence).toBe(0.8);
  });

  it('should reject substring matches below the default floor', async () => {
    expect(await strategy.discover({ descriptor: 'help', snapshot })).toBeNull();
  });

  it('should accept substring matches when the floor allows them', async () => {
    const lenient = new HeuristicStrategy('substring', new LoggerStub());

    const locator = await lenient.discover({ descriptor: 'help', snapshot });

    expect(locator?.target).toEqual({ kind: 'selector', selector: '#email-help' });
    expect(locator?.confidence).toBe(0.6);
  });

  it('should ignore hidden nodes', async () => {
    const hiddenOnly: IPageSnapshot = { ...snapshot, accessibilityTree: [tree[0]] };

    expect(await strategy.discover({ descriptor: 'Email field', snapshot: hiddenOnly })).toBeNull();
  });

  it('should return null when nothing matches', async () => {
    expect(await strategy.discover({ descriptor: 'Checkout button', snapshot })).toBeNull();
  });
});
