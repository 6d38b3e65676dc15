/**
 * Accessibility tree extraction
 * Collects interactive and textual elements in document order with a stable CSS path for each.
 */

import type { Page } from 'playwright';
import type { IAccessibilityNode } from '../types/index.js';

export interface ExtractionOptions {
  maxElements?: number;
}

const CANDIDATE_SELECTORS = [
  'a[href]',
  'button',
  'input:not([type="hidden"])',
  'select',
  'textarea',
  'img[alt]',
  'h1, h2, h3, h4, h5, h6',
  'label',
  '[role]',
  '[aria-label]',
  '[data-testid]',
  '[contenteditable="true"]'
].join(', ');

export async function extractAccessibilityTree(
  page: Page,
  options: ExtractionOptions = {}
): Promise<IAccessibilityNode[]> {
  const { maxElements = 500 } = options;

  return page.evaluate(
    ({ selector, limit }) => {
      function cssPath(el: Element): string {
        if (el.id && document.querySelectorAll(`#${CSS.escape(el.id)}`).length === 1) {
          return `#${CSS.escape(el.id)}`;
        }
        const testId = el.getAttribute('data-testid');
        if (testId && document.querySelectorAll(`[data-testid="${CSS.escape(testId)}"]`).length === 1) {
          return `[data-testid="${CSS.escape(testId)}"]`;
        }

        const parts: string[] = [];
        let current: Element | null = el;
        while (current && current !== document.documentElement) {
          const tag = current.tagName.toLowerCase();
          const parent: Element | null = current.parentElement;
          if (!parent) {
            parts.unshift(tag);
            break;
          }
          const sameTag = Array.from(parent.children).filter(child => child.tagName === current?.tagName);
          parts.unshift(sameTag.length > 1 ? `${tag}:nth-of-type(${sameTag.indexOf(current) + 1})` : tag);
          current = parent;
        }
        return parts.join(' > ');
      }

      function implicitRole(el: Element): string {
        const explicit = el.getAttribute('role');
        if (explicit) return explicit.split(' ')[0];

        const tag = el.tagName.toLowerCase();
        if (tag === 'a') return 'link';
        if (tag === 'button') return 'button';
        if (tag === 'select') return el.hasAttribute('multiple') ? 'listbox' : 'combobox';
        if (tag === 'textarea') return 'textbox';
        if (tag === 'img') return 'img';
        if (/^h[1-6]$/.test(tag)) return 'heading';
        if (tag === 'label') return 'label';
        if (tag === 'input') {
          const type = (el.getAttribute('type') || 'text').toLowerCase();
          if (type === 'checkbox') return 'checkbox';
          if (type === 'radio') return 'radio';
          if (type === 'search') return 'searchbox';
          if (type === 'number') return 'spinbutton';
          if (['submit', 'button', 'reset', 'image'].includes(type)) return 'button';
          return 'textbox';
        }
        if (el.getAttribute('contenteditable') === 'true') return 'textbox';
        return 'generic';
      }

      function labelText(el: Element): string | undefined {
        const labelledBy = el.getAttribute('aria-labelledby');
        if (labelledBy) {
          const text = labelledBy
            .split(/\s+/)
            .map(id => document.getElementById(id)?.textContent?.trim() ?? '')
            .join(' ')
            .trim();
          if (text) return text;
        }
        if (el.id) {
          const forLabel = document.querySelector(`label[for="${CSS.escape(el.id)}"]`);
          const text = forLabel?.textContent?.trim();
          if (text) return text;
        }
        const wrapping = el.closest('label');
        if (wrapping && wrapping !== el) {
          const text = wrapping.textContent?.trim();
          if (text) return text;
        }
        return undefined;
      }

      function directText(el: Element): string | undefined {
        const text = (el instanceof HTMLElement ? el.innerText : el.textContent ?? '').trim().replace(/\s+/g, ' ');
        return text.length > 0 && text.length < 200 ? text : undefined;
      }

      function isVisible(el: Element): boolean {
        const rect = el.getBoundingClientRect();
        if (rect.width === 0 || rect.height === 0) return false;
        const style = window.getComputedStyle(el);
        return style.visibility !== 'hidden' && style.display !== 'none' && style.opacity !== '0';
      }

      interface IExtractedNode {
        selector: string;
        role: string;
        name?: string;
        text?: string;
        label?: string;
        placeholder?: string;
        visible: boolean;
        boundingBox: { x: number; y: number; width: number; height: number };
      }

      const nodes: IExtractedNode[] = [];
      const elements = Array.from(document.querySelectorAll(selector)).slice(0, limit);
      for (const el of elements) {
        const rect = el.getBoundingClientRect();
        const text = directText(el);
        nodes.push({
          selector: cssPath(el),
          role: implicitRole(el),
          name: el.getAttribute('aria-label') || el.getAttribute('alt') || el.getAttribute('title') || text,
          text,
          label: labelText(el),
          placeholder: el.getAttribute('placeholder') || undefined,
          visible: isVisible(el),
          boundingBox: {
            x: Math.round(rect.left),
            y: Math.round(rect.top),
            width: Math.round(rect.width),
            height: Math.round(rect.height)
          }
        });
      }
      return nodes;
    },
    { selector: CANDIDATE_SELECTORS, limit: maxElements }
  );
}
