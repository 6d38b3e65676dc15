/**
 * PatternRegistry Unit Tests
 *
 * Tests template compilation, priority ordering and parameter extraction
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  PatternRegistry,
  compileTemplate,
  countRegexFixedTokens,
  createDefaultPatternRegistry,
  normalizeStepText
} from '../pattern-registry.js';
import { ConfigurationError } from '../../infra/errors.js';

describe('PatternRegistry', () => {
  describe('normalizeStepText', () => {
    it('should drop the Gherkin keyword and trailing period', () => {
      expect(normalizeStepText('  When I take a screenshot. ')).toBe('I take a screenshot');
      expect(normalizeStepText('And I wait 2 seconds')).toBe('I wait 2 seconds');
    });
  });

  describe('compileTemplate', () => {
    it('should count fixed tokens but not optionals or placeholders', () => {
      expect(compileTemplate('I click [on] [the] {target} button').fixedTokens).toBe(3);
      expect(compileTemplate('I (type|enter) {value} (into|in) [the] {target}').fixedTokens).toBe(3);
    });

    it('should match with and without optional tokens', () => {
      const { matcher } = compileTemplate('[the] {target} should be visible');
      expect(matcher.exec('the Logout button should be visible')?.[1]).toBe('Logout button');
      expect(matcher.exec('Logout button should be visible')?.[1]).toBe('Logout button');
    });
  });

  describe('countRegexFixedTokens', () => {
    it('should count literal words outside groups', () => {
      expect(countRegexFixedTokens('^I click the (.+) button$')).toBe(4);
      expect(countRegexFixedTokens('^I log in as "([^"]+)"$')).toBe(4);
    });
  });

  describe('built-in vocabulary', () => {
    let registry: PatternRegistry;

    beforeEach(() => {
      registry = createDefaultPatternRegistry();
    });

    it('should compile a type step into value and field descriptor', () => {
      const step = registry.match('I enter "user@example.com" in the "Email" field');

      expect(step).toMatchObject({
        actionKind: 'type',
        targetDescriptor: 'Email field',
        parameters: [{ name: 'value', value: 'user@example.com' }]
      });
    });

    it('should prefer the button pattern over the generic click', () => {
      const step = registry.match('When I click the "Sign in" button');

      expect(step?.actionKind).toBe('click');
      expect(step?.targetDescriptor).toBe('Sign in button');
      expect(step?.parameters).toEqual([]);
    });

    it('should compile navigation by page name', () => {
      const step = registry.match('Given I am on the "login" page');

      expect(step?.actionKind).toBe('navigate');
      expect(step?.targetDescriptor).toBe('');
      expect(step?.parameters).toEqual([{ name: 'url', value: 'login' }]);
    });

    it('should keep parameters in declared order', () => {
      const step = registry.match('I select "Canada" from the "Country" dropdown');

      expect(step?.targetDescriptor).toBe('Country dropdown');
      expect(step?.parameters).toEqual([{ name: 'option', value: 'Canada' }]);
    });

    it('should route text assertions with a target', () => {
      const step = registry.match('Then I should see "Welcome back" in the header');

      expect(step?.actionKind).toBe('assert-text');
      expect(step?.targetDescriptor).toBe('header');
      expect(step?.parameters).toEqual([{ name: 'text', value: 'Welcome back' }]);
    });

    it('should route page-level text assertions', () => {
      const step = registry.match('Then I should see text "Order placed"');

      expect(step?.actionKind).toBe('assert-text');
      expect(step?.targetDescriptor).toBe('');
    });

    it('should compile waits in seconds and milliseconds', () => {
      expect(registry.match('I wait for 2 seconds')?.parameters).toEqual([{ name: 'seconds', value: '2' }]);
      expect(registry.match('I wait 500 ms')?.parameters).toEqual([{ name: 'milliseconds', value: '500' }]);
    });

    it('should treat placeholder-free patterns as exact literals', () => {
      const step = registry.match('I take a screenshot');
      expect(step?.actionKind).toBe('screenshot');
      expect(step?.patternId).toMatch(/^builtin:/);
      expect(registry.describe().find(p => p.source === 'I take a screenshot')?.tier).toBe('exact');
    });

    it('should compile save-variable steps', () => {
      const step = registry.match('I save the text of the "Order number" as "order"');
      expect(step?.actionKind).toBe('save-variable');
      expect(step?.targetDescriptor).toBe('Order number');
      expect(step?.parameters).toEqual([{ name: 'name', value: 'order' }]);
    });

    it('should return null when nothing matches', () => {
      expect(registry.match('I do a little dance')).toBeNull();
    });

    it('should return frozen compiled steps', () => {
      const step = registry.match('I click "Save"');
      expect(Object.isFrozen(step)).toBe(true);
      expect(Object.isFrozen(step?.parameters)).toBe(true);
    });
  });

  describe('priority', () => {
    it('should let the superset pattern win within a tier', () => {
      const registry = new PatternRegistry();
      registry.register({ pattern: 'I click {text}', action: 'click', descriptor: '{text}' });
      registry.register({ pattern: 'I click the {text} button', action: 'click', descriptor: '{text} button' });

      expect(registry.match('I click the Submit button')?.targetDescriptor).toBe('Submit button');
      expect(registry.match('I click Submit')?.targetDescriptor).toBe('Submit');
    });

    it('should put custom patterns ahead of built-ins', () => {
      const registry = new PatternRegistry();
      registry.register({ pattern: 'I click [on] [the] {target} button', action: 'click', descriptor: '{target} button' }, 'builtin');
      registry.register({ pattern: 'I click {target}', action: 'hover' }, 'custom');

      expect(registry.match('I click the Save button')?.actionKind).toBe('hover');
    });

    it('should put exact literals ahead of everything', () => {
      const registry = new PatternRegistry();
      registry.register({ pattern: 'I log out', action: 'click', descriptor: 'Log out' }, 'builtin');
      registry.register({ pattern: 'I {verb} out', action: 'hover' }, 'custom');

      expect(registry.match('I log out')?.actionKind).toBe('click');
    });

    it('should fall back to registration order on equal specificity', () => {
      const registry = new PatternRegistry();
      registry.register({ pattern: 'I poke {target}', action: 'click' });
      registry.register({ pattern: 'I {verb} {target}', action: 'hover', params: {} });
      registry.register({ pattern: 'I poke {thing}', action: 'hover' });

      expect(registry.match('I poke it')?.actionKind).toBe('click');
    });
  });

  describe('custom mappings', () => {
    it('should extract $n groups and static params', () => {
      const registry = new PatternRegistry();
      registry.registerCustomMappings([
        {
          pattern: '^I log in as "([^"]+)"$',
          action: 'type',
          params: { target: 'Username field', value: '$1', source: 'login-macro' }
        }
      ]);

      const step = registry.match('Given I log in as "alice"');

      expect(step).toMatchObject({
        actionKind: 'type',
        targetDescriptor: 'Username field',
        parameters: [
          { name: 'value', value: 'alice' },
          { name: 'source', value: 'login-macro' }
        ]
      });
    });

    it('should only match a literal mapping against the whole step', () => {
      const registry = createDefaultPatternRegistry([
        { pattern: 'submit', action: 'click', params: { target: 'Submit button' } }
      ]);

      expect(registry.match('Then I should see the submit confirmation')).toMatchObject({
        actionKind: 'assert-visible',
        targetDescriptor: 'submit confirmation'
      });
      expect(registry.match('When submit')).toMatchObject({
        actionKind: 'click',
        targetDescriptor: 'Submit button'
      });
    });

    it('should reject mappings with an unknown action', () => {
      const registry = new PatternRegistry();
      expect(() => registry.registerCustomMappings([{ pattern: '^x$', action: 'dance', params: {} }]))
        .toThrow(ConfigurationError);
    });

    it('should reject invalid regular expressions', () => {
      const registry = new PatternRegistry();
      expect(() => registry.registerCustomMappings([{ pattern: '^(unclosed$', action: 'click', params: {} }]))
        .toThrow(ConfigurationError);
    });
  });
});
