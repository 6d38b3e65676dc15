/**
 * StepCompiler Unit Tests
 *
 * Tests variable, environment, outline and data table binding
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StepCompiler } from '../step-compiler.js';
import { createDefaultPatternRegistry } from '../pattern-registry.js';
import { ConfigStub } from '../../infra/config.js';
import { ParameterBindingError, UnmatchedStepError } from '../../infra/errors.js';

describe('StepCompiler', () => {
  let compiler: StepCompiler;
  const noBindings = { variables: new Map<string, string>() };

  beforeEach(() => {
    compiler = new StepCompiler(
      createDefaultPatternRegistry(),
      undefined,
      new ConfigStub({ TEST_PASSWORD: 'test-secret' })
    );
  });

  it('should compile the email example', () => {
    const step = compiler.compile('I enter "user@example.com" in the "Email" field', noBindings);

    expect(step.actionKind).toBe('type');
    expect(step.targetDescriptor).toBe('Email field');
    expect(step.parameters).toEqual([{ name: 'value', value: 'user@example.com' }]);
    expect(step.rawText).toBe('I enter "user@example.com" in the "Email" field');
  });

  it('should throw UnmatchedStepError carrying the raw text', () => {
    try {
      compiler.compile('I juggle three balls', noBindings);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnmatchedStepError);
      if (error instanceof UnmatchedStepError) {
        expect(error.rawText).toBe('I juggle three balls');
        expect(error.transient).toBe(false);
      }
    }
  });

  it('should substitute saved variables into parameters and descriptors', () => {
    const variables = new Map([['order', 'A-1001'], ['section', 'Orders']]);
    const step = compiler.compile('I should see "${order}" in the "${section}" table', { variables });

    expect(step.targetDescriptor).toBe('Orders table');
    expect(step.parameters).toEqual([{ name: 'text', value: 'A-1001' }]);
  });

  it('should fail with ParameterBindingError for an unsaved variable', () => {
    expect(() => compiler.compile('I enter "${missing}" in the "Email" field', noBindings))
      .toThrow(ParameterBindingError);
  });

  it('should read environment references', () => {
    const step = compiler.compile('I enter "${env.TEST_PASSWORD}" in the "Password" field', noBindings);

    expect(step.parameters).toEqual([{ name: 'value', value: 'test-secret' }]);
  });

  it('should fail for a missing environment variable', () => {
    expect(() => compiler.compile('I enter "${env.NOT_SET_ANYWHERE}" in the "Password" field', noBindings))
      .toThrow('Environment variable "NOT_SET_ANYWHERE" is not set');
  });

  it('should substitute outline placeholders before matching', () => {
    const step = compiler.compile('I select "<country>" from the "Country" dropdown', {
      variables: new Map(),
      examples: { country: 'Norway' }
    });

    expect(step.parameters).toEqual([{ name: 'option', value: 'Norway' }]);
  });

  it('should fail for a missing outline column', () => {
    expect(() => compiler.compile('I click "<button>"', noBindings)).toThrow('Example column "button" is not defined');
  });

  it('should append two-column data table rows after pattern parameters', () => {
    const step = compiler.compile(
      {
        text: 'I fill in the "Signup" form with "details"',
        dataTable: [['first name', 'Ada'], ['last name', '${surname}']]
      },
      { variables: new Map([['surname', 'Lovelace']]) }
    );

    expect(step.parameters).toEqual([
      { name: 'value', value: 'details' },
      { name: 'first name', value: 'Ada' },
      { name: 'last name', value: 'Lovelace' }
    ]);
  });

  it('should reject data tables that are not two columns wide', () => {
    expect(() => compiler.compile({ text: 'I click "Save"', dataTable: [['a', 'b', 'c']] }, noBindings))
      .toThrow(ParameterBindingError);
  });

  it('should produce frozen steps', () => {
    const step = compiler.compile('I click "Save"', noBindings);
    expect(Object.isFrozen(step)).toBe(true);
    expect(Object.isFrozen(step.parameters)).toBe(true);
  });
});
