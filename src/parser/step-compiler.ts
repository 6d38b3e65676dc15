/**
 * Step Compiler
 * Raw step text plus the worker's bindings in, immutable CompiledStep out.
 */

import { PatternRegistry } from './pattern-registry.js';
import type { ICompiledStep, IParameter, IRawStep } from '../types/index.js';
import { ParameterBindingError, UnmatchedStepError } from '../infra/errors.js';
import { IConfig, ConfigStub } from '../infra/config.js';
import { ILogger } from '../infra/logger.js';

export interface ICompileContext {
  readonly variables: ReadonlyMap<string, string>;
  /** Outline example row for the running scenario */
  readonly examples?: Readonly<Record<string, string>>;
}

const OUTLINE_PLACEHOLDER = /<([^<>\s]+)>/g;
const VARIABLE_REFERENCE = /\$\{(env\.)?([A-Za-z_][\w.-]*)\}/g;

export class StepCompiler {
  constructor(
    private registry: PatternRegistry,
    private logger?: ILogger,
    private env: IConfig = new ConfigStub()
  ) {}

  compile(step: IRawStep | string, context: ICompileContext): ICompiledStep {
    const raw: IRawStep = typeof step === 'string' ? { text: step } : step;
    const text = this.substituteOutline(raw.text, context);

    const matched = this.registry.match(text);
    if (!matched) {
      throw new UnmatchedStepError(raw.text);
    }

    const parameters: IParameter[] = matched.parameters.map(({ name, value }) =>
      Object.freeze({ name, value: this.bindVariables(value, context) })
    );

    for (const row of raw.dataTable ?? []) {
      if (row.length !== 2) {
        throw new ParameterBindingError(
          'dataTable',
          `Data table rows must have two columns, got ${row.length} in "${raw.text}"`
        );
      }
      parameters.push(Object.freeze({
        name: this.substituteOutline(row[0], context).trim(),
        value: this.bindVariables(this.substituteOutline(row[1], context).trim(), context)
      }));
    }

    const compiled: ICompiledStep = Object.freeze({
      actionKind: matched.actionKind,
      targetDescriptor: this.bindVariables(matched.targetDescriptor, context),
      parameters: Object.freeze(parameters),
      rawText: raw.text,
      patternId: matched.patternId
    });

    this.logger?.debug('Step compiled', {
      step: raw.text,
      actionKind: compiled.actionKind,
      targetDescriptor: compiled.targetDescriptor,
      patternId: compiled.patternId
    });

    return compiled;
  }

  private substituteOutline(text: string, context: ICompileContext): string {
    return text.replace(OUTLINE_PLACEHOLDER, (_whole, name: string) => {
      const value = context.examples?.[name];
      if (value === undefined) {
        throw new ParameterBindingError(`<${name}>`, `Example column "${name}" is not defined`);
      }
      return value;
    });
  }

  /**
   * `${name}` reads a saved variable, `${env.NAME}` the environment
   */
  private bindVariables(value: string, context: ICompileContext): string {
    return value.replace(VARIABLE_REFERENCE, (whole, envPrefix: string | undefined, name: string) => {
      if (envPrefix) {
        const envValue = this.env.get(name);
        if (envValue === undefined) {
          throw new ParameterBindingError(whole, `Environment variable "${name}" is not set`);
        }
        return envValue;
      }
      const bound = context.variables.get(name);
      if (bound === undefined) {
        throw new ParameterBindingError(whole, `Variable "${name}" has not been saved`);
      }
      return bound;
    });
  }
}
