/**
 * Pattern Registry
 *
 * Ordered table of step patterns. Lookup order is tier (exact literal, custom, built-in),
 * then fixed-token count descending, then registration order.
 */

import { ActionKind, ICompiledStep, IParameter, PatternTier, isActionKind } from '../types/index.js';
import type { CustomMapping } from '../types/config.js';
import { ConfigurationError } from '../infra/errors.js';
import { ILogger } from '../infra/logger.js';
import { GHERKIN_KEYWORDS } from '../constants/index.js';
import { BUILTIN_PATTERNS } from './builtin-patterns.js';

export type PatternSyntax = 'template' | 'regex';

export type StaticParamValue = string | number | boolean | null;

export interface IStepPatternDefinition {
  /** Token template such as `I click [the] {target} button`, or a regular expression */
  pattern: string;
  syntax?: PatternSyntax;
  action: ActionKind;
  /**
   * Parameter extraction template, in declared order.
   * Values may be `{placeholder}`, `$n` group references or static values.
   * Template patterns without one extract every placeholder except `target`.
   */
  params?: Record<string, StaticParamValue>;
  /** Builds the target descriptor, e.g. `{target} field`. Defaults to `{target}`. */
  descriptor?: string;
}

export interface IStepPattern {
  readonly id: string;
  readonly tier: PatternTier;
  readonly syntax: PatternSyntax;
  readonly source: string;
  readonly action: ActionKind;
  readonly specificity: number;
  readonly order: number;
  readonly matcher: RegExp;
  /** Placeholder name per capture group, for templates */
  readonly groupNames: readonly string[];
  readonly params: ReadonlyArray<readonly [string, string]>;
  readonly descriptor: string;
}

const TIER_RANK: Record<PatternTier, number> = { exact: 0, custom: 1, builtin: 2 };

const PLACEHOLDER_CAPTURE = `("[^"]*"|'[^']*'|.+?)`;

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Strip the leading Gherkin keyword and trailing period
 */
export function normalizeStepText(raw: string): string {
  let text = raw.trim().replace(/\.$/, '').trim();
  const [first, ...rest] = text.split(/\s+/);
  if (first && rest.length > 0 && (GHERKIN_KEYWORDS as readonly string[]).includes(first.toLowerCase())) {
    text = rest.join(' ');
  }
  return text;
}

/**
 * Remove double quotes around quoted words: `"Orders" table` becomes `Orders table`
 */
function unquote(descriptor: string): string {
  return descriptor.replace(/"([^"]*)"/g, '$1').trim();
}

export function stripQuotes(value: string): string {
  const match = value.match(/^"(.*)"$/s) ?? value.match(/^'(.*)'$/s);
  return match ? match[1] : value;
}

interface CompiledTemplate {
  matcher: RegExp;
  groupNames: string[];
  fixedTokens: number;
}

/**
 * Compile a token template into an anchored, case-insensitive expression.
 * `{name}` placeholder, `[word]` optional token, `(a|b)` alternation, anything else a fixed word.
 */
export function compileTemplate(template: string): CompiledTemplate {
  const tokens = template.trim().split(/\s+/);
  const groupNames: string[] = [];
  let fixedTokens = 0;
  let body = '';
  let needSeparator = false;

  for (const token of tokens) {
    const placeholder = token.match(/^\{(\w+)\}$/);
    const optional = token.match(/^\[([^\]]+)\]$/);
    const alternation = token.match(/^\(([^)]+)\)$/);

    if (optional) {
      const word = escapeRegex(optional[1]);
      body += needSeparator ? `(?:\\s+${word})?` : `(?:${word}\\s+)?`;
      continue;
    }

    let piece: string;
    if (placeholder) {
      groupNames.push(placeholder[1]);
      piece = PLACEHOLDER_CAPTURE;
    } else if (alternation) {
      fixedTokens++;
      piece = `(?:${alternation[1].split('|').map(escapeRegex).join('|')})`;
    } else {
      fixedTokens++;
      piece = escapeRegex(token);
    }

    body += (needSeparator ? '\\s+' : '') + piece;
    needSeparator = true;
  }

  return { matcher: new RegExp(`^${body}$`, 'i'), groupNames, fixedTokens };
}

/**
 * Literal words left in a regular expression once groups, classes and escapes are removed
 */
export function countRegexFixedTokens(source: string): number {
  let stripped = source;
  let previous: string;
  do {
    previous = stripped;
    stripped = stripped.replace(/\((?!\?:)[^()]*\)/g, ' ');
  } while (stripped !== previous);

  stripped = stripped
    .replace(/\[[^\]]*\]/g, ' ')
    .replace(/\\[a-zA-Z]/g, ' ')
    .replace(/\(\?:/g, ' ');

  return (stripped.match(/[A-Za-z0-9]+/g) ?? []).length;
}

export class PatternRegistry {
  private patterns: IStepPattern[] = [];
  private registered = 0;

  constructor(private logger?: ILogger) {}

  /**
   * Register one pattern. Patterns without placeholders or groups go to the exact tier.
   */
  register(definition: IStepPatternDefinition, tier: 'custom' | 'builtin' = 'custom'): IStepPattern {
    const syntax = definition.syntax ?? 'template';
    const order = this.registered++;

    let matcher: RegExp;
    let groupNames: string[];
    let specificity: number;
    let captureCount: number;

    if (syntax === 'template') {
      const compiled = compileTemplate(definition.pattern);
      matcher = compiled.matcher;
      groupNames = compiled.groupNames;
      specificity = compiled.fixedTokens;
      captureCount = groupNames.length;
    } else {
      try {
        // Whole-step match
        matcher = new RegExp(`^(?:${definition.pattern})$`, 'i');
      } catch (error) {
        throw new ConfigurationError(
          `Invalid step pattern /${definition.pattern}/: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      groupNames = [];
      specificity = countRegexFixedTokens(definition.pattern);
      // The empty alternative always matches, so the result length reveals the group count
      captureCount = (new RegExp(`${definition.pattern}|`).exec('')?.length ?? 1) - 1;
    }

    const params = definition.params
      ? Object.entries(definition.params).map(([name, value]): readonly [string, string] => [name, value === null ? '' : String(value)])
      : groupNames.filter(name => name !== 'target').map((name): readonly [string, string] => [name, `{${name}}`]);

    const pattern: IStepPattern = Object.freeze({
      id: `${tier}:${order}`,
      tier: captureCount === 0 ? 'exact' : tier,
      syntax,
      source: definition.pattern,
      action: definition.action,
      specificity,
      order,
      matcher,
      groupNames: Object.freeze([...groupNames]),
      params: Object.freeze(params),
      descriptor: definition.descriptor ?? (groupNames.includes('target') ? '{target}' : '')
    });

    this.patterns.push(pattern);
    this.patterns.sort(comparePatterns);

    this.logger?.debug('Step pattern registered', {
      id: pattern.id,
      tier: pattern.tier,
      action: pattern.action,
      specificity
    });

    return pattern;
  }

  /**
   * Load `custom_mappings` entries (regular-expression patterns)
   */
  registerCustomMappings(mappings: CustomMapping[]): IStepPattern[] {
    return mappings.map(mapping => {
      if (!isActionKind(mapping.action)) {
        throw new ConfigurationError(`Custom mapping "${mapping.pattern}" names unknown action "${mapping.action}"`);
      }
      return this.register(
        {
          pattern: mapping.pattern,
          syntax: 'regex',
          action: mapping.action,
          params: mapping.params
        },
        'custom'
      );
    });
  }

  registerBuiltins(): void {
    for (const definition of BUILTIN_PATTERNS) {
      this.register(definition, 'builtin');
    }
  }

  /**
   * First pattern in priority order that matches the whole step, or null
   */
  match(rawStepText: string): ICompiledStep | null {
    const text = normalizeStepText(rawStepText);

    for (const pattern of this.patterns) {
      const result = pattern.matcher.exec(text);
      if (!result) {
        continue;
      }

      const captures = new Map<string, string>();
      pattern.groupNames.forEach((name, i) => {
        captures.set(name, stripQuotes((result[i + 1] ?? '').trim()));
      });

      // One pass, so captured text is never re-expanded
      const fill = (template: string): string =>
        template.replace(/(?<!\$)\{(\w+)\}|\$(\d+)/g, (whole, name?: string, n?: string) => {
          if (name !== undefined) {
            return captures.get(name) ?? whole;
          }
          const group = result[Number(n)];
          return group === undefined ? whole : stripQuotes(group.trim());
        });

      const parameters: IParameter[] = pattern.params.map(([name, template]) =>
        Object.freeze({ name, value: fill(template) })
      );

      let targetDescriptor = pattern.descriptor ? unquote(fill(pattern.descriptor)) : '';
      if (pattern.syntax === 'regex') {
        const targetIndex = parameters.findIndex(p => p.name === 'target');
        if (targetIndex >= 0) {
          targetDescriptor = parameters[targetIndex].value;
          parameters.splice(targetIndex, 1);
        }
      }

      return Object.freeze({
        actionKind: pattern.action,
        targetDescriptor,
        parameters: Object.freeze(parameters),
        rawText: rawStepText,
        patternId: pattern.id
      });
    }

    return null;
  }

  describe(): ReadonlyArray<Pick<IStepPattern, 'id' | 'tier' | 'source' | 'action' | 'specificity'>> {
    return this.patterns.map(({ id, tier, source, action, specificity }) => ({ id, tier, source, action, specificity }));
  }

  get size(): number {
    return this.patterns.length;
  }
}

function comparePatterns(a: IStepPattern, b: IStepPattern): number {
  return TIER_RANK[a.tier] - TIER_RANK[b.tier]
    || b.specificity - a.specificity
    || a.order - b.order;
}

export function createDefaultPatternRegistry(customMappings: CustomMapping[] = [], logger?: ILogger): PatternRegistry {
  const registry = new PatternRegistry(logger);
  registry.registerCustomMappings(customMappings);
  registry.registerBuiltins();
  return registry;
}
