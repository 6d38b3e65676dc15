import type { IStepPatternDefinition } from './pattern-registry.js';

/**
 * Built-in step vocabulary.
 * Order only matters between patterns of equal specificity.
 */
export const BUILTIN_PATTERNS: readonly IStepPatternDefinition[] = [
  // navigate
  { pattern: 'I (navigate|go) to [the] {url}', action: 'navigate' },
  { pattern: 'I (navigate|go) to [the] {url} page', action: 'navigate' },
  { pattern: 'I open [the] {url}', action: 'navigate' },
  { pattern: 'I am on [the] {url} page', action: 'navigate' },
  { pattern: 'I am on [the] {url}', action: 'navigate' },

  // click
  { pattern: 'I click [on] [the] {target}', action: 'click' },
  { pattern: 'I click [on] [the] {target} button', action: 'click', descriptor: '{target} button' },
  { pattern: 'I click [on] [the] {target} link', action: 'click', descriptor: '{target} link' },
  { pattern: 'I (press|tap) [the] {target} button', action: 'click', descriptor: '{target} button' },
  { pattern: 'I (check|uncheck|toggle) [the] {target} checkbox', action: 'click', descriptor: '{target} checkbox' },
  { pattern: 'I (choose|pick) [the] {target} radio [button]', action: 'click', descriptor: '{target} radio' },

  // type
  { pattern: 'I (type|enter) {value} (into|in) [the] {target}', action: 'type' },
  { pattern: 'I (type|enter) {value} (into|in) [the] {target} field', action: 'type', descriptor: '{target} field' },
  { pattern: 'I fill [in] [the] {target} with {value}', action: 'type' },
  { pattern: 'I fill [in] [the] {target} field with {value}', action: 'type', descriptor: '{target} field' },

  // select
  { pattern: 'I select {option} from [the] {target}', action: 'select' },
  { pattern: 'I select {option} from [the] {target} dropdown', action: 'select', descriptor: '{target} dropdown' },

  // hover / keys
  { pattern: 'I hover (over|on) [the] {target}', action: 'hover' },
  { pattern: 'I press [the] {key} key', action: 'press-key' },

  // assertions
  { pattern: 'I should see [the] {target}', action: 'assert-visible' },
  { pattern: '[the] {target} should be visible', action: 'assert-visible' },
  { pattern: 'I wait for [the] {target} to (appear|load)', action: 'assert-visible' },
  { pattern: 'I should see text {text}', action: 'assert-text' },
  { pattern: 'I should see {text} in [the] {target}', action: 'assert-text' },
  { pattern: '[the] {target} should (contain|show|have) [text] {text}', action: 'assert-text' },

  // wait
  { pattern: 'I wait [for] {seconds} (second|seconds)', action: 'wait' },
  { pattern: 'I wait [for] {milliseconds} (millisecond|milliseconds|ms)', action: 'wait' },

  // screenshot
  { pattern: 'I take a screenshot', action: 'screenshot' },
  { pattern: 'I take a screenshot (named|called) {name}', action: 'screenshot' },

  // save-variable
  { pattern: 'I (save|store) [the] (text|value) of [the] {target} as {name}', action: 'save-variable' },
  { pattern: 'I remember [the] {target} as {name}', action: 'save-variable' },
];
