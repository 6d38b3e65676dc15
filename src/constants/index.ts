/**
 * Centralized constants for step compilation and element resolution
 */

// Role words that may close a descriptor ("Email field", "Sign in button")
export const ROLE_HINTS = {
  button: ['button', 'menuitem', 'tab'],
  link: ['link'],
  field: ['textbox', 'searchbox', 'combobox', 'spinbutton'],
  input: ['textbox', 'searchbox', 'combobox', 'spinbutton'],
  textbox: ['textbox', 'searchbox'],
  dropdown: ['combobox', 'listbox'],
  select: ['combobox', 'listbox'],
  checkbox: ['checkbox', 'switch'],
  radio: ['radio'],
  tab: ['tab'],
  image: ['img'],
  heading: ['heading'],
} as const;

export type RoleHintWord = keyof typeof ROLE_HINTS;

// Classes the detection collaborator is asked to label
export const DETECTION_CLASSES = [
  'button',
  'input',
  'link',
  'dropdown',
  'checkbox',
  'radio',
  'text',
  'image',
  'tab',
] as const;

export type DetectionClass = typeof DETECTION_CLASSES[number];

// Which detection labels are compatible with each role hint
export const DETECTION_CLASSES_BY_HINT: Record<RoleHintWord, readonly DetectionClass[]> = {
  button: ['button', 'tab'],
  link: ['link', 'text'],
  field: ['input'],
  input: ['input'],
  textbox: ['input'],
  dropdown: ['dropdown'],
  select: ['dropdown'],
  checkbox: ['checkbox'],
  radio: ['radio'],
  tab: ['tab', 'button'],
  image: ['image'],
  heading: ['text'],
};

// Heuristic match ranks and the confidence reported for each
export const HEURISTIC_SCORES = {
  exact: { rank: 5, confidence: 1.0 },
  label: { rank: 4, confidence: 0.95 },
  placeholder: { rank: 3, confidence: 0.9 },
  role: { rank: 2, confidence: 0.8 },
  substring: { rank: 1, confidence: 0.6 },
} as const;

// Action-executor browser verbs
export const BROWSER_ACTIONS = {
  CLICK: 'click',
  TYPE: 'type',
  SELECT: 'select',
  HOVER: 'hover',
  PRESS: 'press',
  READ: 'read',
} as const;

// Messages from the browser that mean "try again shortly"
export const TRANSIENT_BROWSER_MESSAGES = [
  'detached',
  'not attached',
  'not visible',
  'not stable',
  'intercepts pointer events',
  'element is outside of the viewport',
  'timeout',
  'timed out',
  'navigation',
] as const;

// Messages that mean the session itself is gone
export const CRASH_BROWSER_MESSAGES = [
  'target closed',
  'browser has been closed',
  'page crashed',
  'context has been closed',
  'session closed',
] as const;

export const GHERKIN_KEYWORDS = ['given', 'when', 'then', 'and', 'but'] as const;

export const CIRCUIT_KEYS = {
  DETECTOR: 'element-detector',
} as const;

export const DEFAULT_ARTIFACTS_DIR = 'reports';
export const SCREENSHOTS_SUBDIR = 'screenshots';
