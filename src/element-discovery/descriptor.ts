import { ROLE_HINTS, RoleHintWord } from '../constants/index.js';
import { normalizeDescriptor } from '../cache/locator-cache.js';

export interface IDescriptorQuery {
  /** Normalized descriptor without the trailing role word */
  text: string;
  roleHint?: RoleHintWord;
  /** Accessibility roles compatible with the hint */
  roles?: readonly string[];
}

function isRoleHintWord(word: string): word is RoleHintWord {
  return Object.prototype.hasOwnProperty.call(ROLE_HINTS, word);
}

/**
 * "Email field" -> { text: "email", roleHint: "field" }.
 * A descriptor that is only a role word keeps it as text.
 */
export function parseDescriptor(descriptor: string): IDescriptorQuery {
  const normalized = normalizeDescriptor(descriptor).replace(/^the\s+/, '');
  const words = normalized.split(' ');
  const last = words[words.length - 1];

  if (words.length > 1 && isRoleHintWord(last)) {
    return {
      text: words.slice(0, -1).join(' '),
      roleHint: last,
      roles: ROLE_HINTS[last]
    };
  }

  return { text: normalized };
}
