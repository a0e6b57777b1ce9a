import { newFilter, type Filter } from './Filter.js';
import { extractUpdateText } from './extract.js';
import { FilterError } from '../../utils/errors.js';

// The text filters read the message text or caption, the callback data, or the inline query.

export function text(expected: string): Filter {
  return newFilter((update) => extractUpdateText(update) === expected);
}

export function texts(...expected: string[]): Filter {
  const accepted = new Set(expected);
  return newFilter((update) => accepted.has(extractUpdateText(update)));
}

export function withPrefix(prefix: string): Filter {
  return newFilter((update) => extractUpdateText(update).startsWith(prefix));
}

export function withSuffix(suffix: string): Filter {
  return newFilter((update) => extractUpdateText(update).endsWith(suffix));
}

/**
 * Matches when the pattern is found anywhere in the update text.
 * String patterns are compiled once; an invalid one throws a FilterError.
 */
export function regex(pattern: RegExp | string): Filter {
  const compiled = compilePattern(pattern);
  return newFilter((update) => compiled.test(extractUpdateText(update)));
}

function compilePattern(pattern: RegExp | string): RegExp {
  if (typeof pattern !== 'string') {
    // g and y make test() advance lastIndex between calls
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }

  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new FilterError('INVALID_PATTERN', `Invalid regex pattern: ${pattern}`, { cause: error });
  }
}
