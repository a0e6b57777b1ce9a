import { newFilter, type Filter } from './Filter.js';
import { not } from './combinators.js';
import { extractSenderId } from './extract.js';

/**
 * Passes updates whose sender (message or callback query author) is in `ids`.
 * Updates without a resolvable sender never pass.
 */
export function whitelist(...ids: number[]): Filter {
  const allowed = new Set(ids);
  return newFilter((update) => {
    const senderId = extractSenderId(update);
    return senderId !== undefined && allowed.has(senderId);
  });
}

/** Negation of whitelist, so updates without a sender pass. */
export function blacklist(...ids: number[]): Filter {
  return not(whitelist(...ids));
}
