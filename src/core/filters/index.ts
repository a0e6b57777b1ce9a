export { newFilter, PredicateFilter } from './Filter.js';
export type { Filter, FilterFunc, Update } from './Filter.js';
export { extractUpdate, extractUpdateText, extractSenderId } from './extract.js';
export type { UpdatePayload, MessageField } from './extract.js';
export { alwaysTrue, alwaysFalse, and, or, not } from './combinators.js';
export { text, texts, withPrefix, withSuffix, regex } from './text.js';
export { whitelist, blacklist } from './sender.js';
export { command, commands, parseCommand } from './command.js';
export type { ParsedCommand } from './command.js';
