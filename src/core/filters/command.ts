import { newFilter, type Filter } from './Filter.js';
import { extractUpdate } from './extract.js';

export interface ParsedCommand {
  /** Lower-cased command name without the prefix */
  name: string;
  /** Bot username the command was addressed to, without '@' */
  username?: string;
  args: string;
}

export function command(name: string, botUsername: string): Filter {
  return commands('/', botUsername, name);
}

/**
 * Matches messages (text, or caption when there is no text) that invoke one of
 * `names`, either bare or addressed to `botUsername`, with or without arguments.
 *
 * Command names and the username are compared case-insensitively; arguments
 * are left as sent.
 */
export function commands(prefix: string, botUsername: string, ...names: string[]): Filter {
  const normalized = names.map((name) => (prefix + name).toLowerCase());
  const mention = normalizeUsername(botUsername);

  return newFilter((update) => {
    const payload = extractUpdate(update);
    // only messages carry commands
    if (payload.kind !== 'message') {
      return false;
    }

    const text = lowerCommandToken(payload.message.text || payload.message.caption || '');

    return normalized.some(
      (cmd) =>
        text === cmd ||
        text.startsWith(cmd + ' ') ||
        (mention !== '' && (text === cmd + mention || text.startsWith(cmd + mention + ' ')))
    );
  });
}

export function parseCommand(text: string, prefix: string = '/'): ParsedCommand | undefined {
  if (!text.startsWith(prefix)) {
    return undefined;
  }

  const space = text.indexOf(' ');
  const token = space === -1 ? text : text.slice(0, space);
  const args = space === -1 ? '' : text.slice(space + 1);

  const body = token.slice(prefix.length);
  const at = body.indexOf('@');
  const name = (at === -1 ? body : body.slice(0, at)).toLowerCase();
  if (!name) {
    return undefined;
  }

  const parsed: ParsedCommand = { name, args };
  if (at !== -1 && at < body.length - 1) {
    parsed.username = body.slice(at + 1);
  }

  return parsed;
}

function normalizeUsername(botUsername: string): string {
  if (!botUsername) {
    return '';
  }
  const username = botUsername.startsWith('@') ? botUsername : '@' + botUsername;
  return username.toLowerCase();
}

function lowerCommandToken(text: string): string {
  const space = text.indexOf(' ');
  if (space === -1) {
    return text.toLowerCase();
  }
  return text.slice(0, space).toLowerCase() + text.slice(space);
}
