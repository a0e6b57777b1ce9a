import type TelegramBot from 'node-telegram-bot-api';
import type { Update } from './Filter.js';

export type MessageField = 'message' | 'edited_message' | 'channel_post' | 'edited_channel_post';

export type UpdatePayload =
  | { kind: 'message'; field: MessageField; message: TelegramBot.Message }
  | { kind: 'callback_query'; callbackQuery: TelegramBot.CallbackQuery }
  | { kind: 'inline_query'; inlineQuery: TelegramBot.InlineQuery }
  | { kind: 'chosen_inline_result'; chosenInlineResult: TelegramBot.ChosenInlineResult }
  | { kind: 'other'; field: string }
  | { kind: 'none' };

const MESSAGE_FIELDS: readonly MessageField[] = [
  'message',
  'edited_message',
  'channel_post',
  'edited_channel_post',
];

/**
 * Returns the populated payload of an update.
 *
 * Message-like fields come first, then inline queries, chosen inline results
 * and callback queries. Any other populated field is reported by name only.
 */
export function extractUpdate(update: Update): UpdatePayload {
  for (const field of MESSAGE_FIELDS) {
    const message = update[field];
    if (message) {
      return { kind: 'message', field, message };
    }
  }

  if (update.inline_query) {
    return { kind: 'inline_query', inlineQuery: update.inline_query };
  }
  if (update.chosen_inline_result) {
    return { kind: 'chosen_inline_result', chosenInlineResult: update.chosen_inline_result };
  }
  if (update.callback_query) {
    return { kind: 'callback_query', callbackQuery: update.callback_query };
  }

  const other = Object.entries(update).find(([key, value]) => key !== 'update_id' && value != null);
  if (other) {
    return { kind: 'other', field: other[0] };
  }

  return { kind: 'none' };
}

/** Message text (or caption), callback data, or inline query; '' for everything else. */
export function extractUpdateText(update: Update): string {
  const payload = extractUpdate(update);

  switch (payload.kind) {
    case 'message':
      return payload.message.text || payload.message.caption || '';
    case 'callback_query':
      return payload.callbackQuery.data ?? '';
    case 'inline_query':
      return payload.inlineQuery.query;
    default:
      return '';
  }
}

/** Sender of a message or callback query. Inline queries and the rest resolve to undefined. */
export function extractSenderId(update: Update): number | undefined {
  const payload = extractUpdate(update);

  switch (payload.kind) {
    case 'message':
      return payload.message.from?.id;
    case 'callback_query':
      return payload.callbackQuery.from.id;
    default:
      return undefined;
  }
}
