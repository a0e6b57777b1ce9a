import { describe, it, expect } from 'vitest';
import { extractSenderId, extractUpdate, extractUpdateText } from '../../core/filters/extract.js';
import {
  callbackQueryUpdate,
  channelPostUpdate,
  chosenInlineResultUpdate,
  editedMessageUpdate,
  emptyUpdate,
  inlineQueryUpdate,
  messageUpdate,
  shippingQueryUpdate,
} from '../fixtures/updates.js';

describe('extract', () => {
  describe('extractUpdate', () => {
    it('returns message payloads with the field they came from', () => {
      const payload = extractUpdate(editedMessageUpdate({ text: 'fixed typo' }));
      expect(payload.kind).toBe('message');
      if (payload.kind === 'message') {
        expect(payload.field).toBe('edited_message');
        expect(payload.message.text).toBe('fixed typo');
      }
    });

    it('recognises channel posts as messages', () => {
      const payload = extractUpdate(channelPostUpdate({ text: 'news' }));
      expect(payload.kind).toBe('message');
      if (payload.kind === 'message') {
        expect(payload.field).toBe('channel_post');
      }
    });

    it('returns callback and inline query payloads', () => {
      expect(extractUpdate(callbackQueryUpdate(7, 'yes')).kind).toBe('callback_query');
      expect(extractUpdate(inlineQueryUpdate(7, 'cats')).kind).toBe('inline_query');
      expect(extractUpdate(chosenInlineResultUpdate(7, 'cats')).kind).toBe('chosen_inline_result');
    });

    it('names unhandled payload fields', () => {
      expect(extractUpdate(shippingQueryUpdate(7))).toEqual({ kind: 'other', field: 'shipping_query' });
    });

    it('returns none when nothing is populated', () => {
      expect(extractUpdate(emptyUpdate())).toEqual({ kind: 'none' });
    });
  });

  describe('extractUpdateText', () => {
    it('prefers message text over caption', () => {
      expect(extractUpdateText(messageUpdate({ text: 'hi', caption: 'photo' }))).toBe('hi');
    });

    it('falls back to caption when text is empty', () => {
      expect(extractUpdateText(messageUpdate({ text: '', caption: 'photo' }))).toBe('photo');
      expect(extractUpdateText(messageUpdate({ caption: 'photo' }))).toBe('photo');
    });

    it('returns an empty string for a message without text or caption', () => {
      expect(extractUpdateText(messageUpdate())).toBe('');
    });

    it('returns callback data, or empty when absent', () => {
      expect(extractUpdateText(callbackQueryUpdate(1, 'vote:up'))).toBe('vote:up');
      expect(extractUpdateText(callbackQueryUpdate(1))).toBe('');
    });

    it('returns the inline query', () => {
      expect(extractUpdateText(inlineQueryUpdate(1, 'cats'))).toBe('cats');
    });

    it('returns an empty string for other kinds', () => {
      expect(extractUpdateText(chosenInlineResultUpdate(1, 'cats'))).toBe('');
      expect(extractUpdateText(shippingQueryUpdate(1))).toBe('');
      expect(extractUpdateText(emptyUpdate())).toBe('');
    });
  });

  describe('extractSenderId', () => {
    it('resolves message and callback query senders', () => {
      expect(extractSenderId(messageUpdate({ text: 'hi', fromId: 11 }))).toBe(11);
      expect(extractSenderId(callbackQueryUpdate(12, 'x'))).toBe(12);
    });

    it('returns undefined when there is no resolvable sender', () => {
      expect(extractSenderId(messageUpdate({ text: 'hi' }))).toBeUndefined();
      expect(extractSenderId(inlineQueryUpdate(13, 'q'))).toBeUndefined();
      expect(extractSenderId(shippingQueryUpdate(14))).toBeUndefined();
      expect(extractSenderId(emptyUpdate())).toBeUndefined();
    });
  });
});
