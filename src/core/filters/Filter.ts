import type TelegramBot from 'node-telegram-bot-api';

export type Update = TelegramBot.Update;

export type FilterFunc = (update: Update) => boolean;

/** A reusable predicate over incoming updates. */
export interface Filter {
  check(update: Update): boolean;
}

export class PredicateFilter implements Filter {
  constructor(private readonly predicate: FilterFunc) {}

  check(update: Update): boolean {
    return this.predicate(update);
  }
}

export function newFilter(predicate: FilterFunc): Filter {
  return new PredicateFilter(predicate);
}
