import { newFilter, type Filter } from './Filter.js';

export function alwaysTrue(): Filter {
  return newFilter(() => true);
}

export function alwaysFalse(): Filter {
  return newFilter(() => false);
}

/** Behaves like `||`: true as soon as one filter passes, false when none do (or none are given). */
export function or(...filters: Filter[]): Filter {
  const list = [...filters];
  return newFilter((update) => list.some((filter) => filter.check(update)));
}

/** Behaves like `&&`: false as soon as one filter fails, true when all pass (or none are given). */
export function and(...filters: Filter[]): Filter {
  const list = [...filters];
  return newFilter((update) => list.every((filter) => filter.check(update)));
}

export function not(filter: Filter): Filter {
  return newFilter((update) => !filter.check(update));
}
