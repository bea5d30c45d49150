/**
 * Skeletal Default Functions
 *
 * Helpers every template context gets before it is expanded.
 */

import type { Context } from './context.js';
import { EvaluationError } from './errors.js';
import { entriesOf, toText } from './values.js';

const DAYS_OF_WEEK = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday'
];

/** `2024-03-09...` -> `03/09/2024`; shorter input is returned as given */
export function formatDate(value: unknown): string {
  const s = toText(value);
  if (s.length < 10) return s;
  return `${s.slice(5, 7)}/${s.slice(8, 10)}/${s.slice(0, 4)}`;
}

/** Full weekday name of the ISO date in the first ten characters */
export function dayOfWeek(value: unknown): string {
  const s = toText(value).slice(0, 10);
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(s);
  if (!match) {
    throw new EvaluationError(`dayOfWeek(${JSON.stringify(s)})`, 'expected an ISO date (YYYY-MM-DD)');
  }
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return DAYS_OF_WEEK[date.getUTCDay()];
}

/** `2024-03-09T14:05:00Z` -> `2:05 PM`; shorter input is returned as given */
export function formatTime(value: unknown): string {
  const s = toText(value);
  if (s.length < 20) return s;

  let hour = parseInt(s.slice(11, 13), 10);
  const minutes = parseInt(s.slice(14, 16), 10);

  const am = hour >= 12 ? 'PM' : 'AM';
  if (hour > 12) hour -= 12;

  return `${hour}${minutes < 10 ? ':0' : ':'}${minutes} ${am}`;
}

function globToRegExp(glob: string): RegExp {
  let source = '';
  for (const ch of glob) {
    if (ch === '*') source += '.*';
    else if (ch === '?') source += '.';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`);
}

/**
 * Keep the entries of `obj` whose key passes `filters`.
 *
 * Filters are globs tried in order; the first match decides. A leading `-`
 * rejects, anything else keeps, and keys matching nothing are dropped, so
 * `["-secret*", "*"]` keeps everything except the secrets.
 */
export function filterKeys(obj: unknown, filters: unknown): Record<string, unknown> {
  const patterns = entriesOf(filters).map(([, filter]) => {
    const text = toText(filter);
    if (text.length === 0) {
      throw new EvaluationError('filterKeys', 'invalid filter: filters cannot be empty');
    }
    const reject = text[0] === '-';
    return { reject, pattern: globToRegExp(reject ? text.slice(1) : text) };
  });

  const result: Record<string, unknown> = {};
  for (const [key, value] of entriesOf(obj)) {
    const name = toText(key);
    const decision = patterns.find(p => p.pattern.test(name));
    if (decision && !decision.reject) result[name] = value;
  }
  return result;
}

/**
 * Replace `pairs[0]` with `pairs[1]`, `pairs[2]` with `pairs[3]` and so on,
 * in a single left-to-right pass. At each position the earliest match wins;
 * replaced text is never scanned again.
 */
export function multiReplace(text: string, ...pairs: string[]): string {
  if (pairs.length % 2 !== 0) {
    throw new TypeError('Skeletal: multiReplace() expects search/replacement pairs');
  }
  if (pairs.length === 0) return text;

  let out = '';
  let rest = text;
  while (rest.length > 0) {
    let nextIndex = rest.length;
    let nextPair = -1;

    for (let i = 0; i < pairs.length; i += 2) {
      if (pairs[i].length === 0) continue;
      const idx = rest.indexOf(pairs[i]);
      if (idx !== -1 && idx < nextIndex) {
        nextIndex = idx;
        nextPair = i;
      }
    }

    if (nextPair === -1) {
      out += rest;
      break;
    }
    out += rest.slice(0, nextIndex) + pairs[nextPair + 1];
    rest = rest.slice(nextIndex + pairs[nextPair].length);
  }
  return out;
}

/**
 * Bind the default helpers into `context`. `meta` and `data` get empty
 * objects when they are not already set, so templates can test them freely.
 */
export function addDefaultFunctions(context: Context): void {
  context.set('filterKeys', filterKeys);
  context.set('encodeURIComponent', (value: unknown) => encodeURIComponent(toText(value)));
  context.set('formatDate', formatDate);
  context.set('dayOfWeek', dayOfWeek);
  context.set('formatTime', formatTime);

  if (context.get('meta') == null) context.set('meta', {});
  if (context.get('data') == null) context.set('data', {});
}
