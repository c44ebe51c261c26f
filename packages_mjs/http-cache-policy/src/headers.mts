/**
 * Header multi-map and HTTP-date helpers
 */

import type { HeaderInit, HeaderList, HttpHeader } from './types.mjs';

/**
 * Build an immutable header list from a record or an existing list.
 * Array values in a record become repeated headers.
 */
export function toHeaderList(init: HeaderInit | undefined): HeaderList {
  if (!init) {
    return Object.freeze([]);
  }

  if (isHeaderList(init)) {
    return Object.freeze(init.map((h) => Object.freeze({ name: h.name, value: h.value })));
  }

  const headers: HttpHeader[] = [];
  for (const [name, value] of Object.entries(init)) {
    if (typeof value === 'string') {
      headers.push(Object.freeze({ name, value }));
    } else if (value !== undefined) {
      for (const item of value) {
        headers.push(Object.freeze({ name, value: item }));
      }
    }
  }
  return Object.freeze(headers);
}

function isHeaderList(init: HeaderInit): init is HeaderList {
  return Array.isArray(init);
}

/**
 * All headers with the given name, in order
 */
export function getHeaders(headers: HeaderList, name: string): HttpHeader[] {
  const lowerName = name.toLowerCase();
  return headers.filter((h) => h.name.toLowerCase() === lowerName);
}

/**
 * First header with the given name
 */
export function getFirstHeader(headers: HeaderList, name: string): HttpHeader | undefined {
  const lowerName = name.toLowerCase();
  return headers.find((h) => h.name.toLowerCase() === lowerName);
}

/**
 * Get header value case-insensitively (first occurrence)
 */
export function getHeaderValue(headers: HeaderList, name: string): string | undefined {
  return getFirstHeader(headers, name)?.value;
}

export function containsHeader(headers: HeaderList, name: string): boolean {
  return getFirstHeader(headers, name) !== undefined;
}

/**
 * Remove every header with the given name
 */
export function removeHeaders(headers: HeaderList, name: string): HeaderList {
  const lowerName = name.toLowerCase();
  return Object.freeze(headers.filter((h) => h.name.toLowerCase() !== lowerName));
}

/**
 * Replace the first header with the given name in place and drop later ones,
 * or append when the name is absent
 */
export function setHeader(headers: HeaderList, name: string, value: string): HeaderList {
  const lowerName = name.toLowerCase();
  const result: HttpHeader[] = [];
  let replaced = false;

  for (const h of headers) {
    if (h.name.toLowerCase() !== lowerName) {
      result.push(h);
    } else if (!replaced) {
      result.push(Object.freeze({ name: h.name, value }));
      replaced = true;
    }
  }

  if (!replaced) {
    result.push(Object.freeze({ name, value }));
  }
  return Object.freeze(result);
}

/**
 * Append a header, keeping any existing ones with the same name
 */
export function addHeader(headers: HeaderList, name: string, value: string): HeaderList {
  return Object.freeze([...headers, Object.freeze({ name, value })]);
}

/**
 * Flatten to a record with lowercase keys; repeated values are comma-joined
 */
export function headersToRecord(headers: HeaderList): Record<string, string> {
  const result: Record<string, string> = {};
  for (const { name, value } of headers) {
    const key = name.toLowerCase();
    result[key] = key in result ? `${result[key]}, ${value}` : value;
  }
  return result;
}

/**
 * Split a header value into comma-separated elements, ignoring commas
 * inside quoted strings
 */
export function splitHeaderElements(value: string): string[] {
  const elements: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '"') {
      quoted = !quoted;
      current += ch;
    } else if (ch === '\\' && quoted && i + 1 < value.length) {
      current += ch + value[i + 1];
      i++;
    } else if (ch === ',' && !quoted) {
      elements.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  elements.push(current);

  return elements.map((e) => e.trim()).filter((e) => e.length > 0);
}

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// Sun, 06 Nov 1994 08:49:37 GMT
const IMF_FIXDATE = /^[a-z]{3}, (\d{1,2}) ([a-z]{3}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/i;
// Sunday, 06-Nov-94 08:49:37 GMT
const RFC_850_DATE = /^[a-z]{6,9}, (\d{2})-([a-z]{3})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) GMT$/i;
// Sun Nov  6 08:49:37 1994
const ASCTIME_DATE = /^[a-z]{3} ([a-z]{3}) {1,2}(\d{1,2}) (\d{2}):(\d{2}):(\d{2}) (\d{4})$/i;

interface HttpDateParts {
  year: number;
  month: string;
  day: string;
  time: [string, string, string];
}

function matchHttpDate(value: string): HttpDateParts | undefined {
  let m = IMF_FIXDATE.exec(value);
  if (m) {
    return { day: m[1], month: m[2], year: Number(m[3]), time: [m[4], m[5], m[6]] };
  }

  m = RFC_850_DATE.exec(value);
  if (m) {
    const yy = Number(m[3]);
    return {
      day: m[1],
      month: m[2],
      year: yy >= 70 ? 1900 + yy : 2000 + yy,
      time: [m[4], m[5], m[6]],
    };
  }

  m = ASCTIME_DATE.exec(value);
  if (m) {
    return { month: m[1], day: m[2], year: Number(m[6]), time: [m[3], m[4], m[5]] };
  }
  return undefined;
}

/**
 * Parse an HTTP date to epoch ms. Accepts IMF-fixdate, RFC 850 and asctime,
 * all read as GMT; anything else is undefined.
 */
export function parseHttpDate(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parts = matchHttpDate(value.trim());
  if (!parts) return undefined;

  const month = MONTHS.indexOf(parts.month.toLowerCase());
  const day = Number(parts.day);
  const [hour, minute, second] = parts.time.map(Number);
  if (month === -1 || hour > 23 || minute > 59 || second > 60) return undefined;

  const time = Date.UTC(parts.year, month, day, hour, minute, second);
  // Date.UTC rolls 31 Feb over into March
  if (new Date(time).getUTCDate() !== day) return undefined;
  return time;
}

/**
 * Format epoch ms as an RFC 1123 date
 */
export function formatHttpDate(epochMs: number): string {
  return new Date(epochMs).toUTCString();
}

/**
 * Parse the first header with the given name as a date
 */
export function getDateHeader(headers: HeaderList, name: string): number | undefined {
  return parseHttpDate(getHeaderValue(headers, name));
}

/**
 * True if any header with the given name holds a parseable date
 */
export function hasValidDateHeader(headers: HeaderList, name: string): boolean {
  return getHeaders(headers, name).some((h) => parseHttpDate(h.value) !== undefined);
}
