/**
 * Cache-Control directive parsing
 */

import type { Directive, HeaderList } from './types.mjs';
import { getHeaders, splitHeaderElements } from './headers.mjs';

export const CACHE_CONTROL = 'Cache-Control';

/**
 * Parse a single Cache-Control header value into directives
 */
export function parseCacheControl(header: string | undefined | null): Directive[] {
  if (!header) {
    return [];
  }

  return splitHeaderElements(header).map((part) => {
    const eq = part.indexOf('=');
    if (eq === -1) {
      return { name: part.toLowerCase() };
    }
    const name = part.slice(0, eq).trim().toLowerCase();
    return { name, value: unquote(part.slice(eq + 1).trim()) };
  });
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return value;
}

/**
 * Merge directives from every Cache-Control header, in order
 */
export function getCacheControlDirectives(headers: HeaderList): Directive[] {
  return getHeaders(headers, CACHE_CONTROL).flatMap((h) => parseCacheControl(h.value));
}

export function findDirectives(directives: readonly Directive[], name: string): Directive[] {
  const lowerName = name.toLowerCase();
  return directives.filter((d) => d.name === lowerName);
}

export function hasDirective(directives: readonly Directive[], name: string): boolean {
  return findDirectives(directives, name).length > 0;
}

/**
 * Parse a directive argument as a signed integer.
 * Returns undefined for a missing or malformed argument.
 */
export function parseDirectiveInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) return undefined;
  return Number(trimmed);
}

/**
 * A directive with no argument, or an empty one
 */
export function isBareDirective(directive: Directive): boolean {
  return directive.value === undefined || directive.value.trim() === '';
}

/**
 * Smallest argument among directives with the given name, clamped at 0.
 * Malformed arguments count as 0; undefined when the directive is absent.
 */
export function getMinimumDirectiveSeconds(
  directives: readonly Directive[],
  name: string
): number | undefined {
  let result: number | undefined;
  for (const directive of findDirectives(directives, name)) {
    const parsed = parseDirectiveInteger(directive.value);
    const seconds = parsed === undefined ? 0 : Math.max(0, parsed);
    result = result === undefined ? seconds : Math.min(result, seconds);
  }
  return result;
}
