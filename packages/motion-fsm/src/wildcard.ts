/**
 * Wildcard pattern matching for bus event names
 *
 * Supports:
 * - * (single segment wildcard): fsm:enter:* matches fsm:enter:IDLE
 * - ** (multi-segment wildcard): fsm:** matches fsm:enter:IDLE, fsm:reset
 *
 * Compiled patterns are cached.
 */

const patternCache = new Map<string, RegExp>();

const MAX_CACHE_SIZE = 100;

const escapeRegex = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const patternToRegex = (pattern: string, delimiter: string): RegExp => {
  const escapedDelimiter = escapeRegex(delimiter);

  if (pattern === '*') {
    return new RegExp(`^[^${escapedDelimiter}]+$`);
  }
  if (pattern === '**') {
    return /^.*$/;
  }

  // Escape everything except the wildcards, then expand them
  const body = pattern
    .split('**')
    .map((part) =>
      part
        .split('*')
        .map(escapeRegex)
        .join(`[^${escapedDelimiter}]+`)
    )
    .join('.*');

  return new RegExp(`^${body}$`);
};

export const hasWildcard = (pattern: string): boolean => pattern.includes('*');

/**
 * Get compiled RegExp for a wildcard pattern (with caching)
 */
export const getPatternRegex = (pattern: string, delimiter: string = ':'): RegExp => {
  const cacheKey = `${pattern}::${delimiter}`;

  let regex = patternCache.get(cacheKey);

  if (!regex) {
    regex = patternToRegex(pattern, delimiter);

    // Evict the oldest entry once full
    if (patternCache.size >= MAX_CACHE_SIZE) {
      const firstKey = patternCache.keys().next().value;
      if (firstKey !== undefined) {
        patternCache.delete(firstKey);
      }
    }

    patternCache.set(cacheKey, regex);
  }

  return regex;
};

export const matchesPattern = (
  eventName: string,
  pattern: string,
  delimiter: string = ':'
): boolean => {
  if (!hasWildcard(pattern)) {
    return eventName === pattern;
  }
  return getPatternRegex(pattern, delimiter).test(eventName);
};

/**
 * Find all registered patterns that match an event name
 */
export const findMatchingPatterns = (
  eventName: string,
  patterns: Iterable<string>,
  delimiter: string = ':'
): string[] => {
  const matches: string[] = [];
  for (const pattern of patterns) {
    if (matchesPattern(eventName, pattern, delimiter)) {
      matches.push(pattern);
    }
  }
  return matches;
};

export const clearPatternCache = (): void => {
  patternCache.clear();
};

export const getCacheSize = (): number => patternCache.size;
