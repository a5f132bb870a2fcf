import { CacheError } from '@repowarden/shared';

const SEPARATOR = '=';

/**
 * Parses `key=value` lines. Only the first `=` separates, so values may
 * contain `=`. Blank lines and lines without a separator are ignored.
 */
export function parseCacheFile(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of content.split(/\r?\n/)) {
    const index = line.indexOf(SEPARATOR);
    if (index <= 0) continue;
    entries.set(line.slice(0, index), line.slice(index + 1));
  }
  return entries;
}

export function serializeCacheFile(entries: ReadonlyMap<string, string>): string {
  let output = '';
  for (const [key, value] of entries) {
    output += `${key}${SEPARATOR}${value}\n`;
  }
  return output;
}

/**
 * Rejects keys and values the line format cannot round-trip.
 */
export function assertStorable(key: string, value?: string): void {
  if (key.length === 0 || key.includes(SEPARATOR) || /[\r\n]/.test(key)) {
    throw new CacheError(`Invalid cache key: ${JSON.stringify(key)}`, {
      details: { key },
    });
  }
  if (value !== undefined && /[\r\n]/.test(value)) {
    throw new CacheError(`Cache value for "${key}" must not contain line breaks`, {
      details: { key },
    });
  }
}
