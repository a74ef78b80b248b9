const RANGE_PREFIX = /^[\^~>=<]+/
const VERSION_TOKEN = /^\d+(?:\.\d+)*/

export function leadingVersion(text: string): string | undefined {
  return text.trim().match(VERSION_TOKEN)?.[0]
}

/**
 * Reduce an npm range such as `^4.17.1` or `>=1.2 <2` to the version it starts from.
 * Anything without a leading numeric token (`latest`, `*`, git urls) has no version.
 */
export function normalizeVersion(range: string): string | undefined {
  return leadingVersion(range.trim().replace(RANGE_PREFIX, ''))
}
