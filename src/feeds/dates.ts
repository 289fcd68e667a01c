/**
 * FeedSync — Feed Dates
 */

/**
 * Parse an RSS (RFC 2822) or Atom (ISO 8601) date into Unix seconds.
 * Returns undefined for missing or unparsable values.
 */
export function parseFeedDate(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const ms = Date.parse(value.trim());
  return Number.isNaN(ms) ? undefined : Math.floor(ms / 1000);
}
