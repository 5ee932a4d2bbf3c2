/**
 * Canonical flag name derivation.
 */

/**
 * Convert an identifier to its hyphen-delimited lowercase flag name.
 *
 * `FirstParam` -> `first-param`, `maxHTTPRetries` -> `max-http-retries`,
 * `log_level` -> `log-level`. Applying it to its own output returns the same string.
 */
export function toFlagName(identifier: string): string {
  return identifier
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z]+)([A-Z][a-z0-9])/g, '$1-$2')
    .replace(/[\s_.]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-|-$/g, '')
    .toLowerCase();
}
