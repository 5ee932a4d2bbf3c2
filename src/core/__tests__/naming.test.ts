/**
 * Tests for flag name derivation.
 */

import { describe, it, expect } from 'vitest';
import { toFlagName } from '../naming.js';

describe('toFlagName', () => {
  it.each([
    ['FifthParam', 'fifth-param'],
    ['SixthParam', 'sixth-param'],
    ['firstParam', 'first-param'],
    ['maxHTTPRetries', 'max-http-retries'],
    ['userID', 'user-id'],
    ['v2Api', 'v2-api'],
    ['log_level', 'log-level'],
    ['config.file', 'config-file'],
    ['__leading', 'leading'],
    ['host', 'host'],
  ])('maps %s to %s', (input, expected) => {
    expect(toFlagName(input)).toBe(expected);
  });

  it('is idempotent', () => {
    for (const name of ['FifthParam', 'maxHTTPRetries', 'log_level', 'already-kebab']) {
      const once = toFlagName(name);
      expect(toFlagName(once)).toBe(once);
    }
  });
});
