/**
 * Tests for the process-wide config facade.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { ConfigStore } from '../../store/config-store.js';
import { ExitCode } from '../../types/exit-codes.js';
import {
  get,
  getInt,
  getLoader,
  getStore,
  getString,
  loaderFor,
  readInConfig,
  resetConfig,
  set,
  unmarshal,
  unmarshalKey,
  writeConfig,
} from '../config.js';

const YAML = `
name: demo
server:
  port: 8080
  host: localhost
`;

describe('config facade', () => {
  beforeEach(() => {
    resetConfig({ load: (store) => store.readConfig(YAML, 'yaml') });
  });

  afterEach(() => {
    resetConfig();
  });

  it('loads before the first read', () => {
    expect(getLoader().isLoaded()).toBe(false);
    expect(getString('name')).toBe('demo');
    expect(getLoader().isLoaded()).toBe(true);
  });

  it('reads typed values', () => {
    expect(get('server.port')).toBe(8080);
    expect(getInt('server.port')).toBe(8080);
    expect(getString('server.port')).toBe('8080');
  });

  it('applies overrides', () => {
    readInConfig();
    set('server.port', 9090);
    expect(getInt('server.port')).toBe(9090);
  });

  it('decodes records', () => {
    const server = unmarshalKey('server', z.object({ port: z.number().int(), host: z.string() }), {});
    expect(server).toEqual({ port: 8080, host: 'localhost' });

    const root = unmarshal(z.object({ name: z.string() }), { name: '' });
    expect(root).toEqual({ name: 'demo' });
  });

  it('shares the loader of the process-wide store', () => {
    expect(getLoader().getStore()).toBe(getStore());
    expect(loaderFor(getStore())).toBe(getLoader());
  });

  it('creates one loader per store', () => {
    const store = new ConfigStore();
    expect(loaderFor(store)).toBe(loaderFor(store));
  });

  it('replaces the store on reset', () => {
    const before = getStore();
    resetConfig();
    expect(getStore()).not.toBe(before);
  });

  it('refuses to write without a config file', async () => {
    await expect(writeConfig()).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
  });
});
