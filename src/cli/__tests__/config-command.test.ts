/**
 * Tests for the config command.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';
import { ConfigStore } from '../../store/config-store.js';
import { ConfigLoader } from '../../core/loader.js';
import { ExitCode } from '../../types/exit-codes.js';
import { parseValue, registerConfigCommand } from '../config-command.js';

describe('parseValue', () => {
  it.each([
    ['true', true],
    ['false', false],
    ['null', null],
    ['42', 42],
    ['-3', -3],
    ['1.5', 1.5],
    ['[1,2]', [1, 2]],
    ['{"a":1}', { a: 1 }],
    ['plain text', 'plain text'],
  ])('parses %s', (input, expected) => {
    expect(parseValue(input)).toEqual(expected);
  });
});

describe('config command', () => {
  let tempDir: string;
  let out: string[];
  let store: ConfigStore;
  let program: Command;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'flagstack-test-'));
    out = [];
    store = new ConfigStore({ env: {} });
    const loader = new ConfigLoader(store, { load: (s) => s.readConfig('server:\n  port: 8080\n', 'yaml') });
    program = new Command('app').exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });
    registerConfigCommand(program, {
      loader,
      write: (text) => {
        out.push(text);
      },
    });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('gets a value with its environment variable name', async () => {
    await program.parseAsync(['config', 'get', 'server.port'], { from: 'user' });
    expect(out).toEqual(['{"key":"server.port","value":8080,"env":"SERVER_PORT"}\n']);
  });

  it('prints null for a missing key', async () => {
    await program.parseAsync(['config', 'get', 'missing'], { from: 'user' });
    expect(out).toEqual(['{"key":"missing","value":null,"env":"MISSING"}\n']);
  });

  it('lists the merged settings', async () => {
    await program.parseAsync(['config', 'list'], { from: 'user' });
    expect(out).toEqual(['{"file":null,"config":{"server":{"port":8080}}}\n']);
  });

  it('sets a value and writes it to a file', async () => {
    const file = join(tempDir, 'app.json');
    await program.parseAsync(['config', 'set', 'server.host', 'example.test', '--file', file], { from: 'user' });

    expect(out).toEqual([`{"key":"server.host","value":"example.test","written":${JSON.stringify(file)}}\n`]);
    expect(JSON.parse(await readFile(file, 'utf8'))).toEqual({ server: { port: 8080, host: 'example.test' } });
    expect(store.get('server.host')).toBe('example.test');
  });

  it('writes the config to a named file', async () => {
    const file = join(tempDir, 'dump.yaml');
    await program.parseAsync(['config', 'write', file], { from: 'user' });

    expect(out).toEqual([`{"written":${JSON.stringify(file)}}\n`]);
    expect(await readFile(file, 'utf8')).toBe('server:\n  port: 8080\n');
  });

  it('fails to write when no config file is in use', async () => {
    await expect(program.parseAsync(['config', 'write'], { from: 'user' })).rejects.toMatchObject({
      code: ExitCode.CONFIG_ERROR,
    });
  });
});
