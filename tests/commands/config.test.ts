import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runCli } from '../helpers/cli.js';
import { maskSecret } from '../../src/commands/config.js';
import { ENV_KEYS } from '../../src/services/config.js';

describe('maskSecret', () => {
  it('should keep the first and last two characters', () => {
    expect(maskSecret('test-secret')).toBe('te****et');
  });

  it('should hide short secrets entirely', () => {
    expect(maskSecret('abcd')).toBe('****');
  });

  it('should leave absent values alone', () => {
    expect(maskSecret(undefined)).toBeUndefined();
    expect(maskSecret('')).toBe('');
  });
});

describe('config command', () => {
  let configDir: string;
  let configPath: string;

  beforeEach(() => {
    for (const name of Object.values(ENV_KEYS)) {
      vi.stubEnv(name, '');
    }
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'oadr3-config-cmd-test-'));
    configPath = path.join(configDir, 'config.json');
    vi.stubEnv('OADR3_CONFIG_PATH', configPath);
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  it('should save a value to the config file', async () => {
    const run = await runCli(['config', 'set', 'clientId', 'test-client']);

    expect(JSON.parse(run.stdout)).toEqual({ success: true, key: 'clientId', path: configPath });
    expect(JSON.parse(fs.readFileSync(configPath, 'utf-8'))).toEqual({ clientId: 'test-client' });
  });

  it('should show the effective settings with the secret masked', async () => {
    await runCli(['config', 'set', 'clientSecret', 'test-secret']);
    await runCli(['config', 'set', 'scopes', 'read_all,write_reports']);
    vi.stubEnv('OAUTH_CLIENT_ID', 'env-client');

    const run = await runCli(['config', 'show']);

    expect(JSON.parse(run.stdout)).toEqual({
      success: true,
      config: { clientId: 'env-client', clientSecret: 'te****et', scopes: ['read_all', 'write_reports'] },
    });
  });

  it('should show one setting per line in table format', async () => {
    await runCli(['config', 'set', 'scopes', 'read_all,write_reports']);

    const run = await runCli(['--format', 'table', 'config', 'show']);

    expect(run.stdout.split('\n')).toEqual([
      'vtnBaseUrl: (not set)',
      'tokenUrl: (not set)',
      'clientId: (not set)',
      'clientSecret: (not set)',
      'scopes: read_all,write_reports',
      'clientAuthMethod: (not set)',
      'leewaySeconds: (not set)',
      'format: (not set)',
    ]);
  });

  it('should reject an unknown key', async () => {
    const run = await runCli(['config', 'set', 'password', 'test-secret']);

    expect(run.exitCode).toBe(3);
    expect(JSON.parse(run.stdout).error.code).toBe('CONFIGURATION_ERROR');
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('should reject a value of the wrong type', async () => {
    const run = await runCli(['config', 'set', 'leewaySeconds', 'soon']);

    expect(run.exitCode).toBe(3);
    expect(JSON.parse(run.stdout).error.message).toBe('Invalid value for leewaySeconds: soon');
  });

  it('should print the config file location', async () => {
    const run = await runCli(['config', 'path']);

    expect(run.stdout).toBe(configPath);
  });
});
