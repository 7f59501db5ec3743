import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigService, ENV_KEYS, parseScopes, isConfigKey } from '../../src/services/config.js';
import { ConfigurationError } from '../../src/lib/errors.js';
import { loggers } from '../../src/lib/logger.js';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

describe('ConfigService', () => {
  let configService: ConfigService;
  let testConfigDir: string;
  let testConfigPath: string;

  beforeEach(() => {
    // Isolate from the developer's environment
    for (const name of Object.values(ENV_KEYS)) {
      vi.stubEnv(name, '');
    }

    testConfigDir = fs.mkdtempSync(path.join(os.tmpdir(), 'oadr3-config-test-'));
    testConfigPath = path.join(testConfigDir, 'config.json');
    configService = new ConfigService(testConfigPath);
  });

  afterEach(() => {
    if (fs.existsSync(testConfigDir)) {
      fs.rmSync(testConfigDir, { recursive: true });
    }
    vi.unstubAllEnvs();
  });

  describe('get/set', () => {
    it('should return undefined for a key that is not set', () => {
      expect(configService.get('clientId')).toBeUndefined();
    });

    it('should persist values to file', () => {
      configService.set('clientId', 'persistent-id');
      configService.set('scopes', ['read_all']);

      const reloaded = new ConfigService(testConfigPath);
      expect(reloaded.get('clientId')).toBe('persistent-id');
      expect(reloaded.get('scopes')).toEqual(['read_all']);
    });

    it('should write the file readable by the owner only', () => {
      configService.set('clientSecret', 'test-secret');

      if (process.platform !== 'win32') {
        expect(fs.statSync(testConfigPath).mode & 0o777).toBe(0o600);
      }
    });

    it('should delete and clear values', () => {
      configService.set('clientId', 'id');
      configService.set('vtnBaseUrl', 'https://vtn.example.com');

      configService.delete('clientId');
      expect(configService.getAll()).toEqual({ vtnBaseUrl: 'https://vtn.example.com' });

      configService.clear();
      expect(configService.getAll()).toEqual({});
    });
  });

  describe('setFromString', () => {
    it('should split scopes on commas', () => {
      configService.setFromString('scopes', 'read_all, write_events,,');
      expect(configService.get('scopes')).toEqual(['read_all', 'write_events']);
    });

    it('should parse the leeway as a number', () => {
      configService.setFromString('leewaySeconds', '15');
      expect(configService.get('leewaySeconds')).toBe(15);
    });

    it('should reject an invalid value', () => {
      expect(() => configService.setFromString('clientAuthMethod', 'private_key_jwt')).toThrow(
        'Invalid value for clientAuthMethod: private_key_jwt'
      );
      expect(() => configService.setFromString('leewaySeconds', 'soon')).toThrow(ConfigurationError);
    });
  });

  describe('load', () => {
    it('should ignore a config file that does not match the schema', () => {
      const warnSpy = vi.spyOn(loggers.cli, 'warn').mockImplementation(() => {});
      fs.writeFileSync(testConfigPath, JSON.stringify({ leewaySeconds: 'thirty' }));

      const service = new ConfigService(testConfigPath);

      expect(service.getAll()).toEqual({});
      expect(warnSpy).toHaveBeenCalledWith('Ignoring invalid config file', { path: testConfigPath });
    });

    it('should ignore a config file that is not JSON', () => {
      vi.spyOn(loggers.cli, 'warn').mockImplementation(() => {});
      fs.writeFileSync(testConfigPath, '{ not json');

      expect(new ConfigService(testConfigPath).getAll()).toEqual({});
    });
  });

  describe('environment', () => {
    it('should prefer environment variables over the file', () => {
      configService.set('clientId', 'file-id');
      vi.stubEnv('OAUTH_CLIENT_ID', 'env-id');

      expect(configService.getClientId()).toBe('env-id');
    });

    it('should fall back to the file when the variable is empty', () => {
      configService.set('tokenUrl', 'https://auth.example.com/token');
      expect(configService.getTokenUrl()).toBe('https://auth.example.com/token');
    });

    it('should read comma separated scopes', () => {
      vi.stubEnv('OAUTH_SCOPES', 'read_all,write_reports');
      expect(configService.getScopes()).toEqual(['read_all', 'write_reports']);
    });

    it('should reject an unknown client authentication method', () => {
      vi.stubEnv('OAUTH_CLIENT_AUTH_METHOD', 'tls_client_auth');
      expect(() => configService.getClientAuthMethod()).toThrow(ConfigurationError);
    });

    it('should reject a negative leeway', () => {
      vi.stubEnv('OAUTH_TOKEN_LEEWAY_SECONDS', '-5');
      expect(() => configService.getLeewaySeconds()).toThrow(
        'OAUTH_TOKEN_LEEWAY_SECONDS must be a non-negative number, got -5'
      );
    });
  });

  describe('getTokenProviderConfig', () => {
    it('should name every missing setting', () => {
      configService.set('clientId', 'id');

      try {
        configService.getTokenProviderConfig();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toMatchObject({
          message: 'Missing configuration: OAUTH_TOKEN_ENDPOINT, OAUTH_CLIENT_SECRET',
          missingKeys: ['OAUTH_TOKEN_ENDPOINT', 'OAUTH_CLIENT_SECRET'],
        });
      }
    });

    it('should assemble the provider configuration', () => {
      vi.stubEnv('OAUTH_TOKEN_ENDPOINT', 'https://auth.example.com/token');
      vi.stubEnv('OAUTH_CLIENT_ID', 'ven-1');
      vi.stubEnv('OAUTH_CLIENT_SECRET', 'test-secret');
      vi.stubEnv('OAUTH_CLIENT_AUTH_METHOD', 'client_secret_basic');
      vi.stubEnv('OAUTH_TOKEN_LEEWAY_SECONDS', '10');
      configService.set('scopes', ['read_all']);

      expect(configService.getTokenProviderConfig()).toEqual({
        tokenUrl: 'https://auth.example.com/token',
        clientId: 'ven-1',
        clientSecret: 'test-secret',
        scopes: ['read_all'],
        clientAuthMethod: 'client_secret_basic',
        leewaySeconds: 10,
      });
    });
  });
});

describe('parseScopes', () => {
  it('should trim and drop blanks', () => {
    expect(parseScopes(' a , b,, c ')).toEqual(['a', 'b', 'c']);
    expect(parseScopes('')).toEqual([]);
  });
});

describe('isConfigKey', () => {
  it('should accept known keys only', () => {
    expect(isConfigKey('vtnBaseUrl')).toBe(true);
    expect(isConfigKey('password')).toBe(false);
  });
});
