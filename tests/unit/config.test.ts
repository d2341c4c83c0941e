import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import os from 'os';
import path from 'path';
import { DEFAULT_TIMEOUT_MS, getConfig, log } from '../../src/config.js';

const MANAGED_VARS = [
  'ANSIBLE_BASE_URL',
  'ANSIBLE_TOKEN',
  'ANSIBLE_USERNAME',
  'ANSIBLE_PASSWORD',
  'ANSIBLE_TIMEOUT_MS',
  'ANSIBLE_VERIFY_SSL',
  'AWX_TOOLS_ENV',
  'AWX_TOOLS_CONFIG',
  'AWX_TOOLS_EXPOSURE',
  'AWX_TOOLS_GROUPS',
];

describe('Config', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    for (const name of MANAGED_VARS) {
      delete process.env[name];
    }
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    vi.restoreAllMocks();
  });

  describe('getConfig', () => {
    it('should return default values when env vars are not set', () => {
      const config = getConfig();

      expect(config.env).toBe('dev');
      expect(config.instance).toBeUndefined();
      expect(config.instancesPath).toBe(path.join(os.homedir(), '.awx-tools', 'config.yaml'));
      expect(config.exposure).toBe('tools');
      expect(config.allowedGroups).toBeUndefined();
    });

    it('should build the default instance from ANSIBLE_* variables', () => {
      process.env.ANSIBLE_BASE_URL = '  https://awx.example.test  ';
      process.env.ANSIBLE_TOKEN = 'test-token';

      const config = getConfig();

      expect(config.instance).toEqual({
        name: 'default',
        baseUrl: 'https://awx.example.test',
        token: 'test-token',
        timeoutMs: DEFAULT_TIMEOUT_MS,
        verifySsl: true,
      });
    });

    it('should read username and password', () => {
      process.env.ANSIBLE_BASE_URL = 'https://awx.example.test';
      process.env.ANSIBLE_USERNAME = 'admin';
      process.env.ANSIBLE_PASSWORD = 'test-secret';

      const config = getConfig();

      expect(config.instance?.username).toBe('admin');
      expect(config.instance?.password).toBe('test-secret');
      expect(config.instance?.token).toBeUndefined();
    });

    it('should parse ANSIBLE_TIMEOUT_MS and fall back on bad values', () => {
      process.env.ANSIBLE_BASE_URL = 'https://awx.example.test';

      process.env.ANSIBLE_TIMEOUT_MS = '5000';
      expect(getConfig().instance?.timeoutMs).toBe(5000);

      process.env.ANSIBLE_TIMEOUT_MS = 'soon';
      expect(getConfig().instance?.timeoutMs).toBe(30_000);

      process.env.ANSIBLE_TIMEOUT_MS = '-1';
      expect(getConfig().instance?.timeoutMs).toBe(30_000);
    });

    it('should only disable TLS verification for explicit false values', () => {
      process.env.ANSIBLE_BASE_URL = 'https://awx.example.test';

      for (const value of ['false', 'FALSE', '0', 'no', 'off']) {
        process.env.ANSIBLE_VERIFY_SSL = value;
        expect(getConfig().instance?.verifySsl).toBe(false);
      }
      for (const value of ['true', '1', 'yes', '']) {
        process.env.ANSIBLE_VERIFY_SSL = value;
        expect(getConfig().instance?.verifySsl).toBe(true);
      }
    });

    it('should use AWX_TOOLS_CONFIG when set', () => {
      process.env.AWX_TOOLS_CONFIG = '/etc/awx-tools/instances.yaml';

      expect(getConfig().instancesPath).toBe('/etc/awx-tools/instances.yaml');
    });

    it('should only accept "facades" as an alternative exposure', () => {
      process.env.AWX_TOOLS_EXPOSURE = 'facades';
      expect(getConfig().exposure).toBe('facades');

      process.env.AWX_TOOLS_EXPOSURE = 'everything';
      expect(getConfig().exposure).toBe('tools');
    });

    it('should parse AWX_TOOLS_GROUPS as a comma-separated list', () => {
      process.env.AWX_TOOLS_GROUPS = 'roles, users,,jobs ';
      expect(getConfig().allowedGroups).toEqual(['roles', 'users', 'jobs']);

      process.env.AWX_TOOLS_GROUPS = ' , ';
      expect(getConfig().allowedGroups).toBeUndefined();
    });
  });

  describe('log', () => {
    it('should write prefixed messages to stderr in dev environment', () => {
      process.env.AWX_TOOLS_ENV = 'dev';
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      log('Test message', 42);

      expect(spy).toHaveBeenCalledWith('[awx-tools] Test message', 42);
    });

    it('should stay silent outside dev', () => {
      process.env.AWX_TOOLS_ENV = 'production';
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      log('Test message');

      expect(spy).not.toHaveBeenCalled();
    });
  });
});
