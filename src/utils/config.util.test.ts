import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, DEFAULT_CONFIG, isConfigKey, normalizeConfig, parseConfigValue } from './config.util';

describe('normalizeConfig', () => {
  it('fills missing fields with defaults', () => {
    expect(normalizeConfig({ interfaceName: ' wlp2s0 ' })).toEqual({ ...DEFAULT_CONFIG, interfaceName: 'wlp2s0' });
  });

  it('drops invalid values', () => {
    expect(normalizeConfig({ groupOwnerIntent: 16, discoveryTimeout: -1, verbose: 'yes', interfaceName: '' })).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults for non-objects', () => {
    expect(normalizeConfig(null)).toEqual(DEFAULT_CONFIG);
    expect(normalizeConfig('wlan0')).toEqual(DEFAULT_CONFIG);
  });
});

describe('parseConfigValue', () => {
  it('parses each key', () => {
    expect(parseConfigValue('interfaceName', 'wlp3s0')).toBe('wlp3s0');
    expect(parseConfigValue('groupOwnerIntent', '15')).toBe(15);
    expect(parseConfigValue('discoveryTimeout', '2.5')).toBe(2.5);
    expect(parseConfigValue('verbose', 'false')).toBe(false);
  });

  it('rejects invalid values', () => {
    expect(() => parseConfigValue('interfaceName', 'wlan0; reboot')).toThrow("Invalid interface name 'wlan0; reboot'");
    expect(() => parseConfigValue('groupOwnerIntent', '3.5')).toThrow('groupOwnerIntent must be an integer between 0 and 15');
    expect(() => parseConfigValue('discoveryTimeout', '0')).toThrow('discoveryTimeout must be a positive number of seconds');
    expect(() => parseConfigValue('verbose', 'yes')).toThrow("verbose must be 'true' or 'false'");
  });
});

describe('isConfigKey', () => {
  it('accepts only known keys', () => {
    expect(isConfigKey('groupOwnerIntent')).toBe(true);
    expect(isConfigKey('password')).toBe(false);
  });
});

describe('ConfigManager', () => {
  let dir: string;
  let manager: ConfigManager;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wifi-direct-config-'));
    manager = new ConfigManager(path.join(dir, 'nested'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('uses defaults when no file exists', async () => {
    await expect(manager.load()).resolves.toEqual(DEFAULT_CONFIG);
    expect(manager.getConfigPath()).toBe(path.join(dir, 'nested', 'config.json'));
  });

  it('persists a changed setting', async () => {
    await expect(manager.set('groupOwnerIntent', '7')).resolves.toEqual({ ...DEFAULT_CONFIG, groupOwnerIntent: 7 });

    const stored = JSON.parse(await fs.readFile(manager.getConfigPath(), 'utf-8'));
    expect(stored).toEqual({ ...DEFAULT_CONFIG, groupOwnerIntent: 7 });
    await expect(new ConfigManager(path.join(dir, 'nested')).load()).resolves.toEqual(stored);
  });

  it('does not write a rejected value', async () => {
    await expect(manager.set('verbose', 'maybe')).rejects.toThrow("verbose must be 'true' or 'false'");
    await expect(fs.access(manager.getConfigPath())).rejects.toThrow();
  });

  it('falls back to defaults on malformed JSON', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    await manager.init();
    await fs.writeFile(manager.getConfigPath(), '{ not json');

    await expect(manager.load()).resolves.toEqual(DEFAULT_CONFIG);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
