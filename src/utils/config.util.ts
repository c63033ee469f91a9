import * as path from 'path';
import * as fs from 'fs/promises';
import * as os from 'os';

export interface WifiDirectConfig {
  interfaceName: string;
  groupOwnerIntent: number;
  discoveryTimeout: number;
  verbose: boolean;
}

export type ConfigKey = keyof WifiDirectConfig;

export const DEFAULT_CONFIG: Readonly<WifiDirectConfig> = {
  interfaceName: 'wlan0',
  groupOwnerIntent: 0,
  discoveryTimeout: 15,
  verbose: false,
};

const CONFIG_KEYS: readonly ConfigKey[] = ['interfaceName', 'groupOwnerIntent', 'discoveryTimeout', 'verbose'];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(k => k === key);
}

function isGroupOwnerIntent(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 15;
}

function isTimeout(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Build a complete config from whatever was stored. Fields that are missing
 * or invalid take their default.
 */
export function normalizeConfig(raw: unknown): WifiDirectConfig {
  const config: WifiDirectConfig = { ...DEFAULT_CONFIG };
  if (typeof raw !== 'object' || raw === null) return config;

  const stored = new Map(Object.entries(raw));
  const interfaceName = stored.get('interfaceName');
  const groupOwnerIntent = stored.get('groupOwnerIntent');
  const discoveryTimeout = stored.get('discoveryTimeout');
  const verbose = stored.get('verbose');

  if (typeof interfaceName === 'string' && interfaceName.trim()) config.interfaceName = interfaceName.trim();
  if (isGroupOwnerIntent(groupOwnerIntent)) config.groupOwnerIntent = groupOwnerIntent;
  if (isTimeout(discoveryTimeout)) config.discoveryTimeout = discoveryTimeout;
  if (typeof verbose === 'boolean') config.verbose = verbose;
  return config;
}

/**
 * Parse a value typed on the command line for the given key
 * @throws Error when the value is not valid for the key
 */
export function parseConfigValue(key: ConfigKey, value: string): WifiDirectConfig[ConfigKey] {
  switch (key) {
    case 'interfaceName': {
      if (!/^[\w.-]+$/.test(value)) {
        throw new Error(`Invalid interface name '${value}'`);
      }
      return value;
    }
    case 'groupOwnerIntent': {
      const intent = Number(value);
      if (!isGroupOwnerIntent(intent)) {
        throw new Error('groupOwnerIntent must be an integer between 0 and 15');
      }
      return intent;
    }
    case 'discoveryTimeout': {
      const timeout = Number(value);
      if (!isTimeout(timeout)) {
        throw new Error('discoveryTimeout must be a positive number of seconds');
      }
      return timeout;
    }
    case 'verbose': {
      if (value !== 'true' && value !== 'false') {
        throw new Error("verbose must be 'true' or 'false'");
      }
      return value === 'true';
    }
  }
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;

  constructor(configDir?: string) {
    const homeDir = os.homedir() || '/root';
    this.configDir = configDir ?? process.env.WIFI_DIRECT_CONFIG_DIR ?? path.join(homeDir, '.wifi_direct');
    this.configPath = path.join(this.configDir, 'config.json');
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async init() {
    await fs.mkdir(this.configDir, { recursive: true });
  }

  async load(): Promise<WifiDirectConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch {
      return { ...DEFAULT_CONFIG };
    }

    try {
      return normalizeConfig(JSON.parse(content));
    } catch (error) {
      console.error(`Error reading config ${this.configPath}:`, error);
      return { ...DEFAULT_CONFIG };
    }
  }

  async save(config: WifiDirectConfig): Promise<void> {
    await this.init();
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2));
  }

  async set(key: ConfigKey, value: string): Promise<WifiDirectConfig> {
    const config = await this.load();
    const updated = normalizeConfig({ ...config, [key]: parseConfigValue(key, value) });
    await this.save(updated);
    return updated;
  }
}
