import { cosmiconfigSync } from 'cosmiconfig';

export const FIREWALL_URL_ENV = 'PIP_WARDEN_FIREWALL_URL';

export interface PipWardenConfig {
  firewallUrl: string;
  timeoutMs: number;
  connectivityTimeoutMs: number;
  pipCommand: string[];
}

export const defaultConfig: PipWardenConfig = {
  firewallUrl: 'http://127.0.0.1:8000',
  timeoutMs: 30_000,
  connectivityTimeoutMs: 5_000,
  pipCommand: ['pip'],
};

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isCommand(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.length > 0 &&
    value.every((part) => typeof part === 'string' && part.length > 0)
  );
}

/**
 * Keeps the keys of a loaded config file that have the right shape. Unknown
 * keys are ignored; keys of the wrong type warn and keep their default.
 */
export function normalizeConfig(raw: unknown): PipWardenConfig {
  const config: PipWardenConfig = { ...defaultConfig, pipCommand: [...defaultConfig.pipCommand] };
  if (typeof raw !== 'object' || raw === null) return config;

  const fields = new Map(Object.entries(raw));
  const reject = (key: string) =>
    console.warn(`Warning: Ignoring invalid value for "${key}" in configuration file.`);

  if (fields.has('firewallUrl')) {
    const value = fields.get('firewallUrl');
    if (typeof value === 'string' && value.trim()) config.firewallUrl = value.trim();
    else reject('firewallUrl');
  }
  if (fields.has('timeoutMs')) {
    const value = fields.get('timeoutMs');
    if (isPositiveNumber(value)) config.timeoutMs = value;
    else reject('timeoutMs');
  }
  if (fields.has('connectivityTimeoutMs')) {
    const value = fields.get('connectivityTimeoutMs');
    if (isPositiveNumber(value)) config.connectivityTimeoutMs = value;
    else reject('connectivityTimeoutMs');
  }
  if (fields.has('pipCommand')) {
    const value = fields.get('pipCommand');
    if (isCommand(value)) config.pipCommand = [...value];
    else reject('pipCommand');
  }

  return config;
}

export function loadConfig(
  searchFrom: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): PipWardenConfig {
  let config = normalizeConfig(undefined);
  const explorer = cosmiconfigSync('pipwarden');
  try {
    const result = explorer.search(searchFrom);
    if (result && result.config) {
      config = normalizeConfig(result.config);
    }
  } catch (error) {
    console.warn('Warning: Failed to load configuration file:', error);
  }

  const override = env[FIREWALL_URL_ENV]?.trim();
  if (override) config.firewallUrl = override;
  return config;
}
