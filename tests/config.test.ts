import { defaultConfig, FIREWALL_URL_ENV, loadConfig, normalizeConfig } from '../src/config';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

describe('Configuration Loading', () => {
  let tempDir: string;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pip-warden-config-'));
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should return default config if no config file found', () => {
    const config = loadConfig('/non/existent/path', {});
    expect(config).toEqual(defaultConfig);
  });

  it('should merge a config file over the defaults', () => {
    fs.writeFileSync(
      path.join(tempDir, '.pipwardenrc.json'),
      JSON.stringify({ firewallUrl: 'http://firewall.internal:9000', pipCommand: ['python3', '-m', 'pip'] }),
    );

    expect(loadConfig(tempDir, {})).toEqual({
      ...defaultConfig,
      firewallUrl: 'http://firewall.internal:9000',
      pipCommand: ['python3', '-m', 'pip'],
    });
  });

  it('should let the environment override the firewall URL', () => {
    fs.writeFileSync(
      path.join(tempDir, '.pipwardenrc.json'),
      JSON.stringify({ firewallUrl: 'http://firewall.internal:9000' }),
    );

    const config = loadConfig(tempDir, { [FIREWALL_URL_ENV]: 'http://10.0.0.5:8000' });
    expect(config.firewallUrl).toBe('http://10.0.0.5:8000');
  });

  it('should keep defaults for invalid values and warn', () => {
    const config = normalizeConfig({ timeoutMs: -5, pipCommand: [], connectivityTimeoutMs: 250 });

    expect(config).toEqual({ ...defaultConfig, connectivityTimeoutMs: 250 });
    expect(warn).toHaveBeenCalledWith(
      'Warning: Ignoring invalid value for "timeoutMs" in configuration file.',
    );
    expect(warn).toHaveBeenCalledWith(
      'Warning: Ignoring invalid value for "pipCommand" in configuration file.',
    );
  });
});
