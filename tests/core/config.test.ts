import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { defaultConfig, loadConfig, parseConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/core/errors.js';

describe('Config', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'linestat-config-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should return default config if no file found', async () => {
    const config = await loadConfig(tempDir);
    expect(config).toEqual({ extensions: [], ignore: [], quiet: false });
  });

  it('should hand out independent default objects', () => {
    const first = defaultConfig();
    first.ignore.push('vendor');
    expect(defaultConfig().ignore).toEqual([]);
  });

  it('should load .linestatrc.json from the project root', async () => {
    await fs.promises.writeFile(
      path.join(tempDir, '.linestatrc.json'),
      JSON.stringify({ extensions: ['.ts'], quiet: true }),
    );
    const config = await loadConfig(tempDir);
    expect(config).toEqual({ extensions: ['.ts'], ignore: [], quiet: true });
  });

  it('should fall back to linestat.config.json', async () => {
    await fs.promises.writeFile(
      path.join(tempDir, 'linestat.config.json'),
      JSON.stringify({ ignore: ['vendor'] }),
    );
    const config = await loadConfig(tempDir);
    expect(config.ignore).toEqual(['vendor']);
  });

  it('should load config from an explicit path', async () => {
    const custom = path.join(tempDir, 'custom.json');
    await fs.promises.writeFile(custom, JSON.stringify({ extensions: ['md'] }));
    const config = await loadConfig(tempDir, custom);
    expect(config.extensions).toEqual(['md']);
  });

  it('should fail when an explicit config path is missing', async () => {
    const missing = path.join(tempDir, 'missing.json');
    await expect(loadConfig(tempDir, missing)).rejects.toThrow(
      `Config file not found: ${missing}`,
    );
  });

  it('should reject malformed JSON', async () => {
    const file = path.join(tempDir, '.linestatrc.json');
    await fs.promises.writeFile(file, '{ not json');
    await expect(loadConfig(tempDir)).rejects.toBeInstanceOf(ConfigError);
  });

  it('should validate field types', () => {
    expect(() => parseConfig([], 'a.json')).toThrow(
      'Invalid config file: a.json (expected a JSON object)',
    );
    expect(() => parseConfig({ extensions: 'ts' }, 'a.json')).toThrow(
      'Invalid config file: a.json ("extensions" must be an array of strings)',
    );
    expect(() => parseConfig({ ignore: [1] }, 'a.json')).toThrow(
      'Invalid config file: a.json ("ignore" must be an array of strings)',
    );
    expect(() => parseConfig({ quiet: 'yes' }, 'a.json')).toThrow(
      'Invalid config file: a.json ("quiet" must be a boolean)',
    );
  });
});
