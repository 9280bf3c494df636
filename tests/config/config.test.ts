/**
 * Configuration Tests
 * Layering of defaults, YAML file, environment and overrides
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { configFromEnv, loadConfig, mergeConfig } from '../../src/config/config.js';
import { ConfigValidationError } from '../../src/core/errors.js';

describe('Configuration', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'queuetap-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function configFile(content: string): Promise<string> {
    const file = path.join(dir, 'queuetap.yaml');
    await writeFile(file, content, 'utf8');
    return file;
  }

  it('should read a YAML file and fill in defaults', async () => {
    const file = await configFile(
      ['rabbitmq:', '  host: localhost', '  port: 5673', 'output:', '  format: json'].join('\n')
    );

    const { config, source, warnings } = loadConfig({ configPath: file, env: {} });

    expect(source).toBe(file);
    expect(warnings).toEqual([]);
    expect(config.rabbitmq).toEqual({
      host: 'localhost',
      port: 5673,
      vhost: '/',
      user: 'guest',
      password: 'guest',
      heartbeat: 60,
    });
    expect(config.output).toEqual({ format: 'json', compact: false, noColor: false, quiet: false });
    expect(config.file).toEqual({ messagesPerFile: 0, messageDelimiter: '\n' });
    expect(config.logging).toEqual({ level: 'warn' });
  });

  it('should pick up the file named by QUEUETAP_CONFIG', async () => {
    const file = await configFile('logging:\n  level: debug\n');

    const { config, source } = loadConfig({ env: { QUEUETAP_CONFIG: file }, cwd: dir });

    expect(source).toBe(file);
    expect(config.logging.level).toBe('debug');
  });

  it('should let the environment override the file and overrides win over both', async () => {
    const file = await configFile('rabbitmq:\n  host: from-file\n  user: app\n');

    const { config } = loadConfig({
      configPath: file,
      env: { RABBIT_HOST: 'from-env', RABBIT_PORT: '5674', RABBIT_PASSWORD: 'test-secret' },
      overrides: { rabbitmq: { port: 5999 } },
    });

    expect(config.rabbitmq.host).toBe('from-env');
    expect(config.rabbitmq.port).toBe(5999);
    expect(config.rabbitmq.user).toBe('app');
    expect(config.rabbitmq.password).toBe('test-secret');
  });

  it('should warn about guest credentials on a remote host', async () => {
    const { warnings } = loadConfig({ env: { RABBIT_HOST: 'broker.internal' }, cwd: dir });

    expect(warnings).toEqual(["Default 'guest' credentials only work on localhost; connecting to broker.internal"]);
  });

  it('should report invalid values with their path', async () => {
    const file = await configFile('rabbitmq:\n  port: 99999\noutput:\n  format: xml\n');

    const error = (() => {
      try {
        loadConfig({ configPath: file, env: {} });
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigValidationError);
    const issues = error instanceof ConfigValidationError ? error.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^rabbitmq\.port: /);
    expect(issues[1]).toMatch(/^output\.format: /);
  });

  it('should fail on a missing explicit file', () => {
    expect(() => loadConfig({ configPath: path.join(dir, 'nope.yaml'), env: {} })).toThrow(
      "Configuration file '" + path.join(dir, 'nope.yaml') + "' not found"
    );
  });

  it('should fail on a file that is not a mapping', async () => {
    const file = await configFile('- just\n- a list\n');

    expect(() => loadConfig({ configPath: file, env: {} })).toThrow(ConfigValidationError);
  });

  it('should treat an empty file as no settings', async () => {
    const file = await configFile('');

    expect(loadConfig({ configPath: file, env: {} }).config.output.format).toBe('plain');
  });

  describe('mergeConfig', () => {
    it('should merge nested sections and skip undefined values', () => {
      expect(
        mergeConfig({ rabbitmq: { host: 'a', port: 1 }, output: { format: 'json' } }, {
          rabbitmq: { port: 2, vhost: undefined },
          output: undefined,
        })
      ).toEqual({ rabbitmq: { host: 'a', port: 2 }, output: { format: 'json' } });
    });
  });

  describe('configFromEnv', () => {
    it('should map RABBIT_* variables and ignore empty ones', () => {
      expect(configFromEnv({ RABBIT_URL: 'amqp://localhost', RABBIT_VHOST: '', LOG_LEVEL: 'info' })).toEqual({
        rabbitmq: { url: 'amqp://localhost' },
        logging: { level: 'info' },
      });
    });
  });
});
