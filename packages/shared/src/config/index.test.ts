/**
 * Configuration Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getConfig, resetConfig, validateConfig } from './index.js';
import { ConfigurationError } from '../errors/index.js';

const KEYS = [
  'IRC_HOST',
  'IRC_PORT',
  'IRC_SECURE',
  'IRC_CONNECT_TIMEOUT_MS',
  'IRC_NICKNAME',
  'IRC_TOKEN',
  'IRC_CHANNEL',
  'CHAT_LOG_PATH',
  'RECEIVE_CHUNK_BYTES',
] as const;

describe('config', () => {
  const saved: Partial<Record<(typeof KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    process.env.IRC_NICKNAME = 'tester';
    process.env.IRC_TOKEN = 'oauth:test-token';
    process.env.IRC_CHANNEL = 'ninja';
    resetConfig();
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetConfig();
  });

  it('should apply defaults', () => {
    const config = getConfig();

    expect(config.irc).toEqual({
      host: 'irc.chat.twitch.tv',
      port: 6667,
      secure: false,
      connectTimeoutMs: 10000,
      nickname: 'tester',
      token: 'oauth:test-token',
      channel: '#ninja',
    });
    expect(config.ingest).toEqual({ logPath: './data/chat.log', chunkBytes: 2048 });
  });

  it('should read overrides from the environment', () => {
    process.env.IRC_PORT = '6697';
    process.env.IRC_SECURE = 'true';
    process.env.IRC_CHANNEL = '#lobby';
    process.env.CHAT_LOG_PATH = '/tmp/lobby.log';
    process.env.RECEIVE_CHUNK_BYTES = '4096';

    const config = getConfig();

    expect(config.irc.port).toBe(6697);
    expect(config.irc.secure).toBe(true);
    expect(config.irc.channel).toBe('#lobby');
    expect(config.ingest).toEqual({ logPath: '/tmp/lobby.log', chunkBytes: 4096 });
  });

  it('should treat IRC_SECURE=false as false', () => {
    process.env.IRC_SECURE = 'false';

    expect(getConfig().irc.secure).toBe(false);
  });

  it('should cache the loaded config until reset', () => {
    const first = getConfig();
    process.env.IRC_NICKNAME = 'other';

    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig().irc.nickname).toBe('other');
  });

  it('should raise ConfigurationError when required values are missing', () => {
    delete process.env.IRC_TOKEN;

    expect(() => getConfig()).toThrow(ConfigurationError);
  });

  it('should list every problem from validateConfig()', () => {
    delete process.env.IRC_TOKEN;
    process.env.IRC_PORT = '70000';

    const result = validateConfig();

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'irc.port: Number must be less than or equal to 65535',
      'irc.token: IRC_TOKEN is required',
    ]);
  });
});
