/**
 * Configuration management for Chatscribe
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../errors/index.js';

// Load environment variables - try multiple locations
// When running through npm workspaces, CWD may be a package directory (apps/cli)
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  if (!process.env.IRC_TOKEN) {
    dotenvConfig({ path: envPath });
  }
}

export const DEFAULT_CHAT_LOG_PATH = './data/chat.log';

// z.coerce.boolean() turns the string 'false' into true
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((val) => val === 'true' || val === '1');

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Chat server
  irc: z.object({
    host: z.string().min(1).default('irc.chat.twitch.tv'),
    port: z.coerce.number().int().min(1).max(65535).default(6667),
    secure: booleanFlag.default('false'),
    connectTimeoutMs: z.coerce.number().int().positive().default(10000),
    nickname: z.string().min(1, 'IRC_NICKNAME is required'),
    token: z.string().min(1, 'IRC_TOKEN is required'),
    channel: z
      .string()
      .min(1, 'IRC_CHANNEL is required')
      .transform((val) => (val.startsWith('#') ? val : `#${val}`)),
  }),

  // Ingest
  ingest: z.object({
    logPath: z.string().min(1).default(DEFAULT_CHAT_LOG_PATH),
    chunkBytes: z.coerce.number().int().positive().default(2048),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    irc: {
      host: process.env.IRC_HOST,
      port: process.env.IRC_PORT,
      secure: process.env.IRC_SECURE,
      connectTimeoutMs: process.env.IRC_CONNECT_TIMEOUT_MS,
      nickname: process.env.IRC_NICKNAME ?? '',
      token: process.env.IRC_TOKEN ?? '',
      channel: process.env.IRC_CHANNEL ?? '',
    },

    ingest: {
      logPath: process.env.CHAT_LOG_PATH,
      chunkBytes: process.env.RECEIVE_CHUNK_BYTES,
    },
  };

  return configSchema.parse(rawConfig);
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    try {
      configInstance = loadConfig();
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new ConfigurationError(`Invalid configuration: ${formatIssues(error).join('; ')}`, {
          issues: formatIssues(error),
        });
      }
      throw error;
    }
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: formatIssues(error),
      };
    }
    throw error;
  }
}
