import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import { formatIssues } from './registry/MethodRegistry.js';
import { ENVELOPE_POLICIES } from './transports/WebSocketTransport.js';

export const serverConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    transport: z.enum(['http', 'websocket'])
  }),
  tls: z
    .object({
      certPath: z.string().min(1),
      keyPath: z.string().min(1)
    })
    .optional(),
  http: z.object({
    bodyLimit: z.string().min(1)
  }),
  websocket: z.object({
    envelope: z.enum(ENVELOPE_POLICIES)
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS)
  })
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export const defaultConfig: ServerConfig = {
  server: {
    host: '127.0.0.1',
    port: 8080,
    transport: 'http'
  },
  http: {
    bodyLimit: '10mb'
  },
  websocket: {
    envelope: 'strict'
  },
  logging: {
    level: 'info'
  }
};

export interface LoadConfigOptions {
  /** Directory searched for actorwire.config.json (default: process.cwd()) */
  cwd?: string;

  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Home directory searched for .actorwire/config.json (default: os.homedir()) */
  homeDir?: string;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base`; nested objects merge, everything else replaces
 */
function merge(base: JsonObject, override: JsonObject): JsonObject {
  const result: JsonObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isObject(current) && isObject(value) ? merge(current, value) : value;
  }
  return result;
}

export function configPaths(cwd: string, homeDir: string): string[] {
  return [
    path.join(cwd, 'actorwire.config.json'),
    path.join(homeDir, '.actorwire', 'config.json'),
    '/etc/actorwire/config.json'
  ];
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the first config file that exists
 */
async function readConfigFile(paths: string[]): Promise<JsonObject> {
  for (const configPath of paths) {
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        // Not found, try next
        continue;
      }
      throw new ConfigError(`Failed to read config file ${configPath}: ${errorMessage(error)}`, {
        path: configPath
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Config file ${configPath} is not valid JSON: ${errorMessage(error)}`, {
        path: configPath
      });
    }

    if (!isObject(parsed)) {
      throw new ConfigError(`Config file ${configPath} must contain a JSON object`, { path: configPath });
    }
    return parsed;
  }

  return {};
}

function parsePort(value: string): number | string {
  return /^\d+$/.test(value) ? parseInt(value, 10) : value;
}

/**
 * Environment variables override config file settings
 */
function envOverrides(env: NodeJS.ProcessEnv): JsonObject {
  const overrides: JsonObject = {};
  const section = (name: string): JsonObject => {
    const existing = overrides[name];
    if (isObject(existing)) {
      return existing;
    }
    const created: JsonObject = {};
    overrides[name] = created;
    return created;
  };

  if (env.ACTORWIRE_HOST) {
    section('server').host = env.ACTORWIRE_HOST;
  }

  if (env.ACTORWIRE_PORT) {
    section('server').port = parsePort(env.ACTORWIRE_PORT);
  }

  if (env.ACTORWIRE_TRANSPORT) {
    section('server').transport = env.ACTORWIRE_TRANSPORT;
  }

  if (env.ACTORWIRE_TLS_CERT) {
    section('tls').certPath = env.ACTORWIRE_TLS_CERT;
  }

  if (env.ACTORWIRE_TLS_KEY) {
    section('tls').keyPath = env.ACTORWIRE_TLS_KEY;
  }

  if (env.ACTORWIRE_WS_ENVELOPE) {
    section('websocket').envelope = env.ACTORWIRE_WS_ENVELOPE;
  }

  if (env.ACTORWIRE_BODY_LIMIT) {
    section('http').bodyLimit = env.ACTORWIRE_BODY_LIMIT;
  }

  if (env.ACTORWIRE_LOG_LEVEL) {
    section('logging').level = env.ACTORWIRE_LOG_LEVEL;
  }

  return overrides;
}

/**
 * Validate a merged configuration object
 *
 * @throws ConfigError listing every invalid field
 */
export function parseConfig(value: unknown): ServerConfig {
  const parsed = serverConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues
    });
  }
  return parsed.data;
}

/**
 * Load configuration: defaults, then the first config file found, then environment
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ServerConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();

  const fileConfig = await readConfigFile(configPaths(cwd, homeDir));
  const merged = merge(merge({ ...defaultConfig }, fileConfig), envOverrides(env));

  return parseConfig(merged);
}
