/**
 * Command line parsing for the actorwire CLI
 *
 * Server flags are mapped onto the ACTORWIRE_* environment variables so the
 * usual precedence applies: defaults, then config file, then environment,
 * with flags being the last word.
 */

import { ConfigError } from './errors.js';

export type CliCommand = 'serve' | 'docs' | 'help';

export type ExampleActorName = 'calculator' | 'greeter';

export interface CliArgs {
  command: CliCommand;
  actor: ExampleActorName;

  /** Environment overrides derived from flags */
  env: Record<string, string>;

  /** Base URL for `docs` */
  baseUrl?: string;
}

const ENV_FLAGS = new Map<string, string>(Object.entries({
  '--port': 'ACTORWIRE_PORT',
  '-p': 'ACTORWIRE_PORT',
  '--host': 'ACTORWIRE_HOST',
  '--transport': 'ACTORWIRE_TRANSPORT',
  '-t': 'ACTORWIRE_TRANSPORT',
  '--cert': 'ACTORWIRE_TLS_CERT',
  '--key': 'ACTORWIRE_TLS_KEY',
  '--envelope': 'ACTORWIRE_WS_ENVELOPE',
  '--body-limit': 'ACTORWIRE_BODY_LIMIT',
  '--log-level': 'ACTORWIRE_LOG_LEVEL'
}));

export const USAGE = `Usage:
  actorwire [serve] [--actor calculator|greeter] [--port N] [--host H]
            [--transport http|websocket] [--cert PATH --key PATH]
            [--envelope strict|lenient] [--body-limit SIZE]
            [--log-level debug|info|warn|error|silent]
  actorwire docs [--actor calculator|greeter] [--base-url URL]
  actorwire --help

Serves on 127.0.0.1:8080 by default, reachable from this machine only.
Pass --host 0.0.0.0 to accept connections on every interface.`;

function isExampleActor(value: string): value is ExampleActorName {
  return value === 'calculator' || value === 'greeter';
}

/**
 * Parse CLI arguments (without the node and script entries)
 *
 * @throws ConfigError on unknown flags or missing values
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args = [...argv];
  const parsed: CliArgs = { command: 'serve', actor: 'calculator', env: {} };

  if (args[0] === 'serve' || args[0] === 'docs') {
    parsed.command = args[0];
    args.shift();
  }

  for (let i = 0; i < args.length; i++) {
    const key = args[i];

    if (key === '--help') {
      parsed.command = 'help';
      continue;
    }

    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`Missing value for ${key}`, { flag: key });
    }
    i++;

    if (key === '--actor' || key === '-a') {
      if (!isExampleActor(value)) {
        throw new ConfigError(`Unknown actor: ${value} (expected calculator or greeter)`, { flag: key });
      }
      parsed.actor = value;
    } else if (key === '--base-url') {
      parsed.baseUrl = value;
    } else {
      const variable = ENV_FLAGS.get(key);
      if (!variable) {
        throw new ConfigError(`Unknown option: ${key}`, { flag: key });
      }
      parsed.env[variable] = value;
    }
  }

  return parsed;
}
