/**
 * Command-line handling for the client entry point.
 *
 * Usage:
 *   hive-client [--host <host>] [--port <port>] [--reservation <code>]
 *
 * Flags override the environment configuration (see `config/unified.ts`).
 */

import type { ClientConfig } from './config';

export interface CliArgs {
  host?: string;
  port?: number;
  reservation?: string;
}

export type CliParseResult =
  | { kind: 'run'; args: CliArgs }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

/** Connection settings after applying CLI flags on top of the config. */
export interface ConnectionSettings {
  host: string;
  port: number;
  reservation?: string | undefined;
}

export const USAGE = [
  'Usage: hive-client [options]',
  '',
  'Options:',
  '  -h, --host <host>           game server host (default: SC_HOST or localhost)',
  '  -p, --port <port>           game server port (default: SC_PORT or 13050)',
  '  -r, --reservation <code>    reservation code of a prepared game',
  '  -H, --help                  print this help',
].join('\n');

const FLAG_ALIASES: Record<string, string> = {
  '-h': '--host',
  '-p': '--port',
  '-r': '--reservation',
  '-H': '--help',
};

/**
 * Parses `process.argv` (the first two entries are node and the script).
 * Values are taken from `--flag=value` or the following argument.
 */
export function parseArgs(argv: readonly string[]): CliParseResult {
  const args: CliArgs = {};

  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    const [flagMaybe, valueMaybe] = raw.includes('=') ? splitOnce(raw) : [raw, undefined];
    const flag = FLAG_ALIASES[flagMaybe] ?? flagMaybe;

    if (flag === '--help') {
      return { kind: 'help' };
    }

    let value = valueMaybe;
    if (value === undefined) {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        value = next;
        i += 1;
      }
    }

    switch (flag) {
      case '--host':
        if (!value) {
          return { kind: 'error', message: `Missing value for ${flagMaybe}` };
        }
        args.host = value;
        break;
      case '--port': {
        if (!value) {
          return { kind: 'error', message: `Missing value for ${flagMaybe}` };
        }
        const port = Number(value);
        if (!Number.isInteger(port) || port < 1 || port > 65535) {
          return { kind: 'error', message: `Invalid port: ${value}` };
        }
        args.port = port;
        break;
      }
      case '--reservation':
        if (!value) {
          return { kind: 'error', message: `Missing value for ${flagMaybe}` };
        }
        args.reservation = value;
        break;
      default:
        return { kind: 'error', message: `Unknown option: ${raw}` };
    }
  }

  return { kind: 'run', args };
}

export function resolveConnectionSettings(
  args: CliArgs,
  config: Pick<ClientConfig, 'server' | 'game'>
): ConnectionSettings {
  return {
    host: args.host ?? config.server.host,
    port: args.port ?? config.server.port,
    reservation: args.reservation ?? config.game.reservation,
  };
}

function splitOnce(raw: string): [string, string] {
  const index = raw.indexOf('=');
  return [raw.slice(0, index), raw.slice(index + 1)];
}
