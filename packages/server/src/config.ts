import { parseArgs } from 'node:util';

export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = '127.0.0.1';

/** Where the HTTP server listens. */
export interface ServerConfig {
  readonly port: number;
  readonly host: string;
}

/**
 * Resolve the listen address. Command-line flags (`--port`/`-p`, `--host`) win over
 * the `PORT` and `HOST` environment variables, which win over the defaults.
 *
 * @throws {Error} on unknown flags or a port outside `0..65535`.
 */
export function loadServerConfig(argv: readonly string[], env: NodeJS.ProcessEnv): ServerConfig {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      port: { type: 'string', short: 'p' },
      host: { type: 'string' },
    },
    strict: true,
  });

  const rawPort = values.port ?? env['PORT'];
  const port = rawPort === undefined ? DEFAULT_PORT : parsePort(rawPort);
  const host = values.host ?? env['HOST'] ?? DEFAULT_HOST;

  return { port, host };
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw) || port > 65535) {
    throw new Error(`invalid port: ${JSON.stringify(raw)} (expected an integer between 0 and 65535)`);
  }
  return port;
}
