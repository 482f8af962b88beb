import { pino, type Logger } from 'pino';

export type { Logger };

function resolveLevel(): string {
  const configured =
    process.env['ZONESYNC_LOG_LEVEL'] ?? process.env['LOG_LEVEL'];
  if (configured) return configured.toLowerCase();
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

/** Root logger; engine components derive children bound to zone/provider */
export const logger: Logger = pino({
  name: 'zonesync',
  level: resolveLevel(),
});
