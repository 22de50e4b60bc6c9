import pino from 'pino';

export type Logger = pino.Logger;

export function createLogger(level: string = 'info'): Logger {
  return pino(
    {
      name: 'dav-discovery',
      level,
    },
    pino.destination(2) // fd 2 = stderr. stdout carries MCP JSON-RPC and CLI output.
  );
}
