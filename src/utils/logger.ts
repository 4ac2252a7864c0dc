/**
 * Logger utility using Pino
 *
 * Logs go to stderr so stdout stays clean for command output and the MCP
 * stdio transport. Pretty output only on an interactive terminal; JSON lines
 * everywhere else (containers, tests).
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

let transport: pino.DestinationStream | undefined;
if (process.stderr.isTTY && !process.env.VITEST && level !== 'silent') {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    });
  } catch {
    transport = undefined; // pino-pretty not installed
  }
}

const rootLogger = pino({ level }, transport ?? pino.destination(2));

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
