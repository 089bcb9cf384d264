/**
 * Logger utility using Pino
 *
 * Logs go to stderr; stdout is reserved for CLI report output.
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

let transport: pino.DestinationStream | undefined;
if (process.stderr.isTTY && level !== 'silent') {
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
    // pino-pretty not available, fall back to JSON lines
    transport = undefined;
  }
}

const rootLogger = pino({ level }, transport ?? pino.destination(2));

export type Logger = pino.Logger;

const children = new Set<Logger>();

export function createLogger(name: string): Logger {
  const child = rootLogger.child({ name });
  children.add(child);
  return child;
}

/** Apply a level to the root logger and every module logger created so far */
export function setLogLevel(next: string): void {
  rootLogger.level = next;
  for (const child of children) {
    child.level = next;
  }
}

export { rootLogger as logger };
