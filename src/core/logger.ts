import pino from 'pino';
import { dirname } from 'path';

export interface LoggerOptions {
  level?: string;
  /** Human-readable output through pino-pretty */
  pretty?: boolean;
  /** Append JSON lines to this file instead of stderr */
  file?: string;
}

export function createLogger(name: string = 'ontoreason', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? process.env.ONTOREASON_LOG_LEVEL ?? 'info';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  if (options.file) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino/file',
        options: { destination: options.file, mkdir: dirname(options.file) !== '.' },
      },
    });
  }

  // stdout is reserved for command output
  return pino({ name, level }, pino.destination(2));
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}

export type Logger = pino.Logger;
