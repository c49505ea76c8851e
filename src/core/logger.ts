import pino from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LOG_DIR = join(homedir(), '.voxdesk', 'logs');

export interface LoggerOptions {
  verbose?: boolean;
  level?: string;
}

function ensureLogDir(): void {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }
}

export function createLogger(name: string = 'voxdesk', options: LoggerOptions = {}): pino.Logger {
  const level = process.env.VOXDESK_LOG_LEVEL || options.level || 'info';

  if (options.verbose) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  ensureLogDir();
  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(LOG_DIR, 'voxdesk.log'), mkdir: true },
    },
  });
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
