import pino from 'pino';
import { ensureParentDirSync } from '../utils/fs.js';

export interface LoggerOptions {
  level?: pino.LevelWithSilent;
  /** Pretty-print through pino-pretty instead of emitting JSON */
  verbose?: boolean;
  /** Write to this file instead of stderr */
  file?: string;
}

export function createLogger(name: string = 'playwise', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? 'info';

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

  if (options.file) {
    ensureParentDirSync(options.file);
    return pino({ name, level }, pino.destination({ dest: options.file, sync: true }));
  }

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
