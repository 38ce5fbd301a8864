import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { parseLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * CACHEKEEPER_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 */
function getLogLevel(): LogLevel {
  return parseLogLevel(process.env['CACHEKEEPER_LOG_LEVEL']);
}

/**
 * Root pino logger: JSON lines, synchronous, on stderr.
 * stdout belongs to command output (tree listings, --json payloads).
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: getLogLevel(),
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
