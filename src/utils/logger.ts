/**
 * Application logger (pino)
 *
 * Writes to stdout (pretty-printed in development) and optionally to LOG_FILE.
 */

import pino from 'pino';
import { PinoPretty } from 'pino-pretty';
import { config } from '../config/index.js';

function createDestination(): pino.MultiStreamRes {
  const streams: pino.StreamEntry[] = [
    {
      level: 'trace',
      stream: config.logging.pretty
        ? PinoPretty({ colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname' })
        : process.stdout,
    },
  ];

  if (config.logging.file) {
    streams.push({
      level: 'trace',
      stream: pino.destination({ dest: config.logging.file, mkdir: true, sync: false }),
    });
  }

  return pino.multistream(streams);
}

export const logger = pino(
  {
    name: config.app.name,
    level: config.logging.level,
    serializers: {
      error: pino.stdSerializers.err,
    },
  },
  createDestination()
);

/**
 * Raise verbosity at runtime (CLI --verbose)
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
}
