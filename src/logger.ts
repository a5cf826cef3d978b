import pino from 'pino';

import { LOG_LEVEL } from './config.js';

export type { Logger } from 'pino';

// stderr keeps stdout free for command output
export const logger = process.stderr.isTTY
  ? pino({
      level: LOG_LEVEL,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
    })
  : pino({ level: LOG_LEVEL }, pino.destination(2));
