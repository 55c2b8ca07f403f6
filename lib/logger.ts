import pino from 'pino';
import { CONFIG } from './config';

/**
 * Process-wide logger. Writes to stderr so stdout carries only report lines.
 */
const logger = pino(
  { name: 'node-optimizer', level: CONFIG.LOG_LEVEL },
  pino.destination({ dest: 2, sync: true }),
);

export default logger;
