import { pino, type Logger } from 'pino';
import { loadConfig } from './config.js';

export type { Logger };

export const logger: Logger = pino({ level: loadConfig().logLevel, name: 'cinema-tickets' });
