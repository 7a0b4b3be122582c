/**
 * Winston Logger Configuration
 *
 * Structured JSON logs, one object per line, tagged with the service name.
 */

import winston from 'winston';
import { config } from './index';

export const logger = winston.createLogger({
  level: config.nodeEnv === 'production' ? 'info' : 'debug',
  silent: config.nodeEnv === 'test',
  defaultMeta: { service: config.service.name },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
});
