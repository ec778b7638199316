import type { FastifyBaseLogger } from 'fastify';
import { pino } from 'pino';
import type { AppConfig } from './config.js';

export function createLogger(config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>): FastifyBaseLogger {
  return pino({
    level: config.logLevel,
    base: { service: 'bias-meter-api', env: config.nodeEnv },
    redact: ['req.headers.cookie', 'req.headers.authorization', 'password'],
  });
}
