import { pino } from 'pino';
import { config } from './config.js';

export const logger = pino({
  name: 'vvs-catalog-tools',
  level: config.logLevel,
});
