import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  name: 'printerpal',
  level: config.logLevel,
});
