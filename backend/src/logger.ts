import pino from 'pino';
import { config } from './config.js';

const isProd = config.nodeEnv === 'production';
// pretty output only for an interactive terminal
const pretty = !isProd && Boolean(process.stdout.isTTY);

export const logger = pino({
  name: config.serviceName,
  level: config.logLevel,
  redact: ['req.headers.authorization'],
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          singleLine: true,
        },
      }
    : undefined,
});

export default logger;
