import { buildApp } from './app.js';
import { config } from './config.js';
import logger from './logger.js';

// Use pino-pretty for human-readable logs
const app = await buildApp({
  config,
  logger: {
    level: config.logLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        singleLine: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname'
      }
    }
  }
});

if (config.tokenMode === 'prefix') {
  logger.warn('api', 'Using unsigned prefix tokens; set TOKEN_MODE=signed outside development');
}

await app.listen({ port: config.port, host: config.host });
logger.success('api', `Listening on ${config.host}:${config.port}`, { tokenMode: config.tokenMode });
