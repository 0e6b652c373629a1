import pino from 'pino';
import { config } from './config';
import * as fs from 'fs-extra';
import * as path from 'path';

const isDevelopment = config.NODE_ENV === 'development';
const isTest = config.NODE_ENV === 'test';

const loggerConfig: pino.LoggerOptions = {
  level: isTest ? 'silent' : config.LOG_LEVEL,
};

if (isDevelopment) {
  // Pretty logging for development
  loggerConfig.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
} else if (!isTest) {
  // Terminal belongs to the progress output, so production logs go to files
  const logsDir = path.resolve(config.LOG_DIR);
  fs.ensureDirSync(logsDir);
  loggerConfig.transport = {
    targets: [
      {
        target: 'pino/file',
        options: { destination: path.join(logsDir, 'app.log') },
        level: 'info',
      },
      {
        target: 'pino/file',
        options: { destination: path.join(logsDir, 'error.log') },
        level: 'error',
      },
    ],
  };
}

export const logger = pino(loggerConfig);
