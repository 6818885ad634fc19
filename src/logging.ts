// src/logging.ts
// What: Application logger and the append-only response log.
// How: Creates a pino logger. In development, uses the pino-pretty transport for readable logs; under test it is
//      silent unless LOG_LEVEL is set. createResponseLogger() writes one JSON line per question/answer/model-answer
//      tuple (and per failed submission) to a file opened in append mode.

import { destination, pino, type Logger, type LoggerOptions } from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';

const defaultLevel = nodeEnv === 'test' ? 'silent' : isDev ? 'debug' : 'info';

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || defaultLevel,
};

function createAppLogger(): Logger {
  if (!isDev) return pino(baseOptions);
  return pino({
    ...baseOptions,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: false,
      },
    },
  });
}

const logger: Logger = createAppLogger();

export function createResponseLogger(filePath: string): Logger {
  return pino(
    { level: 'info', base: { log: 'responses' } },
    destination({ dest: filePath, append: true, mkdir: true, sync: true }),
  );
}

export type { Logger };
export default logger;
