// utils/logger.ts
import pino from 'pino';

// Pino default levels: trace:10, debug:20, info:30, warn:40, error:50, fatal:60
const customLevels = {
  http: 25, // Positioned between debug and info
};

const resolveLevel = (): string => {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
};

// Development: Pretty printing (Colors, readable timestamp)
// Production: JSON
const transport = process.env.NODE_ENV === 'development'
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard', // YYYY-mm-dd HH:MM:ss
        ignore: 'pid,hostname',
      },
    }
  : undefined;

const logger = pino({
  level: resolveLevel(),
  customLevels,
  // Emit the level label ("level": "info") instead of just the number
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport,
});

export type Logger = typeof logger;

export default logger;
