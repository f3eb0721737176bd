import pino from 'pino';

function hasPrettyTransport(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

const isTest = process.env.NODE_ENV === 'test';
const pretty = !isTest && process.env.NODE_ENV !== 'production' && hasPrettyTransport();

export const logger = pino({
  name: 'print-fleet-gateway',
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  redact: ['credential', 'password', '*.credential', '*.password'],
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});
