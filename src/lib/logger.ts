type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

const isThreshold = (value: string | undefined): value is keyof typeof SEVERITY =>
  value !== undefined && Object.keys(SEVERITY).includes(value);

// Read on every call so tests and long-running processes can change LOG_LEVEL
const threshold = (): number => {
  const configured = process.env.LOG_LEVEL;
  return SEVERITY[isThreshold(configured) ? configured : 'info'];
};

const enabled = (level: LogLevel): boolean => SEVERITY[level] >= threshold();

const formatMessage = (level: LogLevel, message: string): string => {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
};

export const logger = {
  debug: (message: string): void => {
    if (enabled('debug')) console.debug(formatMessage('debug', message));
  },
  info: (message: string): void => {
    if (enabled('info')) console.info(formatMessage('info', message));
  },
  warn: (message: string): void => {
    if (enabled('warn')) console.warn(formatMessage('warn', message));
  },
  error: (message: string, error?: Error): void => {
    if (!enabled('error')) return;
    console.error(formatMessage('error', message));
    if (error) {
      console.error(error.stack || error.message);
    }
  },
};
