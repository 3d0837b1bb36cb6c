export interface MonitorLogger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

interface ConsoleLoggerOptions {
  verbose?: boolean;
  prefix?: string;
}

export const createConsoleLogger = (options?: ConsoleLoggerOptions): MonitorLogger => {
  const prefix = options?.prefix ? `[${options.prefix}] ` : "";

  return {
    info: (message) => console.log(`${prefix}${message}`),
    warn: (message) => console.warn(`${prefix}${message}`),
    error: (message) => console.error(`${prefix}${message}`),
    debug: options?.verbose ? (message) => console.log(`${prefix}  ${message}`) : () => {}
  };
};

export const silentLogger: MonitorLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {}
};
