export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function log(...args: unknown[]): void {
  console.log(...args);
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info: message => console.log(`${prefix} ${message}`),
    warn: message => console.warn(`${prefix} ${message}`),
    error: (message, error) => {
      if (error === undefined) console.error(`${prefix} ${message}`);
      else console.error(`${prefix} ${message}`, error);
    }
  };
}
