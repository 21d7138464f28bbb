export interface Logger {
  debug(log: string, ...args: unknown[]): void;
  info(log: string, ...args: unknown[]): void;
  warn(log: string, ...args: unknown[]): void;
  error(log: string, ...args: unknown[]): void;
}

class ConsoleLogger implements Logger {
  debug(log: string, ...args: unknown[]) {
    console.log(`[debug] ${log}`, ...args);
  }
  info(log: string, ...args: unknown[]) {
    console.log(log, ...args);
  }
  warn(log: string, ...args: unknown[]) {
    console.error(`[warn] ${log}`, ...args);
  }
  error(log: string, ...args: unknown[]) {
    console.error(`[error] ${log}`, ...args);
  }
}

class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export function createLogger(debug: boolean): Logger {
  return debug ? new ConsoleLogger() : new NullLogger();
}

export const logger = createLogger(process.env.DEBUG === "true");
