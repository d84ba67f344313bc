export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, ...details: unknown[]): void;
}

export function createConsoleLogger(debug: boolean = false): Logger {
  return {
    debug: (message) => {
      if (debug) {
        console.log(`🐛 ${message}`);
      }
    },
    info: (message) => console.log(message),
    warn: (message, ...details) => console.warn(`⚠️  ${message}`, ...details)
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {}
};
