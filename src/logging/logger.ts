export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (message) => log("INFO", prefix, message),
    warn: (message) => log("WARN", prefix, message),
    error: (message) => log("ERROR", prefix, message),
  };
}

export function childLogger(parent: Logger, label: string): Logger {
  return {
    info: (message) => parent.info(`${label} ${message}`),
    warn: (message) => parent.warn(`${label} ${message}`),
    error: (message) => parent.error(`${label} ${message}`),
  };
}

function log(level: string, prefix: string, message: string): void {
  const timestamp = new Date().toISOString();
  const stream = level === "ERROR" ? process.stderr : process.stdout;
  stream.write(`${timestamp} ${level} ${prefix} ${message}\n`);
}
