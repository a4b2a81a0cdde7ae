// Console-backed logging shared by the actors, the controller and the stats server.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const ts = () => new Date().toISOString();

export function createConsoleLogger(): Logger {
  return {
    info: (msg, ...args) => console.log(`[INFO] [${ts()}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${ts()}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${ts()}] ${msg}`, ...args),
  };
}

export function createSilentLogger(): Logger {
  return {
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
