// Console-backed logging in the "[LEVEL] [Component] message" form.
// Components take a Logger so tests can pass a silent one.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(component: string): Logger {
  return {
    info: (msg, ...args) => console.log(`[INFO] [${component}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN] [${component}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR] [${component}] ${msg}`, ...args),
  };
}
