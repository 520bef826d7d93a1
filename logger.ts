// a minimal levelled logger; everything goes to stderr

export enum Level {
  notset = 0,
  debug = 10,
  info = 20,
  warning = 30,
  error = 40,
}

export class Logger {
  constructor(public level: Level = Level.notset) { }

  log(level: Level, message?: unknown, ...optionalParams: unknown[]): void {
    if (level >= this.level) {
      console.error(`[${Level[level]}] ${message}`, ...optionalParams);
    }
  }

  debug(message?: unknown, ...optionalParams: unknown[]): void {
    return this.log(Level.debug, message, ...optionalParams);
  }
  warning(message?: unknown, ...optionalParams: unknown[]): void {
    return this.log(Level.warning, message, ...optionalParams);
  }
  error(message?: unknown, ...optionalParams: unknown[]): void {
    return this.log(Level.error, message, ...optionalParams);
  }
}

export const logger = new Logger(Level.info);
