export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface StderrLoggerOptions {
  prefix?: string;
  /** Drop info lines; warnings and errors are always written. */
  quiet?: boolean;
  stream?: Pick<NodeJS.WriteStream, 'write'>;
}

export const DEFAULT_LOG_PREFIX = '[portbench]';

export function createStderrLogger(options: StderrLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? DEFAULT_LOG_PREFIX;
  const stream = options.stream ?? process.stderr;
  const write = (level: string, message: string): void => {
    stream.write(`${prefix} ${level}: ${message}\n`);
  };
  return {
    info(message) {
      if (!options.quiet) {
        write('info', message);
      }
    },
    warn(message) {
      write('warn', message);
    },
    error(message) {
      write('error', message);
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
