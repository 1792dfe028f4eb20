export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export type LogWriter = (line: string) => void;

// stdout belongs to the MCP stdio transport, so everything goes to stderr
const stderrWriter: LogWriter = (line) => console.error(line);

export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private scope: string | undefined;
  private write: LogWriter;

  constructor(level: LogLevel = 'info', scope?: string, write: LogWriter = stderrWriter) {
    this.level = level;
    this.scope = scope;
    this.write = write;
  }

  debug(message: string): void {
    this.emit('debug', message);
  }

  info(message: string): void {
    this.emit('info', message);
  }

  warn(message: string): void {
    this.emit('warn', message);
  }

  error(message: string): void {
    this.emit('error', message);
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new ConsoleLogger(this.level, nested, this.write);
  }

  private emit(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    const prefix = this.scope ? `[${this.scope}] ` : '';
    this.write(`${level.toUpperCase().padEnd(5)} ${prefix}${message}`);
  }
}

// Quiet wins only if verbose is off; the CLI rejects both together
export function levelFromFlags(flags: { quiet: boolean; verbose: boolean }): LogLevel {
  if (flags.verbose) return 'debug';
  if (flags.quiet) return 'error';
  return 'info';
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
