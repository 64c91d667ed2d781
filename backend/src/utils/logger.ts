export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevelName, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(
    private level: LogLevelName = 'info',
    private readonly scope?: string,
  ) {}

  setLevel(level: LogLevelName) {
    this.level = level;
  }

  child(scope: string): Logger {
    return new ScopedLogger(this, scope);
  }

  isEnabled(level: LogLevelName): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  protected write(
    level: LogLevelName,
    scope: string | undefined,
    message: string,
    args: unknown[],
  ) {
    if (!this.isEnabled(level)) {
      return;
    }

    const tag = scope ? ` [${scope}]` : '';
    const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]${tag}`;

    switch (level) {
      case 'error':
        console.error(prefix, message, ...args);
        break;
      case 'warn':
        console.warn(prefix, message, ...args);
        break;
      case 'debug':
        console.debug(prefix, message, ...args);
        break;
      default:
        console.log(prefix, message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]) {
    this.write('debug', this.scope, message, args);
  }

  info(message: string, ...args: unknown[]) {
    this.write('info', this.scope, message, args);
  }

  warn(message: string, ...args: unknown[]) {
    this.write('warn', this.scope, message, args);
  }

  error(message: string, ...args: unknown[]) {
    this.write('error', this.scope, message, args);
  }
}

// Shares the parent's level so setLevel on the root logger reaches every scope.
class ScopedLogger extends Logger {
  constructor(
    private readonly parent: Logger,
    scope: string,
  ) {
    super('info', scope);
  }

  override setLevel(level: LogLevelName) {
    this.parent.setLevel(level);
  }

  override isEnabled(level: LogLevelName): boolean {
    return this.parent.isEnabled(level);
  }
}

export const logger = new Logger();
