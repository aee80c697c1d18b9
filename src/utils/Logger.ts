/**
 * Minimal leveled logger with component prefixes
 * 带组件前缀的分级日志器
 */

/**
 * Log level
 * 日志级别
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger contract accepted by the serializer, baker and virtual machine
 * 序列化器、烘焙器与虚拟机接受的日志接口
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger writing to the console with a `[Component]` prefix
 * 以`[组件]`前缀输出到控制台的日志器
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger('TypeBaker', true);
 * logger.debug('baked Point (2 properties)');
 * // [TypeBaker] baked Point (2 properties)
 * ```
 */
export class ConsoleLogger implements Logger {
  /** Log prefix 日志前缀 */
  protected readonly _logPrefix: string;

  constructor(
    readonly component: string,
    private readonly _debugEnabled = false
  ) {
    this._logPrefix = `[${component}]`;
  }

  get debugEnabled(): boolean {
    return this._debugEnabled;
  }

  debug(message: string): void {
    if (this._debugEnabled) {
      this.log(message, 'debug');
    }
  }

  info(message: string): void {
    this.log(message, 'info');
  }

  warn(message: string): void {
    this.log(message, 'warn');
  }

  error(message: string): void {
    this.log(message, 'error');
  }

  protected log(message: string, level: LogLevel): void {
    const fullMessage = `${this._logPrefix} ${message}`;

    switch (level) {
      case 'debug':
        console.debug(fullMessage);
        break;
      case 'warn':
        console.warn(fullMessage);
        break;
      case 'error':
        console.error(fullMessage);
        break;
      default:
        console.log(fullMessage);
        break;
    }
  }
}

/**
 * Logger that drops everything
 * 丢弃所有输出的日志器
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
