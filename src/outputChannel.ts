import * as fs from 'fs';
import { describeError, SettingsError } from './errors';

export type LogLevel = 'off' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['off', 'error', 'warn', 'info', 'debug'];

export interface LogSink {
  write(line: string): void;
}

export type SinkFailureHandler = (error: unknown, filePath: string) => void;

/** Appends lines to a file. The first failed write disables the sink and is reported once. */
export class FileSink implements LogSink {
  private disabled = false;

  constructor(
    public readonly filePath: string,
    private readonly onFailure?: SinkFailureHandler
  ) {}

  /** Creates the file if needed, raising a settings error when it cannot be opened for appending. */
  public static open(filePath: string, onFailure?: SinkFailureHandler): FileSink {
    try {
      fs.appendFileSync(filePath, '', 'utf8');
    } catch (error) {
      throw new SettingsError(`Cannot open log file '${filePath}': ${describeError(error)}`);
    }
    return new FileSink(filePath, onFailure);
  }

  public get isDisabled(): boolean {
    return this.disabled;
  }

  write(line: string): void {
    if (this.disabled) {
      return;
    }
    try {
      fs.appendFileSync(this.filePath, `${line}\n`, 'utf8');
    } catch (error) {
      this.disabled = true;
      this.onFailure?.(error, this.filePath);
    }
  }
}

// Named, levelled log output. Without a sink every call is a no-op.
export class OutputChannel {
  constructor(
    public readonly name: string,
    private readonly sink: LogSink | undefined,
    private readonly level: LogLevel = 'info',
    private readonly now: () => Date = () => new Date()
  ) {}

  public static create(
    name: string,
    options: { logFile?: string; logLevel?: LogLevel; onSinkFailure?: SinkFailureHandler }
  ): OutputChannel {
    const sink = options.logFile ? FileSink.open(options.logFile, options.onSinkFailure) : undefined;
    return new OutputChannel(name, sink, options.logLevel ?? 'info');
  }

  public appendLine(message: string): void {
    this.sink?.write(`[${this.now().toISOString()}] ${message}`);
  }

  public error(message: string): void {
    this.log('error', message);
  }

  public warn(message: string): void {
    this.log('warn', message);
  }

  public info(message: string): void {
    this.log('info', message);
  }

  public debug(message: string): void {
    this.log('debug', message);
  }

  public isEnabled(level: Exclude<LogLevel, 'off'>): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: Exclude<LogLevel, 'off'>, message: string) {
    if (!this.isEnabled(level)) {
      return;
    }
    this.appendLine(`[${level}] [${this.name}] ${message}`);
  }
}
