import { ConsoleLogger, Injectable, type LogLevel } from '@nestjs/common';

type LogMeta = Record<string, unknown>;
type JsonLevel = 'info' | 'warn' | 'error' | 'debug' | 'verbose';

/**
 * JSON line logger on top of Nest's ConsoleLogger.
 * Every line has the {ts,level,context,msg,...meta} shape so log shippers can parse it.
 */
@Injectable()
export class JsonLogger extends ConsoleLogger {
  constructor(context?: string) {
    super(context ?? 'user-api');
  }

  /** Logger bound to another context, sharing this instance's log levels */
  child(context: string): JsonLogger {
    const child = new JsonLogger(context);
    if (this.options.logLevels) child.setLogLevels(this.options.logLevels);
    return child;
  }

  private normalizeError(error: unknown): LogMeta {
    if (error instanceof Error) {
      return { name: error.name, message: error.message, stack: error.stack };
    }
    if (typeof error === 'object' && error !== null) {
      try {
        return { value: JSON.parse(JSON.stringify(error)) as unknown };
      } catch {
        return { value: String(error) };
      }
    }
    return { value: String(error) };
  }

  private format(level: JsonLevel, message: unknown, context: string | undefined, meta: LogMeta): string {
    const body = message instanceof Error ? { msg: message.message, error: this.normalizeError(message) } : { msg: message };
    return JSON.stringify({ ts: new Date().toISOString(), level, context, ...body, ...meta });
  }

  // Nest passes a context string; application code passes a meta object
  private split(metaOrContext: string | LogMeta | undefined): { context: string | undefined; meta: LogMeta } {
    if (typeof metaOrContext === 'string') return { context: metaOrContext, meta: {} };
    return { context: this.context, meta: metaOrContext ?? {} };
  }

  log(message: unknown, context?: string): void;
  log(message: unknown, meta?: LogMeta): void;
  log(message: unknown, metaOrContext?: string | LogMeta) {
    const { context, meta } = this.split(metaOrContext);
    super.log(this.format('info', message, context, meta));
  }

  warn(message: unknown, context?: string): void;
  warn(message: unknown, meta?: LogMeta): void;
  warn(message: unknown, metaOrContext?: string | LogMeta) {
    const { context, meta } = this.split(metaOrContext);
    super.warn(this.format('warn', message, context, meta));
  }

  error(message: unknown, stack?: string, context?: string): void;
  error(message: unknown, meta?: LogMeta): void;
  error(message: unknown, stackOrMeta?: string | LogMeta, maybeContext?: string) {
    const stack = typeof stackOrMeta === 'string' ? stackOrMeta : undefined;
    const meta = typeof stackOrMeta === 'string' ? {} : (stackOrMeta ?? {});
    super.error(this.format('error', message, maybeContext ?? this.context, stack ? { stack, ...meta } : meta));
  }

  debug(message: unknown, context?: string): void;
  debug(message: unknown, meta?: LogMeta): void;
  debug(message: unknown, metaOrContext?: string | LogMeta) {
    const { context, meta } = this.split(metaOrContext);
    super.debug(this.format('debug', message, context, meta));
  }

  verbose(message: unknown, context?: string): void;
  verbose(message: unknown, meta?: LogMeta): void;
  verbose(message: unknown, metaOrContext?: string | LogMeta) {
    const { context, meta } = this.split(metaOrContext);
    super.verbose(this.format('verbose', message, context, meta));
  }

  /** Keeps Nest from downgrading log levels when bufferLogs=true. */
  setLogLevels(levels: LogLevel[]) {
    super.setLogLevels(levels);
  }
}
