import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Existing pino logger to derive a child from; its level and sink are inherited. */
  base?: PinoLoggerBase

  /** Where JSON lines are written. Ignored when `base` is given. */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase

  constructor(
    deps: PinoLoggerDeps = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.logger = deps.base ? deps.base.child(context) : this.init(deps, context)
  }

  private init(deps: PinoLoggerDeps, context: LogContextPatch): PinoLoggerBase {
    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
    }

    if (deps.destination) return pino(pinoOpts, deps.destination).child(context)

    if (this.opts.prettify) {
      pinoOpts.transport = {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "hostname,pid",
        },
      }
    }

    return pino(pinoOpts).child(context)
  }

  trace(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.trace(meta, message)
  }

  debug(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.debug(meta, message)
  }

  info(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.info(meta, message)
  }

  warn(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.warn(meta, message)
  }

  error(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.error(meta, message)
  }

  fatal(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.fatal(meta, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ base: this.logger }, this.opts, context)
  }
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(deps, opts, context)
}
