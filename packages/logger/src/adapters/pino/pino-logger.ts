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
  /** Where JSON lines go. Defaults to stdout, ignored when `prettify` is set. */
  destination?: DestinationStream
}

export const REDACTED_LOG_VALUE = "[redacted]"

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase

  constructor(
    private readonly deps: PinoLoggerDeps = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
    base?: PinoLoggerBase,
  ) {
    this.logger = base ? base.child(bindings) : this.init(bindings)
  }

  private init(bindings: LogContextPatch): PinoLoggerBase {
    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.redact && this.opts.redact.length > 0 && {
        redact: { paths: this.opts.redact, censor: REDACTED_LOG_VALUE },
      }),
      ...(this.opts.prettify && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            destination: 2,
          },
        },
      }),
    }

    const root =
      this.deps.destination && !this.opts.prettify
        ? pino(pinoOpts, this.deps.destination)
        : pino(pinoOpts)

    return root.child(bindings)
  }

  /** Pins pino's generic log argument to a plain record. */
  private toPinoMeta(meta: LogMeta<TContext>): Record<string, unknown> {
    return meta
  }

  trace(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.trace(this.toPinoMeta(meta), message)
  }

  debug(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.debug(this.toPinoMeta(meta), message)
  }

  info(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.info(this.toPinoMeta(meta), message)
  }

  warn(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.warn(this.toPinoMeta(meta), message)
  }

  error(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.error(this.toPinoMeta(meta), message)
  }

  fatal(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.fatal(this.toPinoMeta(meta), message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.deps, this.opts, context, this.logger)
  }
}
