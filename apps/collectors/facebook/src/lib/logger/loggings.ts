import {
  createLogger,
  format,
  transports,
  Logger as WinstonLogger,
} from "winston";

const { combine, printf, timestamp, colorize, json } = format;

export interface LogContext {
  postId?: string;
  pageId?: string;
  count?: number;
  datasetName?: string;
  error?: string | Error;
  [key: string]: unknown;
}

function devFormat() {
  return printf((info) => {
    const { timestamp, level, message, ...meta } = info;
    return `${timestamp} [${level}] ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ""}`;
  });
}

function prodFormat() {
  return json();
}

export function prodDevLogger(level = "info"): WinstonLogger {
  return createLogger({
    level,
    format: combine(timestamp(), prodFormat()),
    transports: [
      new transports.File({
        level,
        filename: "logs/social-media-tools-info.log",
      }),
      new transports.File({
        level: "error",
        filename: "logs/social-media-tools-error.log",
      }),
    ],
  });
}

export function buildDevLogger(level = "debug"): WinstonLogger {
  return createLogger({
    level,
    format: combine(colorize(), timestamp(), devFormat()),
    transports: [new transports.Console()],
  });
}

export function buildTestLogger(): WinstonLogger {
  return createLogger({
    silent: true,
    transports: [new transports.Console()],
  });
}

// Context-aware wrapper
export class AppLogger {
  private logger: WinstonLogger;
  private serviceName: string;

  constructor(logger: WinstonLogger, serviceName: string) {
    this.logger = logger;
    this.serviceName = serviceName;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug({
      service: this.serviceName,
      message,
      ...this.prepareContext(context),
    });
  }

  info(message: string, context?: LogContext): void {
    this.logger.info({
      service: this.serviceName,
      message,
      ...this.prepareContext(context),
    });
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn({
      service: this.serviceName,
      message,
      ...this.prepareContext(context),
    });
  }

  error(message: string, context?: LogContext): void {
    const errorInfo =
      context?.error instanceof Error ? context.error.stack : context?.error;

    this.logger.error({
      service: this.serviceName,
      message,
      error: errorInfo,
      ...this.prepareContext(context),
    });
  }

  /**
   * Ends the logger and exits once every transport has flushed, so the last
   * entries reach the log files. Never resolves.
   */
  flushAndExit(code: number): Promise<never> {
    return new Promise<never>(() => {
      this.logger.on("finish", () => process.exit(code));
      this.logger.end();
    });
  }

  private prepareContext(context?: LogContext): Record<string, unknown> {
    if (!context) return {};
    const { error, ...rest } = context; // prevent duplicate error field
    return rest;
  }
}
