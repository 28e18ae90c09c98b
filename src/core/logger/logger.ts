/**
 * Gateway logger - Pino-based structured logging
 *
 * - pretty output for development, JSON lines otherwise
 * - child loggers carrying request context
 * - request and model-call tracing helpers
 * - optional EventBus integration that mirrors gateway events into the log
 */

import pino from "pino";
import pinoPretty from "pino-pretty";
import { EventBus, EventType } from "../eventBus";
import { createLoggerConfig, LoggerConfig } from "./config";

export interface LoggerContext {
  requestId?: string;
  model?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export interface GatewayLoggerOptions {
  eventBus?: EventBus;
  // Overrides the configured destination; tests pass an in-memory stream
  stream?: pino.DestinationStream;
  // Wraps an existing pino instance instead of creating one (child loggers)
  pino?: pino.Logger;
}

export class GatewayLogger {
  private pinoLogger: pino.Logger;
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}, options: GatewayLoggerOptions = {}) {
    this.config = createLoggerConfig(config);
    this.pinoLogger =
      options.pino ??
      pino(
        {
          level: this.config.level,
          ...(this.config.source ? { base: { source: this.config.source } } : {}),
          formatters: {
            level: (label) => ({ level: label }),
          },
          serializers: {
            err: pino.stdSerializers.err,
          },
        },
        options.stream ?? this.createStream()
      );

    if (options.eventBus) {
      this.setupEventBusIntegration(options.eventBus);
    }
  }

  private createStream(): pino.DestinationStream {
    const fd = this.config.destination === "stderr" ? 2 : 1;
    if (this.config.format === "pretty") {
      return pinoPretty({
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname,source",
        destination: fd,
      });
    }
    return pino.destination({ dest: fd, sync: true });
  }

  /**
   * Create child logger with context
   */
  child(context: LoggerContext): GatewayLogger {
    return new GatewayLogger(this.config, { pino: this.pinoLogger.child(context) });
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    if (message instanceof Error) {
      this.pinoLogger.error({ ...context, err: message }, message.message);
    } else {
      this.pinoLogger.error(context ?? {}, message);
    }
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    if (message instanceof Error) {
      this.pinoLogger.fatal({ ...context, err: message }, message.message);
    } else {
      this.pinoLogger.fatal(context ?? {}, message);
    }
  }

  /**
   * Request tracing: one line per HTTP exchange
   */
  traceRequest(method: string, path: string, statusCode: number, duration: number, context?: LoggerContext): void {
    const level = statusCode >= 500 ? "error" : statusCode >= 400 ? "warn" : "info";
    this.pinoLogger[level](
      {
        ...context,
        method,
        path,
        statusCode,
        duration,
        type: "request",
      },
      `${method} ${path} -> ${statusCode} ${duration.toFixed(2)}ms`
    );
  }

  /**
   * Model interaction tracing
   */
  traceModelCall(model: string, prompt: string, response: string, duration: number, context?: LoggerContext): void {
    this.debug("Model interaction", {
      ...context,
      model,
      promptLength: prompt.length,
      responseLength: response.length,
      duration,
      type: "model_call",
    });
  }

  isLevelEnabled(level: pino.Level): boolean {
    return this.pinoLogger.isLevelEnabled(level);
  }

  async flush(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.pinoLogger.flush((err) => (err ? reject(err) : resolve()));
    });
  }

  private setupEventBusIntegration(eventBus: EventBus): void {
    const eventMappings: { event: EventType; message: string }[] = [
      { event: "ModelResolvedEvent", message: "Model resolved" },
      { event: "ModelFallbackEvent", message: "Model fell back to default" },
      { event: "ModelAcquisitionEvent", message: "Model acquisition" },
      { event: "GenerationEvent", message: "Generation completed" },
      { event: "GenerationErrorEvent", message: "Generation failed" },
    ];

    for (const { event, message } of eventMappings) {
      eventBus.on(event, (evt) => {
        this.pinoLogger.debug(
          {
            event,
            payload: evt.payload,
            type: "eventbus",
            correlationId: evt.id,
          },
          message
        );
      });
    }
  }
}
