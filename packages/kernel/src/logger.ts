/**
 * Logger - Structured logging with automatic context injection
 *
 * Built on pino, with automatic injection of the current request context
 * (request id, trace id, plus any fields a custom extractor adds).
 *
 * @example
 * ```typescript
 * import { Logger } from 'unfurl-kernel';
 *
 * // Configure once at app start
 * Logger.configure({ level: 'info' });
 *
 * // Use anywhere - context is auto-injected
 * const log = Logger.get();
 * log.info('Processing request');
 *
 * // Create scoped child logger
 * const revealLog = Logger.for('RevealSession');
 * revealLog.debug({ messageId }, 'Reveal started');
 * ```
 */

import pino, {
  type DestinationStream,
  type Logger as PinoLogger,
  type LoggerOptions,
  type TransportSingleOptions,
  type TransportMultiOptions,
} from "pino";
import { Context, type KernelContext } from "./context";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels supported by the kernel logger, least to most severe.
 * `silent` disables all logging.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/**
 * Function to extract fields from KernelContext for logging.
 * Return an object with fields to include in every log entry.
 *
 * @example
 * ```typescript
 * const withUser: ContextFieldsExtractor = (ctx) => ({
 *   user_id: ctx.user?.id,
 *   chat_id: ctx.metadata.chatId,
 * });
 * ```
 *
 * @see {@link composeContextFields} - Combine multiple extractors
 */
export type ContextFieldsExtractor<TContext extends KernelContext = KernelContext> = (
  ctx: TContext,
) => Record<string, unknown>;

export interface LoggerConfig<TContext extends KernelContext = KernelContext> {
  /** Log level (default: LOG_LEVEL from the environment, else 'info') */
  level?: LogLevel;
  /** Pino transport configuration */
  transport?: TransportSingleOptions | TransportMultiOptions;
  /** Write to this stream instead of stdout or a transport */
  destination?: DestinationStream;
  /** Auto-inject request context into every log (default: true) */
  includeContext?: boolean;
  /**
   * Custom function to extract fields from context, composed after the
   * default extractor.
   */
  contextFields?: ContextFieldsExtractor<TContext>;
  /** Base properties to include in every log */
  base?: Record<string, unknown>;
  /** Custom mixin function for additional properties */
  mixin?: () => Record<string, unknown>;
  /** Pretty print (default: true outside production and test runs) */
  prettyPrint?: boolean;
  /**
   * Replace existing config instead of merging (default: false).
   */
  replace?: boolean;
}

/**
 * Log method signature supporting both message-first and object-first forms.
 *
 * @example
 * ```typescript
 * log.info('Processed %d tokens', count);
 * log.error({ err, chatId }, 'Completion failed');
 * ```
 */
export interface LogMethod {
  (msg: string, ...args: unknown[]): void;
  (obj: Record<string, unknown>, msg?: string, ...args: unknown[]): void;
}

/**
 * Kernel logger interface with structured logging and context injection.
 *
 * @see {@link Logger} - Static methods to get/configure loggers
 */
export interface KernelLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;

  /** Create a child logger with additional bindings */
  child(bindings: Record<string, unknown>): KernelLogger;

  level: LogLevel;

  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Implementation
// =============================================================================

let globalLogger: PinoLogger | null = null;
let globalConfig: LoggerConfig = {};

const defaultContextFieldsExtractor: ContextFieldsExtractor = (ctx) => {
  const fields: Record<string, unknown> = {};
  if (ctx.requestId) fields.request_id = ctx.requestId;
  if (ctx.traceId) fields.trace_id = ctx.traceId;
  if (ctx.user?.id) fields.user_id = ctx.user.id;
  return fields;
};

/**
 * Extract context fields for logging.
 * Called on every log to inject current request context.
 */
function getContextFields(config: LoggerConfig): Record<string, unknown> {
  if (config.includeContext === false) {
    return {};
  }

  const ctx = Context.tryGet();
  if (!ctx) {
    return {};
  }

  const extractor = config.contextFields ?? defaultContextFieldsExtractor;
  return extractor(ctx);
}

function resolveLevel(config: LoggerConfig): LogLevel {
  if (config.level) return config.level;
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

function createPinoOptions(config: LoggerConfig): LoggerOptions {
  const env = process.env.NODE_ENV;
  const usePretty = config.prettyPrint ?? (env !== "production" && env !== "test");

  const options: LoggerOptions = {
    level: resolveLevel(config),
    base: config.base ?? { pid: process.pid },

    // Mixin runs on every log to inject context
    mixin: () => {
      const contextFields = getContextFields(config);
      const customFields = config.mixin?.() ?? {};
      return { ...contextFields, ...customFields };
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // A destination stream takes precedence over transports
  if (config.destination) {
    return options;
  }

  if (config.transport) {
    options.transport = config.transport;
  } else if (usePretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return options;
}

function createPino(config: LoggerConfig): PinoLogger {
  const options = createPinoOptions(config);
  return config.destination ? pino(options, config.destination) : pino(options);
}

function currentLevel(pinoLogger: PinoLogger): LogLevel {
  return isLogLevel(pinoLogger.level) ? pinoLogger.level : "info";
}

/**
 * Wrap pino logger to match KernelLogger interface.
 */
function wrapLogger(pinoLogger: PinoLogger): KernelLogger {
  return {
    trace: pinoLogger.trace.bind(pinoLogger),
    debug: pinoLogger.debug.bind(pinoLogger),
    info: pinoLogger.info.bind(pinoLogger),
    warn: pinoLogger.warn.bind(pinoLogger),
    error: pinoLogger.error.bind(pinoLogger),
    fatal: pinoLogger.fatal.bind(pinoLogger),

    child(bindings: Record<string, unknown>): KernelLogger {
      return wrapLogger(pinoLogger.child(bindings));
    },

    get level(): LogLevel {
      return currentLevel(pinoLogger);
    },

    isLevelEnabled(level: LogLevel): boolean {
      return pinoLogger.isLevelEnabled(level);
    },
  };
}

function getOrCreateGlobalLogger(): PinoLogger {
  if (!globalLogger) {
    globalLogger = createPino(globalConfig);
  }
  return globalLogger;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Logger singleton.
 *
 * @example
 * ```typescript
 * Logger.configure({ level: 'debug' });
 *
 * const log = Logger.get();
 * log.info('Request received');
 *
 * class ChatSession {
 *   private log = Logger.for(this);
 * }
 * ```
 */
export const Logger = {
  /**
   * Configure the global logger.
   * Should be called once at application startup.
   */
  configure(config: LoggerConfig): void {
    if (config.replace) {
      globalConfig = config;
    } else {
      globalConfig = { ...globalConfig, ...config };
    }

    if (config.contextFields) {
      globalConfig.contextFields = composeContextFields(defaultContextFields, config.contextFields);
    } else if (!globalConfig.contextFields) {
      globalConfig.contextFields = defaultContextFields;
    }

    globalLogger = createPino(globalConfig);
  },

  /**
   * Get the global logger instance.
   * Context is automatically injected into every log.
   */
  get(): KernelLogger {
    return wrapLogger(getOrCreateGlobalLogger());
  },

  /**
   * Create a child logger scoped to a component or name.
   *
   * @param nameOrComponent Component name or object (uses constructor.name)
   */
  for(nameOrComponent: string | object): KernelLogger {
    const name =
      typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;
    return wrapLogger(getOrCreateGlobalLogger().child({ component: name }));
  },

  child(bindings: Record<string, unknown>): KernelLogger {
    return wrapLogger(getOrCreateGlobalLogger().child(bindings));
  },

  /**
   * Create a standalone logger instance with custom config.
   * Does not affect the global logger.
   */
  create(config: LoggerConfig = {}): KernelLogger {
    return wrapLogger(createPino(config));
  },

  get level(): LogLevel {
    return currentLevel(getOrCreateGlobalLogger());
  },

  setLevel(level: LogLevel): void {
    getOrCreateGlobalLogger().level = level;
  },

  isLevelEnabled(level: LogLevel): boolean {
    return getOrCreateGlobalLogger().isLevelEnabled(level);
  },

  /**
   * Reset the global logger (mainly for testing).
   */
  reset(): void {
    globalLogger = null;
    globalConfig = {};
  },
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Compose multiple context field extractors into one.
 * Later extractors override earlier ones for the same keys.
 */
export function composeContextFields(
  ...extractors: ContextFieldsExtractor[]
): ContextFieldsExtractor {
  return (ctx) => {
    const result: Record<string, unknown> = {};
    for (const extractor of extractors) {
      Object.assign(result, extractor(ctx));
    }
    return result;
  };
}

/**
 * The default context fields extractor: request_id, trace_id, user_id.
 */
export const defaultContextFields = defaultContextFieldsExtractor;

export type { PinoLogger, DestinationStream, TransportSingleOptions, TransportMultiOptions };
