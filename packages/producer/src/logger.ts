/**
 * Structured JSON logging for the producer
 *
 * Every entry is one JSON line carrying level, message, timestamp and context.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

export type LogContext = Record<string, unknown>

/**
 * Logger interface accepted by the producer and its transports
 */
export interface Logger {
	error(message: string, context?: LogContext): void
	warn(message: string, context?: LogContext): void
	info(message: string, context?: LogContext): void
	debug(message: string, context?: LogContext): void

	/**
	 * Create a logger that adds `defaultContext` to every entry
	 */
	child(defaultContext: LogContext): Logger
}

class JsonLogger implements Logger {
	constructor(
		private readonly level: LogLevel,
		private readonly defaultContext: LogContext
	) {}

	private write(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
		if (LOG_LEVEL_VALUES[level] > LOG_LEVEL_VALUES[this.level]) {
			return
		}

		const line = JSON.stringify({
			level,
			message,
			timestamp: new Date().toISOString(),
			...this.defaultContext,
			...context,
		})

		if (level === 'error') {
			console.error(line)
		} else {
			console.log(line)
		}
	}

	error(message: string, context?: LogContext): void {
		this.write('error', message, context)
	}

	warn(message: string, context?: LogContext): void {
		this.write('warn', message, context)
	}

	info(message: string, context?: LogContext): void {
		this.write('info', message, context)
	}

	debug(message: string, context?: LogContext): void {
		this.write('debug', message, context)
	}

	child(defaultContext: LogContext): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext })
	}
}

class NoopLogger implements Logger {
	error(): void {
		// no-op
	}

	warn(): void {
		// no-op
	}

	info(): void {
		// no-op
	}

	debug(): void {
		// no-op
	}

	child(): Logger {
		return this
	}
}

/**
 * Create a JSON console logger
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug')
 * logger.info('connected', { clientId: 'orders-api' })
 * // {"level":"info","message":"connected","timestamp":"...","clientId":"orders-api"}
 * ```
 */
export function createLogger(level: LogLevel = 'info', defaultContext: LogContext = {}): Logger {
	return new JsonLogger(level, defaultContext)
}

export const noopLogger: Logger = new NoopLogger()

export interface LoggerOptions {
	logger?: Logger
	logLevel?: LogLevel
}

/**
 * Pick the logger a component should use.
 *
 * An explicit `logger` wins and gets `context` as child context. Otherwise a
 * JSON logger is created when `logLevel` is set to anything but 'silent'.
 */
export function resolveLogger(options: LoggerOptions, context: LogContext = {}): Logger {
	if (options.logger) {
		return options.logger.child(context)
	}
	if (options.logLevel && options.logLevel !== 'silent') {
		return createLogger(options.logLevel, context)
	}
	return noopLogger
}
