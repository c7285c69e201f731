import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
	SILENT: 'silent',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	/** Log level */
	level: LogLevel;
	/** Service name for structured logs */
	serviceName: string;
	/** Whether to use pretty printing (interactive terminals) */
	pretty?: boolean;
	/** Additional base context */
	base?: Record<string, unknown>;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:HH:MM:ss',
					ignore: 'pid,hostname,service',
					// Progress goes to stderr, stdout carries the command output
					destination: 2,
				},
			},
		});
	}

	return pino(options, pino.destination(2));
}

/**
 * Create a child logger bound to a pipeline component
 */
export function componentLogger(parent: Logger, component: string): Logger {
	return parent.child({ component });
}

/**
 * Measure a synchronous step and log its duration at debug level.
 */
export function timed<T>(logger: Logger, step: string, fn: () => T): T {
	const startedAt = performance.now();
	try {
		return fn();
	} finally {
		const durationMs = Math.round((performance.now() - startedAt) * 100) / 100;
		logger.debug({ step, durationMs }, 'Step finished');
	}
}
