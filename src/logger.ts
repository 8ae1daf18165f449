import type { Logger } from './types.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

/** A logger implementation that outputs to the console. */
export class ConsoleLogger implements Logger {
	constructor(private readonly level: LogLevel = 'info') {}

	debug(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('debug')) console.debug(`[DEBUG] ${message}`, meta || '')
	}

	info(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('info')) console.info(`[INFO] ${message}`, meta || '')
	}

	warn(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('warn')) console.warn(`[WARN] ${message}`, meta || '')
	}

	error(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('error')) console.error(`[ERROR] ${message}`, meta || '')
	}

	private enabled(level: LogLevel): boolean {
		return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
	}
}

/** A logger implementation that does nothing (no-op). */
export class NullLogger implements Logger {
	debug(_message: string, _meta?: Record<string, unknown>): void {}
	info(_message: string, _meta?: Record<string, unknown>): void {}
	warn(_message: string, _meta?: Record<string, unknown>): void {}
	error(_message: string, _meta?: Record<string, unknown>): void {}
}

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value)
}
