/**
 * Leveled console logger.
 * Level comes from BROKER_LOG, then LOG_LEVEL, defaulting to ERROR.
 */

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	NONE = 4,
}

export interface Logger {
	debug(msg: string, ...args: unknown[]): void;
	info(msg: string, ...args: unknown[]): void;
	warn(msg: string, ...args: unknown[]): void;
	error(msg: string, ...args: unknown[]): void;
}

export function parseLogLevel(value: string | undefined): LogLevel {
	switch (value?.toUpperCase()) {
		case 'TRACE':
		case 'DEBUG':
			return LogLevel.DEBUG;
		case 'INFO':
			return LogLevel.INFO;
		case 'WARN':
			return LogLevel.WARN;
		case 'OFF':
		case 'NONE':
			return LogLevel.NONE;
		default:
			return LogLevel.ERROR;
	}
}

export class ConsoleLogger implements Logger {
	readonly level: LogLevel;
	private readonly prefix: string;

	constructor(level?: LogLevel, prefix = '[broker]') {
		this.level = level ?? parseLogLevel(process.env.BROKER_LOG || process.env.LOG_LEVEL);
		this.prefix = prefix;
	}

	debug(msg: string, ...args: unknown[]): void {
		if (this.level <= LogLevel.DEBUG) {
			console.debug(`${this.prefix} [DEBUG] ${msg}`, ...args);
		}
	}

	info(msg: string, ...args: unknown[]): void {
		if (this.level <= LogLevel.INFO) {
			console.log(`${this.prefix} [INFO] ${msg}`, ...args);
		}
	}

	warn(msg: string, ...args: unknown[]): void {
		if (this.level <= LogLevel.WARN) {
			console.warn(`${this.prefix} [WARN] ${msg}`, ...args);
		}
	}

	error(msg: string, ...args: unknown[]): void {
		if (this.level <= LogLevel.ERROR) {
			console.error(`${this.prefix} [ERROR] ${msg}`, ...args);
		}
	}
}

// Shared default instance
export const logger: Logger = new ConsoleLogger();
