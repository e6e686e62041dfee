// ============================================================================
// Vitrin - Logger
// Leveled console logging with a scope per component:
//
//   [vitrin] 14:02:11.337 INFO  SearchResultsPage  Product count: 67049
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const COLORS: Record<Exclude<LogLevel, 'silent'>, string> = {
	debug: '\x1b[90m',
	info: '\x1b[36m',
	warn: '\x1b[33m',
	error: '\x1b[31m',
};
const RESET = '\x1b[0m';

/** Where log lines go. Defaults to the console; tests pass a collector. */
export interface LogSink {
	log(line: string): void;
	warn(line: string): void;
	error(line: string): void;
}

export interface Logger {
	readonly level: LogLevel;
	debug(message: string): void;
	info(message: string): void;
	warn(message: string, err?: unknown): void;
	error(message: string, err?: unknown): void;
	/** A logger for a sub-component, sharing level and sink */
	child(scope: string): Logger;
}

export interface LoggerOptions {
	level?: LogLevel;
	sink?: LogSink;
	/** ANSI colours (default: when stdout is a TTY) */
	color?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
	const level = options.level ?? 'info';
	const sink = options.sink ?? console;
	const color = options.color ?? (options.sink === undefined && process.stdout.isTTY === true);

	const write = (lineLevel: Exclude<LogLevel, 'silent'>, message: string, err?: unknown) => {
		if (RANK[lineLevel] < RANK[level]) return;

		const time = new Date().toISOString().slice(11, 23);
		const tag = lineLevel.toUpperCase().padEnd(5);
		const label = color ? `${COLORS[lineLevel]}${tag}${RESET}` : tag;
		let line = `[vitrin] ${time} ${label} ${scope}  ${message}`;
		if (err !== undefined) {
			line += `: ${err instanceof Error ? err.message : String(err)}`;
		}

		if (lineLevel === 'error') sink.error(line);
		else if (lineLevel === 'warn') sink.warn(line);
		else sink.log(line);
	};

	return {
		level,
		debug: (message) => write('debug', message),
		info: (message) => write('info', message),
		warn: (message, err) => write('warn', message, err),
		error: (message, err) => write('error', message, err),
		child: (childScope) => createLogger(childScope, { level, sink, color }),
	};
}

/** Collects lines in memory. Useful in tests and for attaching logs to reports. */
export class MemorySink implements LogSink {
	readonly lines: string[] = [];

	log(line: string): void {
		this.lines.push(line);
	}

	warn(line: string): void {
		this.lines.push(line);
	}

	error(line: string): void {
		this.lines.push(line);
	}

	/** Lines with the timestamp removed, for stable assertions */
	messages(): string[] {
		return this.lines.map((line) => line.replace(/^\[vitrin\] \d\d:\d\d:\d\d\.\d{3} /, ''));
	}
}
