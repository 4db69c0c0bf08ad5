/**
 * @file Leveled logger shared by the substitution engine, the gateway and the providers.
 * Entries carry a component context plus structured fields such as the dialect,
 * the variable or the provider they concern.
 */

/**
 * Log levels, lowest first.
 */
export enum LogLevel
{
	ALL = 0,
	DEBUG = 10,
	INFO = 20,
	WARN = 30,
	ERROR = 40,
	/** Disable all logging */
	OFF = 50
}

/**
 * Structured fields of a log entry.
 */
export type LogData = Record<string, unknown>;

export interface LogEntry
{
	timestamp: Date;
	level: LogLevel;
	message: string;
	/** Component that wrote the entry */
	context?: string;
	data?: LogData;
}

export interface LoggerConfig
{
	/** Minimum level written (default: INFO) */
	level?: LogLevel;
	formatter?: (entry: LogEntry) => string;
	/** Receives every entry at or above the level; defaults to the console */
	handler?: (entry: LogEntry) => void;
}

/**
 * Logger bound to a component and a set of fixed fields, as returned by {@link getLogger}.
 */
export interface ContextLogger
{
	debug(message: string, data?: LogData): void;
	info(message: string, data?: LogData): void;
	warn(message: string, data?: LogData): void;
	error(message: string, data?: LogData): void;
}

/**
 * `<ISO time> <LEVEL> [context] message key=value ...`, values as JSON.
 */
export function formatEntry(entry: LogEntry): string
{
	const parts = [entry.timestamp.toISOString(), LogLevel[entry.level].padEnd(5)];
	if (entry.context) parts.push(`[${entry.context}]`);
	parts.push(entry.message);
	for (const [key, value] of Object.entries(entry.data ?? {}))
	{
		if (value !== undefined) parts.push(`${key}=${JSON.stringify(value)}`);
	}
	return parts.join(' ');
}

export class Logger
{
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {})
	{
		this.config = {
			level: config.level ?? LogLevel.INFO,
			formatter: config.formatter ?? formatEntry,
			handler: config.handler ?? (entry => this.writeToConsole(entry))
		};
	}

	/**
	 * Updates the configuration. Omitted fields keep their current value.
	 */
	configure(config: Partial<LoggerConfig>): void
	{
		this.config = {
			level: config.level ?? this.config.level,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	getLevel(): LogLevel
	{
		return this.config.level;
	}

	setLevel(level: LogLevel): void
	{
		this.config.level = level;
	}

	log(level: LogLevel, message: string, context?: string, data?: LogData): void
	{
		if (this.config.level === LogLevel.OFF || level < this.config.level) return;
		this.config.handler({ timestamp: new Date(), level, message, context, data });
	}

	private writeToConsole(entry: LogEntry): void
	{
		const line = this.config.formatter(entry);
		switch (entry.level)
		{
			case LogLevel.ERROR:
				console.error(line);
				break;
			case LogLevel.WARN:
				console.warn(line);
				break;
			case LogLevel.DEBUG:
				console.debug(line);
				break;
			default:
				console.log(line);
				break;
		}
	}
}

/**
 * Logger every component writes through.
 */
export const globalLogger = new Logger();

/**
 * Returns a logger that tags every entry with `context` and adds `fields` to its data.
 */
export function getLogger(context: string, fields: LogData = {}): ContextLogger
{
	const write = (level: LogLevel) => (message: string, data?: LogData): void =>
		globalLogger.log(level, message, context, data || Object.keys(fields).length > 0 ? { ...fields, ...data } : undefined);

	return {
		debug: write(LogLevel.DEBUG),
		info: write(LogLevel.INFO),
		warn: write(LogLevel.WARN),
		error: write(LogLevel.ERROR)
	};
}
