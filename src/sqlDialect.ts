/**
 * SQL dialects: identifier quoting, literal escaping and date/time formats
 * of the databases the gateway can target.
 *
 * @module sqlDialect
 */

/**
 * Supported dialect names.
 */
export type DialectName = 'mysql' | 'postgresql' | 'sqlite';

/**
 * Delimiters of a quoted identifier.
 */
export interface IdentifierQuote
{
	open: string;
	close: string;
}

/**
 * Calendar date with an optional time of day, as bound to a DATE variable.
 */
export interface DateTimeParts
{
	year: number;
	month: number;
	day: number;
	/** Present when the value carries a time of day */
	time?: { hour: number; minute: number; second: number };
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Formats the date part as `YYYY-MM-DD`.
 */
export function formatIsoDate(parts: DateTimeParts): string
{
	return `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)}`;
}

/**
 * Formats the value as `YYYY-MM-DD HH:MM:SS` (midnight when no time is present).
 */
export function formatIsoTimestamp(parts: DateTimeParts): string
{
	const time = parts.time ?? { hour: 0, minute: 0, second: 0 };
	return `${formatIsoDate(parts)} ${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
}

/**
 * Reads `YYYY-MM-DD`, `YYYY-MM-DD HH:MM` or `YYYY-MM-DD HH:MM:SS` (a `T` separator is accepted).
 * @returns The parts, or undefined when the text is not such a date or names an impossible day
 */
export function parseDateTimeParts(text: string): DateTimeParts | undefined
{
	const match = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/.exec(text.trim());
	if (!match) return undefined;

	const [, year, month, day, hour, minute, second] = match;
	const parts: DateTimeParts = { year: Number(year), month: Number(month), day: Number(day) };
	const check = new Date(Date.UTC(parts.year, parts.month - 1, parts.day));
	if (check.getUTCMonth() !== parts.month - 1 || check.getUTCDate() !== parts.day) return undefined;

	if (hour !== undefined)
	{
		parts.time = { hour: Number(hour), minute: Number(minute), second: second === undefined ? 0 : Number(second) };
		if (parts.time.hour > 23 || parts.time.minute > 59 || parts.time.second > 59) return undefined;
	}
	return parts;
}

/**
 * Abstract class for dialect-specific SQL text rules.
 * Different databases use different escape characters and literal syntax.
 */
export abstract class SqlDialect
{
	abstract readonly name: DialectName;

	/**
	 * Database name understood by `node-sql-parser`.
	 */
	abstract readonly grammar: string;

	abstract readonly identifierQuote: IdentifierQuote;

	/**
	 * Whether `#` starts a line comment.
	 */
	readonly hashComments: boolean = false;

	/**
	 * Quotes a single identifier part, doubling embedded closing quotes.
	 */
	quoteIdentifierPart(part: string): string
	{
		const { open, close } = this.identifierQuote;
		return `${open}${part.split(close).join(close + close)}${close}`;
	}

	/**
	 * Escape identifiers (table names, field names, etc.), supports table.field format
	 * @param identifier Identifier (e.g., "users.id" or "id")
	 * @returns Escaped identifier (e.g., "`users`.`id`" for MySQL)
	 */
	escapeIdentifier(identifier: string): string
	{
		return identifier.split('.').map(part => this.quoteIdentifierPart(part)).join('.');
	}

	/**
	 * Renders a string literal.
	 */
	quoteString(value: string): string
	{
		return `'${value.replace(/'/g, "''")}'`;
	}

	formatBoolean(value: boolean): string
	{
		return value ? 'TRUE' : 'FALSE';
	}

	/**
	 * Renders a DATE literal.
	 */
	formatDate(parts: DateTimeParts): string
	{
		return this.quoteString(formatIsoDate(parts));
	}

	/**
	 * Renders a TIMESTAMP literal.
	 */
	formatTimestamp(parts: DateTimeParts): string
	{
		return this.quoteString(formatIsoTimestamp(parts));
	}
}

/**
 * MySQL dialect.
 * Uses backticks (`) for identifiers, backslash escapes inside strings and `#` comments.
 */
export class MySQLDialect extends SqlDialect
{
	readonly name = 'mysql';
	readonly grammar = 'mysql';
	readonly identifierQuote = { open: '`', close: '`' };
	override readonly hashComments = true;

	override quoteString(value: string): string
	{
		return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
	}
}

/**
 * PostgreSQL dialect.
 * Uses double quotes (") for identifiers and typed DATE/TIMESTAMP literals.
 */
export class PostgreSQLDialect extends SqlDialect
{
	readonly name = 'postgresql';
	readonly grammar = 'postgresql';
	readonly identifierQuote = { open: '"', close: '"' };

	override formatDate(parts: DateTimeParts): string
	{
		return `DATE ${this.quoteString(formatIsoDate(parts))}`;
	}

	override formatTimestamp(parts: DateTimeParts): string
	{
		return `TIMESTAMP ${this.quoteString(formatIsoTimestamp(parts))}`;
	}
}

/**
 * SQLite dialect.
 * Uses double quotes (") for identifiers; booleans are stored as integers.
 */
export class SQLiteDialect extends SqlDialect
{
	readonly name = 'sqlite';
	readonly grammar = 'sqlite';
	readonly identifierQuote = { open: '"', close: '"' };

	override formatBoolean(value: boolean): string
	{
		return value ? '1' : '0';
	}
}

const dialects: Record<DialectName, SqlDialect> = {
	mysql: new MySQLDialect(),
	postgresql: new PostgreSQLDialect(),
	sqlite: new SQLiteDialect()
};

export function isDialectName(name: string): name is DialectName
{
	return name === 'mysql' || name === 'postgresql' || name === 'sqlite';
}

/**
 * Returns the shared dialect instance for `name`.
 * @throws Error if the dialect is unknown
 */
export function getDialect(name: string): SqlDialect
{
	if (!isDialectName(name))
	{
		throw new Error(`Unknown SQL dialect: '${name}'`);
	}
	return dialects[name];
}
