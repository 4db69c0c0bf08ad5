import { InvalidValueError } from './errors';
import { DateTimeParts, SqlDialect, formatIsoTimestamp, parseDateTimeParts } from './sqlDialect';

/**
 * How bound values are rendered.
 * FRAGMENT values are inserted as raw SQL, IDENTIFIER values as quoted names,
 * every other type as literals.
 */
export type ValueType = 'STRING' | 'NUMERIC' | 'DATE' | 'BOOLEAN' | 'FRAGMENT' | 'IDENTIFIER';

/**
 * Where a variable comes from: a dashboard query parameter or a row-level permission.
 */
export type VariableType = 'QUERY' | 'PERMISSION';

export type ScriptValue = string | number | boolean | Date;

/**
 * A named variable and the values bound to it for one substitution.
 */
export interface ScriptVariable
{
	/** Name referenced as `${name}` in the template */
	name: string;
	/** Bound values, possibly empty */
	values: readonly ScriptValue[];
	valueType: ValueType;
	/** Marks a fragment variable regardless of `valueType` */
	expression?: boolean;
	type?: VariableType;
}

/**
 * A SQL template together with the variables bound for one run.
 */
export interface QueryScript
{
	sql: string;
	variables?: ScriptVariable[];
}

const NUMERIC_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Whether the variable's values are inserted verbatim as SQL text.
 */
export function isFragmentVariable(variable: ScriptVariable): boolean
{
	return variable.expression === true || variable.valueType === 'FRAGMENT';
}

export function isIdentifierVariable(variable: ScriptVariable): boolean
{
	return !isFragmentVariable(variable) && variable.valueType === 'IDENTIFIER';
}

/**
 * Renders the bound values of a value variable as SQL literals of `dialect`.
 * @throws InvalidValueError if a value does not fit the variable's type
 */
export function toLiteralTexts(variable: ScriptVariable, dialect: SqlDialect): string[]
{
	return variable.values.map(value => toLiteral(variable, value, dialect));
}

/**
 * Renders the bound values of an IDENTIFIER variable as quoted names,
 * splitting `schema.table` style names on dots and quoting every part.
 * @throws InvalidValueError for empty names or empty parts
 */
export function toIdentifierTexts(variable: ScriptVariable, dialect: SqlDialect): string[]
{
	return variable.values.map(value =>
	{
		const text = String(value);
		if (text.trim() === '' || text.split('.').some(part => part === ''))
		{
			throw new InvalidValueError(variable.name, value, 'IDENTIFIER');
		}
		return dialect.escapeIdentifier(text);
	});
}

/**
 * Raw SQL text of a fragment variable: its values joined by a space.
 */
export function toFragmentText(variable: ScriptVariable): string
{
	return variable.values.map(value => value instanceof Date ? dateText(variable, value) : String(value)).join(' ');
}

function toLiteral(variable: ScriptVariable, value: ScriptValue, dialect: SqlDialect): string
{
	switch (variable.valueType)
	{
		case 'NUMERIC':
		{
			const text = typeof value === 'number' ? (Number.isFinite(value) ? String(value) : '') : String(value).trim();
			if (typeof value === 'boolean' || value instanceof Date || !NUMERIC_PATTERN.test(text))
			{
				throw new InvalidValueError(variable.name, value, 'NUMERIC');
			}
			// larger integers only survive as strings
			if (typeof value === 'number' && Number.isInteger(value) && !Number.isSafeInteger(value))
			{
				throw new InvalidValueError(variable.name, value, 'NUMERIC');
			}
			return text.replace(/^\+/, '');
		}
		case 'BOOLEAN':
		{
			const text = String(value).trim().toLowerCase();
			if (value === true || text === 'true' || text === '1') return dialect.formatBoolean(true);
			if (value === false || text === 'false' || text === '0') return dialect.formatBoolean(false);
			throw new InvalidValueError(variable.name, value, 'BOOLEAN');
		}
		case 'DATE':
		{
			const parts = value instanceof Date ? datePartsOf(value) : typeof value === 'string' ? parseDateTimeParts(value) : undefined;
			if (!parts)
			{
				throw new InvalidValueError(variable.name, value, 'DATE');
			}
			return parts.time ? dialect.formatTimestamp(parts) : dialect.formatDate(parts);
		}
		default:
			return dialect.quoteString(value instanceof Date ? dateText(variable, value) : String(value));
	}
}

function dateText(variable: ScriptVariable, date: Date): string
{
	const parts = datePartsOf(date);
	if (!parts)
	{
		throw new InvalidValueError(variable.name, date, variable.valueType);
	}
	return formatIsoTimestamp(parts);
}

/**
 * UTC calendar parts of a Date; the time is kept only when it is not midnight.
 */
function datePartsOf(date: Date): DateTimeParts | undefined
{
	if (Number.isNaN(date.getTime())) return undefined;

	const parts: DateTimeParts = { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() };
	const time = { hour: date.getUTCHours(), minute: date.getUTCMinutes(), second: date.getUTCSeconds() };
	if (time.hour !== 0 || time.minute !== 0 || time.second !== 0)
	{
		parts.time = time;
	}
	return parts;
}
