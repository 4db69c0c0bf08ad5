/**
 * SqlParser - Parses template text with the dialect grammar of `node-sql-parser`
 *
 * `${name}` references are not SQL, so each one is swapped for a stand-in of the
 * same length before the text reaches the grammar: a number inside
 * `LIMIT`/`OFFSET`, a unique identifier elsewhere. Offsets reported by the
 * grammar therefore point into the original template, and the locator finds
 * every reference again by looking its stand-in up in the tree.
 *
 * @module sqlParser
 */

import { AST, Parser } from 'node-sql-parser';
import { SqlSyntaxError } from './errors';
import { getLogger } from './logger';
import { SqlDialect } from './sqlDialect';
import { skipTriviaBackward } from './sqlText';

/**
 * A half-open range of the template text.
 */
export interface SourceSpan
{
	start: number;
	end: number;
}

/**
 * A `${name}` reference as written in the template.
 */
export interface VariableReference extends SourceSpan
{
	name: string;
	/** Text handed to the grammar in place of the reference */
	standIn: string;
	/** Parsed as a row count of `LIMIT`/`OFFSET` */
	numeric: boolean;
}

/**
 * A parsed template.
 */
export interface SqlScript
{
	text: string;
	/** Grammar trees, one per statement */
	statements: AST[];
	/** Every reference in the text, in order, including those inside comments and strings */
	references: VariableReference[];
}

export const grammarParser = new Parser();

const logger = getLogger('SqlParser');

const REFERENCE = /\$\{\s*([A-Za-z_][A-Za-z0-9_.]*)\s*\}/g;
const COUNT_KEYWORD = /\b(?:LIMIT|OFFSET)$/i;
const LIMIT_OFFSET_PAIR = /\bLIMIT\s+\d+\s*,$/i;

/**
 * Parses `sqlText` for `dialect`.
 * @throws SqlSyntaxError if the text is not valid SQL for the dialect
 */
export function parse(sqlText: string, dialect: SqlDialect): SqlScript
{
	logger.debug('Parsing SQL template', { dialect: dialect.name, length: sqlText.length });

	if (sqlText.trim() === '')
	{
		throw new SqlSyntaxError('Empty SQL template', 0, sqlText);
	}

	const references: VariableReference[] = [];
	let masked = '';
	let cursor = 0;

	for (const match of sqlText.matchAll(REFERENCE))
	{
		const start = match.index ?? 0;
		const end = start + match[0].length;
		masked += sqlText.slice(cursor, start);

		const before = masked.slice(0, skipTriviaBackward(masked, masked.length));
		const numeric = COUNT_KEYWORD.test(before) || LIMIT_OFFSET_PAIR.test(before);
		const standIn = numeric ? '1'.repeat(end - start) : identifierStandIn(references.length, end - start, sqlText, start);

		references.push({ name: match[1], start, end, standIn, numeric });
		masked += standIn;
		cursor = end;
	}
	masked += sqlText.slice(cursor);

	const leading = masked.length - masked.trimStart().length;
	let tree: AST[] | AST;
	try
	{
		tree = grammarParser.astify(masked.trim(), { database: dialect.grammar });
	}
	catch (error)
	{
		const message = error instanceof Error ? error.message : String(error);
		logger.debug('Grammar rejected template', { dialect: dialect.name, error: message });

		const offset = errorOffset(error);
		const found = errorFound(error);
		const reason = offset === undefined ? message : found === undefined ? 'unexpected end of input' : `unexpected '${found}'`;
		throw new SqlSyntaxError(`Invalid ${dialect.name} SQL: ${reason}`, offset === undefined ? 0 : offset + leading, sqlText);
	}

	return { text: sqlText, statements: Array.isArray(tree) ? tree : [tree], references };
}

/**
 * `v`, underscores and the index in base 36, as long as the reference it stands for.
 */
function identifierStandIn(index: number, length: number, text: string, offset: number): string
{
	const id = index.toString(36);
	if (id.length + 1 > length)
	{
		throw new SqlSyntaxError('Too many variable references', offset, text);
	}
	return 'v' + id.padStart(length - 1, '_');
}

function errorOffset(error: unknown): number | undefined
{
	if (typeof error !== 'object' || error === null || !('location' in error)) return undefined;
	const location = error.location;
	if (typeof location !== 'object' || location === null || !('start' in location)) return undefined;
	const start = location.start;
	if (typeof start !== 'object' || start === null || !('offset' in start)) return undefined;
	return typeof start.offset === 'number' ? start.offset : undefined;
}

function errorFound(error: unknown): string | undefined
{
	if (typeof error !== 'object' || error === null || !('found' in error)) return undefined;
	return typeof error.found === 'string' ? error.found : undefined;
}
