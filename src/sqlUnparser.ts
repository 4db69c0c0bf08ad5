/**
 * SqlUnparser - Renders grammar nodes back to SQL text for a dialect
 *
 * Rendering is done by `node-sql-parser`. Values produced by substitution are
 * already dialect-formatted, so they travel as {@link sqlText} nodes that the
 * renderer writes out unchanged.
 *
 * @module sqlUnparser
 */

import { ExprList, ExpressionValue, Value } from 'node-sql-parser';
import { SqlDialect } from './sqlDialect';
import { SqlScript, grammarParser } from './sqlParser';

/**
 * A node whose SQL text is known up front.
 */
export function sqlText(text: string): Value
{
	return { type: 'raw', value: text };
}

/**
 * Comma-separated list of `items`, in parentheses when `parenthesized`.
 */
export function sqlList(items: ExpressionValue[], parenthesized: boolean): ExprList
{
	return { type: 'expr_list', value: items, parentheses: parenthesized, separator: ', ' };
}

/**
 * Keyword node, written upper case.
 */
export function sqlKeyword(words: string): Value
{
	return { type: 'origin', value: words };
}

/**
 * Renders one expression node.
 */
export function unparse(node: ExpressionValue | ExprList, dialect: SqlDialect): string
{
	return grammarParser.exprToSQL(node, { database: dialect.grammar });
}

/**
 * Renders every statement of a parsed template in the grammar's canonical form.
 * References are written back as `${name}`, except row counts of `LIMIT`/`OFFSET`.
 */
export function unparseScript(script: SqlScript, dialect: SqlDialect): string
{
	const sql = grammarParser.sqlify(script.statements, { database: dialect.grammar });
	return script.references.reduce((text, reference) =>
	{
		const quoted = new RegExp(`[\`"]?\\b${reference.standIn}\\b[\`"]?`, 'g');
		return reference.numeric ? text : text.replace(quoted, () => `\${${reference.name}}`);
	}, sql);
}
