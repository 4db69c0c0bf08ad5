/**
 * VariableSubstitutor - Turns a SQL template and its variable bindings into finished SQL
 *
 * One pass is parse → locate → build placeholders → splice:
 *
 * 1. The template is parsed with the dialect grammar; syntax errors propagate.
 * 2. Every `${name}` reference the grammar saw is located, ordered by position.
 * 3. Each reference gets a placeholder, which yields one replacement pair.
 *    References that rewrite the same range the same way (empty items of one
 *    list) collapse into a single pair.
 * 4. The pairs are spliced into the original text in one left-to-right pass.
 *    Text outside them is kept byte for byte.
 *
 * @module variableSubstitutor
 */

import { DuplicateVariableError } from './errors';
import { ContextLogger, getLogger } from './logger';
import { LocateOptions, locate } from './placeholderLocator';
import { ReplacementPair, applyReplacements } from './replacement';
import { ScriptVariable } from './scriptVariable';
import { DialectName, SqlDialect, getDialect } from './sqlDialect';
import { parse } from './sqlParser';
import { createPlaceholder, placeholderKind } from './variablePlaceholder';

/**
 * Substitution options.
 */
export type SubstitutionOptions = LocateOptions;

/**
 * Holds a dialect and options, and substitutes templates with them.
 *
 * @example
 * const substitutor = new VariableSubstitutor('postgresql');
 * substitutor.substitute('SELECT * FROM t WHERE region IN (${region})', [
 *   { name: 'region', values: ['east', 'west'], valueType: 'STRING' }
 * ]);
 * // SELECT * FROM t WHERE region IN ('east', 'west')
 */
export class VariableSubstitutor
{
	private readonly dialect: SqlDialect;
	private readonly logger: ContextLogger;

	constructor(dialect: SqlDialect | DialectName, private readonly options: SubstitutionOptions = {})
	{
		this.dialect = typeof dialect === 'string' ? getDialect(dialect) : dialect;
		this.logger = getLogger('VariableSubstitutor', { dialect: this.dialect.name });
	}

	/**
	 * @throws SqlScriptError subclasses; no partial SQL is ever returned
	 */
	substitute(template: string, variables: readonly ScriptVariable[]): string
	{
		this.logger.debug('Substituting variables', { variables: variables.map(v => v.name) });

		const seen = new Set<string>();
		for (const variable of variables)
		{
			if (seen.has(variable.name)) throw new DuplicateVariableError(variable.name);
			seen.add(variable.name);
		}

		const script = parse(template, this.dialect);
		const occurrences = locate(script, variables, { strictVariables: this.options.strictVariables });
		if (occurrences.length === 0)
		{
			this.logger.debug('Template has no variable references');
			return template;
		}

		const pairs: ReplacementPair[] = [];
		for (const occurrence of occurrences)
		{
			const kind = placeholderKind(occurrence);
			const pair = createPlaceholder(kind, { occurrence, dialect: this.dialect, text: template }).replacementPair();
			if (!pairs.some(other => sameReplacement(other, pair)))
			{
				pairs.push(pair);
			}
		}
		const sql = applyReplacements(template, pairs);

		this.logger.debug('Substituted variables', {
			references: occurrences.map(occurrence => ({
				variable: occurrence.variable.name,
				kind: placeholderKind(occurrence),
				offset: occurrence.reference.start,
				values: occurrence.variable.values.length
			}))
		});
		return sql;
	}
}

/**
 * Substitutes `variables` into `template` for `dialect`.
 * @see VariableSubstitutor
 */
export function substitute(
	template: string,
	variables: readonly ScriptVariable[],
	dialect: SqlDialect | DialectName,
	options: SubstitutionOptions = {}
): string
{
	return new VariableSubstitutor(dialect, options).substitute(template, variables);
}

function sameReplacement(a: ReplacementPair, b: ReplacementPair): boolean
{
	return a.start === b.start && a.end === b.end && a.replacement === b.replacement;
}
