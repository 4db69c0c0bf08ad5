/**
 * VariablePlaceholder - The closed set of ways a variable is rendered into SQL
 *
 * Every placeholder binds one located reference to the dialect and the template
 * text, and produces a {@link ReplacementPair}. Most kinds replace the reference
 * itself; a query placeholder with an empty binding takes over the operator as
 * well and turns the predicate into a null test of its left operand. Placeholders
 * are stateless and computing a replacement has no side effects.
 *
 * | Kind         | Position                                   | Empty binding                       |
 * |--------------|--------------------------------------------|-------------------------------------|
 * | `query`      | right of `=`, `<>`, `IN`, `LIKE`...        | `IS NULL` / `IS NOT NULL` predicate |
 * | `operand`    | any other call                             | {@link EmptyBindingError}           |
 * | `simple`     | outside any call                           | {@link EmptyBindingError}           |
 * | `fragment`   | anywhere                                   | {@link EmptyBindingError}           |
 * | `identifier` | anywhere                                   | {@link EmptyBindingError}           |
 *
 * @module variablePlaceholder
 */

import { BindingArityError, EmptyBindingError, SqlSyntaxError } from './errors';
import { CallContext, ListItem, Occurrence } from './placeholderLocator';
import { ReplacementPair } from './replacement';
import { isFragmentVariable, isIdentifierVariable, toFragmentText, toIdentifierTexts, toLiteralTexts } from './scriptVariable';
import { SqlDialect } from './sqlDialect';
import { skipTrivia, skipTriviaBackward } from './sqlText';
import { sqlKeyword, sqlList, sqlText, unparse } from './sqlUnparser';

export type PlaceholderKind = 'query' | 'operand' | 'simple' | 'fragment' | 'identifier';

/**
 * Everything a placeholder needs to compute its replacement.
 */
export interface PlaceholderContext
{
	occurrence: Occurrence;
	dialect: SqlDialect;
	/** Full template text */
	text: string;
}

/**
 * Operators whose right-hand side is a value filter.
 */
const QUERY_OPERATORS = new Set(['=', '==', '<>', '!=', 'IN', 'NOT IN', 'LIKE', 'NOT LIKE', 'ILIKE', 'NOT ILIKE']);
const NEGATIVE_OPERATORS = new Set(['<>', '!=', 'NOT IN', 'NOT LIKE', 'NOT ILIKE']);
const PATTERN_OPERATORS = new Set(['LIKE', 'NOT LIKE', 'ILIKE', 'NOT ILIKE']);
const BOOLEAN_OPERATORS = new Set(['AND', 'OR', 'XOR', 'NOT']);
const FUNCTION_TYPES = new Set(['function', 'aggr_func']);

/**
 * Picks the placeholder kind for one occurrence.
 */
export function placeholderKind(occurrence: Pick<Occurrence, 'variable' | 'call'>): PlaceholderKind
{
	const { variable, call } = occurrence;

	if (isFragmentVariable(variable)) return 'fragment';
	if (isIdentifierVariable(variable)) return 'identifier';
	if (!call) return 'simple';
	if (call.type === 'binary_expr' && call.side === 'right' && QUERY_OPERATORS.has(call.operator)) return 'query';
	return 'operand';
}

/**
 * Base class of all placeholder kinds.
 */
export abstract class VariablePlaceholder
{
	abstract readonly kind: PlaceholderKind;

	constructor(protected readonly context: PlaceholderContext)
	{
	}

	/**
	 * The template range to replace and its rendered replacement.
	 */
	abstract replacementPair(): ReplacementPair;

	protected get name(): string
	{
		return this.context.occurrence.variable.name;
	}

	protected pair(start: number, end: number, replacement: string): ReplacementPair
	{
		return { originalFragment: this.context.text.slice(start, end), replacement, start, end };
	}

	protected referencePair(replacement: string): ReplacementPair
	{
		const { reference } = this.context.occurrence;
		return this.pair(reference.start, reference.end, replacement);
	}

	/**
	 * Bound values rendered as dialect literals.
	 */
	protected literals(): string[]
	{
		return toLiteralTexts(this.context.occurrence.variable, this.context.dialect);
	}

	protected render(texts: string[], parenthesized = false): string
	{
		const { dialect } = this.context;
		return texts.length === 1 && !parenthesized
			? unparse(sqlText(texts[0]), dialect)
			: unparse(sqlList(texts.map(sqlText), parenthesized), dialect);
	}

	protected call(): CallContext
	{
		const { call } = this.context.occurrence;
		if (!call)
		{
			throw new Error(`Placeholder '${this.kind}' for '${this.name}' needs an enclosing call`);
		}
		return call;
	}
}

/**
 * Value filter on the right of `=`, `<>`, `!=`, `IN`, `LIKE` and their negations.
 * An empty binding turns the whole predicate into a null test of its left operand.
 */
export class QueryPlaceholder extends VariablePlaceholder
{
	readonly kind = 'query';

	replacementPair(): ReplacementPair
	{
		const call = this.call();
		const { reference, list } = this.context.occurrence;
		const values = this.literals();
		const negative = NEGATIVE_OPERATORS.has(call.operator);

		if (list)
		{
			return this.listPair(call, list, values, negative);
		}
		if (values.length === 0)
		{
			return this.pair(this.operatorStart(call, reference.start), reference.end, this.nullTest(negative));
		}
		if (call.operator === 'IN' || call.operator === 'NOT IN')
		{
			return this.referencePair(this.render(values, true));
		}
		if (values.length === 1)
		{
			return this.referencePair(this.render(values));
		}
		if (PATTERN_OPERATORS.has(call.operator))
		{
			throw new BindingArityError(this.name, call.operator, values.length);
		}

		// equality against several values becomes a membership test
		const membership = `${unparse(sqlKeyword(negative ? 'not in' : 'in'), this.context.dialect)} ${this.render(values, true)}`;
		return this.pair(this.operatorStart(call, reference.start), reference.end, membership);
	}

	/**
	 * Reference inside a list such as `IN ('a', ${b}, ${c})`. Values take the reference's
	 * place; empty references are dropped with their commas, and a list left with
	 * nothing becomes a null test.
	 */
	private listPair(call: CallContext, list: readonly (ListItem | undefined)[], values: string[], negative: boolean): ReplacementPair
	{
		const { reference } = this.context.occurrence;
		const { text, dialect } = this.context;

		if (values.length > 0)
		{
			return this.referencePair(this.render(values));
		}

		const removable = (item: ListItem | undefined): item is ListItem =>
			item !== undefined && !isFragmentVariable(item.variable) && !isIdentifierVariable(item.variable) && item.variable.values.length === 0;

		const first = list[0];
		const last = list[list.length - 1];
		if (list.every(removable) && removable(first) && removable(last))
		{
			const open = skipTriviaBackward(text, first.reference.start) - 1;
			const close = skipTrivia(text, last.reference.end, dialect);
			if (text[open] !== '(' || text[close] !== ')')
			{
				throw new SqlSyntaxError(`Expected parentheses around the list holding '${this.name}'`, reference.start, text);
			}
			return this.pair(this.operatorStart(call, open), close + 1, this.nullTest(negative));
		}

		const index = list.findIndex(item => item?.reference === reference);
		let from = index;
		let to = index;
		while (from > 0 && removable(list[from - 1])) from--;
		while (to < list.length - 1 && removable(list[to + 1])) to++;

		const runStart = list[from];
		const runEnd = list[to];
		if (!removable(runStart) || !removable(runEnd))
		{
			throw new Error(`Reference to '${this.name}' is not an item of its list`);
		}

		if (to < list.length - 1)
		{
			const comma = skipTrivia(text, runEnd.reference.end, dialect);
			this.expectComma(comma);
			return this.pair(runStart.reference.start, skipTrivia(text, comma + 1, dialect), '');
		}

		const comma = skipTriviaBackward(text, runStart.reference.start) - 1;
		this.expectComma(comma);
		return this.pair(skipTriviaBackward(text, comma), runEnd.reference.end, '');
	}

	private expectComma(offset: number): void
	{
		if (this.context.text[offset] !== ',')
		{
			throw new SqlSyntaxError(`Expected ',' next to '${this.name}'`, offset, this.context.text);
		}
	}

	private nullTest(negative: boolean): string
	{
		return unparse(sqlKeyword(negative ? 'is not null' : 'is null'), this.context.dialect);
	}

	/**
	 * Offset where the call's operator is written, searching back from its right operand.
	 */
	private operatorStart(call: CallContext, rightStart: number): number
	{
		const { text } = this.context;
		const match = operatorPattern(call.operator).exec(text.slice(0, skipTriviaBackward(text, rightStart)));
		if (!match)
		{
			throw new SqlSyntaxError(`Expected '${call.operator}' before the value of '${this.name}'`, rightStart, text);
		}
		return match.index;
	}
}

/**
 * Operand of any other call: functions, arithmetic, ordering comparisons, `BETWEEN`...
 * Function arguments take every value; other positions take exactly one.
 */
export class OperandPlaceholder extends VariablePlaceholder
{
	readonly kind = 'operand';

	replacementPair(): ReplacementPair
	{
		const call = this.call();
		const values = this.literals();

		if (values.length === 0)
		{
			throw new EmptyBindingError(this.name, this.kind);
		}
		if (!FUNCTION_TYPES.has(call.type) && values.length > 1)
		{
			throw new BindingArityError(this.name, call.operator, values.length);
		}
		return this.referencePair(this.render(values));
	}
}

/**
 * Standalone reference (select list, `LIMIT`, `CASE` results...): comma-separated literals.
 */
export class SimplePlaceholder extends VariablePlaceholder
{
	readonly kind = 'simple';

	replacementPair(): ReplacementPair
	{
		const values = this.literals();
		if (values.length === 0)
		{
			throw new EmptyBindingError(this.name, this.kind);
		}
		return this.referencePair(this.render(values));
	}
}

/**
 * Raw SQL text inserted as written, in parentheses when it is an operand of `AND`, `OR` or `NOT`.
 */
export class FragmentPlaceholder extends VariablePlaceholder
{
	readonly kind = 'fragment';

	replacementPair(): ReplacementPair
	{
		const { variable, call, parenthesized } = this.context.occurrence;
		if (variable.values.length === 0)
		{
			throw new EmptyBindingError(this.name, this.kind);
		}

		const grouped = call !== undefined && BOOLEAN_OPERATORS.has(call.operator) && !parenthesized;
		return this.referencePair(this.render([toFragmentText(variable)], grouped));
	}
}

/**
 * Table or column names, quoted for the dialect.
 */
export class IdentifierPlaceholder extends VariablePlaceholder
{
	readonly kind = 'identifier';

	replacementPair(): ReplacementPair
	{
		const names = toIdentifierTexts(this.context.occurrence.variable, this.context.dialect);
		if (names.length === 0)
		{
			throw new EmptyBindingError(this.name, this.kind);
		}
		return this.referencePair(this.render(names));
	}
}

/**
 * Creates the placeholder of the given kind.
 */
export function createPlaceholder(kind: PlaceholderKind, context: PlaceholderContext): VariablePlaceholder
{
	switch (kind)
	{
		case 'query':
			return new QueryPlaceholder(context);
		case 'operand':
			return new OperandPlaceholder(context);
		case 'simple':
			return new SimplePlaceholder(context);
		case 'fragment':
			return new FragmentPlaceholder(context);
		case 'identifier':
			return new IdentifierPlaceholder(context);
	}
}

/**
 * Matches the operator at the end of the text; `<>` and `!=` are interchangeable, as are `=` and `==`.
 */
function operatorPattern(operator: string): RegExp
{
	const spellings = operator === '<>' || operator === '!=' ? ['<>', '!='] : operator === '=' || operator === '==' ? ['==', '='] : [operator];
	const alternatives = spellings.map(spelling => spelling
		.split(/\s+/)
		.map(word => /^\w/.test(word) ? `\\b${word}` : word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
		.join('\\s+'));
	return new RegExp(`(?:${alternatives.join('|')})$`, 'i');
}
