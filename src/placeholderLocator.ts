/**
 * PlaceholderLocator - Finds every `${name}` reference in a parsed template
 *
 * The grammar tree is searched for the stand-in each reference was parsed as.
 * For each reference found the locator records the bound variable and the call
 * the reference is a direct operand of (an item of a list operand counts as a
 * direct operand of the call). References the grammar never saw, inside
 * comments or string literals, are left alone.
 *
 * @module placeholderLocator
 */

import { UnboundVariableError, VariableNotFoundError } from './errors';
import { getLogger } from './logger';
import { ScriptVariable } from './scriptVariable';
import { SourceSpan, SqlScript, VariableReference } from './sqlParser';

/**
 * Locator options.
 */
export interface LocateOptions
{
	/** Raise {@link VariableNotFoundError} for declared variables the template never references (default: false) */
	strictVariables?: boolean;
}

/**
 * A contiguous range of the original template.
 */
export interface TemplateFragment extends SourceSpan
{
	text: string;
}

/**
 * Any object of the grammar tree.
 */
export type GrammarNode = { [key: string]: unknown };

/**
 * The call a reference is an operand of.
 */
export interface CallContext
{
	node: GrammarNode;
	/** Grammar node type: `binary_expr`, `function`, `aggr_func`... */
	type: string;
	/** Upper-case operator, or the function name */
	operator: string;
	/** Operand of a binary call holding the reference, directly or inside a list */
	side?: 'left' | 'right';
}

/**
 * A list item that is a variable reference.
 */
export interface ListItem
{
	variable: ScriptVariable;
	reference: VariableReference;
}

/**
 * One reference to a variable, in the context it appears in.
 */
export interface Occurrence extends ListItem
{
	call?: CallContext;
	/** Items of the list operand holding the reference; other items are undefined */
	list?: readonly (ListItem | undefined)[];
	/** The reference is wrapped in its own parentheses */
	parenthesized: boolean;
	/** Template range of the reference */
	fragment: TemplateFragment;
}

const CALL_TYPES = new Set(['binary_expr', 'unary_expr', 'function', 'aggr_func', 'cast', 'interval', 'extract']);
const NAME_KEYS = new Set(['column', 'table', 'db', 'schema', 'as']);

const logger = getLogger('PlaceholderLocator');

export function fragmentOf(text: string, span: SourceSpan): TemplateFragment
{
	return { start: span.start, end: span.end, text: text.slice(span.start, span.end) };
}

/**
 * Locates every variable reference of `script`, ordered by source position.
 *
 * @throws UnboundVariableError if a reference names a variable that was not supplied
 * @throws VariableNotFoundError in strict mode, if a supplied variable is never referenced
 */
export function locate(script: SqlScript, variables: readonly ScriptVariable[], options: LocateOptions = {}): Occurrence[]
{
	const byName = new Map(variables.map(variable => [variable.name, variable]));
	const owners = findReferenceNodes(script);
	const occurrenceByNode = new Map<GrammarNode, Occurrence>();
	const occurrences: Occurrence[] = [];
	const lists: { occurrence: Occurrence; list: GrammarNode }[] = [];

	for (const reference of script.references)
	{
		const chain = owners.get(reference);
		if (!chain && !reference.numeric)
		{
			logger.debug('Skipping reference outside SQL code', { variable: reference.name, offset: reference.start });
			continue;
		}

		const variable = byName.get(reference.name);
		if (!variable)
		{
			throw new UnboundVariableError(reference.name, reference.start);
		}

		const occurrence: Occurrence = { variable, reference, parenthesized: false, fragment: fragmentOf(script.text, reference) };
		if (chain)
		{
			const owner = chain[chain.length - 1];
			const context = contextOf(chain);
			occurrence.parenthesized = owner.parentheses === true;
			occurrence.call = context.call;
			occurrenceByNode.set(owner, occurrence);
			if (context.list) lists.push({ occurrence, list: context.list });
		}
		occurrences.push(occurrence);
	}

	for (const { occurrence, list } of lists)
	{
		const items = Array.isArray(list.value) ? list.value : [];
		occurrence.list = items.map(item =>
		{
			const other = isGrammarNode(item) ? occurrenceByNode.get(item) : undefined;
			return other && { variable: other.variable, reference: other.reference };
		});
	}

	const referenced = new Set(occurrences.map(occurrence => occurrence.variable.name));
	for (const variable of variables)
	{
		if (referenced.has(variable.name)) continue;
		if (options.strictVariables)
		{
			throw new VariableNotFoundError(variable.name);
		}
		logger.warn('Ignoring variable not referenced by the template', { variable: variable.name, type: variable.type });
	}

	logger.debug('Located variable references', { count: occurrences.length });
	return occurrences;
}

export function isGrammarNode(value: unknown): value is GrammarNode
{
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps each reference to the chain of grammar nodes from the statement down to
 * the node standing for the reference.
 */
function findReferenceNodes(script: SqlScript): Map<VariableReference, GrammarNode[]>
{
	const standIns = new Map(script.references.map(reference => [reference.standIn.toLowerCase(), reference]));
	const found = new Map<VariableReference, GrammarNode[]>();
	const seen = new Set<GrammarNode>();
	const chain: GrammarNode[] = [];

	const visit = (value: unknown, key: string): void =>
	{
		if (typeof value === 'string')
		{
			const reference = standIns.get(value.toLowerCase());
			if (reference && !found.has(reference) && isNamePosition(key, chain))
			{
				found.set(reference, ownerChain(chain));
			}
		}
		else if (Array.isArray(value))
		{
			for (const item of value) visit(item, key);
		}
		else if (isGrammarNode(value) && !seen.has(value))
		{
			seen.add(value);
			chain.push(value);
			for (const [childKey, child] of Object.entries(value)) visit(child, childKey);
			chain.pop();
		}
	};

	for (const statement of script.statements) visit(statement, '');
	return found;
}

/**
 * Whether a name at `key` of the innermost node of `chain` is an identifier, not the text of a string literal.
 */
function isNamePosition(key: string, chain: readonly GrammarNode[]): boolean
{
	const parent = chain[chain.length - 1];
	return NAME_KEYS.has(key) || (key === 'value' && parent?.type === 'default');
}

/**
 * Cuts `chain` at the column reference wrapping the name, when there is one.
 */
function ownerChain(chain: readonly GrammarNode[]): GrammarNode[]
{
	for (let i = chain.length - 1; i >= Math.max(0, chain.length - 3); i--)
	{
		if (chain[i].type === 'column_ref') return chain.slice(0, i + 1);
	}
	return chain.slice();
}

function contextOf(chain: readonly GrammarNode[]): { call?: CallContext; list?: GrammarNode }
{
	const owner = chain[chain.length - 1];
	let list: GrammarNode | undefined;

	for (let i = chain.length - 2; i >= 0; i--)
	{
		const node = chain[i];
		const type = node.type;

		if (typeof type === 'string' && CALL_TYPES.has(type))
		{
			const call: CallContext = { node, type, operator: operatorOf(node, type) };
			if (type === 'binary_expr')
			{
				if (node.left === owner || (list && node.left === list)) call.side = 'left';
				if (node.right === owner || (list && node.right === list)) call.side = 'right';
			}
			return { call, list };
		}
		if (type === 'expr_list')
		{
			if (i === chain.length - 2) list = node;
			continue;
		}
		if (type !== undefined && type !== 'expr') break;
	}
	return {};
}

function operatorOf(node: GrammarNode, type: string): string
{
	if (typeof node.operator === 'string') return node.operator.toUpperCase();

	const { name } = node;
	if (typeof name === 'string') return name.toUpperCase();
	if (isGrammarNode(name) && Array.isArray(name.name))
	{
		return name.name.map(part => isGrammarNode(part) ? String(part.value) : String(part)).join('.').toUpperCase();
	}
	return type.toUpperCase();
}
