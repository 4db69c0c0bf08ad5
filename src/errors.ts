/**
 * @file Error taxonomy for template parsing and variable substitution.
 * Every error raised while turning a template into SQL extends {@link SqlScriptError},
 * so callers can catch the whole family at once and switch on `code`.
 */

/**
 * Base class for all substitution errors.
 */
export class SqlScriptError extends Error
{
	constructor(readonly code: string, message: string)
	{
		super(message);
		this.name = new.target.name;
	}
}

/**
 * The template is not valid SQL for the declared dialect.
 */
export class SqlSyntaxError extends SqlScriptError
{
	/** Zero-based line of the offending character */
	readonly line: number;
	/** Zero-based column of the offending character */
	readonly column: number;

	constructor(message: string, readonly offset: number, text: string)
	{
		const before = text.slice(0, offset).split('\n');
		const line = before.length - 1;
		const column = before[before.length - 1].length;
		super('SQL_SYNTAX', `${message} (line ${line + 1}, column ${column + 1})`);
		this.line = line;
		this.column = column;
	}
}

/**
 * A declared variable is never referenced by the template (strict mode only).
 */
export class VariableNotFoundError extends SqlScriptError
{
	constructor(readonly variableName: string)
	{
		super('VARIABLE_NOT_FOUND', `Variable '${variableName}' is not referenced in the template`);
	}
}

/**
 * The template references a variable that was not supplied.
 */
export class UnboundVariableError extends SqlScriptError
{
	constructor(readonly variableName: string, readonly offset: number)
	{
		super('UNBOUND_VARIABLE', `Template references undeclared variable '${variableName}' at offset ${offset}`);
	}
}

/**
 * Two supplied variables share a name.
 */
export class DuplicateVariableError extends SqlScriptError
{
	constructor(readonly variableName: string)
	{
		super('DUPLICATE_VARIABLE', `Variable '${variableName}' is declared more than once`);
	}
}

/**
 * A placeholder that needs at least one value received none.
 */
export class EmptyBindingError extends SqlScriptError
{
	constructor(readonly variableName: string, readonly placeholderKind: string)
	{
		super('EMPTY_BINDING', `Variable '${variableName}' has no bound values but is used as a ${placeholderKind} placeholder`);
	}
}

/**
 * A scalar position received more than one value.
 */
export class BindingArityError extends SqlScriptError
{
	constructor(readonly variableName: string, readonly operator: string, readonly count: number)
	{
		super('BINDING_ARITY', `Variable '${variableName}' is an operand of '${operator}' and takes exactly one value, got ${count}`);
	}
}

/**
 * A bound value does not match the variable's value type.
 */
export class InvalidValueError extends SqlScriptError
{
	constructor(readonly variableName: string, readonly value: unknown, readonly valueType: string)
	{
		super('INVALID_VALUE', `Invalid ${valueType} value for variable '${variableName}': ${String(value)}`);
	}
}

/**
 * Replacement spans overlap or no longer match the template text.
 * Always an internal bookkeeping fault, never recovered.
 */
export class OverlapError extends SqlScriptError
{
	constructor(message: string)
	{
		super('OVERLAP', message);
	}
}
