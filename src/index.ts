/**
 * @file Main entry point of the library.
 * Exports the substitution engine, its building blocks and the `ScriptGateway`
 * that hands finished SQL to data providers.
 */
import { substitute, VariableSubstitutor } from './variableSubstitutor';
import { locate, fragmentOf } from './placeholderLocator';
import {
	createPlaceholder, placeholderKind, VariablePlaceholder,
	QueryPlaceholder, OperandPlaceholder, SimplePlaceholder, FragmentPlaceholder, IdentifierPlaceholder
} from './variablePlaceholder';
import { applyReplacements } from './replacement';
import { parse } from './sqlParser';
import { unparse, unparseScript, sqlText, sqlList, sqlKeyword } from './sqlUnparser';
import { skipTrivia, skipTriviaBackward } from './sqlText';
import { SqlDialect, MySQLDialect, PostgreSQLDialect, SQLiteDialect, getDialect, isDialectName } from './sqlDialect';
import { isFragmentVariable, isIdentifierVariable, toLiteralTexts, toIdentifierTexts, toFragmentText } from './scriptVariable';
import { runMiddlewares } from './middleware';
import { Logger, LogLevel, globalLogger, getLogger, formatEntry } from './logger';

export * from './errors';

// Type-only exports for providers that require peer dependencies
// This allows us to export the types without importing the actual implementations
export type { MySQLProviderOptions, ConnectionPoolConfig } from './dataProviders/MySQLProvider';
export type { SQLiteProviderOptions, SQLiteConnectionPoolConfig } from './dataProviders/SQLiteProvider';
export type { PostgreSQLProviderOptions, PostgreSQLConnectionPoolConfig } from './dataProviders/PostgreSQLProvider';

export type { DataProvider, ConnectionPoolStatus, QueryResult } from './dataProvider';
export type { Middleware, ScriptExecution } from './middleware';
export type { LoggerConfig, LogEntry, LogData, ContextLogger } from './logger';
export type { ScriptVariable, ScriptValue, ValueType, VariableType, QueryScript } from './scriptVariable';
export type { SubstitutionOptions } from './variableSubstitutor';
export type { Occurrence, LocateOptions, TemplateFragment, CallContext, ListItem, GrammarNode } from './placeholderLocator';
export type { PlaceholderKind, PlaceholderContext } from './variablePlaceholder';
export type { ReplacementPair } from './replacement';
export type { SqlScript, SourceSpan, VariableReference } from './sqlParser';
export type { TriviaOptions } from './sqlText';
export type { DialectName, DateTimeParts } from './sqlDialect';

export
{
	substitute, VariableSubstitutor,
	locate, fragmentOf,
	createPlaceholder, placeholderKind, VariablePlaceholder,
	QueryPlaceholder, OperandPlaceholder, SimplePlaceholder, FragmentPlaceholder, IdentifierPlaceholder,
	applyReplacements,
	parse,
	unparse, unparseScript, sqlText, sqlList, sqlKeyword,
	skipTrivia, skipTriviaBackward,
	SqlDialect, MySQLDialect, PostgreSQLDialect, SQLiteDialect, getDialect, isDialectName,
	isFragmentVariable, isIdentifierVariable, toLiteralTexts, toIdentifierTexts, toFragmentText,
	runMiddlewares,
	Logger, LogLevel, globalLogger, getLogger, formatEntry
};

export type { ScriptGatewayConfig, ProviderConfig } from './scriptGateway';
export { ScriptGateway } from './scriptGateway';
