import { SqlDialect } from './sqlDialect';

/**
 * Connection pool status information.
 */
export interface ConnectionPoolStatus
{
	/** Total number of connections in the pool */
	totalConnections: number;
	/** Number of idle connections */
	idleConnections: number;
	/** Number of active connections */
	activeConnections: number;
	/** Maximum allowed connections */
	maxConnections: number;
	/** Minimum idle connections to maintain */
	minConnections?: number;
}

/**
 * Outcome of executing finished SQL.
 * Execution failures are reported through `error` instead of being thrown.
 */
export interface QueryResult<T = Record<string, unknown>>
{
	/** Rows returned by a query */
	rows?: T[];
	/** Rows changed by a data-modifying statement */
	affectedRows?: number;
	/** Generated key of an inserted row */
	insertId?: number | string;
	/** Error message, prefixed with `[Provider.method]` */
	error?: string;
}

/**
 * Executes finished SQL against one database.
 */
export interface DataProvider
{
	/**
	 * Connects to the database.
	 */
	connect(): Promise<void>;

	/**
	 * Disconnects from the database.
	 */
	disconnect(): Promise<void>;

	/**
	 * Executes fully substituted SQL.
	 * @param sql SQL text with every variable already replaced.
	 * @returns The query result object.
	 */
	execute<T = Record<string, unknown>>(sql: string): Promise<QueryResult<T>>;

	/**
	 * Returns the SQL dialect templates are rendered in for this database.
	 */
	getDialect(): SqlDialect;

	/**
	 * Gets the connection pool status (if applicable).
	 * Returns undefined if the provider doesn't support connection pooling.
	 */
	getPoolStatus?(): ConnectionPoolStatus | undefined;

	/**
	 * Checks if the provider supports connection pooling.
	 */
	supportsConnectionPooling?(): boolean;
}
