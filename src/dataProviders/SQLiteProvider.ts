import { DataProvider, ConnectionPoolStatus, QueryResult } from '../dataProvider';
import { getLogger } from '../logger';
import { SQLiteDialect, SqlDialect } from '../sqlDialect';
import { skipTrivia } from '../sqlText';
import sqlite3 from 'sqlite3';
import { open, Database } from 'sqlite';

/**
 * Connection pool configuration for SQLite.
 * Note: SQLite doesn't support true connection pooling like MySQL,
 * but we can manage multiple database handles for read operations.
 */
export interface SQLiteConnectionPoolConfig
{
	/** Whether to use connection pooling for read operations (default: false) */
	usePool?: boolean;
	/** Maximum number of read-only connections (default: 3) */
	maxReadConnections?: number;
	/** Whether to enable WAL mode for better concurrency (default: true when pooling) */
	enableWAL?: boolean;
}

/**
 * Options for connecting to a SQLite database.
 */
export interface SQLiteProviderOptions
{
	/** The file path to the SQLite database, or `:memory:`. */
	filename: string;
	/** Connection pool configuration */
	pool?: SQLiteConnectionPoolConfig;
}

/**
 * Statements answered with rows, matched after leading comments; everything else is run on the primary handle.
 */
const READ_STATEMENT = /^(SELECT|WITH|PRAGMA|EXPLAIN|VALUES)\b/i;

/**
 * A SQLite data provider that executes finished SQL, with optional read-only handles.
 */
export class SQLiteProvider implements DataProvider
{
	/** Primary database connection (used for writes and when pooling is disabled) */
	private db?: Database;
	/** Pool of read-only connections (when pooling is enabled) */
	private readPool: Database[] = [];
	private readonly options: SQLiteProviderOptions;
	private readonly usePool: boolean;
	private readonly maxReadConnections: number;
	/** Current index for round-robin read connection selection */
	private readConnectionIndex = 0;
	private readonly logger = getLogger('SQLiteProvider');
	private readonly dialect = new SQLiteDialect();

	/**
	 * Creates an instance of SQLiteProvider.
	 * @param options The SQLite database configuration.
	 */
	constructor(options: SQLiteProviderOptions)
	{
		this.options = options;
		this.usePool = options.pool?.usePool === true;
		this.maxReadConnections = options.pool?.maxReadConnections || 3;

		this.logger.debug('SQLiteProvider initialized', {
			filename: options.filename,
			usePool: this.usePool,
			maxReadConnections: this.maxReadConnections,
			enableWAL: options.pool?.enableWAL
		});
	}

	/**
	 * Initializes the database connection(s).
	 */
	async connect(): Promise<void>
	{
		this.logger.debug('Connecting to SQLite database', {
			filename: this.options.filename,
			usePool: this.usePool
		});

		this.db = await open({
			filename: this.options.filename,
			driver: sqlite3.Database,
		});

		if (this.usePool || this.options.pool?.enableWAL)
		{
			this.logger.debug('Enabling WAL mode');
			await this.db.exec('PRAGMA journal_mode = WAL;');
		}

		if (this.usePool)
		{
			this.logger.debug(`Creating ${this.maxReadConnections} read-only connections for pool`);
			for (let i = 0; i < this.maxReadConnections; i++)
			{
				const readDb = await open({
					filename: this.options.filename,
					driver: sqlite3.Database,
					mode: sqlite3.OPEN_READONLY,
				});
				this.readPool.push(readDb);
			}
			this.logger.info('Connection pool created successfully', {
				poolSize: this.readPool.length
			});
		}

		this.logger.info('SQLite database connected successfully', {
			filename: this.options.filename,
			usePool: this.usePool,
			readConnections: this.readPool.length
		});
	}

	/**
	 * Closes all database connections.
	 */
	async disconnect(): Promise<void>
	{
		this.logger.debug('Disconnecting from SQLite database');

		for (const readDb of this.readPool)
		{
			await readDb.close();
		}
		this.readPool = [];

		if (this.db)
		{
			await this.db.close();
			this.db = undefined;
		}

		this.logger.info('SQLite database disconnected successfully');
	}

	/**
	 * Executes finished SQL. Read statements return `rows` from a read handle,
	 * others return `affectedRows` and `insertId` from the primary handle.
	 */
	async execute<T = Record<string, unknown>>(sql: string): Promise<QueryResult<T>>
	{
		this.logger.debug('Executing SQLite statement', { length: sql.length });

		try
		{
			if (READ_STATEMENT.test(sql.slice(skipTrivia(sql, 0))))
			{
				const rows = await this.getReadConnection().all<T[]>(sql);
				this.logger.debug('SQLite statement returned rows', { rowCount: rows.length });
				return { rows };
			}

			const result = await this.getWriteConnection().run(sql);
			this.logger.debug('SQLite statement completed', { changes: result.changes });
			return { affectedRows: result.changes ?? 0, insertId: result.lastID };
		}
		catch (err)
		{
			const errorMsg = `[SQLiteProvider.execute] ${err instanceof Error ? err.message : String(err)}`;
			this.logger.error(errorMsg);
			return { error: errorMsg };
		}
	}

	getDialect(): SqlDialect
	{
		return this.dialect;
	}

	/**
	 * Gets the connection pool status.
	 * @returns Connection pool status or undefined if not using pooling.
	 */
	getPoolStatus(): ConnectionPoolStatus | undefined
	{
		if (!this.usePool) return undefined;

		return {
			totalConnections: this.readPool.length + (this.db ? 1 : 0),
			idleConnections: this.readPool.length,
			activeConnections: this.db ? 1 : 0,
			maxConnections: this.maxReadConnections + 1,
			minConnections: 1,
		};
	}

	/**
	 * Checks if the provider supports connection pooling.
	 * @returns Always true for SQLite provider (though limited compared to MySQL).
	 */
	supportsConnectionPooling(): boolean
	{
		return true;
	}

	/**
	 * Round-robin over the read handles, or the primary handle without a pool.
	 */
	private getReadConnection(): Database
	{
		if (this.readPool.length === 0)
		{
			return this.getWriteConnection();
		}

		const connection = this.readPool[this.readConnectionIndex];
		this.readConnectionIndex = (this.readConnectionIndex + 1) % this.readPool.length;
		return connection;
	}

	private getWriteConnection(): Database
	{
		if (!this.db) throw new Error('Not connected');
		return this.db;
	}
}
