import { DataProvider, ConnectionPoolStatus, QueryResult } from '../dataProvider';
import mysql, { Connection, ConnectionOptions, Pool, PoolOptions } from 'mysql2/promise';
import { getLogger } from '../logger';
import { MySQLDialect, SqlDialect } from '../sqlDialect';

/**
 * Connection pool configuration options.
 */
export interface ConnectionPoolConfig
{
	/** Whether to use connection pooling (default: true) */
	usePool?: boolean;
	/** Maximum number of connections in the pool (default: 10) */
	connectionLimit?: number;
	/** Maximum number of connection requests in the queue (default: 0, no limit) */
	queueLimit?: number;
	/** Timeout for idle connections in milliseconds */
	idleTimeout?: number;
	/** Whether to test a pooled connection while connecting (default: false) */
	preConnect?: boolean;
}

/**
 * MySQL connection options, extending `ConnectionOptions` from `mysql2/promise` with pool configuration.
 */
export interface MySQLProviderOptions extends ConnectionOptions
{
	/** Connection pool configuration */
	pool?: ConnectionPoolConfig;
}

/**
 * Number of entries of an internal mysql2 connection list.
 */
function countOf(pool: object, key: string): number
{
	const list: unknown = Reflect.get(pool, key);
	return Array.isArray(list) ? list.length : 0;
}

/**
 * A MySQL data provider that executes finished SQL, with connection pooling support.
 */
export class MySQLProvider implements DataProvider
{
	/**
	 * The MySQL connection instance (used when pooling is disabled).
	 */
	private connection?: Connection;

	/**
	 * The MySQL connection pool instance (used when pooling is enabled).
	 */
	private pool?: Pool;

	private readonly options: MySQLProviderOptions;
	private readonly usePool: boolean;
	private readonly logger = getLogger('MySQLProvider');
	private readonly dialect = new MySQLDialect();

	/**
	 * Constructor that takes connection options.
	 * @param options The MySQL provider options.
	 */
	constructor(options: MySQLProviderOptions)
	{
		// utf8mb4 unless the caller picks another charset
		this.options = {
			charset: 'utf8mb4',
			...options,
		};
		this.usePool = options.pool?.usePool !== false;
		this.logger.debug('MySQLProvider initialized', {
			host: options.host,
			database: options.database,
			usePool: this.usePool,
			connectionLimit: options.pool?.connectionLimit || 10,
			charset: this.options.charset
		});

		if (this.options.charset && this.options.charset.toLowerCase() !== 'utf8mb4')
		{
			this.logger.warn('MySQL charset is not utf8mb4. Emoji and some Unicode characters may not be returned correctly.', {
				charset: this.options.charset
			});
		}
	}

	/**
	 * Connects to the MySQL database using either a connection pool or a single connection.
	 */
	async connect(): Promise<void>
	{
		this.logger.debug('Connecting to MySQL database', { usePool: this.usePool });
		const { pool: poolConfig = {}, ...connectionOptions } = this.options;

		if (this.usePool)
		{
			const poolOptions: PoolOptions = {
				...connectionOptions,
				connectionLimit: poolConfig.connectionLimit || 10,
				queueLimit: poolConfig.queueLimit || 0,
			};
			if (poolConfig.idleTimeout !== undefined)
			{
				poolOptions.idleTimeout = poolConfig.idleTimeout;
			}

			this.logger.debug('Creating MySQL connection pool', {
				connectionLimit: poolOptions.connectionLimit,
				queueLimit: poolOptions.queueLimit
			});

			this.pool = mysql.createPool(poolOptions);

			if (poolConfig.preConnect)
			{
				try
				{
					this.logger.debug('Testing connection pool with ping');
					const testConnection = await this.pool.getConnection();
					await testConnection.ping();
					testConnection.release();
					this.logger.debug('Connection pool test successful');
				}
				catch (error)
				{
					this.logger.error('Connection pool test failed', { error: error instanceof Error ? error.message : String(error) });
					await this.pool.end();
					this.pool = undefined;
					throw error;
				}
			}

			this.logger.info('MySQL connection pool created successfully');
		}
		else
		{
			this.logger.debug('Creating single MySQL connection');
			this.connection = await mysql.createConnection(connectionOptions);
			this.logger.info('MySQL single connection created successfully');
		}
	}

	/**
	 * Closes the MySQL connection or connection pool.
	 */
	async disconnect(): Promise<void>
	{
		this.logger.debug('Disconnecting from MySQL database');

		if (this.pool)
		{
			await this.pool.end();
			this.pool = undefined;
			this.logger.info('MySQL connection pool closed');
		}
		else if (this.connection)
		{
			await this.connection.end();
			this.connection = undefined;
			this.logger.info('MySQL single connection closed');
		}
	}

	/**
	 * Executes finished SQL. Row sets come back as `rows`, data-modifying
	 * statements as `affectedRows` and `insertId`.
	 */
	async execute<T = Record<string, unknown>>(sql: string): Promise<QueryResult<T>>
	{
		this.logger.debug('Executing MySQL statement', { length: sql.length });

		try
		{
			const [result] = this.pool
				? await this.pool.query(sql)
				: await this.requireConnection().query(sql);

			if (Array.isArray(result))
			{
				this.logger.debug('MySQL statement returned rows', { rowCount: result.length });
				return { rows: result as T[] };
			}

			this.logger.debug('MySQL statement completed', { affectedRows: result.affectedRows });
			return { affectedRows: result.affectedRows, insertId: result.insertId };
		}
		catch (err)
		{
			const errorMsg = `[MySQLProvider.execute] ${err instanceof Error ? err.message : String(err)}`;
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
		if (!this.pool) return undefined;

		// counts live on the callback pool wrapped by the promise API
		const corePool: unknown = Reflect.get(this.pool, 'pool');
		const source = typeof corePool === 'object' && corePool !== null ? corePool : this.pool;
		const total = countOf(source, '_allConnections');
		const idle = countOf(source, '_freeConnections');

		return {
			totalConnections: total,
			idleConnections: idle,
			activeConnections: Math.max(0, total - idle),
			maxConnections: this.options.pool?.connectionLimit || 10,
			minConnections: 0,
		};
	}

	/**
	 * Checks if the provider supports connection pooling.
	 * @returns Always true for MySQL provider.
	 */
	supportsConnectionPooling(): boolean
	{
		return true;
	}

	private requireConnection(): Connection
	{
		if (!this.connection)
		{
			throw new Error('Not connected');
		}
		return this.connection;
	}
}
