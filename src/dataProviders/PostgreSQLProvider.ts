import { DataProvider, ConnectionPoolStatus, QueryResult } from '../dataProvider';
import { Pool, PoolConfig, Client, ClientConfig } from 'pg';
import { getLogger } from '../logger';
import { PostgreSQLDialect, SqlDialect } from '../sqlDialect';

/**
 * Connection pool configuration options for PostgreSQL.
 */
export interface PostgreSQLConnectionPoolConfig
{
	/** Whether to use connection pooling (default: true) */
	usePool?: boolean;
	/** Maximum number of connections in the pool (default: 10) */
	max?: number;
	/** Minimum number of connections to maintain (default: 0) */
	min?: number;
	/** Maximum number of milliseconds a client can be idle before being closed (default: 10000) */
	idleTimeoutMillis?: number;
	/** Maximum number of milliseconds to wait for a connection (default: 30000) */
	connectionTimeoutMillis?: number;
	/** Whether the pool may let the process exit while clients are idle (default: false) */
	allowExitOnIdle?: boolean;
}

/**
 * PostgreSQL connection options, extending `ClientConfig` from `pg` with pool configuration.
 */
export interface PostgreSQLProviderOptions extends ClientConfig
{
	/** Connection pool configuration */
	pool?: PostgreSQLConnectionPoolConfig;
}

/**
 * A PostgreSQL data provider that executes finished SQL, with connection pooling support.
 */
export class PostgreSQLProvider implements DataProvider
{
	/**
	 * The PostgreSQL client instance (used when pooling is disabled).
	 */
	private client?: Client;

	/**
	 * The PostgreSQL connection pool instance (used when pooling is enabled).
	 */
	private pool?: Pool;

	private readonly options: PostgreSQLProviderOptions;
	private readonly usePool: boolean;
	private readonly logger = getLogger('PostgreSQLProvider');
	private readonly dialect = new PostgreSQLDialect();

	/**
	 * Constructor that takes connection options.
	 * @param options The PostgreSQL provider options.
	 */
	constructor(options: PostgreSQLProviderOptions)
	{
		this.options = options;
		this.usePool = options.pool?.usePool !== false;
		this.logger.debug('PostgreSQLProvider initialized', {
			host: options.host,
			database: options.database,
			usePool: this.usePool,
			max: options.pool?.max || 10
		});
	}

	/**
	 * Connects to the PostgreSQL database using either a connection pool or a single client.
	 */
	async connect(): Promise<void>
	{
		this.logger.debug('Connecting to PostgreSQL database', { usePool: this.usePool });
		const { pool: poolConfig = {}, ...clientConfig } = this.options;

		if (this.usePool)
		{
			const poolOptions: PoolConfig = {
				...clientConfig,
				max: poolConfig.max || 10,
				min: poolConfig.min || 0,
				idleTimeoutMillis: poolConfig.idleTimeoutMillis || 10000,
				connectionTimeoutMillis: poolConfig.connectionTimeoutMillis || 30000,
				allowExitOnIdle: poolConfig.allowExitOnIdle || false,
			};

			this.logger.debug('Creating PostgreSQL connection pool', {
				max: poolOptions.max,
				min: poolOptions.min,
				idleTimeoutMillis: poolOptions.idleTimeoutMillis
			});

			this.pool = new Pool(poolOptions);

			try
			{
				this.logger.debug('Testing connection pool with simple query');
				const testClient = await this.pool.connect();
				await testClient.query('SELECT 1');
				testClient.release();
				this.logger.info('PostgreSQL connection pool created successfully');
			}
			catch (error)
			{
				this.logger.error('Connection pool test failed', { error: error instanceof Error ? error.message : String(error) });
				await this.pool.end();
				this.pool = undefined;
				throw error;
			}
		}
		else
		{
			this.logger.debug('Creating single PostgreSQL client');
			this.client = new Client(clientConfig);
			await this.client.connect();
			this.logger.info('PostgreSQL single client connected successfully');
		}
	}

	/**
	 * Closes the PostgreSQL connection or connection pool.
	 */
	async disconnect(): Promise<void>
	{
		this.logger.debug('Disconnecting from PostgreSQL database');

		if (this.pool)
		{
			await this.pool.end();
			this.pool = undefined;
			this.logger.info('Connection pool ended successfully');
		}
		else if (this.client)
		{
			await this.client.end();
			this.client = undefined;
			this.logger.info('Client connection ended successfully');
		}
	}

	/**
	 * Executes finished SQL. SELECT statements return `rows`, others `affectedRows`.
	 */
	async execute<T = Record<string, unknown>>(sql: string): Promise<QueryResult<T>>
	{
		this.logger.debug('Executing PostgreSQL statement', { length: sql.length });

		try
		{
			const result = this.pool
				? await this.pool.query(sql)
				: await this.requireClient().query(sql);

			if (result.command === 'SELECT')
			{
				this.logger.debug('PostgreSQL statement returned rows', { rowCount: result.rows.length });
				return { rows: result.rows };
			}

			this.logger.debug('PostgreSQL statement completed', { command: result.command, rowCount: result.rowCount });
			return { affectedRows: result.rowCount ?? 0 };
		}
		catch (err)
		{
			const errorMsg = `[PostgreSQLProvider.execute] ${err instanceof Error ? err.message : String(err)}`;
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

		return {
			totalConnections: this.pool.totalCount,
			idleConnections: this.pool.idleCount,
			activeConnections: this.pool.totalCount - this.pool.idleCount,
			maxConnections: this.options.pool?.max || 10,
			minConnections: this.options.pool?.min || 0,
		};
	}

	/**
	 * Checks if the provider supports connection pooling.
	 * @returns Always true for PostgreSQL provider.
	 */
	supportsConnectionPooling(): boolean
	{
		return true;
	}

	private requireClient(): Client
	{
		if (!this.client)
		{
			throw new Error('Not connected');
		}
		return this.client;
	}
}
